import { describe, it, expect } from 'vitest';
import {
  EtaEstimator,
  FFmpegProgressParser,
  formatProgress,
  parseClock,
  parseProgressLine,
} from './progressParser.js';

const BLOCK = [
  'frame=250',
  'fps=50.00',
  'bitrate=1200.5kbits/s',
  'total_size=1500000',
  'out_time_us=10000000',
  'out_time_ms=10000000',
  'out_time=00:00:10.000000',
  'dup_frames=0',
  'drop_frames=0',
  'speed=2.5x',
  'progress=continue',
  '',
].join('\n');

describe('parseClock', () => {
  it('reads hours, minutes and fractional seconds', () => {
    expect(parseClock('01:02:03.5')).toBe(3723.5);
    expect(parseClock('02:30')).toBe(150);
  });

  it('rejects negative and malformed clocks', () => {
    expect(parseClock('-00:00:01.00')).toBeNull();
    expect(parseClock('N/A')).toBeNull();
    expect(parseClock('1:2:3:4')).toBeNull();
  });
});

describe('parseProgressLine', () => {
  it('reads microsecond timestamps', () => {
    expect(parseProgressLine('out_time_us=1500000')).toEqual({ kind: 'time', seconds: 1.5 });
    expect(parseProgressLine('out_time_ms=1500000')).toEqual({ kind: 'time', seconds: 1.5 });
  });

  it('reads block terminators', () => {
    expect(parseProgressLine('progress=continue')).toEqual({ kind: 'block', ended: false });
    expect(parseProgressLine('progress=end\r')).toEqual({ kind: 'block', ended: true });
  });

  it('reads classic stats lines', () => {
    const line = 'frame= 1000 fps=24.5 q=28.0 size=    1234kB time=00:00:42.00 bitrate= 240.5kbits/s dup=0 drop=0 speed=2.01x';
    expect(parseProgressLine(line)).toEqual({ kind: 'stats', seconds: 42, speed: 2.01 });
  });

  it('skips values it cannot use', () => {
    expect(parseProgressLine('out_time_us=N/A')).toBeNull();
    expect(parseProgressLine('out_time_us=-9223372036854775807')).toBeNull();
    expect(parseProgressLine('out_time=-577014:32:22.775808')).toBeNull();
    expect(parseProgressLine('speed=N/A')).toBeNull();
    expect(parseProgressLine('progress=maybe')).toBeNull();
    expect(parseProgressLine('bitrate=1200kbits/s')).toBeNull();
    expect(parseProgressLine('[h264 @ 0x55] non-existing PPS 0 referenced')).toBeNull();
    expect(parseProgressLine('=5')).toBeNull();
    expect(parseProgressLine('   ')).toBeNull();
    expect(parseProgressLine('frame=  10 fps=0.0 q=0.0 size=0kB time=N/A bitrate=N/A')).toBeNull();
  });
});

describe('FFmpegProgressParser', () => {
  it('emits one update per block', () => {
    const parser = new FFmpegProgressParser();
    expect(parser.feed(BLOCK)).toEqual([{ processedSeconds: 10, speed: 2.5, ended: false }]);
  });

  it('reassembles lines split across chunks', () => {
    const parser = new FFmpegProgressParser();
    expect(parser.feed('out_time_us=2000')).toEqual([]);
    expect(parser.feed('000\nspeed=1.')).toEqual([]);
    expect(parser.feed('25x\nprogr')).toEqual([]);
    expect(parser.feed('ess=continue\n')).toEqual([{ processedSeconds: 2, speed: 1.25, ended: false }]);
  });

  it('never moves backwards', () => {
    const parser = new FFmpegProgressParser();
    parser.feed('out_time_us=5000000\nprogress=continue\n');
    const updates = parser.feed('out_time_us=3000000\nprogress=continue\n');
    expect(updates).toEqual([{ processedSeconds: 5, speed: null, ended: false }]);
    expect(parser.processedSeconds).toBe(5);
  });

  it('survives garbage between blocks', () => {
    const parser = new FFmpegProgressParser();
    const updates = parser.feed('garbage\u0000line\nout_time_us=N/A\nout_time=00:00:03.000000\n\nprogress=end\n');
    expect(updates).toEqual([{ processedSeconds: 3, speed: null, ended: true }]);
  });

  it('handles carriage-return separated stats lines', () => {
    const parser = new FFmpegProgressParser();
    const updates = parser.feed(
      'frame=  10 size=1kB time=00:00:01.00 speed=1.0x\rframe=  20 size=2kB time=00:00:02.00 speed=1.5x\r'
    );
    expect(updates).toEqual([
      { processedSeconds: 1, speed: 1, ended: false },
      { processedSeconds: 2, speed: 1.5, ended: false },
    ]);
  });

  it('flushes a trailing unterminated line on end', () => {
    const parser = new FFmpegProgressParser();
    parser.feed('out_time_us=7000000\n');
    expect(parser.end()).toEqual([]);

    parser.feed('progress=end');
    expect(parser.end()).toEqual([{ processedSeconds: 7, speed: null, ended: true }]);
  });
});

describe('EtaEstimator', () => {
  it('returns nothing before any progress', () => {
    expect(new EtaEstimator(100).update(0, 5)).toBeNull();
    expect(new EtaEstimator(0).update(10, 5)).toBeNull();
  });

  it('extrapolates from elapsed time', () => {
    const estimator = new EtaEstimator(100);
    expect(estimator.update(25, 10)).toEqual({ percent: 0.25, etaSeconds: 30 });
  });

  it('smooths successive estimates', () => {
    const estimator = new EtaEstimator(100, 0.3);
    estimator.update(25, 10);
    const estimate = estimator.update(50, 20);
    expect(estimate?.percent).toBe(0.5);
    // raw 20 blended with the previous 30
    expect(estimate?.etaSeconds).toBeCloseTo(27, 9);
  });

  it('clamps to completion', () => {
    const estimator = new EtaEstimator(100);
    estimator.update(50, 10);
    expect(estimator.update(120, 30)).toEqual({ percent: 1, etaSeconds: 0 });
  });

  it('never goes negative', () => {
    const estimator = new EtaEstimator(10);
    expect(estimator.update(5, -4)?.etaSeconds).toBe(0);
  });
});

describe('formatProgress', () => {
  it('renders percent, speed and eta', () => {
    expect(formatProgress({
      jobId: 'job-1',
      processedSeconds: 42,
      totalSeconds: 100,
      percent: 0.42,
      elapsedSeconds: 20,
      etaSeconds: 65,
      speed: 1.5,
    })).toBe('42.0% | 1.50x | ETA 1m 5s');
  });

  it('omits an unknown speed', () => {
    expect(formatProgress({
      jobId: 'job-1',
      processedSeconds: 1,
      totalSeconds: 10,
      percent: 0.1,
      elapsedSeconds: 1,
      etaSeconds: 9,
      speed: null,
    })).toBe('10.0% | ETA 9s');
  });
});
