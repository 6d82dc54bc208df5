import { describe, it, expect, vi } from 'vitest';
import type { CommandResult, CommandRunner } from '@cutline/utils';
import { CapabilityProber, dryRunArgs, getCapabilityProber, parseEncoderList } from './capabilities.js';

const ENCODER_LISTING = `Encoders:
 V..... = Video
 A..... = Audio
 S..... = Subtitle
 .F.... = Frame-level multithreading
 ------
 V....D libx264              libx264 H.264 / AVC / MPEG-4 AVC / MPEG-4 part 10 (codec h264)
 V....D h264_amf             AMD AMF H.264 Encoder (codec h264)
 V....D h264_nvenc           NVIDIA NVENC H.264 encoder (codec h264)
 V..... h264_qsv             H.264 / AVC / MPEG-4 AVC / MPEG-4 part 10 (Intel Quick Sync Video acceleration) (codec h264)
 A....D aac                  AAC (Advanced Audio Coding)
`;

function result(exitCode: number, stdout = '', stderr = ''): CommandResult {
  return { exitCode, stdout, stderr, duration: 1, timedOut: false };
}

/**
 * Fake ffmpeg: lists the encoders above and succeeds the dry run only for
 * the given codecs.
 */
function fakeFfmpeg(working: string[]) {
  return vi.fn<CommandRunner>(async (_command, args) => {
    if (args.includes('-encoders')) {
      return result(0, ENCODER_LISTING);
    }
    const codec = args[args.indexOf('-c:v') + 1] ?? '';
    return working.includes(codec) ? result(0) : result(1, '', `Cannot load ${codec}`);
  });
}

describe('parseEncoderList', () => {
  it('collects encoder names and skips the legend', () => {
    const encoders = parseEncoderList(ENCODER_LISTING);
    expect([...encoders].sort()).toEqual(['aac', 'h264_amf', 'h264_nvenc', 'h264_qsv', 'libx264']);
  });
});

describe('CapabilityProber', () => {
  it('prefers NVENC when its dry run succeeds', async () => {
    const runner = fakeFfmpeg(['h264_nvenc', 'h264_qsv']);
    const report = await new CapabilityProber({ runner }).probe();
    expect(report.capability).toBe('nvenc');
    expect(runner).toHaveBeenCalledWith('ffmpeg', dryRunArgs('h264_nvenc'), { timeout: 15000 });
  });

  it('falls through to the next listed candidate', async () => {
    const runner = fakeFfmpeg(['h264_qsv']);
    const report = await new CapabilityProber({ runner }).probe();
    expect(report.capability).toBe('qsv');
    // listing + nvenc + amf + qsv
    expect(runner).toHaveBeenCalledTimes(4);
  });

  it('falls back to the software encoder when every dry run fails', async () => {
    const report = await new CapabilityProber({ runner: fakeFfmpeg([]) }).probe();
    expect(report.capability).toBe('cpu');
    expect(report.encoders?.has('libx264')).toBe(true);
  });

  it('falls back to the software encoder when ffmpeg cannot run', async () => {
    const runner = vi.fn<CommandRunner>().mockRejectedValue(new Error('spawn ffmpeg ENOENT'));
    const report = await new CapabilityProber({ runner }).probe();
    expect(report).toMatchObject({ capability: 'cpu', encoders: null });
  });

  it('skips dry runs when hardware acceleration is off', async () => {
    const runner = fakeFfmpeg(['h264_nvenc']);
    const report = await new CapabilityProber({ runner, hardwareAcceleration: false }).probe();
    expect(report.capability).toBe('cpu');
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('probes once for concurrent callers and again after invalidation', async () => {
    const runner = fakeFfmpeg(['h264_nvenc']);
    const prober = new CapabilityProber({ ffmpegPath: '/opt/ffmpeg', runner });

    const [first, second] = await Promise.all([prober.probe(), prober.probe()]);
    expect(first).toBe(second);
    expect(runner).toHaveBeenCalledTimes(2);

    prober.invalidate();
    const third = await prober.probe();
    expect(third).not.toBe(first);
    expect(runner).toHaveBeenCalledTimes(4);
    expect(runner.mock.calls[0]?.[0]).toBe('/opt/ffmpeg');
  });
});

describe('getCapabilityProber', () => {
  it('shares one prober per binary and acceleration setting', () => {
    const accelerated = getCapabilityProber({ ffmpegPath: '/opt/a/ffmpeg', hardwareAcceleration: true });
    expect(getCapabilityProber({ ffmpegPath: '/opt/a/ffmpeg', hardwareAcceleration: true })).toBe(accelerated);

    const software = getCapabilityProber({ ffmpegPath: '/opt/b/ffmpeg', hardwareAcceleration: false });
    expect(software).not.toBe(accelerated);
    expect(software.ffmpegPath).toBe('/opt/b/ffmpeg');
    expect(software.hardwareAcceleration).toBe(false);

    const sameBinaryNoHardware = getCapabilityProber({ ffmpegPath: '/opt/a/ffmpeg', hardwareAcceleration: false });
    expect(sameBinaryNoHardware).not.toBe(accelerated);
    expect(sameBinaryNoHardware.hardwareAcceleration).toBe(false);
  });

  it('defaults to ffmpeg on the PATH with acceleration on', () => {
    const prober = getCapabilityProber();
    expect(prober.ffmpegPath).toBe('ffmpeg');
    expect(prober.hardwareAcceleration).toBe(true);
    expect(getCapabilityProber({ ffmpegPath: 'ffmpeg', hardwareAcceleration: true })).toBe(prober);
  });
});
