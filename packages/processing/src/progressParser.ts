/**
 * Progress Parser
 *
 * Extracts a monotonic processed-time from the encoder's progress output
 * and turns it into percent and a smoothed ETA.
 *
 * Accepted grammar, one record per line (`\n`, `\r\n` or `\r`):
 *
 *   block line   := key "=" value            (from `-progress pipe:1`)
 *     out_time_us | out_time_ms := integer microseconds
 *     out_time                  := clock
 *     speed                     := number "x" | "N/A"
 *     progress                  := "continue" | "end"   (closes a block)
 *   stats line   := ("frame" | "size") "=" ... "time=" clock ... ["speed=" number "x"]
 *   clock        := [hours ":"] minutes ":" seconds ["." fraction]
 *
 * Unknown keys, `N/A`, negative times and anything else that does not fit
 * the grammar are skipped. Times never move backwards.
 */

import { formatDuration } from '@cutline/utils';
import type { ProgressSample } from './types.js';

export type ProgressToken =
  | { kind: 'time'; seconds: number }
  | { kind: 'speed'; speed: number }
  | { kind: 'block'; ended: boolean }
  | { kind: 'stats'; seconds: number; speed: number | null };

export interface ProgressUpdate {
  processedSeconds: number;
  speed: number | null;
  ended: boolean;
}

const CLOCK = /^(?:(\d+):)?(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/;
const STATS_LINE = /^(?:frame|size)=.*?\btime=\s*(\S+)/;
const STATS_SPEED = /\bspeed=\s*(\d+(?:\.\d+)?)x/;

/**
 * Parse `HH:MM:SS.ffffff` (hours optional) to seconds
 */
export function parseClock(value: string): number | null {
  const match = value.trim().match(CLOCK);
  if (!match) return null;

  const hours = parseInt(match[1] ?? '0', 10);
  const minutes = parseInt(match[2] ?? '0', 10);
  const seconds = parseFloat(match[3] ?? '0');
  return hours * 3600 + minutes * 60 + seconds;
}

function parseSpeed(value: string): number | null {
  const match = value.trim().match(/^(\d+(?:\.\d+)?)x$/);
  if (!match) return null;
  return parseFloat(match[1] ?? '0');
}

/**
 * Classify one line of progress output; null when it carries nothing usable
 */
export function parseProgressLine(line: string): ProgressToken | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  const stats = trimmed.match(STATS_LINE);
  if (stats) {
    const seconds = parseClock(stats[1] ?? '');
    if (seconds === null) return null;
    const speed = trimmed.match(STATS_SPEED);
    return { kind: 'stats', seconds, speed: speed ? parseFloat(speed[1] ?? '0') : null };
  }

  const separator = trimmed.indexOf('=');
  if (separator <= 0) return null;

  const key = trimmed.slice(0, separator).trim();
  const value = trimmed.slice(separator + 1).trim();

  switch (key) {
    // out_time_ms is microseconds too, despite the name
    case 'out_time_us':
    case 'out_time_ms': {
      if (!/^\d+$/.test(value)) return null;
      return { kind: 'time', seconds: parseInt(value, 10) / 1_000_000 };
    }
    case 'out_time': {
      const seconds = parseClock(value);
      return seconds === null ? null : { kind: 'time', seconds };
    }
    case 'speed': {
      const speed = parseSpeed(value);
      return speed === null ? null : { kind: 'speed', speed };
    }
    case 'progress':
      if (value === 'end') return { kind: 'block', ended: true };
      if (value === 'continue') return { kind: 'block', ended: false };
      return null;
    default:
      return null;
  }
}

/**
 * Incremental parser. Feed it raw chunks as they arrive; it buffers partial
 * lines and yields one update per closed block or stats line.
 */
export class FFmpegProgressParser {
  private buffer = '';
  private processed = 0;
  private speed: number | null = null;

  get processedSeconds(): number {
    return this.processed;
  }

  feed(chunk: string): ProgressUpdate[] {
    this.buffer += chunk;
    const lines = this.buffer.split(/\r\n|\n|\r/);
    this.buffer = lines.pop() ?? '';
    return this.consume(lines);
  }

  /**
   * Flush a trailing line that never got its newline
   */
  end(): ProgressUpdate[] {
    const rest = this.buffer;
    this.buffer = '';
    return this.consume([rest]);
  }

  private consume(lines: string[]): ProgressUpdate[] {
    const updates: ProgressUpdate[] = [];

    for (const line of lines) {
      const token = parseProgressLine(line);
      if (!token) continue;

      switch (token.kind) {
        case 'time':
          this.advance(token.seconds);
          break;
        case 'speed':
          this.speed = token.speed;
          break;
        case 'block':
          updates.push(this.current(token.ended));
          break;
        case 'stats':
          this.advance(token.seconds);
          if (token.speed !== null) this.speed = token.speed;
          updates.push(this.current(false));
          break;
      }
    }

    return updates;
  }

  private advance(seconds: number): void {
    if (seconds > this.processed) {
      this.processed = seconds;
    }
  }

  private current(ended: boolean): ProgressUpdate {
    return { processedSeconds: this.processed, speed: this.speed, ended };
  }
}

export interface EtaEstimate {
  percent: number;
  etaSeconds: number;
}

/**
 * `eta = elapsed * (1 - p) / p`, smoothed with an exponential moving average
 */
export class EtaEstimator {
  private smoothed: number | null = null;

  constructor(
    private readonly totalSeconds: number,
    private readonly smoothing: number = 0.3
  ) {}

  /**
   * Returns null until there is some progress to extrapolate from
   */
  update(processedSeconds: number, elapsedSeconds: number): EtaEstimate | null {
    if (this.totalSeconds <= 0) return null;

    const percent = Math.min(1, Math.max(0, processedSeconds / this.totalSeconds));
    if (percent === 0) return null;

    if (percent === 1) {
      this.smoothed = 0;
      return { percent, etaSeconds: 0 };
    }

    const raw = Math.max(0, (elapsedSeconds * (1 - percent)) / percent);
    this.smoothed = this.smoothed === null
      ? raw
      : this.smoothing * raw + (1 - this.smoothing) * this.smoothed;

    return { percent, etaSeconds: Math.max(0, this.smoothed) };
  }
}

/**
 * Format a sample for display: `42.0% | 1.50x | ETA 1m 5s`
 */
export function formatProgress(sample: ProgressSample): string {
  const parts = [`${(sample.percent * 100).toFixed(1)}%`];
  if (sample.speed !== null) {
    parts.push(`${sample.speed.toFixed(2)}x`);
  }
  parts.push(`ETA ${formatDuration(sample.etaSeconds)}`);
  return parts.join(' | ');
}
