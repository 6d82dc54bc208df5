/**
 * Time Utilities
 *
 * Media times are carried as seconds (floating point) throughout.
 */

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format a duration in seconds to a human-readable string
 */
export function formatDuration(totalSeconds: number): string {
  if (!Number.isFinite(totalSeconds) || totalSeconds < 0) {
    return '--';
  }

  const seconds = Math.round(totalSeconds);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Parse a time value to seconds.
 *
 * Accepts plain seconds (`12.5`), `MM:SS(.mmm)` or `HH:MM:SS(.mmm)`.
 */
export function parseTimecode(value: string): number {
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return parseFloat(trimmed);
  }

  const match = trimmed.match(/^(?:(\d+):)?(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/);
  if (!match) {
    throw new Error(`Invalid timecode format: ${value}`);
  }

  const hours = parseInt(match[1] ?? '0', 10);
  const minutes = parseInt(match[2] ?? '0', 10);
  const seconds = parseFloat(match[3] ?? '0');
  if (minutes >= 60 || seconds >= 60) {
    throw new Error(`Invalid timecode format: ${value}`);
  }

  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Format seconds to a timecode string (HH:MM:SS.mmm, or HH:MM:SS,mmm for SubRip)
 */
export function formatTimecode(totalSeconds: number, fractionSeparator: '.' | ',' = '.'): string {
  const totalMs = Math.max(0, Math.round(totalSeconds * 1000));
  const hours = Math.floor(totalMs / 3600000);
  const minutes = Math.floor((totalMs % 3600000) / 60000);
  const seconds = Math.floor((totalMs % 60000) / 1000);
  const milliseconds = totalMs % 1000;

  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}${fractionSeparator}${milliseconds.toString().padStart(3, '0')}`;
}
