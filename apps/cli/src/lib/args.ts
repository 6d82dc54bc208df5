/**
 * Option parsers shared by the commands
 */

import { InvalidArgumentError } from 'commander';
import { basename, dirname, extname, join } from 'node:path';
import { parseTimecode } from '@cutline/utils';
import type { Segment } from '@cutline/processing';

/**
 * `12.5-20`, `00:01:02-00:01:30.5`
 */
export function parseRange(value: string): Segment {
  const parts = value.split('-');
  if (parts.length !== 2) {
    throw new InvalidArgumentError(`Expected start-end, got "${value}"`);
  }

  const [startText = '', endText = ''] = parts;
  let start: number;
  let end: number;
  try {
    start = parseTimecode(startText);
    end = parseTimecode(endText);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
  return { start, end };
}

/**
 * Commander collector for a repeatable `-r` option
 */
export function collectRange(value: string, previous: Segment[] = []): Segment[] {
  return [...previous, parseRange(value)];
}

export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * `clips/talk.mp4` -> `<dir>/talk.cut.mp4`, where `<dir>` is the configured
 * output directory or the source's own.
 */
export function defaultOutputPath(sourcePath: string, outputDir: string): string {
  const ext = extname(sourcePath) || '.mp4';
  const stem = basename(sourcePath, extname(sourcePath));
  return join(outputDir || dirname(sourcePath), `${stem}.cut${ext}`);
}
