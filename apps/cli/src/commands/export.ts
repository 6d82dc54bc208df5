/**
 * Export Command
 *
 * Cut ranges out of a video and re-encode it. Progress is shown on a
 * spinner; Ctrl-C cancels the job and removes the partial output.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { FFProbe } from '@cutline/media';
import { formatDuration, getFileSizeBytes } from '@cutline/utils';
import {
  CachingTranscriber,
  candidatesToRemoveSegments,
  createJobOrchestrator,
  formatProgress,
  resolveCutList,
  type ExportRequest,
  type JobResult,
  type QualityIntent,
  type Segment,
} from '@cutline/processing';
import { loadCliSettings } from '../config/index.js';
import { defaultOutputPath } from '../lib/args.js';
import {
  describeError,
  formatBytes,
  printError,
  printInfo,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';
import { createTranscriber, detectEditCandidates } from './analyze.js';

interface ExportOptions {
  range?: Segment[];
  auto?: boolean;
  output?: string;
  subtitles?: boolean;
  language?: string;
  qualityFactor?: number;
  bitrate?: string;
}

/**
 * `--bitrate` alone switches to bitrate mode; with `--quality-factor` it
 * only caps the rate.
 */
export function qualityIntentFrom(options: Pick<ExportOptions, 'qualityFactor' | 'bitrate'>): QualityIntent {
  if (options.bitrate !== undefined && options.qualityFactor === undefined) {
    return { rateControl: 'bitrate', maxBitrate: options.bitrate };
  }
  return { rateControl: 'quality', qualityFactor: options.qualityFactor, maxBitrate: options.bitrate };
}

export async function exportCommand(path: string, options: ExportOptions): Promise<void> {
  const spinner = ora('Probing video...').start();

  try {
    const settings = await loadCliSettings();
    const source = await new FFProbe({ ffprobePath: settings.ffprobePath }).probeVideoSource(path);
    // --auto and --subtitles share one transcript of the source
    const transcriber = new CachingTranscriber(createTranscriber(settings));

    let removeSegments: Segment[] = options.range ?? [];
    if (options.auto) {
      // Hand-entered ranges must stand on their own before detected ones are merged in
      if (removeSegments.length > 0) {
        resolveCutList(source.duration, removeSegments);
      }
      spinner.text = 'Finding pauses and filler words...';
      const candidates = await detectEditCandidates(transcriber, settings, source.path, options.language);
      const detected = candidates.map(c => ({
        start: Math.max(0, c.start),
        end: Math.min(c.end, source.duration),
      }));
      removeSegments = candidatesToRemoveSegments([...removeSegments, ...detected]);
    }
    if (removeSegments.length === 0) {
      spinner.info('No ranges to remove; re-encoding the whole video');
      spinner.start();
    }

    const request: ExportRequest = {
      source,
      removeSegments,
      outputPath: options.output ?? defaultOutputPath(source.path, settings.defaultOutputDir),
      quality: qualityIntentFrom(options),
      subtitles: options.subtitles ? { language: options.language } : undefined,
    };

    const orchestrator = createJobOrchestrator(settings, { transcriber });
    const events = orchestrator.subscribe();
    const job = orchestrator.submit(request);
    spinner.text = `Exporting ${chalk.cyan(job.outputPath)} (${formatDuration(job.cutList.keptDuration)} kept)`;

    const watcher = (async () => {
      for await (const event of events) {
        if (event.jobId !== job.id) continue;
        if (event.type === 'state') {
          spinner.text = `${event.to}...`;
        } else if (event.type === 'progress') {
          spinner.text = `Encoding ${formatProgress(event.sample)}`;
        }
      }
    })();

    const onInterrupt = () => {
      spinner.text = 'Cancelling...';
      orchestrator.cancel(job.id);
    };
    process.once('SIGINT', onInterrupt);

    let result: JobResult;
    try {
      result = await orchestrator.waitFor(job.id);
    } finally {
      process.removeListener('SIGINT', onInterrupt);
      await orchestrator.shutdown();
      await watcher;
    }

    await reportResult(spinner, result);
  } catch (error) {
    spinner.fail('Export failed');
    printError(describeError(error));
    process.exit(1);
  }
}

async function reportResult(spinner: Ora, result: JobResult): Promise<void> {
  switch (result.state) {
    case 'completed': {
      spinner.succeed('Export complete');
      const size = await getFileSizeBytes(result.outputPath);
      printSuccess(`Wrote ${result.outputPath}${size !== null ? ` (${formatBytes(size)})` : ''}`);
      if (result.profile) {
        printKeyValue('Encoder', `${result.profile.codec} (${result.profile.encoder})`);
      }
      printKeyValue('Duration', formatDuration(result.cutList.keptDuration));
      if (result.subtitlePath) {
        printSuccess(`Subtitles ${result.subtitlePath}`);
      }
      for (const warning of result.warnings) {
        printWarning(warning.message);
      }
      return;
    }

    case 'cancelled':
      spinner.warn('Export cancelled');
      printInfo('Partial output removed');
      process.exitCode = 130;
      return;

    case 'failed':
      spinner.fail('Export failed');
      printError(result.error?.message ?? 'Unknown error');
      if (result.error?.stderrTail) {
        console.error(chalk.gray(result.error.stderrTail));
      }
      process.exitCode = 1;
      return;
  }
}
