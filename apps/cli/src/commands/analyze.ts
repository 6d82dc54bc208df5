/**
 * Analyze Command
 *
 * Transcribe a video and list the pauses and filler words worth cutting.
 */

import ora from 'ora';
import chalk from 'chalk';
import type { Settings } from '@cutline/core';
import { formatTimecode } from '@cutline/utils';
import {
  WhisperCliTranscriber,
  findEditCandidates,
  type Transcriber,
  summarizeCandidates,
  transcriptWords,
  type EditCandidate,
} from '@cutline/processing';
import { loadCliSettings } from '../config/index.js';
import { describeError, printError, printHeader, printInfo, printJson, printKeyValue } from '../lib/output.js';

interface AnalyzeOptions {
  json?: boolean;
  language?: string;
}

export function createTranscriber(settings: Settings): WhisperCliTranscriber {
  return new WhisperCliTranscriber({
    whisperPath: settings.whisperPath,
    model: settings.whisperModel,
  });
}

/**
 * Word-timed transcription followed by candidate detection
 */
export async function detectEditCandidates(
  transcriber: Transcriber,
  settings: Settings,
  path: string,
  language?: string
): Promise<EditCandidate[]> {
  const transcript = await transcriber.transcribe(path, { language });
  return findEditCandidates(transcriptWords(transcript), {
    fillerWords: settings.fillerWords,
    silenceThreshold: settings.silenceThreshold,
  });
}

export async function analyzeCommand(path: string, options: AnalyzeOptions): Promise<void> {
  const spinner = ora('Transcribing...').start();

  try {
    const settings = await loadCliSettings();
    const candidates = await detectEditCandidates(createTranscriber(settings), settings, path, options.language);
    spinner.stop();

    const summary = summarizeCandidates(candidates);

    if (options.json) {
      printJson({ candidates, summary });
      return;
    }

    printHeader('Edit Candidates');
    if (candidates.length === 0) {
      printInfo('Nothing to cut');
      return;
    }

    for (const candidate of candidates) {
      const range = `${formatTimecode(candidate.start)} - ${formatTimecode(candidate.end)}`;
      const label = candidate.kind === 'silence'
        ? chalk.yellow('silence')
        : chalk.magenta(`filler "${candidate.text ?? ''}"`);
      console.log(`  ${chalk.cyan(range)} ${label}`);
    }

    printHeader('Summary');
    printKeyValue('Silences', `${summary.silence.count} (${summary.silence.totalSeconds.toFixed(2)}s)`);
    printKeyValue('Fillers', `${summary.filler.count} (${summary.filler.totalSeconds.toFixed(2)}s)`);
  } catch (error) {
    spinner.fail('Analysis failed');
    printError(describeError(error));
    process.exit(1);
  }
}
