/**
 * Inspect Command
 *
 * Probe a video and print what a cut job would see.
 */

import ora from 'ora';
import { FFProbe } from '@cutline/media';
import { getFileSizeBytes, formatDuration } from '@cutline/utils';
import { loadCliSettings } from '../config/index.js';
import {
  describeError,
  formatBytes,
  printError,
  printHeader,
  printJson,
  printKeyValue,
} from '../lib/output.js';

interface InspectOptions {
  json?: boolean;
}

export async function inspectCommand(path: string, options: InspectOptions): Promise<void> {
  const spinner = ora('Probing video...').start();

  try {
    const settings = await loadCliSettings();
    const probe = new FFProbe({ ffprobePath: settings.ffprobePath });
    const source = await probe.probeVideoSource(path);
    const size = await getFileSizeBytes(path);
    spinner.stop();

    if (options.json) {
      printJson({ ...source, sizeBytes: size });
      return;
    }

    printHeader('Video Source');
    printKeyValue('File', source.path);
    printKeyValue('Container', source.container);
    printKeyValue('Duration', `${formatDuration(source.duration)} (${source.duration.toFixed(3)}s)`);
    printKeyValue(
      'Resolution',
      source.width !== null && source.height !== null ? `${source.width}x${source.height}` : 'unknown'
    );
    printKeyValue('Frame rate', source.frameRate !== null ? `${source.frameRate.toFixed(3)} fps` : 'unknown');
    printKeyValue('Audio', source.hasAudio ? 'yes' : 'no');
    if (size !== null) {
      printKeyValue('Size', formatBytes(size));
    }
  } catch (error) {
    spinner.fail('Inspection failed');
    printError(describeError(error));
    process.exit(1);
  }
}
