/**
 * Probe Command
 *
 * Report the detected encoder capability and the profile it selects.
 */

import ora from 'ora';
import { getCapabilityProber, selectProfile } from '@cutline/processing';
import { loadCliSettings } from '../config/index.js';
import { describeError, printError, printHeader, printJson, printKeyValue } from '../lib/output.js';

interface ProbeOptions {
  refresh?: boolean;
  json?: boolean;
}

export async function probeCommand(options: ProbeOptions): Promise<void> {
  const spinner = ora('Probing encoders...').start();

  try {
    const settings = await loadCliSettings();
    const prober = getCapabilityProber({
      ffmpegPath: settings.ffmpegPath,
      hardwareAcceleration: settings.hardwareAcceleration,
    });
    if (options.refresh) {
      prober.invalidate();
    }

    const report = await prober.probe();
    const profile = selectProfile(report.capability, {}, {
      qualityFactor: settings.qualityFactor,
      maxBitrate: settings.defaultBitrate,
    });
    spinner.stop();

    if (options.json) {
      printJson({ capability: report.capability, probedAt: report.probedAt, profile });
      return;
    }

    printHeader('Encoder Capability');
    printKeyValue('Capability', report.capability);
    printKeyValue('Hardware acceleration', settings.hardwareAcceleration ? 'enabled' : 'disabled');
    printKeyValue('Encoders listed', report.encoders === null ? 'unavailable' : report.encoders.size);
    printKeyValue('Probed at', report.probedAt.toISOString());

    printHeader('Selected Profile');
    printKeyValue('Codec', profile.codec);
    printKeyValue('Preset', profile.preset);
    printKeyValue(
      'Rate control',
      profile.rateControl.mode === 'quality'
        ? `quality ${profile.rateControl.factor}`
        : `bitrate ${profile.rateControl.bitrate}`
    );
    printKeyValue('Max bitrate', profile.maxBitrate);
    printKeyValue('Audio', `${profile.audioCodec} ${profile.audioBitrate}`);
  } catch (error) {
    spinner.fail('Probe failed');
    printError(describeError(error));
    process.exit(1);
  }
}
