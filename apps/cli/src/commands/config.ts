/**
 * Config Command
 *
 * View and update the settings file.
 */

import chalk from 'chalk';
import { toSettingsDocument } from '@cutline/core';
import {
  applyAssignments,
  config,
  loadCliSettings,
  parseAssignment,
  saveCliSettings,
} from '../config/index.js';
import { describeError, printError, printHeader, printJson, printSuccess } from '../lib/output.js';

interface ConfigOptions {
  set?: string[];
  json?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  try {
    let settings = await loadCliSettings();

    if (options.set && options.set.length > 0) {
      settings = applyAssignments(settings, options.set.map(parseAssignment));
      await saveCliSettings(settings);
      printSuccess(`Saved ${config.settingsFile}`);
    }

    const document = toSettingsDocument(settings);
    if (options.json) {
      printJson(document);
      return;
    }

    printHeader('Settings');
    console.log(`  ${chalk.gray('file:')} ${config.settingsFile}`);
    console.log();
    for (const [key, value] of Object.entries(document)) {
      console.log(`${chalk.cyan(key)}: ${JSON.stringify(value)}`);
    }
  } catch (error) {
    printError(describeError(error));
    process.exit(1);
  }
}
