/**
 * @cutline/core
 *
 * Core package containing:
 * - Job state machine
 * - Error taxonomy
 * - Settings document
 */

// State machine
export {
  JOB_STATES,
  JobStateMachine,
  isValidTransition,
  isTerminalState,
  getNextStates,
} from './stateMachine.js';

export type {
  JobState,
  TerminalJobState,
  JobStateTransition,
} from './stateMachine.js';

// Errors
export {
  CutlineError,
  ValidationError,
  SegmentValidationError,
  EncoderUnavailableError,
  ProfileIncompatibleError,
  ProcessExecutionError,
  SubtitleGenerationError,
  CancelledError,
  StateTransitionError,
  ConfigError,
} from './errors/index.js';

// Settings
export {
  BITRATE_PATTERN,
  DEFAULT_FILLER_WORDS,
  settingsSchema,
  parseSettings,
  defaultSettings,
  loadSettings,
  saveSettings,
  toSettingsDocument,
  type Settings,
  type SettingsDocument,
} from './config/settings.js';
