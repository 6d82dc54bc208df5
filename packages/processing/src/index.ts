/**
 * @cutline/processing
 *
 * The export pipeline:
 * - Capability prober (hardware encoder detection)
 * - Segment resolver and profile selector
 * - Command builder
 * - Progress parsing
 * - Job orchestrator
 * - Subtitles and edit-candidate analysis
 */

export type {
  Segment,
  CutList,
  EncoderCapability,
  VideoCodec,
  RateControl,
  EncodingProfile,
  QualityIntent,
  CommandSpec,
  ProgressSample,
  SubtitleCue,
  SubtitleTrack,
  SubtitleRequest,
  ExportRequest,
  JobErrorInfo,
  JobSnapshot,
  JobResult,
  JobEvent,
} from './types.js';

// Segments
export {
  DEFAULT_MIN_KEEP_DURATION,
  minKeepDurationFor,
  totalDuration,
  resolveCutList,
  mapRangeToOutput,
  type ResolveOptions,
} from './segments.js';

// Profiles
export {
  PROFILE_TABLE,
  ENCODER_CAPABILITIES,
  QUALITY_DEFAULTS,
  parseBitrate,
  selectProfile,
  type ProfileDefaults,
} from './profiles.js';

// Capabilities
export {
  CapabilityProber,
  HARDWARE_PREFERENCE,
  getCapabilityProber,
  parseEncoderList,
  type CapabilityReport,
  type CapabilityProberOptions,
} from './capabilities.js';

// Command building
export {
  FFmpegCommandBuilder,
  buildExportCommand,
  buildTrimConcatFilter,
  renderVideoCodec,
  formatCommand,
  quoteArg,
} from './commandBuilder.js';

// Progress
export {
  FFmpegProgressParser,
  EtaEstimator,
  parseProgressLine,
  parseClock,
  formatProgress,
  type ProgressUpdate,
  type EtaEstimate,
} from './progressParser.js';

// Execution
export { EventChannel } from './eventChannel.js';
export {
  spawnProcess,
  TailBuffer,
  type LaunchedProcess,
  type ProcessExit,
  type ProcessLauncher,
} from './process.js';
export {
  JobOrchestrator,
  createJobOrchestrator,
  toErrorInfo,
  type CapabilitySource,
  type JobOrchestratorOptions,
} from './jobOrchestrator.js';

// Subtitles
export * from './subtitles/index.js';

// Analysis
export {
  findEditCandidates,
  transcriptWords,
  summarizeCandidates,
  candidatesToRemoveSegments,
  type CandidateKind,
  type EditCandidate,
  type AnalysisOptions,
  type CandidateSummary,
} from './analysis.js';
