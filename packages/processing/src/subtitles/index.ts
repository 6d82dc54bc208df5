export {
  WhisperCliTranscriber,
  CachingTranscriber,
  parseWhisperOutput,
  type Transcriber,
  type Transcript,
  type TranscriptSegment,
  type TranscribedWord,
  type TranscribeOptions,
  type WhisperCliOptions,
} from './transcriber.js';

export { formatSrt } from './srt.js';

export {
  normalizeCues,
  cuesFromTranscript,
  remapTrackToCutList,
  subtitlePathFor,
  generateSubtitles,
  writeSubtitleFile,
} from './integrator.js';
