/**
 * @cutline/media
 *
 * Source probing: turns an input file into an immutable VideoSource.
 */

export {
  FFProbe,
  parseFrameRate,
  toVideoSource,
  type FFProbeResult,
  type FFProbeOptions,
} from './probes/ffprobe.js';

export type { VideoSource } from './types.js';
