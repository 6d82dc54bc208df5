/**
 * Encoding Profiles
 *
 * Maps a detected encoder capability plus the user's quality intent to a
 * concrete profile. Pure table lookup: the only inputs are the capability
 * the prober already settled on, the intent, and the configured defaults.
 */

import { BITRATE_PATTERN, ValidationError } from '@cutline/core';
import type {
  EncoderCapability,
  EncodingProfile,
  QualityIntent,
  RateControl,
  VideoCodec,
} from './types.js';

interface ProfileRow {
  codec: VideoCodec;
  preset: string;
}

/**
 * One row per capability. `satisfies` keeps the table exhaustive.
 */
export const PROFILE_TABLE = {
  cpu: { codec: 'libx264', preset: 'slower' },
  nvenc: { codec: 'h264_nvenc', preset: 'medium' },
  amf: { codec: 'h264_amf', preset: 'slow' },
  qsv: { codec: 'h264_qsv', preset: 'slow' },
} as const satisfies Record<EncoderCapability, ProfileRow>;

export const ENCODER_CAPABILITIES = ['cpu', 'nvenc', 'amf', 'qsv'] as const satisfies readonly EncoderCapability[];

// Near-lossless perceptual quality with a bounded worst-case size
export const QUALITY_DEFAULTS = {
  qualityFactor: 16,
  maxBitrate: '20000k',
  pixelFormat: 'yuv420p',
  audioBitrate: '192k',
} as const;

export interface ProfileDefaults {
  qualityFactor?: number;
  maxBitrate?: string;
}

/**
 * Convert an ffmpeg bitrate string (`20000k`, `20M`, `800000`) to kbit/s
 */
export function parseBitrate(value: string): number {
  const trimmed = value.trim();
  const match = trimmed.match(/^(\d+(?:\.\d+)?)([kKmM]?)$/);
  if (!match || !BITRATE_PATTERN.test(trimmed)) {
    throw new ValidationError('bitrate', `expected a value such as 20000k, got "${value}"`);
  }

  const amount = parseFloat(match[1] ?? '0');
  switch (match[2]) {
    case 'm':
    case 'M':
      return amount * 1000;
    case 'k':
    case 'K':
      return amount;
    default:
      return amount / 1000;
  }
}

function checkQualityFactor(factor: number): number {
  if (!Number.isInteger(factor) || factor < 0 || factor > 51) {
    throw new ValidationError('qualityFactor', `must be an integer between 0 and 51, got ${factor}`);
  }
  return factor;
}

function checkBitrate(value: string): string {
  if (!BITRATE_PATTERN.test(value)) {
    throw new ValidationError('maxBitrate', `expected a value such as 20000k, got "${value}"`);
  }
  return value;
}

/**
 * Select the encoding profile for a capability and intent
 */
export function selectProfile(
  capability: EncoderCapability,
  intent: QualityIntent = {},
  defaults: ProfileDefaults = {}
): EncodingProfile {
  const row: ProfileRow = PROFILE_TABLE[capability];

  const maxBitrate = checkBitrate(intent.maxBitrate ?? defaults.maxBitrate ?? QUALITY_DEFAULTS.maxBitrate);
  const rateControl: RateControl = intent.rateControl === 'bitrate'
    ? { mode: 'bitrate', bitrate: maxBitrate }
    : {
      mode: 'quality',
      factor: checkQualityFactor(intent.qualityFactor ?? defaults.qualityFactor ?? QUALITY_DEFAULTS.qualityFactor),
    };

  const profile: EncodingProfile = {
    encoder: capability,
    codec: row.codec,
    rateControl,
    preset: row.preset,
    maxBitrate,
    pixelFormat: QUALITY_DEFAULTS.pixelFormat,
    audioCodec: 'aac',
    audioBitrate: QUALITY_DEFAULTS.audioBitrate,
  };
  return Object.freeze(profile);
}
