/**
 * Quality Profiles
 *
 * Maps a quality tier and target format to encoder parameters.
 *
 * - Video: CRF scale, lower = finer compression
 * - Lossy audio: bitrate, low < medium < high
 * - FLAC: fixed compression level, tier ignored
 * - WAV: PCM, tier and bitrate ignored
 */

import {
  DEFAULT_QUALITY_TIER,
  QUALITY_TIERS,
  TARGET_FORMATS,
  isQualityTier,
  type QualityProfile,
  type QualityTier,
  type TargetFormat,
} from '@transcoder/core';

export const CRF_LEVELS: Readonly<Record<QualityTier, number>> = {
  low: 35,
  medium: 28,
  high: 20,
};

export const AUDIO_BITRATES: Readonly<Record<QualityTier, string>> = {
  low: '96k',
  medium: '192k',
  high: '320k',
};

export const FLAC_COMPRESSION_LEVEL = 5;

export const VIDEO_ENCODER_PRESET = 'ultrafast';

/**
 * Normalize a user-supplied tier; anything unrecognized becomes the default tier
 */
export function normalizeQualityTier(tier: string | undefined): QualityTier {
  const normalized = (tier ?? '').trim().toLowerCase();
  return isQualityTier(normalized) ? normalized : DEFAULT_QUALITY_TIER;
}

/**
 * Resolve the encoder parameters for a (format, tier) pair
 */
export function resolveProfile(format: TargetFormat, tier: string | undefined): QualityProfile {
  const quality = normalizeQualityTier(tier);

  switch (format) {
    case 'mp4':
    case 'mov':
      return {
        kind: 'video',
        tier: quality,
        videoCodec: 'libx264',
        crf: CRF_LEVELS[quality],
        preset: VIDEO_ENCODER_PRESET,
        audioCodec: 'aac',
      };
    case 'mp3':
      return { kind: 'lossy-audio', tier: quality, codec: 'libmp3lame', bitrate: AUDIO_BITRATES[quality] };
    case 'aac':
      return { kind: 'lossy-audio', tier: quality, codec: 'aac', bitrate: AUDIO_BITRATES[quality] };
    case 'flac':
      return { kind: 'lossless-audio', codec: 'flac', compressionLevel: FLAC_COMPRESSION_LEVEL };
    case 'wav':
      return { kind: 'pcm', codec: 'pcm_s16le' };
  }
}

/**
 * Human-readable summary of a profile
 */
export function describeProfile(profile: QualityProfile): string {
  switch (profile.kind) {
    case 'video':
      return `${profile.videoCodec} crf ${profile.crf} (${profile.preset}), ${profile.audioCodec} audio`;
    case 'lossy-audio':
      return `${profile.codec} ${profile.bitrate}`;
    case 'lossless-audio':
      return `${profile.codec} compression level ${profile.compressionLevel}`;
    case 'pcm':
      return `${profile.codec} (uncompressed)`;
  }
}

export interface ProfileTableRow {
  format: TargetFormat;
  tier: QualityTier;
  profile: QualityProfile;
}

/**
 * Every (format, tier) pair with its resolved profile
 */
export function listProfiles(): ProfileTableRow[] {
  return TARGET_FORMATS.flatMap(format =>
    QUALITY_TIERS.map(tier => ({ format, tier, profile: resolveProfile(format, tier) }))
  );
}
