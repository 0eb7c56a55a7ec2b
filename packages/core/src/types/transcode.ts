/**
 * Transcode Types
 * 
 * Request, plan and outcome shapes shared by the processing layer and
 * its front ends.
 */

export const VIDEO_FORMATS = ['mp4', 'mov'] as const;
export const AUDIO_FORMATS = ['mp3', 'wav', 'aac', 'flac'] as const;
export const TARGET_FORMATS = [...VIDEO_FORMATS, ...AUDIO_FORMATS] as const;

export type VideoFormat = typeof VIDEO_FORMATS[number];
export type AudioFormat = typeof AUDIO_FORMATS[number];
export type TargetFormat = typeof TARGET_FORMATS[number];

export const QUALITY_TIERS = ['low', 'medium', 'high'] as const;
export type QualityTier = typeof QUALITY_TIERS[number];
export const DEFAULT_QUALITY_TIER: QualityTier = 'medium';

export type MediaKind = 'video' | 'audio';

/**
 * Clip window in milliseconds from the start of the input
 */
export interface ClipWindow {
  startMs: number;
  endMs: number;
}

export interface ConversionRequest {
  inputPath: string;
  outputPath: string;
  format: string;       // validated against TARGET_FORMATS by the planner
  quality?: string;     // normalized to a QualityTier, unknown values become 'medium'
  clip?: ClipWindow;
}

export type PlanBranch = 'audio-to-audio' | 'video-to-audio' | 'video-to-video';

export interface VideoProfile {
  kind: 'video';
  tier: QualityTier;
  videoCodec: 'libx264';
  crf: number;
  preset: string;
  audioCodec: 'aac';
}

export interface LossyAudioProfile {
  kind: 'lossy-audio';
  tier: QualityTier;
  codec: 'libmp3lame' | 'aac';
  bitrate: string;
}

export interface LosslessAudioProfile {
  kind: 'lossless-audio';
  codec: 'flac';
  compressionLevel: number;
}

export interface PcmAudioProfile {
  kind: 'pcm';
  codec: 'pcm_s16le';
}

export type QualityProfile =
  | VideoProfile
  | LossyAudioProfile
  | LosslessAudioProfile
  | PcmAudioProfile;

export interface EncodePlan {
  readonly args: readonly string[];
  readonly format: TargetFormat;
  readonly inputKind: MediaKind;
  readonly targetKind: MediaKind;
  readonly branch: PlanBranch;
  readonly profile: QualityProfile;
  readonly clip?: Readonly<ClipWindow>;
}

/**
 * One telemetry sample: media time encoded so far
 */
export interface ProgressSample {
  elapsedMs: number;
}

export interface TerminalStatus {
  exitCode: number | null;
  signal: string | null;
}

export type OutcomeReason = 'completed' | 'engine-failure' | 'cancelled';

export interface Outcome {
  readonly succeeded: boolean;
  readonly reason: OutcomeReason;
  readonly exitCode: number | null;
  readonly diagnostic?: string;   // advisory only, never parsed
}

export type ProgressCallback = (progress: number) => void;

export function isTargetFormat(value: string): value is TargetFormat {
  return TARGET_FORMATS.some(format => format === value);
}

export function isVideoFormat(format: TargetFormat): format is VideoFormat {
  return VIDEO_FORMATS.some(video => video === format);
}

export function isQualityTier(value: string): value is QualityTier {
  return QUALITY_TIERS.some(tier => tier === value);
}
