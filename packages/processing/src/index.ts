/**
 * @transcoder/processing
 * 
 * Transcode job control on top of ffmpeg.
 * 
 * RULES:
 * - Reject bad requests before spawning anything
 * - Progress never goes backwards and ends at 1.0 on success
 * - A job always ends with exactly one Outcome
 * - Log every ffmpeg command executed
 */

// Controller
export {
  TranscodeController,
  type TranscodeControllerOptions,
  type TranscodeJob,
} from './transcodeController.js';

// Session
export { JobSession, type CancelRequestResult } from './jobSession.js';
export { ProgressTracker } from './progressTracker.js';

// Planning
export {
  planConversion,
  validateRequest,
  classifyInput,
  VIDEO_CONTAINER_EXTENSIONS,
} from './commandPlanner.js';

export {
  FFmpegCommandBuilder,
  formatCommand,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type OutputOptions,
  type OutputSeek,
} from './commandBuilder.js';

// Quality profiles
export {
  CRF_LEVELS,
  AUDIO_BITRATES,
  FLAC_COMPRESSION_LEVEL,
  VIDEO_ENCODER_PRESET,
  normalizeQualityTier,
  resolveProfile,
  describeProfile,
  listProfiles,
  type ProfileTableRow,
} from './qualityProfiles.js';

// Duration
export { resolveDuration, parseProbedDuration } from './durationResolver.js';

// Outcome
export { classifyOutcome, logTail, DIAGNOSTIC_TAIL_LINES } from './outcomeClassifier.js';

// Engine
export { FFmpegEngine, type FFmpegEngineOptions } from './engine.js';
export { FFProbe, parseProbeOutput, type FFProbeOptions } from './ffprobe.js';
export {
  FFmpegProgressParser,
  parseFFmpegTime,
  type ProgressEvent,
} from './progressParser.js';

// Types
export type {
  EncodingEngine,
  EngineHandle,
  EngineExit,
  ExecuteOptions,
  MediaProber,
  ProbeMetadata,
} from './types.js';
