/**
 * @transcoder/core
 * 
 * Core package containing:
 * - Request, plan and outcome types
 * - Session state machine
 * - Error taxonomy
 * - Binary and environment configuration
 */

// Types
export {
  VIDEO_FORMATS,
  AUDIO_FORMATS,
  TARGET_FORMATS,
  QUALITY_TIERS,
  DEFAULT_QUALITY_TIER,
  isTargetFormat,
  isVideoFormat,
  isQualityTier,
} from './types/transcode.js';

export type {
  VideoFormat,
  AudioFormat,
  TargetFormat,
  QualityTier,
  MediaKind,
  ClipWindow,
  ConversionRequest,
  PlanBranch,
  VideoProfile,
  LossyAudioProfile,
  LosslessAudioProfile,
  PcmAudioProfile,
  QualityProfile,
  EncodePlan,
  ProgressSample,
  TerminalStatus,
  OutcomeReason,
  Outcome,
  ProgressCallback,
} from './types/transcode.js';

// State machine
export {
  SESSION_STATES,
  SessionStateMachine,
  isValidTransition,
  isTerminalState,
} from './stateMachine.js';

export type {
  SessionState,
  TerminalSessionState,
  SessionStateTransition,
} from './stateMachine.js';

// Errors
export {
  TranscoderError,
  ValidationError,
  UnsupportedFormatError,
  UnsupportedConversionError,
  ProbeError,
  StateTransitionError,
  isTranscoderError,
} from './errors/index.js';

// Configuration
export {
  loadConfig,
  getBinariesConfig,
  getBinaryFolders,
  type TranscoderConfig,
  type BinaryConfig,
  type BinariesConfig,
  type BinarySource,
} from './config/index.js';
