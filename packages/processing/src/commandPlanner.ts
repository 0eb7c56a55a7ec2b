/**
 * Command Planner
 *
 * Turns a ConversionRequest into an immutable EncodePlan. Every error here is
 * raised before an engine process exists.
 */

import { z } from 'zod';
import {
  UnsupportedConversionError,
  UnsupportedFormatError,
  ValidationError,
  isTargetFormat,
  isVideoFormat,
  type ClipWindow,
  type ConversionRequest,
  type EncodePlan,
  type MediaKind,
  type PlanBranch,
  type QualityProfile,
} from '@transcoder/core';
import { getExtension, isNonEmptyString } from '@transcoder/utils';
import { FFmpegCommandBuilder } from './commandBuilder.js';
import { resolveProfile } from './qualityProfiles.js';

export const VIDEO_CONTAINER_EXTENSIONS: readonly string[] = ['mp4', 'mov', 'mkv', 'avi', 'webm'];

const clipWindowSchema = z
  .object({
    startMs: z.number().int().nonnegative(),
    endMs: z.number().int().nonnegative(),
  })
  .refine(window => window.endMs > window.startMs, {
    message: 'end must be after start',
    path: ['endMs'],
  });

const requestSchema = z.object({
  inputPath: z.string().refine(isNonEmptyString, 'must not be empty'),
  outputPath: z.string().refine(isNonEmptyString, 'must not be empty'),
  format: z.string(),
  quality: z.string().optional(),
  clip: clipWindowSchema.optional(),
});

/**
 * Check the request shape and return a frozen copy
 */
export function validateRequest(request: ConversionRequest): Readonly<ConversionRequest> {
  const result = requestSchema.safeParse(request);

  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path ?? [];
    const field = path.join('.') || 'request';
    const code = path[0] === 'clip' ? 'INVALID_CLIP_WINDOW' : 'VALIDATION_ERROR';
    throw new ValidationError(field, issue?.message ?? 'invalid value', code);
  }

  const { inputPath, outputPath, format, quality, clip } = result.data;
  const frozen: ConversionRequest = { inputPath, outputPath, format };
  if (quality !== undefined) frozen.quality = quality;
  if (clip) frozen.clip = Object.freeze({ startMs: clip.startMs, endMs: clip.endMs });

  return Object.freeze(frozen);
}

/**
 * Classify the input by container extension; anything unrecognized is audio
 */
export function classifyInput(inputPath: string): MediaKind {
  return VIDEO_CONTAINER_EXTENSIONS.includes(getExtension(inputPath)) ? 'video' : 'audio';
}

function selectBranch(inputKind: MediaKind, targetKind: MediaKind, format: string): PlanBranch {
  if (inputKind === 'audio' && targetKind === 'audio') return 'audio-to-audio';
  if (inputKind === 'video' && targetKind === 'audio') return 'video-to-audio';
  if (inputKind === 'video' && targetKind === 'video') return 'video-to-video';
  throw new UnsupportedConversionError(inputKind, format);
}

function applyProfile(builder: FFmpegCommandBuilder, profile: QualityProfile): void {
  switch (profile.kind) {
    case 'video':
      builder
        .setVideoCodec({ codec: profile.videoCodec, crf: profile.crf, preset: profile.preset })
        .setAudioCodec({ codec: profile.audioCodec })
        .setOutputOptions({ movflags: '+faststart' });
      break;
    case 'lossy-audio':
      builder.setAudioCodec({ codec: profile.codec, bitrate: profile.bitrate });
      break;
    case 'lossless-audio':
      builder.setAudioCodec({ codec: profile.codec, compressionLevel: profile.compressionLevel });
      break;
    case 'pcm':
      builder.setAudioCodec({ codec: profile.codec });
      break;
  }
}

/**
 * Build the encode plan for a conversion or clip request
 */
export function planConversion(request: ConversionRequest): EncodePlan {
  const valid = validateRequest(request);

  const format = valid.format.trim().toLowerCase();
  if (!isTargetFormat(format)) {
    throw new UnsupportedFormatError(valid.format);
  }

  const inputKind = classifyInput(valid.inputPath);
  const targetKind: MediaKind = isVideoFormat(format) ? 'video' : 'audio';
  const branch = selectBranch(inputKind, targetKind, format);
  const profile = resolveProfile(format, valid.quality);

  const builder = new FFmpegCommandBuilder()
    .overwrite()
    .addInput(valid.inputPath);

  const clip: ClipWindow | undefined = valid.clip;
  if (clip) {
    builder.setOutputSeek(clip.startMs, clip.endMs - clip.startMs);
  }

  if (branch === 'video-to-audio') {
    builder.disableVideo();
  }

  applyProfile(builder, profile);
  builder.setOutput(valid.outputPath);

  const plan: EncodePlan = {
    args: Object.freeze(builder.build()),
    format,
    inputKind,
    targetKind,
    branch,
    profile: Object.freeze(profile),
    ...(clip ? { clip } : {}),
  };

  return Object.freeze(plan);
}
