import { describe, expect, it } from 'vitest';
import { QUALITY_TIERS, TARGET_FORMATS } from '@transcoder/core';
import {
  describeProfile,
  listProfiles,
  normalizeQualityTier,
  resolveProfile,
} from './qualityProfiles.js';

describe('qualityProfiles', () => {
  it('normalizes tiers case-insensitively and falls back to medium', () => {
    expect(normalizeQualityTier(' HIGH ')).toBe('high');
    expect(normalizeQualityTier('Low')).toBe('low');
    expect(normalizeQualityTier('ultra')).toBe('medium');
    expect(normalizeQualityTier('')).toBe('medium');
    expect(normalizeQualityTier(undefined)).toBe('medium');
  });

  it('uses an inverse CRF scale for video formats', () => {
    expect(resolveProfile('mp4', 'low')).toEqual({
      kind: 'video', tier: 'low', videoCodec: 'libx264', crf: 35, preset: 'ultrafast', audioCodec: 'aac',
    });
    expect(resolveProfile('mov', 'medium')).toMatchObject({ kind: 'video', crf: 28 });
    expect(resolveProfile('mp4', 'high')).toMatchObject({ kind: 'video', crf: 20 });
  });

  it('orders lossy audio bitrates low < medium < high', () => {
    expect(resolveProfile('mp3', 'low')).toEqual({ kind: 'lossy-audio', tier: 'low', codec: 'libmp3lame', bitrate: '96k' });
    expect(resolveProfile('mp3', 'medium')).toMatchObject({ bitrate: '192k' });
    expect(resolveProfile('aac', 'high')).toEqual({ kind: 'lossy-audio', tier: 'high', codec: 'aac', bitrate: '320k' });
  });

  it('ignores the tier for flac and wav', () => {
    for (const tier of [...QUALITY_TIERS, 'bogus']) {
      expect(resolveProfile('flac', tier)).toEqual({ kind: 'lossless-audio', codec: 'flac', compressionLevel: 5 });
      expect(resolveProfile('wav', tier)).toEqual({ kind: 'pcm', codec: 'pcm_s16le' });
    }
  });

  it('resolves unknown tiers exactly like medium for every format', () => {
    for (const format of TARGET_FORMATS) {
      expect(resolveProfile(format, 'extreme')).toEqual(resolveProfile(format, 'medium'));
    }
  });

  it('lists every format and tier pair', () => {
    const rows = listProfiles();
    expect(rows).toHaveLength(TARGET_FORMATS.length * QUALITY_TIERS.length);
    expect(rows[0]).toMatchObject({ format: 'mp4', tier: 'low' });
  });

  it('describes profiles for display', () => {
    expect(describeProfile(resolveProfile('mp4', 'high'))).toBe('libx264 crf 20 (ultrafast), aac audio');
    expect(describeProfile(resolveProfile('mp3', 'low'))).toBe('libmp3lame 96k');
    expect(describeProfile(resolveProfile('flac', 'low'))).toBe('flac compression level 5');
    expect(describeProfile(resolveProfile('wav', 'low'))).toBe('pcm_s16le (uncompressed)');
  });
});
