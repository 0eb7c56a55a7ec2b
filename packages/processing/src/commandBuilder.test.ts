import { describe, expect, it } from 'vitest';
import { FFmpegCommandBuilder, formatCommand } from './commandBuilder.js';

describe('FFmpegCommandBuilder', () => {
  it('places the seek after the input', () => {
    const args = new FFmpegCommandBuilder()
      .overwrite()
      .addInput('in.mkv')
      .setOutputSeek(90000, 15250)
      .setVideoCodec({ codec: 'libx264', crf: 28, preset: 'ultrafast' })
      .setAudioCodec({ codec: 'aac' })
      .setOutputOptions({ movflags: '+faststart' })
      .setOutput('out.mp4')
      .build();

    expect(args).toEqual([
      '-y', '-i', 'in.mkv', '-ss', '00:01:30.000', '-t', '00:00:15.250',
      '-c:v', 'libx264', '-crf', '28', '-preset', 'ultrafast',
      '-c:a', 'aac', '-movflags', '+faststart', 'out.mp4',
    ]);
  });

  it('drops the video codec when video is disabled', () => {
    const args = new FFmpegCommandBuilder()
      .addInput('in.mp4')
      .disableVideo()
      .setVideoCodec({ codec: 'libx264', crf: 20, preset: 'ultrafast' })
      .setAudioCodec({ codec: 'flac', compressionLevel: 5 })
      .setOutput('out.flac')
      .build();

    expect(args).toEqual(['-i', 'in.mp4', '-vn', '-c:a', 'flac', '-compression_level', '5', 'out.flac']);
  });

  it('requires an input and an output', () => {
    expect(() => new FFmpegCommandBuilder().setOutput('out.mp3').build()).toThrow('Input file not specified');
    expect(() => new FFmpegCommandBuilder().addInput('in.wav').build()).toThrow('Output file not specified');
  });

  it('quotes arguments with spaces when rendering', () => {
    expect(formatCommand(['-i', 'my clip.mov', 'out.mp4'])).toBe('ffmpeg -i "my clip.mov" out.mp4');
    expect(formatCommand(['-i', 'a.wav', 'b.mp3'], '/opt/ffmpeg')).toBe('/opt/ffmpeg -i a.wav b.mp3');
  });
});
