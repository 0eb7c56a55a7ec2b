/**
 * FFmpeg Command Builder
 *
 * Fluent API for building ffmpeg argument lists.
 * Arguments are emitted in a fixed order: global, inputs, output-side seek,
 * stream selection, codecs, container options, output.
 */

import { formatTimecode } from '@transcoder/utils';

export interface VideoCodecOptions {
  codec: 'libx264';
  preset: string;
  crf: number;
}

export interface AudioCodecOptions {
  codec: 'aac' | 'libmp3lame' | 'flac' | 'pcm_s16le';
  bitrate?: string;
  compressionLevel?: number;
}

export interface OutputOptions {
  movflags?: string;      // -movflags for mp4/mov
}

/**
 * Seek applied after the input is opened (-ss/-t after -i):
 * decodes up to the start point, so the cut is frame-accurate.
 */
export interface OutputSeek {
  startMs: number;
  durationMs: number;
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private dropVideo = false;
  private seek: OutputSeek | null = null;
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Overwrite an existing output (-y)
   */
  overwrite(): this {
    this.globalArgs.push('-y');
    return this;
  }

  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Trim the output to a window of the input
   */
  setOutputSeek(startMs: number, durationMs: number): this {
    this.seek = { startMs, durationMs };
    return this;
  }

  /**
   * Strip the video stream (-vn); any video codec is ignored
   */
  disableVideo(): this {
    this.dropVideo = true;
    return this;
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    if (this.inputs.length === 0) {
      throw new Error('Input file not specified');
    }
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }

    const args: string[] = [...this.globalArgs];

    for (const input of this.inputs) {
      args.push('-i', input);
    }

    if (this.seek) {
      args.push(
        '-ss', formatTimecode(this.seek.startMs),
        '-t', formatTimecode(this.seek.durationMs),
      );
    }

    if (this.dropVideo) {
      args.push('-vn');
    } else if (this.videoCodec) {
      args.push(
        '-c:v', this.videoCodec.codec,
        '-crf', this.videoCodec.crf.toString(),
        '-preset', this.videoCodec.preset,
      );
    }

    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
      if (this.audioCodec.compressionLevel !== undefined) {
        args.push('-compression_level', this.audioCodec.compressionLevel.toString());
      }
    }

    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }

    args.push(this.outputFile);

    return args;
  }
}

/**
 * Render an argument list for logs, quoting arguments with spaces
 */
export function formatCommand(args: readonly string[], binary: string = 'ffmpeg'): string {
  return [binary, ...args].map(a => (a.includes(' ') ? `"${a}"` : a)).join(' ');
}
