/**
 * Progress Parser
 *
 * Parses ffmpeg `-progress pipe:1` output. ffmpeg writes key=value lines
 * and closes each block with `progress=continue` or `progress=end`; one
 * 'progress' event is emitted per block that carried a usable timestamp.
 */

import { EventEmitter } from 'node:events';

export interface ProgressEvent {
  time: number;   // Milliseconds of output encoded
}

export class FFmpegProgressParser extends EventEmitter {
  private time: number | null = null;
  private buffer = '';

  /**
   * Feed a chunk of progress output; partial lines are kept until complete
   */
  parseProgressData(data: string): void {
    this.buffer += data;

    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const line of lines) {
      this.parseProgressLine(line.trim());
    }
  }

  /**
   * Flush a trailing line left without a newline
   */
  flush(): void {
    const rest = this.buffer.trim();
    this.buffer = '';
    if (rest) this.parseProgressLine(rest);
  }

  private parseProgressLine(line: string): void {
    const match = line.match(/^(\w+)=(.*)$/);
    if (!match) return;

    const key = match[1] ?? '';
    const value = (match[2] ?? '').trim();

    // ffmpeg reports N/A before the first packet is written
    if (value === 'N/A' || value === '') return;

    switch (key) {
      // Both are microseconds; out_time_ms is misnamed by ffmpeg
      case 'out_time_us':
      case 'out_time_ms':
        this.setTime(parseInt(value, 10) / 1000);
        break;
      case 'out_time':
        this.setTime(parseFFmpegTime(value));
        break;
      case 'progress':
        if (this.time !== null) {
          const event: ProgressEvent = { time: this.time };
          this.emit('progress', event);
        }
        break;
    }
  }

  private setTime(ms: number): void {
    if (Number.isFinite(ms) && ms >= 0) {
      this.time = ms;
    }
  }
}

/**
 * Parse ffmpeg time format (HH:MM:SS.micro, optionally negative) to ms
 */
export function parseFFmpegTime(time: string): number {
  const negative = time.startsWith('-');
  const parts = time.replace(/^-/, '').split(':');
  if (parts.length !== 3) return Number.NaN;

  const [hours, minutes, seconds] = parts.map(p => Number(p));
  const ms = ((hours ?? 0) * 3600 + (minutes ?? 0) * 60 + (seconds ?? 0)) * 1000;
  return negative ? -ms : ms;
}
