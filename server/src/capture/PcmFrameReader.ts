import type { Readable } from 'stream';
import { TransientCaptureError } from '../sync/errors';
import type { AudioStream } from './types';

const BYTES_PER_SAMPLE = 4;
const DEFAULT_READ_TIMEOUT_MS = 1000;
// Beyond this many frames of backlog the oldest audio is dropped
const MAX_BACKLOG_FRAMES = 8;

/**
 * Slices a raw float32le mono byte stream into fixed-size frames.
 */
export class PcmFrameReader implements AudioStream {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private failure: string | null = null;
  private wake: (() => void) | null = null;
  private closed = false;

  constructor(
    private readonly source: Readable,
    readonly sampleRate: number,
    private readonly onClose: () => void = () => undefined,
    private readonly readTimeoutMs = DEFAULT_READ_TIMEOUT_MS
  ) {
    source.on('data', this.handleData);
    source.on('end', this.handleEnd);
    source.on('error', this.handleError);
  }

  markFailed(reason: string): void {
    this.failure = reason;
    this.wake?.();
  }

  async read(frameSize: number): Promise<Float32Array> {
    const needed = frameSize * BYTES_PER_SAMPLE;

    while (this.buffered < needed) {
      if (this.closed) {
        throw new TransientCaptureError('Audio stream is closed');
      }
      if (this.failure) {
        throw new TransientCaptureError(this.failure);
      }
      const arrived = await this.waitForData();
      if (!arrived) {
        throw new TransientCaptureError(`No audio data within ${this.readTimeoutMs} ms`);
      }
    }

    return this.take(frameSize);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.source.off('data', this.handleData);
    this.source.off('end', this.handleEnd);
    this.source.off('error', this.handleError);
    this.chunks = [];
    this.buffered = 0;
    this.wake?.();
    this.onClose();
  }

  private handleData = (chunk: Buffer): void => {
    this.chunks.push(chunk);
    this.buffered += chunk.length;
    this.wake?.();
  };

  private handleEnd = (): void => {
    this.markFailed('Audio capture stream ended');
  };

  private handleError = (error: Error): void => {
    this.markFailed(error.message);
  };

  private waitForData(): Promise<boolean> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve(false);
      }, this.readTimeoutMs);

      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve(true);
      };
    });
  }

  private take(frameSize: number): Float32Array {
    const needed = frameSize * BYTES_PER_SAMPLE;
    let bytes = Buffer.concat(this.chunks, this.buffered);

    if (bytes.length > needed * MAX_BACKLOG_FRAMES) {
      // Keep the newest frame plus any partial trailing sample
      const keep = needed + (bytes.length % BYTES_PER_SAMPLE);
      bytes = bytes.subarray(bytes.length - keep);
    }

    const frame = new Float32Array(frameSize);
    for (let i = 0; i < frameSize; i++) {
      frame[i] = bytes.readFloatLE(i * BYTES_PER_SAMPLE);
    }

    const rest = bytes.subarray(needed);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return frame;
  }
}
