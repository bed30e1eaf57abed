import { BandNormalizer } from './BandNormalizer';
import { BAND_EDGES_HZ, computeBandEnergies, isPowerOfTwo } from './spectrum';
import { SyncEngine, sleep, yieldToEventLoop } from '../sync/SyncEngine';
import { ConfigurationError, TransientCaptureError } from '../sync/errors';
import type { AudioCaptureBackend, AudioStream } from '../capture/types';
import type { AudioSettings, DeviceSession, HsbColor } from '../sync/types';

const READ_RETRY_DELAY_MS = 50;
const READ_FAILURE_LOG_EVERY = 100;

export interface AudioTick {
  bands: number[];
  color: HsbColor;
  pushed: boolean;
}

export interface AudioEngineOptions {
  now?: () => number;
}

function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/**
 * Map normalized band levels to a color.
 * Treble drives hue; bass currently carries no weight in the hue term.
 */
export function bandsToColor(bands: readonly number[]): HsbColor {
  const overall = mean(bands);
  const bass = mean(bands.slice(0, 3));
  const mid = mean(bands.slice(3, 6));
  const treble = mean(bands.slice(6, 10));

  // TODO: give bass a non-zero hue weight once the intended mix is decided
  const hue = (bass * 0 + treble * 240) % 360;
  const saturation = clamp(50 + mid * 50, 30, 100);
  const brightness = clamp(20 + overall * 80, 10, 100);

  return { hue, saturation, brightness };
}

/**
 * Drives the light from live audio: one capture frame per tick, ten-band
 * spectrum, adaptive normalization, rate-limited pushes.
 */
export class AudioSyncEngine extends SyncEngine<AudioTick> {
  protected readonly tag = 'AudioSync';

  private readonly capture: AudioCaptureBackend;
  private readonly normalizer: BandNormalizer;
  private readonly now: () => number;
  private stream: AudioStream | null = null;
  private lastPushAt = 0;
  private readFailures = 0;

  constructor(
    private readonly session: DeviceSession,
    private readonly settings: Readonly<AudioSettings>,
    capture: AudioCaptureBackend | null,
    options: AudioEngineOptions = {}
  ) {
    super();

    if (!capture) {
      throw new ConfigurationError(
        'Audio capture is unavailable. Install PulseAudio (parec) or ALSA (arecord) utilities.'
      );
    }
    if (settings.bandCount !== BAND_EDGES_HZ.length) {
      throw new ConfigurationError(`Only ${BAND_EDGES_HZ.length}-band audio analysis is supported.`);
    }
    if (!isPowerOfTwo(settings.chunkSize)) {
      throw new ConfigurationError(`Audio chunk size must be a power of two (got ${settings.chunkSize}).`);
    }

    this.capture = capture;
    this.normalizer = new BandNormalizer(settings.bandCount, settings.historyLength);
    this.now = options.now ?? Date.now;
  }

  /**
   * Analyze one frame and derive the color for it. Feeds the normalizer
   * history, so calling it twice with the same frame is not idempotent.
   */
  analyzeFrame(frame: Float32Array, sampleRate: number): { bands: number[]; color: HsbColor } {
    const energies = computeBandEnergies(frame, sampleRate);
    const bands = this.normalizer.updateAndNormalize(energies);
    return { bands, color: bandsToColor(bands) };
  }

  protected async open(): Promise<void> {
    this.stream = await this.capture.open(this.settings.deviceSelector, this.settings.sampleRate);
    this.lastPushAt = this.now();
    this.readFailures = 0;
    console.log(
      `[AudioSync] Capturing from ${this.settings.deviceSelector ?? 'default device'} via ${this.capture.name} at ${this.stream.sampleRate} Hz`
    );
  }

  protected async tick(): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      throw new Error('Audio stream is not open');
    }

    let frame: Float32Array;
    try {
      frame = await stream.read(this.settings.chunkSize);
    } catch (error) {
      if (!(error instanceof TransientCaptureError)) {
        throw error;
      }
      if (this.readFailures % READ_FAILURE_LOG_EVERY === 0) {
        console.warn(`[AudioSync] Capture read failed (${this.readFailures + 1}x): ${error.message}`);
      }
      this.readFailures++;
      await sleep(READ_RETRY_DELAY_MS);
      return;
    }

    const { bands, color } = this.analyzeFrame(frame, stream.sampleRate);

    let pushed = false;
    const now = this.now();
    if (now - this.lastPushAt > this.settings.minPushIntervalMs) {
      await this.session.setColor(color);
      this.lastPushAt = now;
      pushed = true;
    }

    this.emitTick({ bands, color, pushed });
    await yieldToEventLoop();
  }

  protected release(): void {
    if (this.stream) {
      this.stream.close();
      this.stream = null;
    }
  }
}
