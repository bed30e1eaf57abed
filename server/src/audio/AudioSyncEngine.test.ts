import { describe, it, expect, vi } from 'vitest';
import { AudioSyncEngine, AudioTick, bandsToColor } from './AudioSyncEngine';
import { ConfigurationError, TransientCaptureError } from '../sync/errors';
import { DEFAULT_AUDIO_SETTINGS } from '../sync/types';
import type { AudioCaptureBackend, AudioDevice, AudioStream } from '../capture/types';
import type { DeviceInfo, DeviceSession, HsbColor } from '../sync/types';

const SAMPLE_RATE = 44100;

type FrameSource = (index: number) => Float32Array | Error;

class FakeAudioStream implements AudioStream {
  readonly sampleRate = SAMPLE_RATE;
  closed = false;
  reads = 0;

  constructor(private readonly source: FrameSource) {}

  async read(): Promise<Float32Array> {
    const next = this.source(this.reads++);
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  close(): void {
    this.closed = true;
  }
}

class FakeAudioCapture implements AudioCaptureBackend {
  readonly name = 'fake';
  opens = 0;
  stream: FakeAudioStream | null = null;

  constructor(private readonly source: FrameSource) {}

  async open(): Promise<AudioStream> {
    this.opens++;
    this.stream = new FakeAudioStream(this.source);
    return this.stream;
  }

  async listDevices(): Promise<AudioDevice[]> {
    return [];
  }
}

class FakeSession implements DeviceSession {
  deviceIp: string | null = '192.168.1.50';
  colors: HsbColor[] = [];

  constructor(private readonly onColor: () => void = () => undefined) {}

  async connect(): Promise<void> {}
  async powerOn(): Promise<void> {}
  async powerOff(): Promise<void> {}

  async setColor(color: HsbColor): Promise<void> {
    this.onColor();
    this.colors.push(color);
  }

  async getDeviceInfo(): Promise<DeviceInfo> {
    return { deviceId: 'fake', model: 'L530', nickname: 'Desk', deviceOn: true };
  }
}

function tone(amplitude: number): Float32Array {
  const frame = new Float32Array(DEFAULT_AUDIO_SETTINGS.chunkSize);
  for (let i = 0; i < frame.length; i++) {
    frame[i] = amplitude * Math.sin((2 * Math.PI * 1000 * i) / SAMPLE_RATE);
  }
  return frame;
}

const silence = () => new Float32Array(DEFAULT_AUDIO_SETTINGS.chunkSize);

function collectTicks(engine: AudioSyncEngine): AudioTick[] {
  const ticks: AudioTick[] = [];
  engine.on('tick', (tick: AudioTick) => ticks.push(tick));
  return ticks;
}

describe('bandsToColor', () => {
  it('maps silence to the base color', () => {
    expect(bandsToColor(new Array(10).fill(0))).toEqual({ hue: 0, saturation: 50, brightness: 20 });
  });

  it('maps full scale to blue at full saturation and brightness', () => {
    expect(bandsToColor(new Array(10).fill(1))).toEqual({ hue: 240, saturation: 100, brightness: 100 });
  });

  it('takes hue from treble only', () => {
    const color = bandsToColor([1, 1, 1, 0, 0, 0, 0, 0, 0, 0]);
    expect(color.hue).toBe(0);
    expect(color.saturation).toBe(50);
    expect(color.brightness).toBeCloseTo(44);
  });

  it('scales hue with the treble level', () => {
    const color = bandsToColor([0, 0, 0, 0, 0, 0, 0.5, 0.5, 0.5, 0.5]);
    expect(color.hue).toBeCloseTo(120);
    expect(color.brightness).toBeCloseTo(36);
  });
});

describe('AudioSyncEngine', () => {
  it('rejects a missing capture backend', () => {
    expect(() => new AudioSyncEngine(new FakeSession(), DEFAULT_AUDIO_SETTINGS, null)).toThrow(ConfigurationError);
  });

  it('rejects unsupported band counts and chunk sizes', () => {
    const capture = new FakeAudioCapture(silence);
    expect(
      () => new AudioSyncEngine(new FakeSession(), { ...DEFAULT_AUDIO_SETTINGS, bandCount: 8 }, capture)
    ).toThrow(ConfigurationError);
    expect(
      () => new AudioSyncEngine(new FakeSession(), { ...DEFAULT_AUDIO_SETTINGS, chunkSize: 1000 }, capture)
    ).toThrow('power of two');
  });

  it('lights the 1 kHz band once the normalizer has warmed up', async () => {
    // Rising amplitude keeps the newest frame at the top of the history
    const capture = new FakeAudioCapture(index => tone(1 + 0.05 * index));
    const engine = new AudioSyncEngine(new FakeSession(), DEFAULT_AUDIO_SETTINGS, capture);
    const ticks = collectTicks(engine);

    await engine.start();
    await vi.waitFor(() => expect(ticks.length).toBeGreaterThanOrEqual(25));
    await engine.stop();

    for (const tick of ticks.slice(0, 19)) {
      expect(tick.bands).toEqual(new Array(10).fill(0));
    }
    for (const tick of ticks.slice(19, 25)) {
      expect(tick.bands[5]).toBeCloseTo(Math.tanh(1.25), 3);
    }
  });

  it('pushes at most once per minimum interval', async () => {
    let clock = 0;
    const pushTimes: number[] = [];
    const session = new FakeSession(() => pushTimes.push(clock));
    const capture = new FakeAudioCapture(() => {
      clock += 10;
      return silence();
    });
    const engine = new AudioSyncEngine(session, DEFAULT_AUDIO_SETTINGS, capture, { now: () => clock });
    const ticks = collectTicks(engine);

    await engine.start();
    await vi.waitFor(() => expect(ticks.length).toBeGreaterThanOrEqual(30));
    await engine.stop();

    expect(pushTimes.slice(0, 3)).toEqual([60, 120, 180]);
    for (let i = 1; i < pushTimes.length; i++) {
      expect(pushTimes[i] - pushTimes[i - 1]).toBeGreaterThan(DEFAULT_AUDIO_SETTINGS.minPushIntervalMs);
    }
    expect(ticks.slice(0, 6).map(tick => tick.pushed)).toEqual([false, false, false, false, false, true]);
  });

  it('retries transient read failures without stopping', async () => {
    const capture = new FakeAudioCapture(index =>
      index < 3 ? new TransientCaptureError('no data') : silence()
    );
    const engine = new AudioSyncEngine(new FakeSession(), DEFAULT_AUDIO_SETTINGS, capture);
    const ticks = collectTicks(engine);
    const failed = vi.fn();
    engine.on('failed', failed);

    await engine.start();
    await vi.waitFor(() => expect(ticks.length).toBeGreaterThan(0));
    await engine.stop();

    expect(failed).not.toHaveBeenCalled();
    expect(capture.stream?.reads).toBeGreaterThan(3);
  });

  it('stops with a failure on a non-transient read error', async () => {
    const capture = new FakeAudioCapture(() => new Error('device unplugged'));
    const engine = new AudioSyncEngine(new FakeSession(), DEFAULT_AUDIO_SETTINGS, capture);
    const failed = vi.fn();
    const stopped = vi.fn();
    engine.on('failed', failed);
    engine.on('stopped', stopped);

    await engine.start();
    await vi.waitFor(() => expect(stopped).toHaveBeenCalledWith('device unplugged'));

    expect(failed).toHaveBeenCalledTimes(1);
    expect(engine.isRunning()).toBe(false);
    expect(capture.stream?.closed).toBe(true);
  });

  it('stops with a failure when a push fails', async () => {
    const session = new FakeSession(() => {
      throw new Error('bulb unreachable');
    });
    const engine = new AudioSyncEngine(session, { ...DEFAULT_AUDIO_SETTINGS, minPushIntervalMs: 0 }, new FakeAudioCapture(silence), {
      now: (() => {
        let t = 0;
        return () => ++t;
      })(),
    });
    const stopped = vi.fn();
    engine.on('stopped', stopped);

    await engine.start();
    await vi.waitFor(() => expect(stopped).toHaveBeenCalledWith('bulb unreachable'));
    expect(engine.isRunning()).toBe(false);
  });

  it('ignores a second start and closes the stream on stop', async () => {
    const capture = new FakeAudioCapture(silence);
    const engine = new AudioSyncEngine(new FakeSession(), DEFAULT_AUDIO_SETTINGS, capture);
    const stopped = vi.fn();
    engine.on('stopped', stopped);

    await engine.start();
    await engine.start();
    expect(capture.opens).toBe(1);
    expect(engine.isRunning()).toBe(true);

    await engine.stop();
    await engine.stop();

    expect(engine.isRunning()).toBe(false);
    expect(capture.stream?.closed).toBe(true);
    expect(stopped).toHaveBeenCalledTimes(1);
    expect(stopped).toHaveBeenCalledWith('Stopped by user');
  });

  it('waits for a pending start before stop resolves', async () => {
    const capture = new FakeAudioCapture(silence);
    const open = capture.open.bind(capture);
    capture.open = async () => {
      await new Promise(resolve => setTimeout(resolve, 50));
      return open();
    };
    const engine = new AudioSyncEngine(new FakeSession(), DEFAULT_AUDIO_SETTINGS, capture);
    const started = vi.fn();
    engine.on('started', started);

    const starting = engine.start();
    await engine.stop();

    expect(engine.isRunning()).toBe(false);
    expect(capture.opens).toBe(1);
    expect(capture.stream?.closed).toBe(true);
    expect(started).not.toHaveBeenCalled();
    await expect(starting).resolves.toBeUndefined();
  });

  it('propagates a capture open failure from start', async () => {
    const capture = new FakeAudioCapture(silence);
    capture.open = () => Promise.reject(new ConfigurationError('no recorder'));
    const engine = new AudioSyncEngine(new FakeSession(), DEFAULT_AUDIO_SETTINGS, capture);

    await expect(engine.start()).rejects.toThrow('no recorder');
    expect(engine.isRunning()).toBe(false);
  });
});
