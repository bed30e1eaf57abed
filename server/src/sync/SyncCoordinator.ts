import { EventEmitter } from 'events';
import { AudioSyncEngine } from '../audio/AudioSyncEngine';
import { ScreenSyncEngine } from '../screen/ScreenSyncEngine';
import { ConfigurationError, DeviceNotFoundError, errorMessage } from './errors';
import type { CaptureBackends } from '../capture/types';
import type {
  AudioSettings,
  Credentials,
  DeviceInfo,
  DeviceSession,
  HsbColor,
  ScreenSettings,
  SyncMode,
  SyncStatus,
} from './types';

type ActiveEngine =
  | { mode: 'audio'; engine: AudioSyncEngine }
  | { mode: 'screen'; engine: ScreenSyncEngine };

export interface CoordinatorDependencies {
  session: DeviceSession;
  capture: CaptureBackends;
  discoverDevice: (credentials: Credentials) => Promise<string | null>;
}

export interface ColorEvent {
  mode: SyncMode;
  color: HsbColor;
}

/**
 * Owns at most one running engine and the device session it drives.
 *
 * Transitions are queued so a `start` or `stop` never overlaps another one;
 * after each completes, `activeMode` is set exactly when an engine runs.
 */
export class SyncCoordinator extends EventEmitter {
  private readonly session: DeviceSession;
  private readonly capture: CaptureBackends;
  private readonly discover: (credentials: Credentials) => Promise<string | null>;
  private active: ActiveEngine | null = null;
  private poweredOn = false;
  private transition: Promise<void> = Promise.resolve();

  constructor(
    private readonly credentials: Credentials,
    deps: CoordinatorDependencies
  ) {
    super();
    this.session = deps.session;
    this.capture = deps.capture;
    this.discover = deps.discoverDevice;
  }

  get activeMode(): SyncMode | null {
    return this.active?.mode ?? null;
  }

  getStatus(): SyncStatus {
    return {
      activeMode: this.activeMode,
      deviceIp: this.session.deviceIp,
      screenBrightness: this.active?.mode === 'screen' ? this.active.engine.getUserBrightness() : null,
    };
  }

  start(
    mode: SyncMode,
    deviceIp: string | undefined,
    audioSettings: Readonly<AudioSettings>,
    screenSettings: Readonly<ScreenSettings>,
    initialBrightness?: number
  ): Promise<void> {
    return this.enqueue(() =>
      this.startNow(mode, deviceIp, audioSettings, screenSettings, initialBrightness)
    );
  }

  stop(): Promise<void> {
    return this.enqueue(() => this.stopNow());
  }

  /**
   * Reads the bulb through the shared session; fails until a start has connected it.
   */
  getDeviceInfo(): Promise<DeviceInfo> {
    return this.session.getDeviceInfo();
  }

  setScreenBrightness(value: number): void {
    if (this.active?.mode === 'screen') {
      this.active.engine.setUserBrightness(value);
    }
  }

  private enqueue(operation: () => Promise<void>): Promise<void> {
    const result = this.transition.then(operation);
    this.transition = result.catch(() => undefined);
    return result;
  }

  private async startNow(
    mode: SyncMode,
    deviceIp: string | undefined,
    audioSettings: Readonly<AudioSettings>,
    screenSettings: Readonly<ScreenSettings>,
    initialBrightness?: number
  ): Promise<void> {
    await this.stopActiveEngine();

    try {
      const ip = await this.resolveDeviceIp(mode, deviceIp);

      await this.session.connect(ip);
      await this.session.powerOn();
      this.poweredOn = true;

      if (mode === 'audio') {
        const engine = new AudioSyncEngine(this.session, audioSettings, this.capture.audio);
        await this.activate({ mode, engine });
      } else {
        const engine = new ScreenSyncEngine(this.session, screenSettings, this.capture.screen);
        if (initialBrightness !== undefined) {
          engine.setUserBrightness(initialBrightness);
        }
        await this.activate({ mode, engine });
      }

      console.log(`[Coordinator] ${mode} sync running on ${ip}`);
    } catch (error) {
      console.error(`[Coordinator] Failed to start ${mode} sync:`, errorMessage(error));
      await this.stopActiveEngine();
      throw error;
    } finally {
      this.emit('status', this.getStatus());
    }
  }

  private async resolveDeviceIp(mode: SyncMode, deviceIp: string | undefined): Promise<string> {
    if (deviceIp) {
      return deviceIp;
    }
    if (mode === 'audio') {
      throw new ConfigurationError('Device IP is required for audio sync.');
    }

    console.log('[Coordinator] No device IP given, scanning the network...');
    const found = await this.discover(this.credentials);
    if (!found) {
      throw new DeviceNotFoundError();
    }
    return found;
  }

  private async activate(active: ActiveEngine): Promise<void> {
    const { mode, engine } = active;

    engine.on('tick', (tick: { color: HsbColor }) => {
      const event: ColorEvent = { mode, color: tick.color };
      this.emit('color', event);
    });
    engine.on('failed', (error: unknown) => {
      if (this.active?.engine !== engine) {
        return;
      }
      this.active = null;
      console.error(`[Coordinator] ${mode} sync stopped after an error:`, errorMessage(error));
      this.emit('failed', error);
      this.emit('status', this.getStatus());
    });

    this.active = active;
    try {
      await engine.start();
    } catch (error) {
      this.active = null;
      throw error;
    }
  }

  private async stopActiveEngine(): Promise<void> {
    const active = this.active;
    if (!active) {
      return;
    }
    this.active = null;
    await active.engine.stop();
    active.engine.removeAllListeners();
  }

  private async stopNow(): Promise<void> {
    await this.stopActiveEngine();

    if (this.poweredOn) {
      this.poweredOn = false;
      try {
        await this.session.powerOff();
      } catch (error) {
        console.warn('[Coordinator] Power off failed:', errorMessage(error));
      }
    }

    this.emit('status', this.getStatus());
  }
}
