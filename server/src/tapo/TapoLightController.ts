import { TapoKlapSession } from './TapoKlapSession';
import { DeviceError } from '../sync/errors';
import type { Credentials, DeviceInfo, DeviceSession, HsbColor } from '../sync/types';

export interface TapoControllerOptions {
  timeoutMs?: number;
}

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(Math.trunc(value), max));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function decodeNickname(value: unknown): string {
  if (typeof value !== 'string' || value.length === 0) {
    return '';
  }
  return Buffer.from(value, 'base64').toString('utf8');
}

/**
 * Light-bulb commands over a KLAP session (L530-style color bulbs).
 */
export class TapoLightController implements DeviceSession {
  private session: TapoKlapSession | null = null;
  private ip: string | null = null;

  constructor(
    private readonly credentials: Credentials,
    private readonly options: TapoControllerOptions = {}
  ) {}

  get deviceIp(): string | null {
    return this.ip;
  }

  async connect(deviceIp: string): Promise<void> {
    if (this.session && this.ip === deviceIp) {
      return;
    }

    const session = new TapoKlapSession({
      host: deviceIp,
      credentials: this.credentials,
      timeoutMs: this.options.timeoutMs,
    });
    await session.handshake();

    this.session = session;
    this.ip = deviceIp;
    console.log(`[Tapo] Connected to ${deviceIp}`);
  }

  async powerOn(): Promise<void> {
    await this.requireSession().request('set_device_info', { device_on: true });
  }

  async powerOff(): Promise<void> {
    await this.requireSession().request('set_device_info', { device_on: false });
  }

  /**
   * Hue, saturation and brightness in one call; color_temp 0 switches the
   * bulb out of white mode.
   */
  async setColor(color: HsbColor): Promise<void> {
    await this.requireSession().request('set_device_info', {
      hue: clampInt(color.hue, 0, 359),
      saturation: clampInt(color.saturation, 1, 100),
      brightness: clampInt(color.brightness, 1, 100),
      color_temp: 0,
    });
  }

  async getDeviceInfo(): Promise<DeviceInfo> {
    const result = await this.requireSession().request('get_device_info');
    if (!isRecord(result)) {
      throw new DeviceError('Malformed device info');
    }

    return {
      deviceId: typeof result.device_id === 'string' ? result.device_id : '',
      model: typeof result.model === 'string' ? result.model : 'unknown',
      nickname: decodeNickname(result.nickname),
      deviceOn: result.device_on === true,
      brightness: optionalNumber(result.brightness),
      hue: optionalNumber(result.hue),
      saturation: optionalNumber(result.saturation),
    };
  }

  private requireSession(): TapoKlapSession {
    if (!this.session) {
      throw new DeviceError('Device not connected.');
    }
    return this.session;
  }
}
