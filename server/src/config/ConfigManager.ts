import * as fs from 'fs/promises';
import * as path from 'path';
import {
  DEFAULT_AUDIO_SETTINGS,
  DEFAULT_SCREEN_SETTINGS,
  DEFAULT_USER_BRIGHTNESS,
  AudioSettings,
  Credentials,
  ScreenSettings,
} from '../sync/types';

export interface DiscoveryConfig {
  scanBase?: string;
  start: number;
  end: number;
}

export interface AppConfig {
  credentials?: Credentials;
  deviceIp?: string;
  port: number;
  screenBrightness: number;
  audio: AudioSettings;
  screen: ScreenSettings;
  discovery: DiscoveryConfig;
}

export type ConfigUpdate = Partial<Omit<AppConfig, 'audio' | 'screen' | 'discovery'>> & {
  audio?: Partial<AudioSettings>;
  screen?: Partial<ScreenSettings>;
  discovery?: Partial<DiscoveryConfig>;
};

const DEFAULT_PORT = 3000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberIn(value: unknown, fallback: number, min: number, max: number): number {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < min || parsed > max) {
    return fallback;
  }
  return parsed;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function sanitizeCredentials(value: unknown): Credentials | undefined {
  if (!isRecord(value)) return undefined;
  const email = optionalString(value.email);
  const password = typeof value.password === 'string' && value.password.length > 0 ? value.password : undefined;
  return email && password ? { email, password } : undefined;
}

export function sanitizeAudioSettings(value: unknown, base: AudioSettings = DEFAULT_AUDIO_SETTINGS): AudioSettings {
  const raw = isRecord(value) ? value : {};
  return {
    deviceSelector: raw.deviceSelector !== undefined ? optionalString(raw.deviceSelector) : base.deviceSelector,
    chunkSize: Math.round(numberIn(raw.chunkSize, base.chunkSize, 64, 16384)),
    bandCount: Math.round(numberIn(raw.bandCount, base.bandCount, 1, 64)),
    minPushIntervalMs: numberIn(raw.minPushIntervalMs, base.minPushIntervalMs, 0, 10000),
    historyLength: Math.round(numberIn(raw.historyLength, base.historyLength, 20, 100000)),
    sampleRate: Math.round(numberIn(raw.sampleRate, base.sampleRate, 8000, 192000)),
  };
}

export function sanitizeScreenSettings(value: unknown, base: ScreenSettings = DEFAULT_SCREEN_SETTINGS): ScreenSettings {
  const raw = isRecord(value) ? value : {};
  const minBrightness = numberIn(raw.minBrightness, base.minBrightness, 1, 100);
  const maxBrightness = numberIn(raw.maxBrightness, base.maxBrightness, 1, 100);
  return {
    refreshRate: numberIn(raw.refreshRate, base.refreshRate, 1, 240),
    smoothingFactor: numberIn(raw.smoothingFactor, base.smoothingFactor, 0.01, 1),
    gamma: numberIn(raw.gamma, base.gamma, 0.1, 5),
    saturationBoost: numberIn(raw.saturationBoost, base.saturationBoost, 0, 10),
    minBrightness: Math.min(minBrightness, maxBrightness),
    maxBrightness: Math.max(minBrightness, maxBrightness),
    powerFactor: numberIn(raw.powerFactor, base.powerFactor, 0, 10),
    monitorIndex: Math.round(numberIn(raw.monitorIndex, base.monitorIndex, 0, 64)),
  };
}

export class ConfigManager {
  private configPath: string;
  private config: AppConfig;
  private env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath || path.join(process.cwd(), 'config.json');
    this.env = env;
    this.config = this.getDefaultConfig();
  }

  /**
   * Get default configuration
   */
  private getDefaultConfig(): AppConfig {
    return {
      credentials: undefined,
      deviceIp: undefined,
      port: DEFAULT_PORT,
      screenBrightness: DEFAULT_USER_BRIGHTNESS,
      audio: { ...DEFAULT_AUDIO_SETTINGS },
      screen: { ...DEFAULT_SCREEN_SETTINGS },
      discovery: { start: 1, end: 254 },
    };
  }

  /**
   * Load configuration from file, then apply environment overrides
   */
  async load(): Promise<AppConfig> {
    try {
      const data = await fs.readFile(this.configPath, 'utf-8');
      this.config = this.sanitize(JSON.parse(data));
      console.log(`Configuration loaded from ${this.configPath}`);
    } catch (error: unknown) {
      if (!(isRecord(error) && error.code === 'ENOENT')) {
        throw error;
      }
      console.log('No config file found, using defaults');
      this.config = this.getDefaultConfig();
    }

    this.applyEnvironment();
    return this.getConfig();
  }

  /**
   * Save configuration to file
   */
  async save(): Promise<void> {
    const data = JSON.stringify(this.config, null, 2);
    await fs.writeFile(this.configPath, data, 'utf-8');
    console.log(`Configuration saved to ${this.configPath}`);
  }

  getConfig(): AppConfig {
    return {
      ...this.config,
      audio: { ...this.config.audio },
      screen: { ...this.config.screen },
      discovery: { ...this.config.discovery },
    };
  }

  /**
   * Merge a partial update; every field is re-validated against the current value
   */
  updateConfig(updates: ConfigUpdate | Record<string, unknown>): void {
    const current = this.config;
    const raw: Record<string, unknown> = { ...updates };

    this.config = {
      ...current,
      deviceIp: raw.deviceIp !== undefined ? optionalString(raw.deviceIp) : current.deviceIp,
      port: Math.round(numberIn(raw.port, current.port, 0, 65535)),
      screenBrightness: Math.round(numberIn(raw.screenBrightness, current.screenBrightness, 1, 100)),
      audio: sanitizeAudioSettings(raw.audio, current.audio),
      screen: sanitizeScreenSettings(raw.screen, current.screen),
      discovery: this.sanitizeDiscovery(raw.discovery, current.discovery),
    };
  }

  setCredentials(credentials: Credentials, deviceIp?: string): void {
    this.config.credentials = { ...credentials };
    this.config.deviceIp = deviceIp;
  }

  clearCredentials(): void {
    this.config.credentials = undefined;
  }

  private sanitize(raw: unknown): AppConfig {
    const defaults = this.getDefaultConfig();
    const record = isRecord(raw) ? raw : {};

    return {
      credentials: sanitizeCredentials(record.credentials),
      deviceIp: optionalString(record.deviceIp),
      port: Math.round(numberIn(record.port, defaults.port, 0, 65535)),
      screenBrightness: Math.round(numberIn(record.screenBrightness, defaults.screenBrightness, 1, 100)),
      audio: sanitizeAudioSettings(record.audio),
      screen: sanitizeScreenSettings(record.screen),
      discovery: this.sanitizeDiscovery(record.discovery, defaults.discovery),
    };
  }

  private sanitizeDiscovery(value: unknown, base: DiscoveryConfig): DiscoveryConfig {
    const raw = isRecord(value) ? value : {};
    const start = Math.round(numberIn(raw.start, base.start, 1, 254));
    const end = Math.round(numberIn(raw.end, base.end, 1, 254));
    return {
      scanBase: raw.scanBase !== undefined ? optionalString(raw.scanBase) : base.scanBase,
      start: Math.min(start, end),
      end: Math.max(start, end),
    };
  }

  private applyEnvironment(): void {
    const { TAPO_EMAIL, TAPO_PASSWORD, TAPO_IP, AUDIO_DEVICE, PORT } = this.env;

    if (TAPO_EMAIL && TAPO_PASSWORD) {
      this.config.credentials = { email: TAPO_EMAIL, password: TAPO_PASSWORD };
    }
    if (TAPO_IP) {
      this.config.deviceIp = TAPO_IP;
    }
    if (AUDIO_DEVICE) {
      this.config.audio = { ...this.config.audio, deviceSelector: AUDIO_DEVICE };
    }
    if (PORT) {
      this.config.port = Math.round(numberIn(PORT, this.config.port, 0, 65535));
    }
  }
}
