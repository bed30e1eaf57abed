/**
 * Shared types for the audio/screen sync engines and the coordinator
 */

export type SyncMode = 'audio' | 'screen';

export interface HsbColor {
  hue: number;        // 0-360
  saturation: number; // 0-100
  brightness: number; // 0-100
}

export interface Credentials {
  email: string;
  password: string;
}

export interface DeviceInfo {
  deviceId: string;
  model: string;
  nickname: string;
  deviceOn: boolean;
  brightness?: number;
  hue?: number;
  saturation?: number;
}

/**
 * A connected light. Both engines push color through it; the coordinator
 * uses it for power control around mode switches.
 */
export interface DeviceSession {
  readonly deviceIp: string | null;
  connect(deviceIp: string): Promise<void>;
  powerOn(): Promise<void>;
  powerOff(): Promise<void>;
  setColor(color: HsbColor): Promise<void>;
  getDeviceInfo(): Promise<DeviceInfo>;
}

export interface AudioSettings {
  // Capture device name (PulseAudio source / ALSA PCM), backend default if unset
  deviceSelector?: string;
  chunkSize: number;
  bandCount: number;
  minPushIntervalMs: number;
  historyLength: number;
  sampleRate: number;
}

export interface ScreenSettings {
  refreshRate: number;
  smoothingFactor: number;
  gamma: number;
  saturationBoost: number;
  minBrightness: number;
  maxBrightness: number;
  powerFactor: number;
  monitorIndex: number;
}

export const DEFAULT_AUDIO_SETTINGS: Readonly<AudioSettings> = Object.freeze({
  chunkSize: 1024,
  bandCount: 10,
  minPushIntervalMs: 50,
  historyLength: 300,
  sampleRate: 44100,
});

export const DEFAULT_SCREEN_SETTINGS: Readonly<ScreenSettings> = Object.freeze({
  refreshRate: 60,
  smoothingFactor: 0.4,
  gamma: 1.2,
  saturationBoost: 1.5,
  minBrightness: 10,
  maxBrightness: 80,
  powerFactor: 1.8,
  monitorIndex: 0,
});

export const DEFAULT_USER_BRIGHTNESS = 80;

export interface SyncStatus {
  activeMode: SyncMode | null;
  deviceIp: string | null;
  screenBrightness: number | null;
}
