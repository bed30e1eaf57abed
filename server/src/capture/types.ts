export interface AudioDevice {
  id: string;
  name: string;
  channels?: number;
}

export interface AudioStream {
  readonly sampleRate: number;
  /**
   * Resolves with exactly `frameSize` mono samples. Rejects with
   * TransientCaptureError when no data arrives in time.
   */
  read(frameSize: number): Promise<Float32Array>;
  close(): void;
}

export interface AudioCaptureBackend {
  readonly name: string;
  open(deviceSelector: string | undefined, sampleRate: number): Promise<AudioStream>;
  listDevices(): Promise<AudioDevice[]>;
}

/**
 * Packed 8-bit RGB, row-major, `width * height * 3` bytes.
 */
export interface ScreenFrame {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface FrameGrabber {
  grab(monitorIndex: number): Promise<ScreenFrame>;
  close(): void;
}

export interface ScreenCaptureBackend {
  readonly name: string;
  open(): Promise<FrameGrabber>;
}

export interface CaptureBackends {
  audio: AudioCaptureBackend | null;
  screen: ScreenCaptureBackend | null;
}
