import { applyGammaCorrection, lerp, lerpHue, rgbToHsv, weightedAverageColor } from './color';
import { SyncEngine, sleep } from '../sync/SyncEngine';
import { ConfigurationError } from '../sync/errors';
import { DEFAULT_USER_BRIGHTNESS } from '../sync/types';
import type { FrameGrabber, ScreenCaptureBackend, ScreenFrame } from '../capture/types';
import type { DeviceSession, HsbColor, ScreenSettings } from '../sync/types';

export interface ScreenTick {
  target: HsbColor;
  color: HsbColor;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

function truncateColor(color: HsbColor): HsbColor {
  return {
    hue: Math.trunc(color.hue) % 360,
    saturation: Math.trunc(color.saturation),
    brightness: Math.trunc(color.brightness),
  };
}

/**
 * Drives the light from the dominant screen color, smoothing toward each
 * frame's target so the bulb does not flicker between ticks.
 */
export class ScreenSyncEngine extends SyncEngine<ScreenTick> {
  protected readonly tag = 'ScreenSync';

  private readonly capture: ScreenCaptureBackend;
  private grabber: FrameGrabber | null = null;
  private userBrightness = DEFAULT_USER_BRIGHTNESS;
  private current: HsbColor;

  constructor(
    private readonly session: DeviceSession,
    private readonly settings: Readonly<ScreenSettings>,
    capture: ScreenCaptureBackend | null
  ) {
    super();

    if (!capture) {
      throw new ConfigurationError('Screen capture is unavailable on this system.');
    }
    if (!(settings.refreshRate > 0)) {
      throw new ConfigurationError(`Refresh rate must be positive (got ${settings.refreshRate}).`);
    }
    if (!(settings.smoothingFactor > 0 && settings.smoothingFactor <= 1)) {
      throw new ConfigurationError(`Smoothing factor must be in (0, 1] (got ${settings.smoothingFactor}).`);
    }
    if (settings.minBrightness > settings.maxBrightness) {
      throw new ConfigurationError('Minimum brightness cannot exceed maximum brightness.');
    }

    this.capture = capture;
    this.current = {
      hue: 0,
      saturation: 50,
      brightness: clamp(60, settings.minBrightness, settings.maxBrightness),
    };
  }

  setUserBrightness(value: number): void {
    if (!Number.isFinite(value)) {
      return;
    }
    this.userBrightness = clamp(Math.trunc(value), 1, 100);
  }

  getUserBrightness(): number {
    return this.userBrightness;
  }

  getCurrentColor(): HsbColor {
    return { ...this.current };
  }

  /**
   * Color the light should head toward for this frame.
   */
  computeTarget(frame: ScreenFrame): HsbColor {
    const average = weightedAverageColor(frame, this.settings.powerFactor);
    const [r, g, b] = applyGammaCorrection(average, this.settings.gamma);
    const { h, s, v } = rgbToHsv(r / 255, g / 255, b / 255);

    const boosted = Math.min(s * this.settings.saturationBoost, 1.0);

    return {
      hue: Math.trunc(h * 360),
      saturation: Math.max(10, Math.trunc(boosted * 100)),
      brightness: clamp(
        Math.trunc(this.userBrightness * v),
        this.settings.minBrightness,
        this.settings.maxBrightness
      ),
    };
  }

  /**
   * Move the smoothed color one step toward the frame's target.
   */
  updateColors(frame: ScreenFrame): ScreenTick {
    const target = this.computeTarget(frame);
    const factor = this.settings.smoothingFactor;

    this.current = {
      hue: lerpHue(this.current.hue, target.hue, factor),
      saturation: lerp(this.current.saturation, target.saturation, factor),
      brightness: lerp(this.current.brightness, target.brightness, factor),
    };

    return { target, color: this.getCurrentColor() };
  }

  protected async open(): Promise<void> {
    this.grabber = await this.capture.open();
    console.log(
      `[ScreenSync] Capturing monitor ${this.settings.monitorIndex} via ${this.capture.name} at ${this.settings.refreshRate} Hz`
    );
  }

  protected async tick(): Promise<void> {
    const grabber = this.grabber;
    if (!grabber) {
      throw new Error('Screen grabber is not open');
    }

    const frame = await grabber.grab(this.settings.monitorIndex);
    const tick = this.updateColors(frame);

    await this.session.setColor(truncateColor(tick.color));
    this.emitTick(tick);

    await sleep(1000 / this.settings.refreshRate);
  }

  protected release(): void {
    if (this.grabber) {
      this.grabber.close();
      this.grabber = null;
    }
  }
}
