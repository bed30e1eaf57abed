import screenshot from 'screenshot-desktop';
import sharp from 'sharp';
import type { FrameGrabber, ScreenCaptureBackend, ScreenFrame } from './types';

export const CAPTURE_SIZE = 150;

interface Display {
  id: string | number;
}

export function pickDisplay<T>(displays: readonly T[], monitorIndex: number): T | undefined {
  if (monitorIndex >= 0 && monitorIndex < displays.length) {
    return displays[monitorIndex];
  }
  return displays[0];
}

/**
 * Screenshot the display, then downsample to CAPTURE_SIZE² packed RGB.
 */
class DesktopFrameGrabber implements FrameGrabber {
  constructor(private readonly displays: readonly Display[]) {}

  async grab(monitorIndex: number): Promise<ScreenFrame> {
    const display = pickDisplay(this.displays, monitorIndex);
    const image = await screenshot(display ? { screen: display.id, format: 'png' } : { format: 'png' });

    const { data, info } = await sharp(image)
      .resize(CAPTURE_SIZE, CAPTURE_SIZE, { fit: 'fill', kernel: 'lanczos3' })
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return { width: info.width, height: info.height, data };
  }

  close(): void {
    // screenshot-desktop holds nothing open between grabs
  }
}

export class DesktopScreenCapture implements ScreenCaptureBackend {
  readonly name = 'screenshot-desktop';

  async open(): Promise<FrameGrabber> {
    const displays: Display[] = await screenshot.listDisplays();
    return new DesktopFrameGrabber(displays);
  }
}

/**
 * Screen capture is usable when the platform tool can list displays.
 */
export async function resolveScreenBackend(): Promise<ScreenCaptureBackend | null> {
  try {
    const displays = await screenshot.listDisplays();
    console.log(`[Capture] Screen backend: screenshot-desktop (${displays.length} display(s))`);
    return new DesktopScreenCapture();
  } catch (error) {
    console.warn('[Capture] No screen capture backend available:', error instanceof Error ? error.message : error);
    return null;
  }
}
