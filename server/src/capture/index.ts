/**
 * Capture backends
 *
 * Audio comes from a recorder process (parec / arecord) emitting raw float
 * PCM; screen frames come from screenshot-desktop, downsampled with sharp.
 */

import { resolveAudioBackend } from './ProcessAudioCapture';
import { resolveScreenBackend } from './DesktopScreenCapture';
import type { CaptureBackends } from './types';

export * from './types';
export { PcmFrameReader } from './PcmFrameReader';
export { ProcessAudioCapture, resolveAudioBackend } from './ProcessAudioCapture';
export { DesktopScreenCapture, resolveScreenBackend } from './DesktopScreenCapture';

export async function resolveCaptureBackends(): Promise<CaptureBackends> {
  const [audio, screen] = await Promise.all([resolveAudioBackend(), resolveScreenBackend()]);
  return { audio, screen };
}
