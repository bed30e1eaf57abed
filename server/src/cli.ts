import type { SyncMode } from './sync/types';

/**
 * `--mode audio|screen` (or `--mode=screen`) starts syncing right away.
 */
export function parseModeArgument(argv: readonly string[]): SyncMode | null {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = arg === '--mode' ? argv[i + 1] : arg.startsWith('--mode=') ? arg.slice('--mode='.length) : undefined;
    if (value === undefined) continue;
    if (value === 'audio' || value === 'screen') {
      return value;
    }
    throw new Error(`Unknown mode "${value}" (expected audio or screen)`);
  }
  return null;
}
