/**
 * Fatal at construction: missing capture backend, unsupported settings,
 * or a device address that the requested mode needs.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class DeviceError extends Error {
  constructor(message: string, public readonly code?: number) {
    super(message);
    this.name = 'DeviceError';
  }
}

export class DeviceNotFoundError extends Error {
  constructor(message = 'Device not found. Enter its IP and try again.') {
    super(message);
    this.name = 'DeviceNotFoundError';
  }
}

/**
 * Raised by audio capture reads. The audio loop backs off and retries.
 */
export class TransientCaptureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransientCaptureError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
