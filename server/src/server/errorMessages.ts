import { AxiosError } from 'axios';
import { ConfigurationError, DeviceError, DeviceNotFoundError, errorMessage } from '../sync/errors';

/**
 * User-facing text for a failed sync action.
 */
export function formatSyncError(error: unknown): string {
  if (error instanceof ConfigurationError || error instanceof DeviceNotFoundError) {
    return error.message;
  }
  if (error instanceof DeviceError) {
    return `Could not reach the light: ${error.message}`;
  }
  if (error instanceof AxiosError) {
    return `Network error talking to the light: ${error.message}`;
  }
  return `Unexpected error: ${errorMessage(error)}`;
}

export function httpStatusFor(error: unknown): number {
  if (error instanceof ConfigurationError) return 400;
  if (error instanceof DeviceNotFoundError) return 404;
  if (error instanceof DeviceError || error instanceof AxiosError) return 502;
  return 500;
}
