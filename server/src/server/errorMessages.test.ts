import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import { formatSyncError, httpStatusFor } from './errorMessages';
import { ConfigurationError, DeviceError, DeviceNotFoundError } from '../sync/errors';

describe('formatSyncError', () => {
  it('passes configuration and discovery messages through', () => {
    expect(formatSyncError(new ConfigurationError('Device IP is required for audio sync.'))).toBe(
      'Device IP is required for audio sync.'
    );
    expect(formatSyncError(new DeviceNotFoundError())).toBe('Device not found. Enter its IP and try again.');
  });

  it('prefixes device and network failures', () => {
    expect(formatSyncError(new DeviceError('Device 192.168.1.50 rejected the credentials'))).toBe(
      'Could not reach the light: Device 192.168.1.50 rejected the credentials'
    );
    expect(formatSyncError(new AxiosError('timeout of 5000ms exceeded'))).toBe(
      'Network error talking to the light: timeout of 5000ms exceeded'
    );
  });

  it('describes anything else as unexpected', () => {
    expect(formatSyncError(new Error('boom'))).toBe('Unexpected error: boom');
    expect(formatSyncError('boom')).toBe('Unexpected error: boom');
  });
});

describe('httpStatusFor', () => {
  it('maps error kinds to status codes', () => {
    expect(httpStatusFor(new ConfigurationError('bad'))).toBe(400);
    expect(httpStatusFor(new DeviceNotFoundError())).toBe(404);
    expect(httpStatusFor(new DeviceError('down'))).toBe(502);
    expect(httpStatusFor(new AxiosError('down'))).toBe(502);
    expect(httpStatusFor(new Error('boom'))).toBe(500);
  });
});
