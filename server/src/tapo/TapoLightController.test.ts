import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TapoLightController } from './TapoLightController';
import { DeviceError } from '../sync/errors';
import { FakeTapoBulb } from '../testing/FakeTapoBulb';
import type { Credentials } from '../sync/types';

const CREDENTIALS: Credentials = { email: 'user@example.com', password: 'test-secret' };

describe('TapoLightController', () => {
  let bulb: FakeTapoBulb;
  let host: string;
  let controller: TapoLightController;

  beforeEach(async () => {
    bulb = new FakeTapoBulb(CREDENTIALS);
    host = await bulb.listen();
    controller = new TapoLightController(CREDENTIALS);
  });

  afterEach(async () => {
    await bulb.close();
  });

  it('refuses commands before connecting', async () => {
    await expect(controller.powerOn()).rejects.toThrow(new DeviceError('Device not connected.'));
    expect(controller.deviceIp).toBeNull();
  });

  it('connects once per address', async () => {
    await controller.connect(host);
    await controller.connect(host);

    expect(controller.deviceIp).toBe(host);
    expect(bulb.handshakes).toBe(1);
  });

  it('switches power through set_device_info', async () => {
    await controller.connect(host);
    await controller.powerOn();
    await controller.powerOff();

    expect(bulb.requests).toEqual([
      { method: 'set_device_info', params: { device_on: true } },
      { method: 'set_device_info', params: { device_on: false } },
    ]);
  });

  it('sends hue, saturation and brightness in one clamped call', async () => {
    await controller.connect(host);
    await controller.setColor({ hue: 359.6, saturation: 0, brightness: 150 });

    expect(bulb.requests).toEqual([
      { method: 'set_device_info', params: { hue: 359, saturation: 1, brightness: 100, color_temp: 0 } },
    ]);
  });

  it('truncates fractional color values', async () => {
    await controller.connect(host);
    await controller.setColor({ hue: 10.9, saturation: 55.7, brightness: 33.5 });

    expect(bulb.requests).toEqual([
      { method: 'set_device_info', params: { hue: 10, saturation: 55, brightness: 33, color_temp: 0 } },
    ]);
  });

  it('reads device info and decodes the nickname', async () => {
    await controller.connect(host);
    await controller.powerOn();

    expect(await controller.getDeviceInfo()).toEqual({
      deviceId: 'fake-device',
      model: 'L530',
      nickname: 'Desk Lamp',
      deviceOn: true,
      brightness: 50,
      hue: 0,
      saturation: 100,
    });
  });
});
