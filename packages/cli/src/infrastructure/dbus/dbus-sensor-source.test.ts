/**
 * @file packages/cli/src/infrastructure/dbus/dbus-sensor-source.test.ts
 * @description Tests for mapper enumeration and property reads against a fake bus.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import dbus, { type Message } from 'dbus-next';
import { SensorNotFoundError, TransportError } from '../../domain/errors/app-error.js';
import { DbusSensorSource, type BusConnection } from './dbus-sensor-source.js';

const ROOT = '/xyz/openbmc_project/sensors';
const VALUE = 'xyz.openbmc_project.Sensor.Value';
const WARNING = 'xyz.openbmc_project.Sensor.Threshold.Warning';
const AVAILABILITY = 'xyz.openbmc_project.State.Decorator.Availability';
const SERVICE = 'xyz.openbmc_project.HwmonTempSensor';

const reply = (...body: unknown[]): Message =>
  new dbus.Message({ path: '/', interface: 'org.example.Reply', member: 'Reply', body });

const createMockLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('DbusSensorSource', () => {
  let call: Mock<BusConnection['call']>;
  let disconnect: Mock<BusConnection['disconnect']>;
  let logger: ReturnType<typeof createMockLogger>;
  let source: DbusSensorSource;

  beforeEach(() => {
    call = vi.fn<BusConnection['call']>();
    disconnect = vi.fn<BusConnection['disconnect']>();
    logger = createMockLogger();
    source = new DbusSensorSource({ call, disconnect }, logger);
  });

  describe('enumerate', () => {
    it('should ask the mapper for Sensor.Value objects under the scope', async () => {
      call.mockResolvedValue(
        reply({
          [`${ROOT}/temperature/cpu0`]: { [SERVICE]: [VALUE, WARNING] },
        }),
      );

      const tree = await source.enumerate(`${ROOT}/temperature`);

      const request = call.mock.calls[0][0];
      expect(request.destination).toBe('xyz.openbmc_project.ObjectMapper');
      expect(request.path).toBe('/xyz/openbmc_project/object_mapper');
      expect(request.member).toBe('GetSubTree');
      expect(request.signature).toBe('sias');
      expect(request.body).toEqual([`${ROOT}/temperature`, 0, [VALUE]]);

      expect([...tree.keys()]).toEqual([`${ROOT}/temperature/cpu0`]);
      expect(tree.get(`${ROOT}/temperature/cpu0`)?.get(SERVICE)).toEqual([VALUE, WARNING]);
    });

    it('should map the mapper not-found error to SensorNotFoundError', async () => {
      call.mockRejectedValue(
        new dbus.DBusError('xyz.openbmc_project.Common.Error.ResourceNotFound', 'none'),
      );
      await expect(source.enumerate(`${ROOT}/psu`)).rejects.toBeInstanceOf(SensorNotFoundError);
    });

    it('should treat an empty subtree as not found', async () => {
      call.mockResolvedValue(reply({}));
      await expect(source.enumerate(ROOT)).rejects.toThrow(`No sensors found under ${ROOT}`);
    });

    it('should wrap other bus errors in TransportError', async () => {
      call.mockRejectedValue(new dbus.DBusError('org.freedesktop.DBus.Error.AccessDenied', 'no'));
      await expect(source.enumerate(ROOT)).rejects.toThrow('Call GetSubTree() failed: no');
    });

    it('should reject a malformed reply', async () => {
      call.mockResolvedValue(reply({ [`${ROOT}/x/y`]: 'oops' }));
      await expect(source.enumerate(ROOT)).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe('fetchProperties', () => {
    const path = `${ROOT}/temperature/cpu0`;

    beforeEach(() => {
      call.mockImplementation(async (message) => {
        switch (message.body[0]) {
          case VALUE:
            return reply({
              Value: new dbus.Variant('x', 45250n),
              Scale: new dbus.Variant('x', -3n),
              Unit: new dbus.Variant('s', `${VALUE}.Unit.DegreesC`),
            });
          case WARNING:
            return reply({
              WarningHigh: new dbus.Variant('x', 80000n),
              WarningAlarmHigh: new dbus.Variant('b', false),
            });
          default:
            throw new dbus.DBusError('org.freedesktop.DBus.Error.UnknownInterface', 'gone');
        }
      });
    });

    it('should merge the properties of every known interface the provider has', async () => {
      const bag = await source.fetchProperties(SERVICE, path, [
        WARNING,
        VALUE,
        'org.freedesktop.DBus.Introspectable',
      ]);

      expect(call.mock.calls.map(([message]) => message.body[0])).toEqual([VALUE, WARNING]);
      expect(call.mock.calls[0][0].member).toBe('GetAll');
      expect(call.mock.calls[0][0].interface).toBe('org.freedesktop.DBus.Properties');
      expect(call.mock.calls[0][0].destination).toBe(SERVICE);
      expect(Object.fromEntries(bag)).toEqual({
        Value: { kind: 'int', value: 45250n },
        Scale: { kind: 'int', value: -3n },
        Unit: { kind: 'string', value: `${VALUE}.Unit.DegreesC` },
        WarningHigh: { kind: 'int', value: 80000n },
        WarningAlarmHigh: { kind: 'bool', value: false },
      });
    });

    it('should always read Sensor.Value even if the mapper left it out', async () => {
      await source.fetchProperties(SERVICE, path, []);
      expect(call.mock.calls.map(([message]) => message.body[0])).toEqual([VALUE]);
    });

    it('should skip an unreadable optional interface with a warning', async () => {
      const bag = await source.fetchProperties(SERVICE, path, [VALUE, AVAILABILITY]);

      expect(bag.has('Value')).toBe(true);
      expect(bag.has('Available')).toBe(false);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('should fail the sensor when Sensor.Value cannot be read', async () => {
      call.mockReset();
      call.mockRejectedValue(new dbus.DBusError('org.freedesktop.DBus.Error.NoReply', 'timeout'));

      await expect(source.fetchProperties(SERVICE, path, [VALUE])).rejects.toThrow(
        `Get properties for ${path} failed`,
      );
    });

    it('should fail the sensor on a missing reply', async () => {
      call.mockReset();
      call.mockResolvedValue(null);

      await expect(source.fetchProperties(SERVICE, path, [VALUE])).rejects.toBeInstanceOf(
        TransportError,
      );
    });
  });

  it('should disconnect the bus on close', () => {
    source.close();
    expect(disconnect).toHaveBeenCalledTimes(1);
  });
});
