/**
 * @file packages/cli/src/infrastructure/dbus/dbus-sensor-source.ts
 * @description Sensor enumeration and property reads over D-Bus (object mapper + Properties).
 */

import dbus, { type Message } from 'dbus-next';
import { z } from 'zod';
import {
  DBUS_NAMES,
  NOT_FOUND_ERRORS,
  SENSOR_INTERFACES,
  SENSOR_VALUE_INTERFACE,
  mergePropertyBags,
  type PropertyBag,
  type SensorProviders,
  type SensorTree,
} from '@lsensors/shared';
import type { SensorSource } from '../../domain/interfaces/sensor-source.interface.js';
import {
  SensorNotFoundError,
  TransportError,
  errorMessage,
} from '../../domain/errors/app-error.js';
import type { LoggerLike } from '../../logger.js';
import { decodeProperties } from './property-codec.js';

/**
 * The part of a dbus-next `MessageBus` this source relies on.
 */
export interface BusConnection {
  call(message: Message): Promise<Message | null>;
  disconnect(): void;
}

// a{sa{sas}}: path -> service -> interfaces
const SubTreeSchema = z.record(z.string(), z.record(z.string(), z.array(z.string())));

const isNotFound = (err: unknown): boolean =>
  err instanceof dbus.DBusError && NOT_FOUND_ERRORS.includes(err.type);

/**
 * Opens the system bus, or the bus at `busAddress` when one is given.
 */
export function openBus(busAddress?: string): BusConnection {
  return busAddress ? dbus.sessionBus({ busAddress }) : dbus.systemBus();
}

/**
 * Encapsulates sensor discovery and reads against the object mapper.
 */
export class DbusSensorSource implements SensorSource {
  constructor(
    private readonly bus: BusConnection,
    private readonly logger: LoggerLike,
  ) {}

  async enumerate(scope: string): Promise<SensorTree> {
    let reply: Message | null;
    try {
      reply = await this.bus.call(
        new dbus.Message({
          destination: DBUS_NAMES.mapperBus,
          path: DBUS_NAMES.mapperPath,
          interface: DBUS_NAMES.mapperInterface,
          member: 'GetSubTree',
          signature: 'sias',
          body: [scope, 0, [SENSOR_VALUE_INTERFACE]],
        }),
      );
    } catch (err) {
      if (isNotFound(err)) throw new SensorNotFoundError(scope);
      throw new TransportError(`Call GetSubTree() failed: ${errorMessage(err)}`, err);
    }

    const parsed = SubTreeSchema.safeParse(reply?.body[0]);
    if (!parsed.success) {
      throw new TransportError('Call GetSubTree() returned an unexpected reply', parsed.error);
    }

    const tree = new Map<string, SensorProviders>();
    for (const [path, services] of Object.entries(parsed.data)) {
      tree.set(path, new Map(Object.entries(services)));
    }
    if (tree.size === 0) throw new SensorNotFoundError(scope);

    this.logger.debug({ scope, sensors: tree.size }, 'Enumerated sensors');
    return tree;
  }

  async fetchProperties(
    service: string,
    path: string,
    interfaces: readonly string[],
  ): Promise<PropertyBag> {
    const wanted = SENSOR_INTERFACES.filter(
      (iface) => iface === SENSOR_VALUE_INTERFACE || interfaces.includes(iface),
    );

    const bags: PropertyBag[] = [];
    for (const iface of wanted) {
      try {
        bags.push(await this.getAll(service, path, iface));
      } catch (err) {
        if (iface === SENSOR_VALUE_INTERFACE) {
          throw new TransportError(`Get properties for ${path} failed`, err);
        }
        this.logger.warn({ err, service, path, iface }, 'Optional sensor interface unreadable');
      }
    }
    return mergePropertyBags(bags);
  }

  close(): void {
    this.bus.disconnect();
  }

  private async getAll(service: string, path: string, iface: string): Promise<PropertyBag> {
    const reply = await this.bus.call(
      new dbus.Message({
        destination: service,
        path,
        interface: DBUS_NAMES.propertiesInterface,
        member: 'GetAll',
        signature: 's',
        body: [iface],
      }),
    );
    if (!reply) throw new Error(`No reply from ${service}`);
    return decodeProperties(reply.body[0], this.logger);
  }
}
