import type { PropertyBag, SensorTree } from '@lsensors/shared';

/**
 * Where sensors come from. Implementations own the transport.
 */
export interface SensorSource {
  /**
   * Lists sensor paths under `scope` with the services providing them.
   * Rejects with `SensorNotFoundError` when nothing matches and with
   * `TransportError` on any other failure.
   */
  enumerate(scope: string): Promise<SensorTree>;

  /**
   * Reads one sensor's properties from one provider.
   */
  fetchProperties(
    service: string,
    path: string,
    interfaces: readonly string[],
  ): Promise<PropertyBag>;

  close(): void;
}
