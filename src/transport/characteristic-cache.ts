/**
 * Connection-scoped cache of characteristic handles.
 */

import {
  normalizeUuid,
  type CharacteristicHandle,
  type SK8Transport,
  type TransportConnection,
} from './transport';

/**
 * Resolves characteristic UUIDs to handles, memoizing hits.
 *
 * Misses are not cached: a characteristic absent on this firmware stays
 * absent, but asking again is harmless. The whole cache must be cleared when
 * the connection closes, since handles are not valid across connections.
 */
export class CharacteristicCache {
  private handles = new Map<string, CharacteristicHandle>();

  constructor(
    private readonly transport: SK8Transport,
    private readonly connection: TransportConnection
  ) {}

  /**
   * Resolve a UUID to a handle.
   *
   * @returns The handle, or null if the device does not expose it
   */
  async resolve(uuid: string): Promise<CharacteristicHandle | null> {
    const key = normalizeUuid(uuid);
    const cached = this.handles.get(key);
    if (cached !== undefined) {
      console.debug(`Returning cached handle for ${key}`);
      return cached;
    }

    const handle = await this.transport.findCharacteristic(this.connection, key);
    if (handle === null) {
      console.warn(`Failed to find characteristic for UUID: ${key}`);
      return null;
    }

    console.debug(`Found characteristic ${key} (handle ${handle})`);
    this.handles.set(key, handle);
    return handle;
  }

  /**
   * Resolve the first UUID the device supports.
   *
   * Used where older firmware exposes a register under a different UUID.
   */
  async resolveFirst(
    uuids: readonly string[]
  ): Promise<{ uuid: string; handle: CharacteristicHandle } | null> {
    for (const uuid of uuids) {
      const handle = await this.resolve(uuid);
      if (handle !== null) {
        return { uuid: normalizeUuid(uuid), handle };
      }
    }
    return null;
  }

  has(uuid: string): boolean {
    return this.handles.has(normalizeUuid(uuid));
  }

  get size(): number {
    return this.handles.size;
  }

  clear(): void {
    this.handles.clear();
  }
}
