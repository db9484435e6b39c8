/**
 * Connection wrapper for SK8 devices.
 *
 * Provides a UUID-level interface over an {@link SK8Transport} link:
 * - Characteristic resolution through a per-connection cache
 * - Reads and writes with transport failures wrapped in TransportError
 * - Notification subscriptions tracked so teardown can undo them
 */

import { AttributeUnsupportedError, NotConnectedError, TransportError } from '../exceptions';
import { CharacteristicCache } from './characteristic-cache';
import {
  normalizeUuid,
  type CharacteristicHandle,
  type NotifyHandler,
  type SK8Transport,
  type TransportConnection,
} from './transport';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * An open connection to one SK8.
 *
 * Accepts either a single UUID or a list of alternatives wherever a
 * characteristic is named; alternatives are tried in order.
 */
export class SK8Connection {
  readonly characteristics: CharacteristicCache;
  // uuid -> handle of active subscriptions
  private subscriptions = new Map<string, CharacteristicHandle>();

  constructor(
    private readonly transport: SK8Transport,
    readonly link: TransportConnection
  ) {
    this.characteristics = new CharacteristicCache(transport, link);
  }

  get isConnected(): boolean {
    return this.link.isConnected;
  }

  get address(): string {
    return this.link.address;
  }

  /**
   * Read a characteristic value.
   *
   * @throws {AttributeUnsupportedError} If the device lacks the characteristic
   * @throws {TransportError} If the read fails
   */
  async read(uuids: string | readonly string[]): Promise<Uint8Array> {
    const handle = await this.requireHandle(uuids);
    console.debug(`Reading attribute with handle ${handle}`);
    try {
      return await this.transport.readCharacteristic(this.link, handle);
    } catch (error) {
      throw new TransportError(`Failed to read characteristic: ${describe(error)}`);
    }
  }

  /**
   * Write a characteristic value.
   *
   * @throws {AttributeUnsupportedError} If the device lacks the characteristic
   * @throws {TransportError} If the write fails
   */
  async write(uuids: string | readonly string[], data: Uint8Array): Promise<void> {
    const handle = await this.requireHandle(uuids);
    console.debug(`Writing [${Array.from(data).join(', ')}] --> handle ${handle}`);
    try {
      await this.transport.writeCharacteristic(this.link, handle, data);
    } catch (error) {
      throw new TransportError(`Failed to write characteristic: ${describe(error)}`);
    }
  }

  /**
   * Subscribe to notifications unless already subscribed.
   *
   * @returns False if a subscription was already active
   */
  async subscribe(uuid: string, onNotify: NotifyHandler): Promise<boolean> {
    const key = normalizeUuid(uuid);
    if (this.subscriptions.has(key)) {
      return false;
    }

    const handle = await this.requireHandle(key);
    try {
      await this.transport.subscribe(this.link, handle, onNotify);
    } catch (error) {
      throw new TransportError(`Failed to subscribe to ${key}: ${describe(error)}`);
    }
    this.subscriptions.set(key, handle);
    return true;
  }

  /**
   * Stop notifications. No-op if not subscribed.
   */
  async unsubscribe(uuid: string): Promise<void> {
    const key = normalizeUuid(uuid);
    const handle = this.subscriptions.get(key);
    if (handle === undefined) {
      return;
    }

    try {
      await this.transport.unsubscribe(this.link, handle);
    } catch (error) {
      throw new TransportError(`Failed to unsubscribe from ${key}: ${describe(error)}`);
    }
    this.subscriptions.delete(key);
  }

  isSubscribed(uuid: string): boolean {
    return this.subscriptions.has(normalizeUuid(uuid));
  }

  /**
   * Unsubscribe everything, then close the link and drop cached handles.
   *
   * @throws {TransportError} If the transport fails to disconnect
   */
  async close(): Promise<void> {
    try {
      for (const uuid of [...this.subscriptions.keys()]) {
        if (!this.isConnected) {
          break;
        }
        try {
          await this.unsubscribe(uuid);
        } catch (error) {
          // Link is going away regardless
          console.warn(`Ignoring unsubscribe failure during disconnect: ${describe(error)}`);
        }
      }

      if (this.isConnected) {
        await this.transport.disconnect(this.link);
      }
    } catch (error) {
      throw new TransportError(`Failed to disconnect: ${describe(error)}`);
    } finally {
      this.subscriptions.clear();
      this.characteristics.clear();
    }
  }

  private async requireHandle(uuids: string | readonly string[]): Promise<CharacteristicHandle> {
    if (!this.isConnected) {
      throw new NotConnectedError();
    }

    const candidates = typeof uuids === 'string' ? [uuids] : uuids;
    let resolved: Awaited<ReturnType<CharacteristicCache['resolveFirst']>>;
    try {
      resolved = await this.characteristics.resolveFirst(candidates);
    } catch (error) {
      throw new TransportError(`Characteristic lookup failed: ${describe(error)}`);
    }

    if (resolved === null) {
      throw new AttributeUnsupportedError(
        `Device does not support characteristic ${candidates.join(' / ')}`,
        candidates[0]
      );
    }
    return resolved.handle;
  }
}
