/**
 * Broadcast Hub
 *
 * Registry of downstream clients. Every upstream frame is handed to each
 * client's channel; the hub itself never waits on a socket, so one stalled
 * client cannot hold up the read loop or the other clients.
 */

import { debugLog, verboseLog } from '../../debug.ts';
import { describeEvent, type RelayEvent } from '../../protocol/events.ts';
import type { EventBroadcaster } from '../upstream/types.ts';
import { ClientChannel } from './client-channel.ts';
import type { BroadcastOptions, ClientTransport } from './types.ts';

export class BroadcastHub implements EventBroadcaster {
  private readonly channels = new Map<string, ClientChannel>();

  constructor(private readonly options: BroadcastOptions) {}

  /**
   * Add a client. Ids must be unique among live clients.
   */
  register(transport: ClientTransport): void {
    if (this.channels.has(transport.id)) {
      throw new Error(`Client ${transport.id} is already registered`);
    }

    const channel = new ClientChannel(transport, this.options, (clientId, reason) => {
      this.channels.delete(clientId);
      verboseLog(`Client ${clientId} disconnected (${reason})`, 'warn');
    });
    this.channels.set(transport.id, channel);

    const from = transport.remoteAddress ? ` from ${transport.remoteAddress}` : '';
    verboseLog(`Client ${transport.id} connected${from} (${this.channels.size} total)`);
  }

  /**
   * Forget a client whose connection has already gone away.
   */
  unregister(clientId: string): boolean {
    const channel = this.channels.get(clientId);
    if (!channel) return false;

    channel.dispose();
    this.channels.delete(clientId);
    verboseLog(`Client ${clientId} disconnected (${this.channels.size} remaining)`);
    return true;
  }

  /**
   * Queue `event` on every registered client.
   *
   * @returns Number of clients the event was queued for
   */
  broadcast(event: RelayEvent): number {
    let delivered = 0;
    for (const channel of [...this.channels.values()]) {
      if (channel.enqueue(event)) {
        delivered++;
      }
    }

    debugLog(`[BroadcastHub] Broadcast ${describeEvent(event)} event to ${delivered} clients`);
    return delivered;
  }

  size(): number {
    return this.channels.size;
  }

  clientIds(): string[] {
    return [...this.channels.keys()];
  }

  closeAll(reason = 'Relay shutting down'): void {
    for (const channel of this.channels.values()) {
      channel.close(1001, reason);
    }
    this.channels.clear();
  }
}
