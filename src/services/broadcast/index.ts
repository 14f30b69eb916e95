/**
 * Broadcast Service
 *
 * Fans relayed engine frames out to downstream WebSocket clients.
 */

export type {
  BroadcastOptions,
  ChannelFailureHandler,
  ClientTransport,
  WriteCallback,
} from './types.ts';

export { ClientChannel } from './client-channel.ts';
export { BroadcastHub } from './hub.ts';
