// Publish/subscribe transport contract shared by the council and the dispatch center

import { randomUUID } from 'node:crypto';
import type { MessageEnvelope, MessageType } from '../../core/schemas.js';

/**
 * Channel every routing-aware service listens on
 */
export const BROADCAST_CHANNEL = 'broadcast';

export type EnvelopeHandler = (envelope: MessageEnvelope) => void | Promise<void>;

export type Unsubscribe = () => Promise<void>;

/**
 * Transport adapter. Channels are logical service names or the broadcast channel.
 */
export interface MessageBus {
  /**
   * Connect to the underlying transport
   */
  connect(): Promise<void>;

  /**
   * Deliver an envelope to every subscriber of a channel (fire and forget)
   */
  publish(channel: string, envelope: MessageEnvelope): Promise<void>;

  subscribe(channel: string, handler: EnvelopeHandler): Promise<Unsubscribe>;

  close(): Promise<void>;
}

/**
 * Wrap a payload for the bus
 */
export function createEnvelope(
  type: MessageType,
  from: string,
  to: string,
  payload: unknown,
  now: Date = new Date()
): MessageEnvelope {
  return {
    id: randomUUID(),
    type,
    from,
    to,
    published_at: now.toISOString(),
    payload
  };
}
