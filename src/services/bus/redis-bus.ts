// Redis pub/sub transport. One client publishes, a second one subscribes.

import { createClient } from 'redis';
import { safeValidateEnvelope } from '../../core/schemas.js';
import type { MessageEnvelope } from '../../core/schemas.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { formatIssues } from '../../core/validation.js';
import { EnvelopeHandler, MessageBus, Unsubscribe } from './message-bus.js';

type RedisClient = ReturnType<typeof createClient>;

export interface RedisBusOptions {
  url: string;
  channelPrefix?: string;
  logger?: Logger;
}

export class RedisBus implements MessageBus {
  private readonly publisher: RedisClient;
  private readonly subscriber: RedisClient;
  private readonly prefix: string;
  private readonly log: Logger;
  private isConnected = false;
  private listeners = new Map<string, Set<EnvelopeHandler>>();

  constructor(options: RedisBusOptions) {
    this.prefix = options.channelPrefix ?? '';
    this.log = (options.logger ?? rootLogger).child('redis');
    this.publisher = createClient({ url: options.url });
    this.subscriber = createClient({ url: options.url });

    this.publisher.on('error', error => this.log.exception(error, { client: 'publisher' }));
    this.subscriber.on('error', error => this.log.exception(error, { client: 'subscriber' }));
  }

  async connect(): Promise<void> {
    if (this.isConnected) return;
    await this.publisher.connect();
    await this.subscriber.connect();
    this.isConnected = true;
    this.log.info('Redis bus connected', { prefix: this.prefix });
  }

  async close(): Promise<void> {
    if (!this.isConnected) return;
    await this.subscriber.disconnect();
    await this.publisher.disconnect();
    this.isConnected = false;
    this.listeners.clear();
  }

  async publish(channel: string, envelope: MessageEnvelope): Promise<void> {
    if (!this.isConnected) await this.connect();
    await this.publisher.publish(this.channelKey(channel), JSON.stringify(envelope));
  }

  async subscribe(channel: string, handler: EnvelopeHandler): Promise<Unsubscribe> {
    if (!this.isConnected) await this.connect();

    let handlers = this.listeners.get(channel);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(channel, handlers);
      await this.subscriber.subscribe(this.channelKey(channel), raw => this.handleIncoming(channel, raw));
    }
    handlers.add(handler);

    return async () => {
      const current = this.listeners.get(channel);
      if (!current) return;
      current.delete(handler);
      if (current.size === 0) {
        this.listeners.delete(channel);
        if (this.isConnected) {
          await this.subscriber.unsubscribe(this.channelKey(channel));
        }
      }
    };
  }

  /**
   * Redis channel name for a logical channel
   */
  channelKey(channel: string): string {
    return this.prefix ? `${this.prefix}:${channel}` : channel;
  }

  private handleIncoming(channel: string, raw: string): void {
    const envelope = decodeEnvelope(raw);
    if (typeof envelope === 'string') {
      this.log.warn('Dropping undecodable message', { channel, reason: envelope });
      return;
    }

    for (const handler of this.listeners.get(channel) ?? []) {
      Promise.resolve()
        .then(() => handler(envelope))
        .catch(error => this.log.exception(error, { channel, type: envelope.type }));
    }
  }
}

/**
 * Parse a wire message. Returns the reason as a string when it cannot be decoded.
 */
export function decodeEnvelope(raw: string): MessageEnvelope | string {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    return error instanceof Error ? error.message : 'invalid JSON';
  }

  const result = safeValidateEnvelope(data);
  return result.success ? result.data : formatIssues(result.error);
}
