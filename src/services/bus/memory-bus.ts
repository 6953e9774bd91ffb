// In-process bus used by simulations and tests

import type { MessageEnvelope } from '../../core/schemas.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { EnvelopeHandler, MessageBus, Unsubscribe } from './message-bus.js';

/**
 * A delivered envelope and the channel it went to
 */
export interface PublishedMessage {
  channel: string;
  envelope: MessageEnvelope;
}

export class MemoryBus implements MessageBus {
  private listeners = new Map<string, Set<EnvelopeHandler>>();
  private history: PublishedMessage[] = [];
  private readonly log: Logger;

  constructor(logger: Logger = rootLogger) {
    this.log = logger.child('bus');
  }

  async connect(): Promise<void> {
    this.log.debug('Memory bus connected');
  }

  async close(): Promise<void> {
    this.listeners.clear();
  }

  /**
   * Handlers are invoked in subscription order but not awaited, so a handler
   * that publishes in turn never waits on its own publisher.
   */
  async publish(channel: string, envelope: MessageEnvelope): Promise<void> {
    this.history.push({ channel, envelope });

    const handlers = this.listeners.get(channel);
    if (!handlers) {
      return;
    }

    for (const handler of [...handlers]) {
      try {
        const result = handler(envelope);
        if (result instanceof Promise) {
          result.catch(error => this.reportHandlerError(channel, envelope, error));
        }
      } catch (error) {
        this.reportHandlerError(channel, envelope, error);
      }
    }
  }

  async subscribe(channel: string, handler: EnvelopeHandler): Promise<Unsubscribe> {
    let handlers = this.listeners.get(channel);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(channel, handlers);
    }
    handlers.add(handler);

    return async () => {
      this.listeners.get(channel)?.delete(handler);
    };
  }

  /**
   * Everything published so far, optionally for one channel
   */
  getHistory(channel?: string): PublishedMessage[] {
    return channel === undefined ? [...this.history] : this.history.filter(m => m.channel === channel);
  }

  clearHistory(): void {
    this.history = [];
  }

  subscriberCount(channel: string): number {
    return this.listeners.get(channel)?.size ?? 0;
  }

  private reportHandlerError(channel: string, envelope: MessageEnvelope, error: unknown): void {
    this.log.exception(error, { channel, type: envelope.type, id: envelope.id });
  }
}
