// Closed dispatch table from message type tag to a validated handler

import { z } from 'zod';
import type { MessageEnvelope, MessageType } from '../../core/schemas.js';
import { MessageError } from '../../core/errors.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { parseMessage } from '../../core/validation.js';
import { MessageBus, Unsubscribe } from './message-bus.js';

interface Route {
  handle(envelope: MessageEnvelope): Promise<void>;
}

/**
 * Result of dispatching one envelope
 */
export type RouteOutcome = 'handled' | 'unrouted' | 'invalid' | 'failed';

/**
 * Routes each envelope to the handler registered for its type. Unknown types,
 * invalid payloads and handler errors are logged and never reach the bus.
 */
export class MessageRouter {
  private readonly routes = new Map<MessageType, Route>();
  private readonly log: Logger;

  constructor(name: string, logger: Logger = rootLogger) {
    this.log = logger.child(`${name}:router`);
  }

  /**
   * Register the handler for a message type. Later registrations replace earlier ones.
   */
  on<S extends z.ZodTypeAny>(
    type: MessageType,
    schema: S,
    handler: (payload: z.output<S>, envelope: MessageEnvelope) => void | Promise<void>
  ): this {
    this.routes.set(type, {
      handle: async envelope => {
        const payload: z.output<S> = parseMessage(schema, type, envelope.payload);
        await handler(payload, envelope);
      }
    });
    return this;
  }

  handles(type: MessageType): boolean {
    return this.routes.has(type);
  }

  registeredTypes(): MessageType[] {
    return [...this.routes.keys()];
  }

  async dispatch(envelope: MessageEnvelope): Promise<RouteOutcome> {
    const route = this.routes.get(envelope.type);
    if (!route) {
      this.log.warn('No handler for message type', { type: envelope.type, from: envelope.from });
      return 'unrouted';
    }

    try {
      await route.handle(envelope);
      return 'handled';
    } catch (error) {
      if (error instanceof MessageError) {
        this.log.warn(error.message, { from: envelope.from, id: envelope.id });
        return 'invalid';
      }
      this.log.exception(error, { type: envelope.type, from: envelope.from });
      return 'failed';
    }
  }

  /**
   * Subscribe the router to a bus channel
   */
  attach(bus: MessageBus, channel: string): Promise<Unsubscribe> {
    return bus.subscribe(channel, envelope => this.dispatch(envelope).then(() => undefined));
  }
}
