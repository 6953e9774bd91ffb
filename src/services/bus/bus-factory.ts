// Builds the transport named in the bus configuration

import { Logger, logger as rootLogger } from '../../core/logger.js';
import type { BusConfig } from '../config/config-service.js';
import { MemoryBus } from './memory-bus.js';
import { MessageBus } from './message-bus.js';
import { RedisBus } from './redis-bus.js';

/**
 * The memory transport only reaches services running in the same process
 */
export function createMessageBus(config: BusConfig, logger: Logger = rootLogger): MessageBus {
  switch (config.transport) {
    case 'redis':
      return new RedisBus({ url: config.url, channelPrefix: config.channelPrefix, logger });
    case 'memory':
      return new MemoryBus(logger);
  }
}
