import { ChannelRegistry } from '../push/channel-registry.js';
import { SessionBroker } from '../relay/session-broker.js';
import { Counters } from '../metrics/counters.js';
import type { Logger } from '../logger.js';
import type { Clock } from '../relay/wait.js';
import type { BrokerMetrics } from '../types.js';

export interface BrokerContext {
  port: number;
  channelRegistry: ChannelRegistry;
  sessionBroker: SessionBroker;
  counters: Counters;
  clock: Clock;
  logger: Logger;
  getMetrics: () => BrokerMetrics;
}
