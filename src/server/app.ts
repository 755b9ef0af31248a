import express from 'express';
import type { BrokerConfig } from './config.js';
import type { Logger } from './logger.js';
import { Counters } from './metrics/counters.js';
import { ChannelRegistry } from './push/channel-registry.js';
import { NotificationDispatcher } from './push/notification-dispatcher.js';
import { TokenProvider } from './push/token-provider.js';
import { RelayStatusClient, RpcTransportClient } from './relay/relay-client.js';
import { SessionBroker, type BringUpTransition } from './relay/session-broker.js';
import { SessionRegistry } from './relay/session-registry.js';
import { sleep as realSleep, systemClock, type Clock, type Sleep } from './relay/wait.js';
import { LocalFileSystemTools } from './tools/local-file-system.js';
import { makeChannelsRoute } from './api/channels-route.js';
import { makeLocalMcpRoute } from './api/local-mcp-route.js';
import { makeStatusRoute } from './api/status-route.js';
import type { BrokerContext } from './api/types.js';
import type { FetchLike } from './types.js';

export interface BrokerDeps {
  logger: Logger;
  fetch?: FetchLike;
  clock?: Clock;
  sleep?: Sleep;
  onTransition?: (transition: BringUpTransition) => void;
}

export interface Broker {
  ctx: BrokerContext;
  tokenProvider: TokenProvider;
  dispatcher: NotificationDispatcher;
  statusClient: RelayStatusClient;
  transport: RpcTransportClient;
  tools: LocalFileSystemTools;
}

export function buildBroker(config: BrokerConfig, deps: BrokerDeps): Broker {
  const fetchImpl: FetchLike = deps.fetch ?? ((input, init) => fetch(input, init));
  const clock = deps.clock ?? systemClock;
  const sleep = deps.sleep ?? realSleep;
  const { logger } = deps;

  const counters = new Counters();
  const channelRegistry = new ChannelRegistry();
  const sessionRegistry = new SessionRegistry();

  const tokenProvider = new TokenProvider({
    tokenEndpoint: config.wns.tokenEndpoint,
    clientId: config.wns.clientId,
    clientSecret: config.wns.clientSecret,
    scope: config.wns.scope,
    marginSeconds: config.wns.tokenMarginSeconds,
    clock,
    fetch: fetchImpl,
    logger
  });
  const dispatcher = new NotificationDispatcher({
    relayBaseUrl: config.relay.baseUrl,
    serverId: config.localMcp.serverId,
    channels: channelRegistry,
    tokens: tokenProvider,
    clock,
    fetch: fetchImpl,
    logger
  });
  const statusClient = new RelayStatusClient({ baseUrl: config.relay.baseUrl, fetch: fetchImpl, logger });
  const transport = new RpcTransportClient({ baseUrl: config.relay.baseUrl, fetch: fetchImpl, clock, logger });

  const { connectTimeoutMs, connectPollMs, readyTimeoutMs, readyPollMs, settleMs } = config.localMcp;
  const sessionBroker = new SessionBroker({
    registry: sessionRegistry,
    dispatcher,
    status: statusClient,
    transport,
    counters,
    clock,
    sleep,
    logger,
    timing: { connectTimeoutMs, connectPollMs, readyTimeoutMs, readyPollMs, settleMs },
    clientInfo: config.localMcp.clientInfo,
    singleFlight: config.localMcp.singleFlight,
    onTransition: deps.onTransition
  });

  const ctx: BrokerContext = {
    port: config.port,
    channelRegistry,
    sessionBroker,
    counters,
    clock,
    logger,
    getMetrics: () => ({
      sessionsReady: sessionRegistry.size(),
      bringUpsInFlight: sessionBroker.inflightCount(),
      channelsRegistered: channelRegistry.size()
    })
  };

  return { ctx, tokenProvider, dispatcher, statusClient, transport, tools: new LocalFileSystemTools(sessionBroker) };
}

export function createApp(ctx: BrokerContext): express.Express {
  const app = express();
  app.use(express.json());
  app.use('/api', makeStatusRoute(ctx));
  app.use('/api', makeChannelsRoute(ctx));
  app.use('/api', makeLocalMcpRoute(ctx));
  return app;
}
