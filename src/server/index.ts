import http from 'node:http';
import { createApp, buildBroker } from './app.js';
import { isWnsConfigured, loadConfig } from './config.js';
import { createLogger } from './logger.js';

const config = loadConfig();
const logger = createLogger(config.logLevel);

if (!isWnsConfigured(config.wns)) {
  logger.warn('push credentials are incomplete; desktop clients cannot be woken');
}

const { ctx } = buildBroker(config, { logger });
const server = http.createServer(createApp(ctx));

server.listen(config.port, () => {
  logger.info({ port: config.port, relay: config.relay.baseUrl }, 'broker listening');
});
