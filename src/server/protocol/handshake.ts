import { HandshakeError, describeCause } from '../errors.js';
import type { Logger } from '../logger.js';
import type { RpcTransportClient } from '../relay/relay-client.js';
import {
  INITIALIZED_NOTIFICATION,
  INITIALIZE_METHOD,
  TOOLS_LIST_METHOD,
  buildInitializeParams,
  buildNotification,
  buildRequest,
  type ClientInfo
} from './json-rpc.js';

export const INITIALIZE_REQUEST_ID = 1;
export const TOOLS_LIST_REQUEST_ID = 2;
export const FIRST_SESSION_REQUEST_ID = 3;

export interface HandshakeResult {
  initialize: unknown;
  tools: unknown;
}

/**
 * initialize (id 1) → notifications/initialized → tools/list (id 2), strictly in order.
 * Only the two requests can fail the handshake.
 */
export async function runHandshake(
  transport: RpcTransportClient,
  clientName: string,
  sessionId: string,
  clientInfo: ClientInfo,
  logger: Logger,
  signal?: AbortSignal
): Promise<HandshakeResult> {
  const log = logger.child({ clientName, sessionId });

  log.info('handshake step 1: initialize');
  let initialize: unknown;
  try {
    initialize = await transport.post(sessionId, buildRequest(INITIALIZE_REQUEST_ID, INITIALIZE_METHOD, buildInitializeParams(clientInfo)), signal);
  } catch (error) {
    if (signal?.aborted) throw error;
    throw new HandshakeError(clientName, 'initialize', { cause: error });
  }
  log.debug({ reply: initialize }, 'initialize answered');

  log.info('handshake step 2: initialized notification');
  try {
    await transport.notify(sessionId, buildNotification(INITIALIZED_NOTIFICATION), signal);
  } catch (error) {
    if (signal?.aborted) throw error;
    // notifications have no reply channel
    log.debug({ err: describeCause(error) }, 'initialized notification not delivered');
  }

  log.info('handshake step 3: tools/list');
  let tools: unknown;
  try {
    tools = await transport.post(sessionId, buildRequest(TOOLS_LIST_REQUEST_ID, TOOLS_LIST_METHOD, {}), signal);
  } catch (error) {
    if (signal?.aborted) throw error;
    throw new HandshakeError(clientName, 'tools/list', { cause: error });
  }
  log.info({ tools }, 'handshake complete');

  return { initialize, tools };
}
