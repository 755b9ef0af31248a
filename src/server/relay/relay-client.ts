import { z } from 'zod';
import { RpcError, describeCause } from '../errors.js';
import type { Logger } from '../logger.js';
import {
  buildRequest,
  jsonRpcResponseSchema,
  type JsonRpcNotification,
  type JsonRpcParams,
  type JsonRpcRequest,
  type JsonRpcResponse
} from '../protocol/json-rpc.js';
import type { FetchLike, Session } from '../types.js';
import type { Clock } from './wait.js';

export interface RelayEndpointOptions {
  baseUrl: string;
  fetch: FetchLike;
  logger: Logger;
}

export function relayUrl(baseUrl: string, route: 'notify' | 'status' | 'mcp', key: string): string {
  return `${baseUrl}/api/${route}/${encodeURIComponent(key)}`;
}

/** Failure talking to the relay's RPC endpoint, before any JSON-RPC semantics apply. */
export class RelayTransportError extends Error {
  constructor(message: string, readonly status?: number, readonly body?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RelayTransportError';
  }
}

const statusSchema = z.object({ connected: z.boolean() });

export class RelayStatusClient {
  private readonly logger: Logger;

  constructor(private readonly opts: RelayEndpointOptions) {
    this.logger = opts.logger.child({ module: 'relay-status' });
  }

  /** Never throws for relay or network failures; those read as "not connected". */
  async isConnected(sessionId: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const res = await this.opts.fetch(relayUrl(this.opts.baseUrl, 'status', sessionId), { method: 'GET', signal });
      if (!res.ok) {
        this.logger.debug({ sessionId, status: res.status }, 'status probe rejected');
        return false;
      }
      const parsed = statusSchema.safeParse(await res.json());
      if (!parsed.success) {
        this.logger.debug({ sessionId }, 'status probe returned a malformed body');
        return false;
      }
      return parsed.data.connected;
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.debug({ sessionId, err: describeCause(error) }, 'status probe failed');
      return false;
    }
  }
}

export interface RpcTransportOptions extends RelayEndpointOptions {
  clock: Clock;
}

export class RpcTransportClient {
  private readonly logger: Logger;

  constructor(private readonly opts: RpcTransportOptions) {
    this.logger = opts.logger.child({ module: 'rpc-transport' });
  }

  /** Posts one envelope and returns the parsed JSON reply, whatever its shape. */
  async post(sessionId: string, envelope: JsonRpcRequest, signal?: AbortSignal): Promise<unknown> {
    const text = await this.send(sessionId, envelope, signal);
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new RelayTransportError(`relay returned a non-JSON reply for ${envelope.method}`, undefined, text, { cause: error });
    }
  }

  async notify(sessionId: string, envelope: JsonRpcNotification, signal?: AbortSignal): Promise<void> {
    await this.send(sessionId, envelope, signal);
  }

  async sendRequest(session: Session, method: string, params: JsonRpcParams = {}, signal?: AbortSignal): Promise<JsonRpcResponse> {
    const id = session.nextRequestId++;
    const envelope = buildRequest(id, method, params);
    this.logger.debug({ sessionId: session.sessionId, id, method }, 'sending request');

    let reply: unknown;
    try {
      reply = await this.post(session.sessionId, envelope, signal);
    } catch (error) {
      const status = error instanceof RelayTransportError ? error.status : undefined;
      throw new RpcError(session.clientName, method, describeCause(error), { status, cause: error });
    }

    const parsed = jsonRpcResponseSchema.safeParse(reply);
    if (!parsed.success) {
      throw new RpcError(session.clientName, method, 'reply is not a JSON-RPC response', { cause: parsed.error });
    }
    if (parsed.data.error) {
      throw new RpcError(session.clientName, method, parsed.data.error.message, { rpcCode: parsed.data.error.code });
    }

    session.lastActivityAt = this.opts.clock.now();
    this.logger.debug({ sessionId: session.sessionId, id, method }, 'request answered');
    return parsed.data;
  }

  private async send(sessionId: string, envelope: JsonRpcRequest | JsonRpcNotification, signal?: AbortSignal): Promise<string> {
    let res: Response;
    try {
      res = await this.opts.fetch(relayUrl(this.opts.baseUrl, 'mcp', sessionId), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(envelope),
        signal
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new RelayTransportError(`relay unreachable: ${describeCause(error)}`, undefined, undefined, { cause: error });
    }

    const text = await res.text();
    if (!res.ok) {
      throw new RelayTransportError(`relay returned ${res.status}`, res.status, text);
    }
    return text;
  }
}
