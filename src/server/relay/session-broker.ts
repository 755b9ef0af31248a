import {
  BringUpCancelledError,
  BrokerError,
  ConnectTimeoutError,
  CredentialError,
  NotifyError,
  TransportNotReadyTimeoutError,
  describeCause
} from '../errors.js';
import type { Logger } from '../logger.js';
import type { Counters } from '../metrics/counters.js';
import { FIRST_SESSION_REQUEST_ID, runHandshake } from '../protocol/handshake.js';
import type { ClientInfo, JsonRpcParams, JsonRpcResponse } from '../protocol/json-rpc.js';
import type { NotificationDispatcher } from '../push/notification-dispatcher.js';
import type { BringUpPhase, BringUpState, NotifyResult, Session } from '../types.js';
import type { RelayStatusClient, RpcTransportClient } from './relay-client.js';
import type { SessionRegistry } from './session-registry.js';
import { pollUntil, type Clock, type Sleep } from './wait.js';

export interface BringUpTiming {
  connectTimeoutMs: number;
  connectPollMs: number;
  readyTimeoutMs: number;
  readyPollMs: number;
  settleMs: number;
}

export interface BringUpTransition {
  clientName: string;
  from: BringUpState;
  to: BringUpState;
  at: number;
}

export interface SessionBrokerOptions {
  registry: SessionRegistry;
  dispatcher: Pick<NotificationDispatcher, 'notify'>;
  status: Pick<RelayStatusClient, 'isConnected'>;
  transport: RpcTransportClient;
  counters: Counters;
  clock: Clock;
  sleep: Sleep;
  logger: Logger;
  timing: BringUpTiming;
  clientInfo: ClientInfo;
  /** Concurrent callers for one client name share a single bring-up. When false they race and the last one wins. */
  singleFlight: boolean;
  onTransition?: (transition: BringUpTransition) => void;
}

const PHASE_BY_STATE: Record<BringUpState, BringUpPhase> = {
  idle: 'notify',
  notifying: 'notify',
  awaiting_connect: 'connect',
  awaiting_transport_ready: 'transport_ready',
  handshaking: 'handshake',
  ready: 'handshake',
  failed: 'notify'
};

interface SharedBringUp {
  promise: Promise<Session>;
  controller: AbortController;
  waiters: number;
}

/**
 * Hands out ready MCP sessions to desktop clients: reuses a live one or wakes the client,
 * waits for it to connect and for its transport to settle, then runs the MCP handshake.
 */
export class SessionBroker {
  private readonly inflight = new Map<string, SharedBringUp>();
  private readonly states = new Map<string, BringUpState>();
  private readonly logger: Logger;

  constructor(private readonly opts: SessionBrokerOptions) {
    this.logger = opts.logger.child({ module: 'session-broker' });
  }

  async getOrCreateSession(clientName: string, signal?: AbortSignal): Promise<Session> {
    const existing = this.opts.registry.get(clientName);
    if (existing) {
      let alive: boolean;
      try {
        alive = await this.opts.status.isConnected(existing.sessionId, signal);
      } catch (error) {
        throw new BringUpCancelledError(clientName, 'connect', { cause: error });
      }
      if (alive) {
        this.opts.counters.sessionReuseTotal += 1;
        this.logger.debug({ clientName, sessionId: existing.sessionId }, 'reusing live session');
        return existing;
      }
      if (this.opts.registry.removeIfCurrent(existing)) {
        this.opts.counters.staleSessionEvictTotal += 1;
        this.logger.info({ clientName, sessionId: existing.sessionId }, 'evicted stale session');
      }
    }
    return this.bringUp(clientName, signal);
  }

  async sendRequest(session: Session, method: string, params: JsonRpcParams = {}, signal?: AbortSignal): Promise<JsonRpcResponse> {
    this.opts.counters.rpcRequestTotal += 1;
    try {
      return await this.opts.transport.sendRequest(session, method, params, signal);
    } catch (error) {
      this.opts.counters.rpcFailureTotal += 1;
      this.logger.warn({ clientName: session.clientName, sessionId: session.sessionId, method, err: describeCause(error) }, 'request failed');
      throw error;
    }
  }

  async sendMcpRequest(clientName: string, method: string, params: JsonRpcParams = {}, signal?: AbortSignal): Promise<{ session: Session; reply: JsonRpcResponse }> {
    const session = await this.getOrCreateSession(clientName, signal);
    const reply = await this.sendRequest(session, method, params, signal);
    return { session, reply };
  }

  getBringUpState(clientName: string): BringUpState {
    return this.states.get(clientName) ?? (this.opts.registry.get(clientName) ? 'ready' : 'idle');
  }

  evict(clientName: string): boolean {
    return this.opts.registry.remove(clientName) !== undefined;
  }

  listSessions(): Session[] {
    return this.opts.registry.list();
  }

  inflightCount(): number {
    return this.states.size;
  }

  private bringUp(clientName: string, signal?: AbortSignal): Promise<Session> {
    if (signal?.aborted) {
      return Promise.reject(new BringUpCancelledError(clientName, PHASE_BY_STATE[this.getBringUpState(clientName)]));
    }
    if (!this.opts.singleFlight) return this.runBringUp(clientName, signal);

    let shared = this.inflight.get(clientName);
    if (shared) {
      this.opts.counters.singleFlightJoinTotal += 1;
      this.logger.debug({ clientName }, 'joining in-flight bring-up');
    } else {
      const controller = new AbortController();
      const promise: Promise<Session> = this.runBringUp(clientName, controller.signal).finally(() => {
        if (this.inflight.get(clientName)?.promise === promise) this.inflight.delete(clientName);
      });
      shared = { promise, controller, waiters: 0 };
      this.inflight.set(clientName, shared);
    }
    return this.follow(clientName, shared, signal);
  }

  /** The shared bring-up is cancelled only once every caller waiting on it has aborted. */
  private follow(clientName: string, shared: SharedBringUp, signal?: AbortSignal): Promise<Session> {
    shared.waiters += 1;
    if (!signal) return shared.promise;

    return new Promise<Session>((resolve, reject) => {
      const onAbort = () => {
        shared.waiters -= 1;
        const during = PHASE_BY_STATE[this.getBringUpState(clientName)];
        if (shared.waiters > 0) {
          reject(new BringUpCancelledError(clientName, during));
          return;
        }
        shared.controller.abort();
        shared.promise.then(() => reject(new BringUpCancelledError(clientName, during)), reject);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      shared.promise.then(
        (session) => {
          signal.removeEventListener('abort', onAbort);
          resolve(session);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private async runBringUp(clientName: string, signal?: AbortSignal): Promise<Session> {
    const { clock, sleep, timing } = this.opts;
    const log = this.logger.child({ clientName });
    const startedAt = clock.now();
    let state: BringUpState = 'idle';
    const move = (to: BringUpState) => {
      const from = state;
      state = to;
      if (to === 'ready' || to === 'failed') this.states.delete(clientName);
      else this.states.set(clientName, to);
      log.info({ from, to }, 'bring-up transition');
      this.opts.onTransition?.({ clientName, from, to, at: clock.now() });
    };

    this.opts.counters.bringUpTotal += 1;
    try {
      move('notifying');
      const sessionId = await this.wake(clientName, signal);

      move('awaiting_connect');
      const connected = await pollUntil((probe) => this.opts.status.isConnected(sessionId, probe), {
        intervalMs: timing.connectPollMs,
        timeoutMs: timing.connectTimeoutMs,
        clock,
        sleep,
        signal
      });
      if (!connected.satisfied) throw new ConnectTimeoutError(clientName, connected.elapsedMs);

      // "connected" can race ahead of the transport accepting protocol traffic
      move('awaiting_transport_ready');
      const ready = await pollUntil((probe) => this.opts.status.isConnected(sessionId, probe), {
        intervalMs: timing.readyPollMs,
        timeoutMs: timing.readyTimeoutMs,
        clock,
        sleep,
        signal
      });
      if (!ready.satisfied) throw new TransportNotReadyTimeoutError(clientName, ready.elapsedMs);
      if (timing.settleMs > 0) await sleep(timing.settleMs, signal);

      move('handshaking');
      await runHandshake(this.opts.transport, clientName, sessionId, this.opts.clientInfo, log, signal);

      const session = this.opts.registry.createSession(clientName, sessionId, FIRST_SESSION_REQUEST_ID, clock.now());
      this.opts.registry.put(session);
      move('ready');
      this.opts.counters.bringUpSuccessTotal += 1;
      log.info({ sessionId, elapsedMs: clock.now() - startedAt }, 'session ready');
      return session;
    } catch (error) {
      const failure = this.classify(error, clientName, state, signal);
      move('failed');
      this.opts.counters.markBringUpFailure(failure instanceof BrokerError ? failure.phase : PHASE_BY_STATE[state]);
      log.error({ err: describeCause(failure), elapsedMs: clock.now() - startedAt }, 'bring-up failed');
      throw failure;
    }
  }

  private async wake(clientName: string, signal?: AbortSignal): Promise<string> {
    let result: NotifyResult;
    try {
      result = await this.opts.dispatcher.notify(clientName, signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      if (error instanceof CredentialError) throw new CredentialError(error.message, { cause: error, clientName });
      throw new NotifyError(clientName, describeCause(error), { cause: error });
    }
    if (!result.ok) throw new NotifyError(clientName, result.diagnostic);
    return result.sessionId;
  }

  private classify(error: unknown, clientName: string, state: BringUpState, signal?: AbortSignal): unknown {
    if (error instanceof BrokerError) return error;
    if (signal?.aborted) return new BringUpCancelledError(clientName, PHASE_BY_STATE[state], { cause: error });
    return error;
  }
}
