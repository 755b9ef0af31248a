import type { BringUpPhase } from './types.js';

export type BrokerErrorCode =
  | 'credential_failed'
  | 'notify_failed'
  | 'connect_timeout'
  | 'transport_not_ready'
  | 'handshake_failed'
  | 'rpc_failed'
  | 'cancelled';

/** Base of every failure the broker surfaces; names the phase and the client it happened for. */
export class BrokerError extends Error {
  constructor(
    readonly code: BrokerErrorCode,
    readonly phase: BringUpPhase,
    readonly clientName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CredentialError extends BrokerError {
  constructor(message: string, options?: { cause?: unknown; clientName?: string }) {
    super('credential_failed', 'credential', options?.clientName ?? '', message, options);
  }
}

export class NotifyError extends BrokerError {
  constructor(clientName: string, readonly diagnostic: string, options?: { cause?: unknown }) {
    super('notify_failed', 'notify', clientName, `failed to wake desktop client '${clientName}': ${diagnostic}`, options);
  }
}

export class ConnectTimeoutError extends BrokerError {
  constructor(clientName: string, readonly elapsedMs: number) {
    super('connect_timeout', 'connect', clientName, `desktop client '${clientName}' did not connect within ${elapsedMs}ms`);
  }
}

export class TransportNotReadyTimeoutError extends BrokerError {
  constructor(clientName: string, readonly elapsedMs: number) {
    super('transport_not_ready', 'transport_ready', clientName, `transport for '${clientName}' did not become ready within ${elapsedMs}ms`);
  }
}

export type HandshakeStep = 'initialize' | 'tools/list';

export class HandshakeError extends BrokerError {
  constructor(clientName: string, readonly step: HandshakeStep, options?: { cause?: unknown }) {
    super('handshake_failed', 'handshake', clientName, `MCP handshake with '${clientName}' failed at ${step}: ${describeCause(options?.cause)}`, options);
  }
}

export class RpcError extends BrokerError {
  readonly status?: number;
  readonly rpcCode?: number;

  constructor(
    clientName: string,
    readonly method: string,
    message: string,
    details: { status?: number; rpcCode?: number; cause?: unknown } = {}
  ) {
    super('rpc_failed', 'rpc', clientName, `${method} on '${clientName}' failed: ${message}`, { cause: details.cause });
    this.status = details.status;
    this.rpcCode = details.rpcCode;
  }
}

export class BringUpCancelledError extends BrokerError {
  constructor(clientName: string, readonly during: BringUpPhase, options?: { cause?: unknown }) {
    super('cancelled', 'cancelled', clientName, `bring-up for '${clientName}' cancelled during ${during}`, options);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? 'unknown error' : String(cause);
}
