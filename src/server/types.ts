export type BringUpState =
  | 'idle'
  | 'notifying'
  | 'awaiting_connect'
  | 'awaiting_transport_ready'
  | 'handshaking'
  | 'ready'
  | 'failed';

export type BringUpPhase = 'credential' | 'notify' | 'connect' | 'transport_ready' | 'handshake' | 'rpc' | 'cancelled';

export interface Session {
  readonly sessionId: string;
  readonly clientName: string;
  connectedAt: number;
  lastActivityAt: number;
  nextRequestId: number;
}

export interface Credential {
  token: string;
  expiresAt: number;
}

export interface ChannelRegistration {
  clientName: string;
  channelUri: string;
  machineName: string;
  registeredAt: number;
  lastSeen: number;
}

export type NotifyResult =
  | { ok: true; sessionId: string; callbackUrl: string }
  | { ok: false; diagnostic: string };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface BrokerMetrics {
  sessionsReady: number;
  bringUpsInFlight: number;
  channelsRegistered: number;
}
