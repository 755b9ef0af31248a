import type { BringUpState, BrokerMetrics, ChannelRegistration, Session } from '../types.js';
import type { Counters } from './counters.js';

export interface ClientStatus {
  clientName: string;
  state: BringUpState;
  sessionId: string | null;
  lastActivityAt: number | null;
  channelLastSeen: number | null;
}

/** One row per client that has a push channel, a session or both, ordered by name. */
export function collectClientStatus(
  channels: ChannelRegistration[],
  sessions: Session[],
  stateOf: (clientName: string) => BringUpState
): ClientStatus[] {
  const channelByName = new Map(channels.map((c) => [c.clientName, c]));
  const sessionByName = new Map(sessions.map((s) => [s.clientName, s]));
  const names = [...new Set([...channelByName.keys(), ...sessionByName.keys()])].sort();

  return names.map((clientName) => {
    const session = sessionByName.get(clientName);
    return {
      clientName,
      state: stateOf(clientName),
      sessionId: session?.sessionId ?? null,
      lastActivityAt: session?.lastActivityAt ?? null,
      channelLastSeen: channelByName.get(clientName)?.lastSeen ?? null
    };
  });
}

export function buildBrokerHealthSummary(metrics: BrokerMetrics, counters: Counters, clients: ClientStatus[]) {
  return {
    metrics,
    clients,
    bringUps: {
      total: counters.bringUpTotal,
      succeeded: counters.bringUpSuccessTotal,
      failedByPhase: counters.bringUpFailureByPhase,
      singleFlightJoins: counters.singleFlightJoinTotal
    },
    sessions: {
      reused: counters.sessionReuseTotal,
      staleEvicted: counters.staleSessionEvictTotal
    },
    rpc: {
      requests: counters.rpcRequestTotal,
      failures: counters.rpcFailureTotal
    }
  };
}
