import type { BringUpPhase } from '../types.js';

type PhaseCounter = Partial<Record<BringUpPhase, number>>;

export class Counters {
  bringUpTotal = 0;
  bringUpSuccessTotal = 0;
  bringUpFailureByPhase: PhaseCounter = {};
  sessionReuseTotal = 0;
  staleSessionEvictTotal = 0;
  singleFlightJoinTotal = 0;
  rpcRequestTotal = 0;
  rpcFailureTotal = 0;

  markBringUpFailure(phase: BringUpPhase): void {
    this.bringUpFailureByPhase[phase] = (this.bringUpFailureByPhase[phase] ?? 0) + 1;
  }
}
