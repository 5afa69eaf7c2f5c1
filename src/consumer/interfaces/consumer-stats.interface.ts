import { PollState } from '../../domain/value-objects/poll-state.vo';

export interface DispatchStats {
  inFlight: number;
  dispatched: number;
  completed: number;
  retried: number;
  failed: number;
  crashed: number;
  rejected: number;
  resolutionFailures: number;
}

export interface ConsumerStats extends DispatchStats {
  state: PollState;
  batchNumber: number;
  maxConcurrentHandlers: number;
}
