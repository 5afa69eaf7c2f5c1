/**
 * Poll State Value Object
 * Phases of the poll loop state machine
 */
export enum PollState {
  IDLE = 'IDLE',
  FETCHING = 'FETCHING',
  WAITING = 'WAITING',
  DISPATCHING = 'DISPATCHING',
  DRAINING = 'DRAINING',
  TERMINATED = 'TERMINATED',
}

export class PollStateVO {
  private static readonly transitions: Record<PollState, PollState[]> = {
    [PollState.IDLE]: [PollState.FETCHING, PollState.DRAINING],
    [PollState.FETCHING]: [PollState.WAITING, PollState.DISPATCHING, PollState.DRAINING],
    [PollState.WAITING]: [PollState.FETCHING, PollState.DRAINING],
    [PollState.DISPATCHING]: [PollState.WAITING, PollState.DRAINING],
    [PollState.DRAINING]: [PollState.TERMINATED],
    [PollState.TERMINATED]: [],
  };

  private constructor(private readonly _value: PollState) {}

  static idle(): PollStateVO {
    return new PollStateVO(PollState.IDLE);
  }

  static of(value: PollState): PollStateVO {
    return new PollStateVO(value);
  }

  get value(): PollState {
    return this._value;
  }

  isTerminal(): boolean {
    return this._value === PollState.TERMINATED;
  }

  canTransitionTo(next: PollState): boolean {
    return PollStateVO.transitions[this._value].includes(next);
  }

  transitionTo(next: PollState): PollStateVO {
    if (!this.canTransitionTo(next)) {
      throw new Error(`Invalid poll state transition: ${this._value} -> ${next}`);
    }
    return new PollStateVO(next);
  }

  toString(): string {
    return this._value;
  }
}
