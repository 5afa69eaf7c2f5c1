import { describe, it, expect } from 'vitest';
import { PollState, PollStateVO } from '../../../src/domain/value-objects/poll-state.vo';

describe('PollStateVO', () => {
  it('should start idle', () => {
    const state = PollStateVO.idle();

    expect(state.value).toBe(PollState.IDLE);
    expect(state.isTerminal()).toBe(false);
  });

  it('should follow a fetch, dispatch, wait cycle', () => {
    const state = PollStateVO.idle()
      .transitionTo(PollState.FETCHING)
      .transitionTo(PollState.DISPATCHING)
      .transitionTo(PollState.WAITING)
      .transitionTo(PollState.FETCHING);

    expect(state.value).toBe(PollState.FETCHING);
  });

  it('should allow waiting straight after a fetch when at capacity', () => {
    expect(PollStateVO.of(PollState.FETCHING).canTransitionTo(PollState.WAITING)).toBe(true);
  });

  it('should only terminate through draining', () => {
    expect(PollStateVO.of(PollState.DISPATCHING).canTransitionTo(PollState.TERMINATED)).toBe(false);

    const terminated = PollStateVO.of(PollState.DISPATCHING)
      .transitionTo(PollState.DRAINING)
      .transitionTo(PollState.TERMINATED);

    expect(terminated.isTerminal()).toBe(true);
    expect(terminated.toString()).toBe('TERMINATED');
  });

  it('should throw on an invalid transition', () => {
    expect(() => PollStateVO.of(PollState.TERMINATED).transitionTo(PollState.FETCHING)).toThrow(
      'Invalid poll state transition: TERMINATED -> FETCHING',
    );
  });
});
