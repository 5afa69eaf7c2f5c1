/**
 * Handler Outcome Value Object
 * What a message handler reports back to the dispatcher. Handlers never talk
 * to the queue themselves; the dispatcher maps the outcome onto a resolution.
 *
 * COMPLETED → message deleted
 * RETRY(n)  → visibility set to n seconds (default 0)
 * FAILED    → visibility set to n seconds if given, else 0
 */
export enum OutcomeKind {
  COMPLETED = 'COMPLETED',
  RETRY = 'RETRY',
  FAILED = 'FAILED',
}

export interface CompletedOutcome {
  readonly kind: OutcomeKind.COMPLETED;
}

export interface RetryOutcome {
  readonly kind: OutcomeKind.RETRY;
  readonly visibilityTimeoutSeconds: number;
}

export interface FailedOutcome {
  readonly kind: OutcomeKind.FAILED;
  readonly reason?: string;
  readonly visibilityTimeoutSeconds?: number;
}

export type HandlerOutcome = CompletedOutcome | RetryOutcome | FailedOutcome;

export const HandlerOutcome = {
  completed(): CompletedOutcome {
    return { kind: OutcomeKind.COMPLETED };
  },

  retry(visibilityTimeoutSeconds = 0): RetryOutcome {
    return { kind: OutcomeKind.RETRY, visibilityTimeoutSeconds };
  },

  failed(reason?: string, visibilityTimeoutSeconds?: number): FailedOutcome {
    return { kind: OutcomeKind.FAILED, reason, visibilityTimeoutSeconds };
  },
};

/**
 * How a message leaves the dispatcher. CRASHED has no handler-facing
 * factory: it is what a thrown handler turns into.
 */
export enum ResolutionKind {
  COMPLETED = 'COMPLETED',
  RETRIED = 'RETRIED',
  FAILED = 'FAILED',
  CRASHED = 'CRASHED',
  REJECTED = 'REJECTED',
}

export type LeaseAction =
  | { readonly type: 'delete' }
  | { readonly type: 'changeVisibility'; readonly visibilityTimeoutSeconds: number };

export function toLeaseAction(outcome: HandlerOutcome): LeaseAction {
  switch (outcome.kind) {
    case OutcomeKind.COMPLETED:
      return { type: 'delete' };
    case OutcomeKind.RETRY:
      return {
        type: 'changeVisibility',
        visibilityTimeoutSeconds: outcome.visibilityTimeoutSeconds,
      };
    case OutcomeKind.FAILED:
      return {
        type: 'changeVisibility',
        visibilityTimeoutSeconds: outcome.visibilityTimeoutSeconds ?? 0,
      };
  }
}

export function toResolutionKind(outcome: HandlerOutcome): ResolutionKind {
  switch (outcome.kind) {
    case OutcomeKind.COMPLETED:
      return ResolutionKind.COMPLETED;
    case OutcomeKind.RETRY:
      return ResolutionKind.RETRIED;
    case OutcomeKind.FAILED:
      return ResolutionKind.FAILED;
  }
}

export const MAX_VISIBILITY_TIMEOUT_SECONDS = 43200;

export function isVisibilityTimeout(value: unknown): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_VISIBILITY_TIMEOUT_SECONDS
  );
}

/**
 * Accepts only outcomes the queue can act on: a known kind and, where a
 * visibility timeout is carried, a whole number of seconds in 0..43200.
 */
export function isHandlerOutcome(value: unknown): value is HandlerOutcome {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  const visibility =
    'visibilityTimeoutSeconds' in value ? value.visibilityTimeoutSeconds : undefined;

  switch (value.kind) {
    case OutcomeKind.COMPLETED:
      return true;
    case OutcomeKind.RETRY:
      return isVisibilityTimeout(visibility);
    case OutcomeKind.FAILED:
      return visibility === undefined || isVisibilityTimeout(visibility);
    default:
      return false;
  }
}
