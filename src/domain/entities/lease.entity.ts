import { produce } from 'immer';
import { LeaseResolvedError } from '../errors/consumer.errors';

/**
 * Lease Entity - the visibility window of one in-flight message
 *
 * Status Transitions:
 * ACTIVE → ACTIVE (extend, deadline pushed forward)
 * ACTIVE → RESOLVED (message deleted or released back to the queue)
 *
 * The queue enforces visibility server-side; the local deadline is only used
 * to warn about handlers that outlive their lease. Reading the deadline or
 * extending a resolved lease throws LeaseResolvedError.
 */

export type LeaseStatus = 'active' | 'resolved';

export interface LeaseEntityData {
  readonly messageId: string;
  readonly receiptHandle: string;
  /** Absolute visibility deadline, epoch milliseconds */
  readonly deadline: number;
  readonly acquiredAt: number;
  readonly extensions: number;
  readonly status: LeaseStatus;
  readonly resolvedAt?: number;
}

export interface LeaseEntity extends LeaseEntityData {
  remainingMs(now?: number): number;
  isExpired(now?: number): boolean;
  isWithinMargin(marginMs: number, now?: number): boolean;
  isResolved(): boolean;

  // Mutation methods (return new instances)
  extend(visibilityTimeoutSeconds: number, now?: number): LeaseEntity;
  resolve(now?: number): LeaseEntity;

  toJSON(): ReturnType<typeof LeaseEntity.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace LeaseEntity {
  export interface CreateProps {
    messageId: string;
    receiptHandle: string;
    visibilityTimeoutSeconds: number;
    acquiredAt?: number;
  }

  export function create(props: CreateProps): LeaseEntity {
    validate(props);

    const acquiredAt = props.acquiredAt ?? Date.now();
    const data: LeaseEntityData = {
      messageId: props.messageId,
      receiptHandle: props.receiptHandle,
      deadline: acquiredAt + props.visibilityTimeoutSeconds * 1000,
      acquiredAt,
      extensions: 0,
      status: 'active',
    };

    return attachMethods(data);
  }

  function attachMethods(data: LeaseEntityData): LeaseEntity {
    return {
      ...data,

      get deadline() {
        return getDeadline(data);
      },

      remainingMs: (now?: number) => remainingMs(data, now),
      isExpired: (now?: number) => isExpired(data, now),
      isWithinMargin: (marginMs: number, now?: number) =>
        isWithinMargin(data, marginMs, now),
      isResolved: () => isResolved(data),

      extend: (visibilityTimeoutSeconds: number, now?: number) =>
        extend(data, visibilityTimeoutSeconds, now),
      resolve: (now?: number) => resolve(data, now),

      toJSON: () => toJSON(data),
    };
  }

  function validate(props: CreateProps): void {
    if (!props.messageId || props.messageId.trim().length === 0) {
      throw new Error('Message ID is required');
    }
    if (!props.receiptHandle || props.receiptHandle.trim().length === 0) {
      throw new Error('Receipt handle is required');
    }
    if (props.visibilityTimeoutSeconds < 0) {
      throw new Error('Visibility timeout cannot be negative');
    }
  }

  function assertActive(lease: LeaseEntityData): void {
    if (lease.status === 'resolved') {
      throw new LeaseResolvedError(lease.messageId);
    }
  }

  // ===== Queries =====

  export function getDeadline(lease: LeaseEntityData): number {
    assertActive(lease);
    return lease.deadline;
  }

  export function remainingMs(lease: LeaseEntityData, now = Date.now()): number {
    return Math.max(0, getDeadline(lease) - now);
  }

  export function isExpired(lease: LeaseEntityData, now = Date.now()): boolean {
    return remainingMs(lease, now) === 0;
  }

  export function isWithinMargin(
    lease: LeaseEntityData,
    marginMs: number,
    now = Date.now(),
  ): boolean {
    return remainingMs(lease, now) <= marginMs;
  }

  export function isResolved(lease: LeaseEntityData): boolean {
    return lease.status === 'resolved';
  }

  // ===== State Mutations (Return new instances via Immer) =====

  /**
   * The queue restarts the visibility window from the moment of the call,
   * so the new deadline is `now + visibilityTimeoutSeconds`.
   */
  export function extend(
    lease: LeaseEntityData,
    visibilityTimeoutSeconds: number,
    now = Date.now(),
  ): LeaseEntity {
    assertActive(lease);
    if (visibilityTimeoutSeconds < 0) {
      throw new Error('Visibility timeout cannot be negative');
    }

    const updated = produce(lease, (draft) => {
      draft.deadline = now + visibilityTimeoutSeconds * 1000;
      draft.extensions = draft.extensions + 1;
    });
    return attachMethods(updated);
  }

  export function resolve(lease: LeaseEntityData, now = Date.now()): LeaseEntity {
    assertActive(lease);

    const updated = produce(lease, (draft) => {
      draft.status = 'resolved';
      draft.resolvedAt = now;
    });
    return attachMethods(updated);
  }

  // ===== Serialization =====

  export function toJSON(lease: LeaseEntityData) {
    return {
      messageId: lease.messageId,
      status: lease.status,
      extensions: lease.extensions,
      acquiredAt: new Date(lease.acquiredAt).toISOString(),
      deadline: lease.status === 'active' ? new Date(lease.deadline).toISOString() : undefined,
      resolvedAt: lease.resolvedAt ? new Date(lease.resolvedAt).toISOString() : undefined,
    };
  }
}
