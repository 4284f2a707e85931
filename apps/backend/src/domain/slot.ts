export type SlotStatus = "pending" | "finished" | "expired";

export type QuotaKind = "session" | "list";

/** Partition of the slot table owned by one quota revision. */
export interface QuotaNamespace {
  quota: string;
  version: string;
}

/** One condition (or the single session pool) inside a namespace. */
export interface PoolKey extends QuotaNamespace {
  pool: string;
}

export interface SlotAssignment extends PoolKey {
  ordinal: number;
  sessionId: string;
  status: SlotStatus;
  createdAt: number;
  updatedAt: number;
}

export interface PoolCounts {
  target: number;
  open: number;
  pending: number;
  finished: number;
}

export interface ConditionTarget {
  name: string;
  target: number;
}

export interface QuotaDefinition {
  kind: QuotaKind;
  conditions: ConditionTarget[];
}

export type AssignResult =
  | {
      kind: "assigned";
      condition: string;
      ordinal: number;
      status: "pending" | "finished";
      /** True when the session already held this slot before the call. */
      reused: boolean;
    }
  | { kind: "full" };

export const QUOTA_FULL: AssignResult = { kind: "full" };
