export type AuditOutcome = "SUCCESS" | "FAILURE";

/** Derived from the actor key prefix; unprefixed keys are the system. */
export type AuditActorRole = "customer" | "vendor" | "driver" | "admin" | "system";

export const AUDIT_ACTIONS = [
  "order.checkout",
  "order.status",
  "order.cancel",
  "order.confirm_pickup",
  "order.payment",
  "order.rate",
  "order.reorder",
] as const;

export type AuditAction = typeof AUDIT_ACTIONS[number];

/** Failed checkouts are recorded against the cart, everything else against the order. */
export type AuditResourceType = "order" | "cart";

export type AuditMetadata = Record<string, string | number | boolean>;

export interface AuditEventRecord {
  id: string;
  service: string;
  actorKey: string;
  actorRole: AuditActorRole;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId?: string;
  outcome: AuditOutcome;
  metadata?: AuditMetadata;
  createdAtIso: string;
}

export interface AuditSummary {
  service: string;
  totalEvents: number;
  failedEvents: number;
  lastEventAtIso: string | null;
  actions: Array<{ action: AuditAction; count: number }>;
}
