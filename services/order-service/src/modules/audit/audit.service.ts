import { AuditAction, AuditEventRecord, AuditMetadata, AuditOutcome, AuditSummary } from "@tapau/types";
import { Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { randomUUID } from "crypto";
import { actorRoleFor } from "./actor-role";
import { AuditRepository } from "./repository/audit.repository";

const SERVICE = "order-service";
const RETAINED_EVENTS = 5000;

type AuditEventInput = Omit<AuditEventRecord, "id" | "createdAtIso" | "service" | "actorRole">;

export interface AuditEventFilter {
  limit?: number;
  action?: AuditAction;
  actorKey?: string;
  outcome?: AuditOutcome;
  resourceId?: string;
}

function matches(event: AuditEventRecord, filter: AuditEventFilter): boolean {
  return (!filter.action || event.action === filter.action)
    && (!filter.actorKey || event.actorKey === filter.actorKey)
    && (!filter.outcome || event.outcome === filter.outcome)
    && (!filter.resourceId || event.resourceId === filter.resourceId);
}

/**
 * Newest-first log of checkout and order actions. The most recent events are
 * held in memory; every event is also written to `audit_events` when a
 * database is configured.
 */
@Injectable()
export class AuditService implements OnModuleInit {
  private readonly logger = new Logger(AuditService.name);
  private events: AuditEventRecord[] = [];

  constructor(private readonly repository: AuditRepository) {}

  async onModuleInit(): Promise<void> {
    const stored = await this.repository.loadRecent(RETAINED_EVENTS);
    if (!stored) return;
    this.events = stored;
    this.logger.log(`Hydrated ${stored.length} audit events`);
  }

  record(input: AuditEventInput): AuditEventRecord {
    const event: AuditEventRecord = {
      ...input,
      id: `adt_${randomUUID().slice(0, 12)}`,
      service: SERVICE,
      actorRole: actorRoleFor(input.actorKey),
      createdAtIso: new Date().toISOString(),
    };

    this.events = [event, ...this.events.slice(0, RETAINED_EVENTS - 1)];
    void this.repository.insert(event)
      .catch((error: unknown) => this.logger.warn(`Persist audit event ${event.id} failed: ${String(error)}`));
    return event;
  }

  /** Records an action taken on an order. */
  recordAction(
    actorKey: string,
    action: AuditAction,
    outcome: AuditOutcome,
    orderId: string,
    metadata?: AuditMetadata,
  ): AuditEventRecord {
    return this.record({ actorKey, action, outcome, resourceType: "order", resourceId: orderId, metadata });
  }

  list(filter: AuditEventFilter = {}): AuditEventRecord[] {
    const limit = Math.min(Math.max(filter.limit ?? 100, 1), 500);
    return this.events.filter((event) => matches(event, filter)).slice(0, limit);
  }

  /** Oldest first, so the trail reads in the order things happened. */
  trailForOrder(orderId: string): AuditEventRecord[] {
    return this.events
      .filter((event) => event.resourceType === "order" && event.resourceId === orderId)
      .reverse();
  }

  summary(): AuditSummary {
    const counts = new Map<AuditAction, number>();
    for (const event of this.events) counts.set(event.action, (counts.get(event.action) ?? 0) + 1);

    return {
      service: SERVICE,
      totalEvents: this.events.length,
      failedEvents: this.events.filter((event) => event.outcome === "FAILURE").length,
      lastEventAtIso: this.events[0]?.createdAtIso ?? null,
      actions: [...counts]
        .map(([action, count]) => ({ action, count }))
        .sort((a, b) => b.count - a.count)
        .slice(0, 20),
    };
  }
}
