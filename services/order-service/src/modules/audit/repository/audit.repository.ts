import { CoreDatabase, DbRow } from "@tapau/database";
import { AUDIT_ACTIONS, AuditAction, AuditEventRecord, AuditMetadata } from "@tapau/types";
import { Injectable, Logger } from "@nestjs/common";
import { getOrderEnv } from "../../../config/env";
import { actorRoleFor } from "../actor-role";

function isAuditAction(value: unknown): value is AuditAction {
  return typeof value === "string" && AUDIT_ACTIONS.some((action) => action === value);
}

const INSERT_EVENT = `
  insert into audit_events
    (id, service, actor_key, actor_role, action, resource_type, resource_id, outcome, metadata_json, created_at_iso)
  values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
  on conflict (id) do nothing`;

/** Rows with an action this build does not know are skipped. */
function toEvent(row: DbRow): AuditEventRecord | null {
  if (!isAuditAction(row.action)) return null;
  const actorKey = String(row.actor_key);
  return {
    id: String(row.id),
    service: String(row.service),
    actorKey,
    actorRole: actorRoleFor(actorKey),
    action: row.action,
    resourceType: row.resource_type === "cart" ? "cart" : "order",
    resourceId: row.resource_id ? String(row.resource_id) : undefined,
    outcome: row.outcome === "FAILURE" ? "FAILURE" : "SUCCESS",
    metadata: row.metadata_json ? (JSON.parse(String(row.metadata_json)) as AuditMetadata) : undefined,
    createdAtIso: String(row.created_at_iso),
  };
}

@Injectable()
export class AuditRepository {
  private readonly logger = new Logger(AuditRepository.name);
  private readonly db = new CoreDatabase({
    connectionString: getOrderEnv().databaseUrl,
    log: (message: string) => this.logger.log(message),
  });

  /** Null when no database is configured. */
  async loadRecent(limit: number): Promise<AuditEventRecord[] | null> {
    await this.db.init();
    if (!this.db.isReady()) return null;

    const rows = await this.db.query(
      "select * from audit_events where service = $1 order by created_at_iso desc limit $2",
      ["order-service", limit],
    );
    return rows.map(toEvent).filter((event): event is AuditEventRecord => event !== null);
  }

  async insert(event: AuditEventRecord): Promise<void> {
    await this.db.init();
    if (!this.db.isReady()) return;

    await this.db.query(INSERT_EVENT, [
      event.id,
      event.service,
      event.actorKey,
      event.actorRole,
      event.action,
      event.resourceType,
      event.resourceId ?? null,
      event.outcome,
      event.metadata ? JSON.stringify(event.metadata) : null,
      event.createdAtIso,
    ]);
  }
}
