import { AuditActorRole } from "@tapau/types";

/** Actor keys look like `customer:<id>`; anything unprefixed is the system. */
export function actorRoleFor(actorKey: string): AuditActorRole {
  if (actorKey.startsWith("customer:")) return "customer";
  if (actorKey.startsWith("vendor:")) return "vendor";
  if (actorKey.startsWith("driver:")) return "driver";
  if (actorKey.startsWith("admin:")) return "admin";
  return "system";
}
