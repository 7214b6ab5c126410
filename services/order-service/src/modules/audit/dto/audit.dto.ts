import { AUDIT_ACTIONS, AuditAction, AuditOutcome } from "@tapau/types";
import { Type } from "class-transformer";
import { IsIn, IsInt, IsOptional, IsString, Max, Min } from "class-validator";

const OUTCOMES: readonly AuditOutcome[] = ["SUCCESS", "FAILURE"];

export class AuditEventsQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit?: number;

  @IsOptional()
  @IsIn(AUDIT_ACTIONS)
  action?: AuditAction;

  @IsOptional()
  @IsString()
  actorKey?: string;

  @IsOptional()
  @IsIn(OUTCOMES)
  outcome?: AuditOutcome;
}
