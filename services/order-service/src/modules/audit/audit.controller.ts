import { AuditEventRecord, AuditSummary } from "@tapau/types";
import { Controller, Get, Param, Query } from "@nestjs/common";
import { AuditService } from "./audit.service";
import { AuditEventsQueryDto } from "./dto/audit.dto";

@Controller("audit")
export class AuditController {
  constructor(private readonly audit: AuditService) {}

  @Get("events")
  events(@Query() query: AuditEventsQueryDto): AuditEventRecord[] {
    return this.audit.list(query);
  }

  @Get("orders/:orderId")
  orderTrail(@Param("orderId") orderId: string): AuditEventRecord[] {
    return this.audit.trailForOrder(orderId);
  }

  @Get("summary")
  summary(): AuditSummary {
    return this.audit.summary();
  }
}
