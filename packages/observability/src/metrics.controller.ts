import { Controller, DefaultValuePipe, Get, ParseIntPipe, Query } from "@nestjs/common";
import { MetricsService, MetricsSnapshot } from "./metrics.service";

@Controller("metrics")
export class MetricsController {
  constructor(private readonly metrics: MetricsService) {}

  @Get()
  snapshot(@Query("windowSec", new DefaultValuePipe(300), ParseIntPipe) windowSec: number): MetricsSnapshot {
    return this.metrics.snapshot(Math.min(Math.max(windowSec, 10), 3600));
  }
}
