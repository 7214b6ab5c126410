import { DynamicModule, Module } from "@nestjs/common";
import { APP_INTERCEPTOR } from "@nestjs/core";
import { HealthController } from "./health.controller";
import { MetricsController } from "./metrics.controller";
import { MetricsService } from "./metrics.service";
import { RequestMetricsInterceptor } from "./request-metrics.interceptor";
import { SERVICE_NAME } from "./tokens";

@Module({})
export class ObservabilityModule {
  static register(serviceName: string): DynamicModule {
    return {
      module: ObservabilityModule,
      controllers: [HealthController, MetricsController],
      providers: [
        { provide: SERVICE_NAME, useValue: serviceName },
        MetricsService,
        {
          provide: APP_INTERCEPTOR,
          useClass: RequestMetricsInterceptor,
        },
      ],
      exports: [MetricsService],
    };
  }
}
