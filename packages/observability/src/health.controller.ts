import { Controller, Get, Inject } from "@nestjs/common";
import { SERVICE_NAME } from "./tokens";

@Controller("health")
export class HealthController {
  constructor(@Inject(SERVICE_NAME) private readonly serviceName: string) {}

  @Get()
  getHealth(): { status: "ok"; service: string; timestamp: string } {
    return { status: "ok", service: this.serviceName, timestamp: new Date().toISOString() };
  }
}
