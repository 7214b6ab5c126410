import "reflect-metadata";
import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";
import { initSentry } from "@tapau/observability";
import { AppModule } from "./app.module";
import { getOrderEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  initSentry("order-service");
  const env = getOrderEnv();
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ logger: true }),
  );

  app.enableCors({ origin: true, credentials: true });
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true, forbidNonWhitelisted: true }));
  await app.listen(env.port, "0.0.0.0");
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(`order-service failed to start: ${String(error)}`);
  process.exit(1);
});
