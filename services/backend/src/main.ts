/**
 * @fileoverview Application bootstrap for the entry buffer service.
 *
 * Exports:
 * - bootstrap (L17) - Starts NestJS HTTP server.
 */

import "reflect-metadata";

import { NestFactory } from "@nestjs/core";

import { AppModule } from "./app.module";
import { AppConfig, ConfigToken } from "./config/config.types";
import { AllExceptionsFilter } from "./logging/exception.filter";
import { requestIdMiddleware } from "./logging/request-id.middleware";

const bootstrap = async (): Promise<void> => {
  /* Create and configure NestJS app. */
  const app = await NestFactory.create(AppModule, { cors: true });

  /* Attach request id middleware and error filter. */
  app.use(requestIdMiddleware);
  app.useGlobalFilters(new AllExceptionsFilter());

  /* Start HTTP server on configured port. */
  const config = app.get<AppConfig>(ConfigToken);
  await app.listen(config.port);
  console.log(`[bootstrap] listening port=${config.port} capacity=${config.entryBufferCapacity}`);
};

bootstrap().catch((error: unknown) => {
  console.error("[bootstrap] failed to start", error);
  process.exit(1);
});
