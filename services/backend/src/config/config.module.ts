/**
 * @fileoverview Global NestJS module for validated configuration.
 *
 * Exports:
 * - ConfigModule (L26) - Provides AppConfig via DI token to every module.
 */

import { Global, Module } from "@nestjs/common";

import { loadConfig } from "./config";
import { ConfigToken } from "./config.types";

@Global()
@Module({
  providers: [
    {
      provide: ConfigToken,
      useFactory: () => {
        /* Load and validate configuration once at startup. */
        return loadConfig();
      }
    }
  ],
  exports: [ConfigToken]
})
export class ConfigModule {}
