/**
 * @fileoverview Root NestJS module wiring configuration and entry routes.
 *
 * Exports:
 * - AppModule (L16) - Application module definition.
 */

import { Module } from "@nestjs/common";

import { ConfigModule } from "./config/config.module";
import { EntriesModule } from "./entries/entries.module";

@Module({
  imports: [ConfigModule, EntriesModule]
})
export class AppModule {}
