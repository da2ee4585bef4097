/**
 * @fileoverview Types and DI token for app configuration.
 *
 * Exports:
 * - AppConfig (L9) - Validated configuration shape.
 * - ConfigToken (L15) - Injection token for config provider.
 */

export type AppConfig = {
  port: number;
  /** Entries kept before the oldest is evicted. */
  entryBufferCapacity: number;
};

export const ConfigToken = Symbol("APP_CONFIG");
