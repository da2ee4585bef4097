/**
 * @fileoverview Environment parsing and configuration validation.
 *
 * Exports:
 * - DEFAULT_PORT (L15) - Default HTTP port.
 * - parsePositiveInteger (L22) - Parse optional positive integer values.
 * - loadConfig (L34) - Load and validate config from environment.
 */

import { z } from "zod";

import { DEFAULT_ENTRY_BUFFER_CAPACITY } from "../entries/entry-buffer";
import { AppConfig } from "./config.types";

const DEFAULT_PORT = 3000;

const envSchema = z.object({
  PORT: z.string().optional(),
  ENTRY_BUFFER_CAPACITY: z.string().optional()
});

const parsePositiveInteger = (value: string | undefined, name: string): number | undefined => {
  /* Treat blank values as unset. */
  if (!value || value.trim().length === 0) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer: ${value}`);
  }
  return parsed;
};

export const loadConfig = (): AppConfig => {
  /* Validate environment shape. */
  const env = envSchema.parse(process.env);

  /* Assemble config object. */
  return {
    port: parsePositiveInteger(env.PORT, "PORT") ?? DEFAULT_PORT,
    entryBufferCapacity:
      parsePositiveInteger(env.ENTRY_BUFFER_CAPACITY, "ENTRY_BUFFER_CAPACITY") ??
      DEFAULT_ENTRY_BUFFER_CAPACITY
  };
};

export { DEFAULT_PORT, parsePositiveInteger };
