/**
 * @fileoverview Validation and construction of custom performance entries.
 *
 * Exports:
 * - InvalidEntryError (L22) - Raised when a submission lacks required fields.
 * - createCustomEntry (L40) - Validate an init and freeze it into an entry.
 */

import { z, ZodError } from "zod";

import { CUSTOM_ENTRY_TYPE, CustomEntryInit, CustomPerformanceEntry } from "./custom-entry.types";

const ROOT_PATH_LABEL = "entry";

/* Negative durations are allowed; NaN and infinities are not. */
const entryInitSchema = z.object({
  name: z.string(),
  startTime: z.number().finite(),
  duration: z.number().finite()
});

export class InvalidEntryError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Invalid entry: ${issues.join("; ")}`);
    this.name = "InvalidEntryError";
    this.issues = issues;
  }
}

const formatIssues = (error: ZodError): string[] => {
  /* One "<path>: <message>" line per issue. */
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : ROOT_PATH_LABEL;
    return `${path}: ${issue.message}`;
  });
};

export const createCustomEntry = <TDetail>(
  init: CustomEntryInit<TDetail>
): CustomPerformanceEntry<TDetail> => {
  const parsed = entryInitSchema.safeParse(init);
  if (!parsed.success) {
    throw new InvalidEntryError(formatIssues(parsed.error));
  }

  /* Shallow freeze: detail is kept by reference and left untouched. */
  return Object.freeze({
    entryType: CUSTOM_ENTRY_TYPE,
    name: parsed.data.name,
    startTime: parsed.data.startTime,
    duration: parsed.data.duration,
    detail: init.detail ?? null
  });
};
