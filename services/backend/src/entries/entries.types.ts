/**
 * @fileoverview Request shapes for entry routes.
 */

export type MarkRequest = {
  name: string;
  startTime?: number;
  detail?: unknown;
};

export type MeasureRequest = {
  name: string;
  start: string;
  end?: string;
  detail?: unknown;
};
