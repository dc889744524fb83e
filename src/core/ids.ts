import { ulid } from "ulid";

export type FilterRunId = `frun_${string}`;

export function newFilterRunId(): FilterRunId {
  return `frun_${ulid()}`;
}

export function isFilterRunId(value: string): value is FilterRunId {
  return value.startsWith("frun_") && value.length > "frun_".length;
}
