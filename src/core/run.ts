import type { FilterRunId } from "./ids.js";
import type { JsonObject } from "./json.js";

export type RunStatus = "running" | "succeeded" | "blocked" | "failed";

export const RUN_STATUSES: readonly RunStatus[] = ["running", "succeeded", "blocked", "failed"];

export function isRunStatus(value: string): value is RunStatus {
  return RUN_STATUSES.some((s) => s === value);
}

export interface FilterRunRecord {
  runId: FilterRunId;
  toolName: string;
  paramsHash: `sha256:${string}`;
  policyHash: `sha256:${string}`;
  status: RunStatus;
  requestedBy: string | null;
  submitUid: number | null;
  createdAt: string;
  finishedAt: string | null;
  environment: JsonObject | null;
  errorKind: string | null;
  error: string | null;
  resultJson: JsonObject | null;
}

export interface FilterRunEvent {
  kind: string;
  message: string | null;
  data: JsonObject | null;
  ts: string;
}
