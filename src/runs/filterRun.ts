import type { FilterRunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunStatus } from "../core/run.js";
import type { PostgresStore } from "../store/postgresStore.js";

export interface FilterRunInfo {
  runId: FilterRunId;
  toolName: string;
  paramsHash: `sha256:${string}`;
  canonicalParams: JsonObject;
  policyHash: `sha256:${string}`;
  requestedBy: string | null;
  submitUid: number | null;
  environment: JsonObject | null;
}

/**
 * One audited tool call: a `filter_runs` row plus its event trail.
 */
export class FilterRun {
  readonly runId: FilterRunId;

  constructor(
    private readonly store: PostgresStore,
    private readonly info: FilterRunInfo
  ) {
    this.runId = info.runId;
  }

  async start(): Promise<void> {
    await this.store.createRun(this.info);
    await this.event("run.started", `tool=${this.info.toolName}`, {
      params_hash: this.info.paramsHash,
      policy_hash: this.info.policyHash
    });
  }

  async event(kind: string, message: string, data: JsonObject | null): Promise<void> {
    await this.store.addRunEvent(this.runId, kind, message, data);
  }

  async finishSuccess(result: JsonObject, summary: string): Promise<JsonObject> {
    return this.finish("succeeded", null, null, summary, result);
  }

  async finishBlocked(errorKind: string, reason: string, result: JsonObject): Promise<JsonObject> {
    return this.finish("blocked", errorKind, reason, `blocked: ${reason}`, result);
  }

  async finishFailure(errorMessage: string): Promise<void> {
    await this.finish("failed", null, errorMessage, `failed: ${errorMessage}`, null);
  }

  private async finish(
    status: Exclude<RunStatus, "running">,
    errorKind: string | null,
    error: string | null,
    finalMessage: string,
    result: JsonObject | null
  ): Promise<JsonObject> {
    await this.event(`run.${status}`, finalMessage, errorKind ? { error_kind: errorKind } : null);

    const resultWithProvenance: JsonObject | null = result ? { ...result, provenance_run_id: this.runId } : null;

    await this.store.updateRun(this.runId, {
      status,
      finishedAt: new Date().toISOString(),
      errorKind,
      error,
      resultJson: resultWithProvenance
    });

    return resultWithProvenance ?? { provenance_run_id: this.runId };
  }
}

export function requestedByFromExtra(extra: {
  authInfo?: { clientId: string; extra?: Record<string, unknown> } | undefined;
  sessionId?: string | undefined;
}): string | null {
  const subject = extra.authInfo?.extra?.["subject"];
  return (typeof subject === "string" ? subject : null) ?? extra.authInfo?.clientId ?? extra.sessionId ?? null;
}
