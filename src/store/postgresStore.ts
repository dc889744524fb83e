import type { Kysely, Selectable } from "kysely";
import { isSha256Digest } from "../core/canonicalJson.js";
import { isFilterRunId, type FilterRunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { isRunStatus, type FilterRunEvent, type FilterRunRecord, type RunStatus } from "../core/run.js";
import type { DB } from "../db/types.js";

function toIso(value: Date | string): string {
  if (value instanceof Date) return value.toISOString();
  return new Date(value).toISOString();
}

function toIsoOrNull(value: Date | string | null): string | null {
  return value === null ? null : toIso(value);
}

function digest(value: string, column: string): `sha256:${string}` {
  if (!isSha256Digest(value)) throw new Error(`corrupt ${column} in filter_runs: ${value}`);
  return value;
}

export interface CreateFilterRunInput {
  runId: FilterRunId;
  toolName: string;
  paramsHash: `sha256:${string}`;
  canonicalParams: JsonObject;
  policyHash: `sha256:${string}`;
  requestedBy: string | null;
  submitUid: number | null;
  environment: JsonObject | null;
}

export type FilterRunPatch = Partial<
  Pick<FilterRunRecord, "status" | "finishedAt" | "errorKind" | "error" | "resultJson">
>;

export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createRun(input: CreateFilterRunInput): Promise<FilterRunRecord> {
    await this.db
      .insertInto("filter_runs")
      .values({
        run_id: input.runId,
        tool_name: input.toolName,
        params_hash: input.paramsHash,
        canonical_params: input.canonicalParams,
        policy_hash: input.policyHash,
        status: "running" satisfies RunStatus,
        requested_by: input.requestedBy,
        submit_uid: input.submitUid,
        environment: input.environment
      })
      .execute();

    const row = await this.db
      .selectFrom("filter_runs")
      .selectAll()
      .where("run_id", "=", input.runId)
      .executeTakeFirstOrThrow();

    return this.mapRun(row);
  }

  async getRun(runId: FilterRunId): Promise<FilterRunRecord | null> {
    const row = await this.db.selectFrom("filter_runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? this.mapRun(row) : null;
  }

  async updateRun(runId: FilterRunId, patch: FilterRunPatch): Promise<void> {
    const updates: {
      status?: string;
      finished_at?: string | null;
      error_kind?: string | null;
      error?: string | null;
      result_json?: JsonObject | null;
    } = {};
    if (patch.status) updates.status = patch.status;
    if (patch.finishedAt !== undefined) updates.finished_at = patch.finishedAt;
    if (patch.errorKind !== undefined) updates.error_kind = patch.errorKind;
    if (patch.error !== undefined) updates.error = patch.error;
    if (patch.resultJson !== undefined) updates.result_json = patch.resultJson;

    if (Object.keys(updates).length === 0) return;

    await this.db.updateTable("filter_runs").set(updates).where("run_id", "=", runId).execute();
  }

  async addRunEvent(runId: FilterRunId, kind: string, message: string | null, data: JsonObject | null): Promise<void> {
    await this.db
      .insertInto("filter_run_events")
      .values({
        run_id: runId,
        kind,
        message,
        data
      })
      .execute();
  }

  async listRunEvents(runId: FilterRunId): Promise<FilterRunEvent[]> {
    const rows = await this.db
      .selectFrom("filter_run_events")
      .select(["kind", "message", "data", "ts"])
      .where("run_id", "=", runId)
      .orderBy("event_id", "asc")
      .execute();

    return rows.map((r) => ({ kind: r.kind, message: r.message, data: r.data, ts: toIso(r.ts) }));
  }

  private mapRun(row: Selectable<DB["filter_runs"]>): FilterRunRecord {
    if (!isFilterRunId(row.run_id)) throw new Error(`corrupt run_id in filter_runs: ${row.run_id}`);
    if (!isRunStatus(row.status)) throw new Error(`unknown run status for ${row.run_id}: ${row.status}`);

    return {
      runId: row.run_id,
      toolName: row.tool_name,
      paramsHash: digest(row.params_hash, "params_hash"),
      policyHash: digest(row.policy_hash, "policy_hash"),
      status: row.status,
      requestedBy: row.requested_by,
      submitUid: row.submit_uid,
      createdAt: toIso(row.created_at),
      finishedAt: toIsoOrNull(row.finished_at),
      environment: row.environment,
      errorKind: row.error_kind,
      error: row.error,
      resultJson: row.result_json
    };
  }
}
