import type { ColumnType, Generated, JSONColumnType } from "kysely";
import type { JsonObject } from "../core/json.js";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;
// pg hands timestamptz back as Date; inserts and updates take ISO strings.
type Timestamp = ColumnType<Date | string, string | undefined, string>;
type TimestampNullable = ColumnType<Date | string | null, string | null | undefined, string | null>;

export interface FilterRunsTable {
  run_id: string;
  tool_name: string;
  params_hash: string;
  canonical_params: Json;
  policy_hash: string;
  status: string;
  requested_by: OptionalNullable<string>;
  submit_uid: OptionalNullable<number>;
  created_at: Timestamp;
  finished_at: TimestampNullable;
  environment: JsonNullable;
  error_kind: OptionalNullable<string>;
  error: OptionalNullable<string>;
  result_json: JsonNullable;
}

export interface FilterRunEventsTable {
  event_id: Generated<number>;
  run_id: string;
  ts: Timestamp;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  filter_runs: FilterRunsTable;
  filter_run_events: FilterRunEventsTable;
}
