import type { JsonObject } from "../core/json.js";

export function envSnapshot(): JsonObject {
  return {
    node: process.version,
    mode: process.env.DATABASE_URL ? "postgres" : "pg-mem",
    site_policy: process.env.SITE_POLICY_PATH ?? "policies/default.policy.yaml"
  };
}
