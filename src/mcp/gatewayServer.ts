import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { JobFilterError } from "../core/errors.js";
import { newFilterRunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import { getLog } from "../core/log.js";
import { deriveGridEngineEnv, jobTmpdir } from "../compat/sgeEnvironment.js";
import type { JobSubmitFilter } from "../filter/jobSubmitFilter.js";
import { FilterRun, requestedByFromExtra } from "../runs/filterRun.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { envSnapshot } from "./envSnapshot.js";
import { jobFromWire, jobToWire } from "./jobWire.js";
import {
  zJobModifyInput,
  zJobModifyOutput,
  zJobSubmitInput,
  zJobSubmitOutput,
  zTaskEnvInput,
  zTaskEnvOutput
} from "./toolSchemas.js";

const log = getLog(import.meta);

export interface GatewayDeps {
  filter: JobSubmitFilter;
  store: PostgresStore;
}

function toRejection(error: JobFilterError): JsonObject {
  return { kind: error.kind, message: error.message, line: error.line };
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "sgecompat-gateway",
    version: "0.1.0"
  });

  function openRun(
    toolName: string,
    canonicalParams: JsonObject,
    submitUid: number | null,
    extra: Parameters<typeof requestedByFromExtra>[0]
  ): FilterRun {
    return new FilterRun(deps.store, {
      runId: newFilterRunId(),
      toolName,
      paramsHash: sha256Prefixed(stableJsonStringify(canonicalParams)),
      canonicalParams,
      policyHash: deps.filter.policy.policyHash,
      requestedBy: requestedByFromExtra(extra),
      submitUid,
      environment: envSnapshot()
    });
  }

  async function failRun(run: FilterRun | null, started: boolean, e: unknown): Promise<void> {
    if (!run || !started) return;
    const message = e instanceof Error ? e.message : "unknown error";
    log.error({ runId: run.runId, err: message }, "tool call failed");
    await run.finishFailure(message);
  }

  mcp.registerTool(
    "job_submit",
    {
      description:
        "Normalize a job at submission: apply embedded GridEngine (#$) directives and site policy. Returns the adjusted job or the rejection.",
      inputSchema: zJobSubmitInput,
      outputSchema: zJobSubmitOutput
    },
    async (args, extra) => {
      let run: FilterRun | null = null;
      let started = false;

      try {
        const job = jobFromWire(args.job);
        run = openRun("job_submit", { job: jobToWire(job), submit_uid: args.submit_uid }, args.submit_uid, extra);
        await run.start();
        started = true;

        const outcome = deps.filter.submit(job, args.submit_uid);
        const result: JsonObject = {
          accepted: outcome.ok,
          job: jobToWire(job),
          rejection: outcome.ok ? null : toRejection(outcome.error),
          policy_hash: deps.filter.policy.policyHash
        };

        if (outcome.ok) {
          const structured = await run.finishSuccess(result, "accepted");
          return {
            content: [{ type: "text", text: `Accepted job for gid ${job.groupId} (${run.runId})` }],
            structuredContent: structured
          };
        }

        const structured = await run.finishBlocked(outcome.error.kind, outcome.error.message, result);
        return {
          content: [{ type: "text", text: `Rejected: ${outcome.error.message}` }],
          structuredContent: structured
        };
      } catch (e) {
        await failRun(run, started, e);
        throw e;
      }
    }
  );

  mcp.registerTool(
    "job_modify",
    {
      description: "Check a job modification request; the account of a submitted job cannot change.",
      inputSchema: zJobModifyInput,
      outputSchema: zJobModifyOutput
    },
    async (args, extra) => {
      let run: FilterRun | null = null;
      let started = false;

      try {
        const incoming = { account: args.incoming.account ?? null };
        const existing = { account: args.existing.account ?? null };
        run = openRun("job_modify", { incoming, existing, submit_uid: args.submit_uid }, args.submit_uid, extra);
        await run.start();
        started = true;

        const outcome = deps.filter.modify(incoming, existing, args.submit_uid);
        if (outcome.ok) {
          const structured = await run.finishSuccess({ accepted: true, rejection: null }, "accepted");
          return {
            content: [{ type: "text", text: "Modification accepted" }],
            structuredContent: structured
          };
        }

        const structured = await run.finishBlocked(outcome.error.kind, outcome.error.message, {
          accepted: false,
          rejection: toRejection(outcome.error)
        });
        return {
          content: [{ type: "text", text: `Rejected: ${outcome.error.message}` }],
          structuredContent: structured
        };
      } catch (e) {
        await failRun(run, started, e);
        throw e;
      }
    }
  );

  mcp.registerTool(
    "gridengine_task_env",
    {
      description:
        "Derive the GridEngine task environment (JOB_ID, NSLOTS, SGE_TASK_*, ...) and per-job TMPDIR from a Slurm task environment.",
      inputSchema: zTaskEnvInput,
      outputSchema: zTaskEnvOutput
    },
    async (args, extra) => {
      let run: FilterRun | null = null;
      let started = false;

      try {
        const canonicalParams: JsonObject = {
          slurm_env: args.slurm_env,
          tmpdir_base: args.tmpdir_base ?? null,
          job_id: args.job_id ?? null,
          step_id: args.step_id ?? null
        };
        run = openRun("gridengine_task_env", canonicalParams, null, extra);
        await run.start();
        started = true;

        const { env, warnings } = deriveGridEngineEnv(args.slurm_env);
        for (const warning of warnings) {
          log.warn({ runId: run.runId }, warning);
          await run.event("env.warning", warning, null);
        }
        const tmpdir = args.job_id === undefined ? null : jobTmpdir(args.tmpdir_base, args.job_id, args.step_id ?? null);

        const structured = await run.finishSuccess({ env, tmpdir, warnings }, "derived");
        return {
          content: [{ type: "text", text: `Derived ${Object.keys(env).length} GridEngine variables` }],
          structuredContent: structured
        };
      } catch (e) {
        await failRun(run, started, e);
        throw e;
      }
    }
  );

  return mcp;
}
