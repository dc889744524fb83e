import { LookupFailureError, PolicyViolationError } from "../core/errors.js";
import type { Logger } from "../core/log.js";
import { joinPartitions, splitPartitions, type JobRecord } from "../job/jobRecord.js";
import { applyGridEngineDirectives } from "../gridengine/optionDispatcher.js";
import type { GroupDirectory } from "../system/groups.js";
import { countRequestedGpus } from "./gpuGres.js";
import type { SitePolicy } from "./sitePolicy.js";

export interface PipelineContext {
  policy: SitePolicy;
  groups: GroupDirectory;
  log: Logger;
}

const SCRIPT_MARKER = "#!";
const PRIVILEGED_UID = 0;

function resolveGroupName(ctx: PipelineContext, gid: number): string | null {
  try {
    return ctx.groups.lookupGroupName(gid);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    ctx.log.error({ gid, err: reason }, "group database lookup failed");
    throw new LookupFailureError(`Unable to resolve job submission gid ${gid}: ${reason}`);
  }
}

function groupExists(ctx: PipelineContext, name: string): boolean {
  try {
    return ctx.groups.groupExists(name);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    ctx.log.error({ group: name, err: reason }, "group database lookup failed");
    throw new LookupFailureError(`Unable to look up group ${name}: ${reason}`);
  }
}

function parseScriptDirectives(job: JobRecord, ctx: PipelineContext): void {
  if (!ctx.policy.gridEngineEnabled()) return;
  if (!job.script || !job.script.startsWith(SCRIPT_MARKER)) return;

  const summary = applyGridEngineDirectives(job, job.script, {
    minMemPerSlotMib: ctx.policy.minMemPerSlotMib(),
    log: ctx.log
  });
  if (summary.directiveLines > 0) {
    ctx.log.info(summary, "processed GridEngine directives");
  }
}

function checkReservedPartition(job: JobRecord, ctx: PipelineContext): void {
  if (!ctx.policy.reservedCheckEnabled()) return;
  const reserved = ctx.policy.reservedPartitionName();
  if (splitPartitions(job.partition).includes(reserved) && !job.reservation) {
    throw new PolicyViolationError(
      `The ${reserved} partition can only be used with a reservation (--reservation=<name>)`
    );
  }
}

function checkNodeSharing(job: JobRecord, ctx: PipelineContext): void {
  if (job.shared === null) return;
  if (!ctx.policy.sharingAllowed(job.shared)) {
    throw new PolicyViolationError(
      `Node sharing mode "${job.shared}" is not permitted on this cluster; use --exclusive or --oversubscribe instead`
    );
  }
  ctx.log.info({ shared: job.shared }, "job node sharing mode");
}

function applyDefaultMemory(job: JobRecord, ctx: PipelineContext): void {
  if (job.pnMinMemory !== null) return;
  job.pnMinMemory = { mib: ctx.policy.defaultMemPerCpuMib(), perCpu: true };
  ctx.log.trace({ mib: job.pnMinMemory.mib }, "applied default memory per CPU");
}

function deriveAccount(job: JobRecord, submitUid: number, ctx: PipelineContext): void {
  if (job.account !== null) return;

  if (job.groupId >= ctx.policy.baseGid()) {
    const name = resolveGroupName(ctx, job.groupId);
    if (!name) {
      ctx.log.error({ gid: job.groupId }, "unable to resolve job submission gid; job account not set");
      throw new LookupFailureError(`Unable to resolve job submission gid ${job.groupId}`);
    }
    job.account = name;
    ctx.log.info({ account: name, gid: job.groupId }, "set job account from submission group");
    return;
  }

  if (submitUid !== PRIVILEGED_UID) {
    throw new PolicyViolationError("Please choose a workgroup before submitting a job");
  }
}

function applyOwnedResourceQos(job: JobRecord, ctx: PipelineContext): void {
  if (!ctx.policy.ownedResourceQosEnabled()) return;
  if (job.qos !== null || !job.account) return;

  const owned = splitPartitions(job.partition).find((p) => ctx.policy.isOwnedResourcePartition(p));
  if (owned) {
    job.qos = job.account;
    ctx.log.info({ partition: owned, qos: job.qos }, "set QOS for owned-resource partition");
  }
}

function applyPriorityAccessQos(job: JobRecord, ctx: PipelineContext): void {
  if (!ctx.policy.priorityAccessQosEnabled()) return;
  if (job.qos !== null) return;

  const partitions = splitPartitions(job.partition);
  if (partitions.length === 0) return;

  const placeholder = ctx.policy.workgroupPlaceholder();
  const allWorkgroups = partitions.every((p) => p === placeholder || groupExists(ctx, p));
  if (allWorkgroups) {
    job.qos = ctx.policy.priorityAccessQosName();
    ctx.log.info({ qos: job.qos }, "set priority-access QOS for workgroup partitions");
  }
}

function substituteWorkgroup(job: JobRecord, ctx: PipelineContext): void {
  if (!ctx.policy.workgroupSubstitutionEnabled()) return;

  const placeholder = ctx.policy.workgroupPlaceholder();
  const partitions = splitPartitions(job.partition);
  if (!partitions.includes(placeholder)) return;

  const workgroup = resolveGroupName(ctx, job.groupId);
  if (!workgroup) {
    throw new PolicyViolationError(
      `Unable to determine the workgroup for partition ${placeholder} (gid ${job.groupId}); choose a workgroup first`
    );
  }
  job.partition = joinPartitions(partitions.map((p) => (p === placeholder ? workgroup : p)));
  ctx.log.info({ partition: job.partition }, "substituted workgroup partition");
}

function enforceGpuBinding(job: JobRecord, ctx: PipelineContext): void {
  if (!ctx.policy.gpuGresAdjustmentsEnabled()) return;
  if (!job.gresSpec) return;

  const gpus = countRequestedGpus(job.gresSpec, ctx.policy.gpuTypes());
  if (gpus <= 0) return;

  job.gresEnforceBind = true;
  if (job.socketsPerNode === null) job.socketsPerNode = gpus;
  ctx.log.info({ gpus }, "enforcing GPU-to-CPU binding");
}

function backfillTimeMin(job: JobRecord): void {
  if (job.timeMin === null && job.timeLimit !== null) job.timeMin = job.timeLimit;
}

// Every field a policy step may write.
type PolicyFields = Pick<
  JobRecord,
  "pnMinMemory" | "account" | "qos" | "partition" | "gresEnforceBind" | "socketsPerNode" | "timeMin"
>;

function policyFields(job: JobRecord): PolicyFields {
  const { pnMinMemory, account, qos, partition, gresEnforceBind, socketsPerNode, timeMin } = job;
  return { pnMinMemory, account, qos, partition, gresEnforceBind, socketsPerNode, timeMin };
}

/**
 * Normalizes one submitted job in place. Steps run in a fixed order and the
 * first violation aborts the submission. Directive effects applied before a
 * violation stay on the record; policy steps leave nothing behind.
 */
export function runSubmitPipeline(job: JobRecord, submitUid: number, ctx: PipelineContext): void {
  parseScriptDirectives(job, ctx);

  const afterDirectives = policyFields(job);
  try {
    checkReservedPartition(job, ctx);
    checkNodeSharing(job, ctx);
    applyDefaultMemory(job, ctx);
    deriveAccount(job, submitUid, ctx);
    applyOwnedResourceQos(job, ctx);
    applyPriorityAccessQos(job, ctx);
    substituteWorkgroup(job, ctx);
    enforceGpuBinding(job, ctx);
    backfillTimeMin(job);
  } catch (e) {
    Object.assign(job, afterDirectives);
    throw e;
  }
}
