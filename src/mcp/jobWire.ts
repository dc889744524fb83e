import { createJobRecord, type JobRecord } from "../job/jobRecord.js";
import type { WireJob, WireJobInput } from "./toolSchemas.js";

export function jobFromWire(wire: WireJobInput): JobRecord {
  return createJobRecord({
    account: wire.account ?? null,
    partition: wire.partition ?? null,
    reservation: wire.reservation ?? null,
    qos: wire.qos ?? null,
    name: wire.name ?? null,
    comment: wire.comment ?? null,
    stdOut: wire.std_out ?? null,
    stdErr: wire.std_err ?? null,
    stdIn: wire.std_in ?? null,
    mailType: wire.mail_type ?? null,
    mailUser: wire.mail_user ?? null,
    numTasks: wire.num_tasks ?? null,
    cpusPerTask: wire.cpus_per_task ?? null,
    minCpus: wire.min_cpus ?? null,
    maxCpus: wire.max_cpus ?? null,
    minNodes: wire.min_nodes ?? null,
    maxNodes: wire.max_nodes ?? null,
    pnMinCpus: wire.pn_min_cpus ?? null,
    ntasksPerNode: wire.ntasks_per_node ?? null,
    pnMinMemory: wire.pn_min_memory ? { mib: wire.pn_min_memory.mib, perCpu: wire.pn_min_memory.per_cpu } : null,
    timeLimit: wire.time_limit ?? null,
    timeMin: wire.time_min ?? null,
    shared: wire.shared ?? null,
    gresSpec: wire.gres_spec ?? null,
    gresEnforceBind: wire.gres_enforce_bind ?? false,
    socketsPerNode: wire.sockets_per_node ?? null,
    groupId: wire.group_id,
    script: wire.script ?? null,
    environment: wire.environment ?? []
  });
}

export function jobToWire(job: JobRecord): WireJob {
  return {
    account: job.account,
    partition: job.partition,
    reservation: job.reservation,
    qos: job.qos,
    name: job.name,
    comment: job.comment,
    std_out: job.stdOut,
    std_err: job.stdErr,
    std_in: job.stdIn,
    mail_type: job.mailType,
    mail_user: job.mailUser,
    num_tasks: job.numTasks,
    cpus_per_task: job.cpusPerTask,
    min_cpus: job.minCpus,
    max_cpus: job.maxCpus,
    min_nodes: job.minNodes,
    max_nodes: job.maxNodes,
    pn_min_cpus: job.pnMinCpus,
    ntasks_per_node: job.ntasksPerNode,
    pn_min_memory: job.pnMinMemory ? { mib: job.pnMinMemory.mib, per_cpu: job.pnMinMemory.perCpu } : null,
    time_limit: job.timeLimit,
    time_min: job.timeMin,
    shared: job.shared,
    gres_spec: job.gresSpec,
    gres_enforce_bind: job.gresEnforceBind,
    sockets_per_node: job.socketsPerNode,
    group_id: job.groupId,
    script: job.script,
    environment: [...job.environment]
  };
}
