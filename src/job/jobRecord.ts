/**
 * The subset of a Slurm job descriptor this filter reads and writes.
 *
 * `null` is the "unset" sentinel for every optional field. Anything non-null
 * on entry was chosen by the submitter (command-line flags or API) and is
 * never replaced by directive or policy output.
 */

export const MailType = {
  BEGIN: 0x1,
  END: 0x2,
  FAIL: 0x4,
  REQUEUE: 0x8
} as const;

export type NodeSharing = "exclusive" | "user" | "mcs" | "shared";

export interface MemoryRequest {
  mib: number;
  perCpu: boolean;
}

export interface JobRecord {
  account: string | null;
  partition: string | null;
  reservation: string | null;
  qos: string | null;
  name: string | null;
  comment: string | null;
  stdOut: string | null;
  stdErr: string | null;
  stdIn: string | null;
  mailType: number | null;
  mailUser: string | null;
  numTasks: number | null;
  cpusPerTask: number | null;
  minCpus: number | null;
  maxCpus: number | null;
  minNodes: number | null;
  maxNodes: number | null;
  pnMinCpus: number | null;
  ntasksPerNode: number | null;
  pnMinMemory: MemoryRequest | null;
  timeLimit: number | null;
  timeMin: number | null;
  shared: NodeSharing | null;
  gresSpec: string | null;
  gresEnforceBind: boolean;
  socketsPerNode: number | null;
  groupId: number;
  script: string | null;
  environment: string[];
}

export function createJobRecord(init: Partial<JobRecord> & Pick<JobRecord, "groupId">): JobRecord {
  return {
    account: null,
    partition: null,
    reservation: null,
    qos: null,
    name: null,
    comment: null,
    stdOut: null,
    stdErr: null,
    stdIn: null,
    mailType: null,
    mailUser: null,
    numTasks: null,
    cpusPerTask: null,
    minCpus: null,
    maxCpus: null,
    minNodes: null,
    maxNodes: null,
    pnMinCpus: null,
    ntasksPerNode: null,
    pnMinMemory: null,
    timeLimit: null,
    timeMin: null,
    shared: null,
    gresSpec: null,
    gresEnforceBind: false,
    socketsPerNode: null,
    script: null,
    ...init,
    environment: [...(init.environment ?? [])]
  };
}

export function splitPartitions(value: string | null): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function joinPartitions(partitions: string[]): string | null {
  return partitions.length > 0 ? partitions.join(",") : null;
}
