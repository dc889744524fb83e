import { scanInteger } from "../gridengine/tokens.js";

export type SlurmEnv = Readonly<Record<string, string | undefined>>;

export interface SlotCount {
  slots: number;
  /** Set when parsing stopped early; `slots` then holds the partial sum. */
  warning: string | null;
}

export interface GridEngineEnv {
  env: Record<string, string>;
  warnings: string[];
}

const DEFAULT_TMPDIR_BASE = "/tmp";

/**
 * Sums a `SLURM_JOB_CPUS_PER_NODE` value such as `1(x2),2(x3)` (= 1+1+2+2+2).
 */
export function countSlots(cpusPerNode: string): SlotCount {
  let slots = 0;
  let pos = 0;
  const stop = (at: number): SlotCount => ({
    slots,
    warning: `Unable to parse SLURM_JOB_CPUS_PER_NODE (at index ${at}): ${cpusPerNode}`
  });

  while (pos < cpusPerNode.length) {
    const count = scanInteger(cpusPerNode, pos);
    if (!count || count.value <= 0) return stop(pos);
    let n = count.value;
    pos = count.end;

    if (cpusPerNode.startsWith("(x", pos)) {
      pos += 2;
      const repeat = scanInteger(cpusPerNode, pos);
      if (!repeat || repeat.value <= 0) return stop(pos);
      n *= repeat.value;
      pos = repeat.end;
      if (cpusPerNode[pos] === ")") pos++;
    }
    slots += n;

    if (pos === cpusPerNode.length) break;
    if (cpusPerNode[pos] !== ",") return stop(pos);
    pos++;
  }

  return { slots, warning: null };
}

function firstNonEmpty(slurmEnv: SlurmEnv, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = slurmEnv[key];
    if (value) return value;
  }
  return null;
}

const DIRECT_COPIES: ReadonlyArray<[target: string, sources: string[]]> = [
  ["SGE_O_WORKDIR", ["SLURM_SUBMIT_DIR"]],
  ["JOB_ID", ["SLURM_ARRAY_JOB_ID", "SLURM_JOB_ID"]],
  ["JOB_NAME", ["SLURM_JOB_NAME"]],
  ["TASK_ID", ["SLURM_ARRAY_TASK_ID"]],
  ["SGE_TASK_FIRST", ["SLURM_ARRAY_TASK_MIN"]],
  ["SGE_TASK_LAST", ["SLURM_ARRAY_TASK_MAX"]],
  ["SGE_TASK_STEPSIZE", ["SLURM_ARRAY_TASK_STEP"]]
];

/**
 * GridEngine variables a task expects, derived from the Slurm task environment.
 * Unset or empty sources produce no variable, except `NHOSTS` which defaults to 1.
 */
export function deriveGridEngineEnv(slurmEnv: SlurmEnv): GridEngineEnv {
  const env: Record<string, string> = {};
  const warnings: string[] = [];

  for (const [target, sources] of DIRECT_COPIES) {
    const value = firstNonEmpty(slurmEnv, ...sources);
    if (value !== null) env[target] = value;
  }

  env["NHOSTS"] = firstNonEmpty(slurmEnv, "SLURM_JOB_NUM_NODES") ?? "1";

  const cpusPerNode = firstNonEmpty(slurmEnv, "SLURM_JOB_CPUS_PER_NODE");
  if (cpusPerNode !== null) {
    const { slots, warning } = countSlots(cpusPerNode);
    if (warning) warnings.push(warning);
    if (slots > 0) env["NSLOTS"] = String(slots);
  }

  return { env, warnings };
}

/**
 * Per-job scratch directory: `<base>/<job>` for the batch step (`stepId` null),
 * `<base>/<job>.<step>` otherwise.
 */
export function jobTmpdir(base: string | null | undefined, jobId: number, stepId: number | null): string {
  const root = base || DEFAULT_TMPDIR_BASE;
  return stepId === null ? `${root}/${jobId}` : `${root}/${jobId}.${stepId}`;
}
