import { describe, it, expect } from "vitest";
import { countSlots, deriveGridEngineEnv, jobTmpdir } from "../src/compat/sgeEnvironment.js";

describe("countSlots", () => {
  it("expands repeat counts", () => {
    expect(countSlots("1(x2),2(x3)")).toEqual({ slots: 8, warning: null });
    expect(countSlots("16,8(x2)")).toEqual({ slots: 32, warning: null });
    expect(countSlots("4")).toEqual({ slots: 4, warning: null });
  });

  it("keeps the partial sum when parsing stops", () => {
    expect(countSlots("2(x2),abc")).toEqual({
      slots: 4,
      warning: "Unable to parse SLURM_JOB_CPUS_PER_NODE (at index 6): 2(x2),abc"
    });
    expect(countSlots("3;4")).toEqual({
      slots: 3,
      warning: "Unable to parse SLURM_JOB_CPUS_PER_NODE (at index 1): 3;4"
    });
    expect(countSlots("2(x0)").slots).toBe(0);
  });
});

describe("deriveGridEngineEnv", () => {
  it("maps the Slurm task environment to GridEngine names", () => {
    const { env, warnings } = deriveGridEngineEnv({
      SLURM_SUBMIT_DIR: "/home/someone/project",
      SLURM_JOB_ID: "123",
      SLURM_ARRAY_JOB_ID: "120",
      SLURM_JOB_NAME: "align",
      SLURM_JOB_NUM_NODES: "2",
      SLURM_JOB_CPUS_PER_NODE: "4(x2)",
      SLURM_ARRAY_TASK_ID: "3",
      SLURM_ARRAY_TASK_MIN: "1",
      SLURM_ARRAY_TASK_MAX: "10",
      SLURM_ARRAY_TASK_STEP: "1"
    });
    expect(env).toEqual({
      SGE_O_WORKDIR: "/home/someone/project",
      JOB_ID: "120",
      JOB_NAME: "align",
      TASK_ID: "3",
      SGE_TASK_FIRST: "1",
      SGE_TASK_LAST: "10",
      SGE_TASK_STEPSIZE: "1",
      NHOSTS: "2",
      NSLOTS: "8"
    });
    expect(warnings).toEqual([]);
  });

  it("skips empty values and defaults NHOSTS to 1", () => {
    expect(deriveGridEngineEnv({ SLURM_JOB_ID: "77", SLURM_JOB_NAME: "" })).toEqual({
      env: { JOB_ID: "77", NHOSTS: "1" },
      warnings: []
    });
  });

  it("passes slot parsing warnings through", () => {
    const { env, warnings } = deriveGridEngineEnv({ SLURM_JOB_CPUS_PER_NODE: "x" });
    expect(env["NSLOTS"]).toBeUndefined();
    expect(warnings).toEqual(["Unable to parse SLURM_JOB_CPUS_PER_NODE (at index 0): x"]);
  });
});

describe("jobTmpdir", () => {
  it("uses the job id for the batch step and job.step otherwise", () => {
    expect(jobTmpdir("/scratch", 77, null)).toBe("/scratch/77");
    expect(jobTmpdir(undefined, 77, 0)).toBe("/tmp/77.0");
    expect(jobTmpdir("", 5, 2)).toBe("/tmp/5.2");
  });
});
