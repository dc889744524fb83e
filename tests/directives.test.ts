import { describe, it, expect } from "vitest";
import { JobFilterError, MalformedDirectiveError } from "../src/core/errors.js";
import { getLog } from "../src/core/log.js";
import { createJobRecord, type JobRecord } from "../src/job/jobRecord.js";
import { scanDirectiveLines } from "../src/gridengine/directiveScanner.js";
import {
  applyGridEngineDirectives,
  parseDirectiveLine,
  parseSlotRange
} from "../src/gridengine/optionDispatcher.js";

const log = getLog("directives.test");

function run(script: string, init: Partial<JobRecord> = {}): JobRecord {
  const job = createJobRecord({ groupId: 2000, ...init });
  applyGridEngineDirectives(job, script, { minMemPerSlotMib: 1024, log });
  return job;
}

describe("scanDirectiveLines", () => {
  it("collects #$ lines from the leading comment block with physical line numbers", () => {
    const script = "#!/bin/bash\n#$ -N foo\n# plain comment\n#$ -q a\necho hi\n#$ -N late\n";
    expect(scanDirectiveLines(script)).toEqual([
      { line: 2, body: " -N foo" },
      { line: 4, body: " -q a" }
    ]);
  });

  it("tolerates CRLF line endings", () => {
    expect(scanDirectiveLines("#!/bin/sh\r\n#$ -j y\r\n")).toEqual([{ line: 2, body: " -j y" }]);
  });

  it("stops at an empty line", () => {
    expect(scanDirectiveLines("#!/bin/sh\n\n#$ -N foo\n")).toEqual([]);
  });
});

describe("parseSlotRange", () => {
  it("accepts N, N-M, -M and N-", () => {
    expect(parseSlotRange("4", 1, 100)).toEqual({ min: 4, max: 4 });
    expect(parseSlotRange("2-8", 1, 100)).toEqual({ min: 2, max: 8 });
    expect(parseSlotRange("-4", 1, 100)).toEqual({ min: 1, max: 4 });
    expect(parseSlotRange("3-", 1, 100)).toEqual({ min: 3, max: 3 });
  });

  it("rejects zero, overflow, garbage and inverted ranges", () => {
    expect(() => parseSlotRange("0", 5, 100)).toThrow(MalformedDirectiveError);
    expect(() => parseSlotRange("70000", 5, 0xfffd)).toThrow(MalformedDirectiveError);
    expect(() => parseSlotRange("2-x", 5, 100)).toThrow(MalformedDirectiveError);
    expect(() => parseSlotRange("4x", 5, 100)).toThrow(MalformedDirectiveError);
    expect(() => parseSlotRange("8-2", 5, 100)).toThrow("line 5");
  });
});

describe("parallel environment (-pe)", () => {
  it("threads 4 runs one task with four CPUs on one node", () => {
    const job = run("#!/bin/bash\n#$ -pe threads 4\n");
    expect(job.numTasks).toBe(1);
    expect(job.cpusPerTask).toBe(4);
    expect(job.minCpus).toBe(4);
    expect(job.maxCpus).toBe(4);
    expect(job.minNodes).toBe(1);
    expect(job.maxNodes).toBe(1);
    expect(job.pnMinCpus).toBe(4);
    expect(job.environment).toEqual(["SLURM_NTASKS=1", "SLURM_NPROCS=1", "SLURM_CPUS_PER_TASK=4"]);
  });

  it("mpi 2-8 runs eight single-CPU tasks", () => {
    const job = run("#!/bin/bash\n#$ -pe mpi 2-8\n");
    expect(job.numTasks).toBe(8);
    expect(job.cpusPerTask).toBe(1);
    expect(job.minCpus).toBe(2);
    expect(job.maxCpus).toBe(8);
    expect(job.pnMinCpus).toBe(1);
    expect(job.minNodes).toBeNull();
    expect(job.environment).toEqual(["SLURM_NTASKS=8", "SLURM_NPROCS=8", "SLURM_CPUS_PER_TASK=1"]);
  });

  it("generic-mpi behaves like mpi", () => {
    expect(run("#!/bin/bash\n#$ -pe generic-mpi 3\n").numTasks).toBe(3);
  });

  it("reports an inverted range with its line number", () => {
    let caught: unknown = null;
    try {
      run("#!/bin/bash\n#$ -N x\n#$ -pe mpi 8-2\n");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(JobFilterError);
    if (!(caught instanceof JobFilterError)) return;
    expect(caught.kind).toBe("MalformedDirective");
    expect(caught.line).toBe(3);
    expect(caught.message).toBe('GridEngine directive error at line 3: invalid slot range "8-2": minimum 8 exceeds maximum 2');
  });

  it("rejects unknown environments and missing slot counts", () => {
    expect(() => run("#!/bin/bash\n#$ -pe smp 4\n")).toThrow('unsupported parallel environment "smp"');
    expect(() => run("#!/bin/bash\n#$ -pe threads\n")).toThrow("requires a slot count");
  });

  // The guard covers the whole task geometry at once: a single field set on
  // the command line suppresses every -pe effect, not just that field.
  it("is ignored entirely when any task geometry field is already set", () => {
    const byNtasksPerNode = run("#!/bin/bash\n#$ -pe threads 4\n", { ntasksPerNode: 2 });
    expect(byNtasksPerNode.cpusPerTask).toBeNull();
    expect(byNtasksPerNode.numTasks).toBeNull();
    expect(byNtasksPerNode.environment).toEqual([]);

    const byCpusPerTask = run("#!/bin/bash\n#$ -pe mpi 8\n", { cpusPerTask: 2 });
    expect(byCpusPerTask.cpusPerTask).toBe(2);
    expect(byCpusPerTask.numTasks).toBeNull();
    expect(byCpusPerTask.maxCpus).toBeNull();
  });

  it("accepts exported values that match the derived geometry", () => {
    const job = run("#!/bin/bash\n#$ -pe threads 4\n", { environment: ["PATH=/bin", "SLURM_NTASKS=1"] });
    expect(job.environment).toEqual(["PATH=/bin", "SLURM_NTASKS=1", "SLURM_NPROCS=1", "SLURM_CPUS_PER_TASK=4"]);
  });

  it("fails when an exported value contradicts the derived geometry", () => {
    const init = { environment: ["SLURM_NTASKS=9"] };
    expect(() => run("#!/bin/bash\n#$ -N mpi\n#$ -pe mpi 4\n", init)).toThrow(
      "GridEngine directive error at line 3: -pe mpi requires SLURM_NTASKS=4 but the job environment already has SLURM_NTASKS=9"
    );

    const job = createJobRecord({ groupId: 2000, ...init });
    expect(() => applyGridEngineDirectives(job, "#!/bin/bash\n#$ -pe mpi 4\n", { minMemPerSlotMib: 1024, log })).toThrow(
      MalformedDirectiveError
    );
    expect(job.numTasks).toBeNull();
    expect(job.environment).toEqual(["SLURM_NTASKS=9"]);
  });
});

describe("mail options (-m, -M)", () => {
  it("accumulates mail bits and clears them on n", () => {
    expect(run("#!/bin/bash\n#$ -m bea\n").mailType).toBe(7);
    expect(run("#!/bin/bash\n#$ -m s\n").mailType).toBe(8);
    expect(run("#!/bin/bash\n#$ -m ben\n").mailType).toBe(0);
    expect(run("#!/bin/bash\n#$ -m nb\n").mailType).toBe(1);
  });

  it("rejects unknown mail characters", () => {
    expect(() => run("#!/bin/bash\n#$ -m bx\n")).toThrow('invalid mail option "x"');
  });

  it("keeps a mail type chosen at submission, including an explicit none", () => {
    expect(run("#!/bin/bash\n#$ -m bea\n", { mailType: 0 }).mailType).toBe(0);
  });

  it("takes the mail address verbatim", () => {
    expect(run("#!/bin/bash\n#$ -M someone@example.org\n").mailUser).toBe("someone@example.org");
    expect(run("#!/bin/bash\n#$ -M a@example.org\n", { mailUser: "b@example.org" }).mailUser).toBe("b@example.org");
  });
});

describe("job name (-N)", () => {
  it("stops the name at path-like characters", () => {
    expect(run("#!/bin/bash\n#$ -N my/job\n").name).toBe("my");
    expect(run("#!/bin/bash\n#$ -N align_run\n").name).toBe("align_run");
  });

  it("falls back to the comment when a name is already set", () => {
    const job = run("#!/bin/bash\n#$ -N fromscript\n", { name: "fromcli" });
    expect(job.name).toBe("fromcli");
    expect(job.comment).toBe("fromscript");

    const full = run("#!/bin/bash\n#$ -N fromscript\n", { name: "a", comment: "b" });
    expect(full.name).toBe("a");
    expect(full.comment).toBe("b");
  });
});

describe("queue list (-q)", () => {
  it("drops host qualifiers and empty names", () => {
    expect(run("#!/bin/bash\n#$ -q all.q@node1,,gpu.q\n").partition).toBe("all.q,gpu.q");
  });

  it("leaves an existing partition alone", () => {
    expect(run("#!/bin/bash\n#$ -q standard\n", { partition: "devel" }).partition).toBe("devel");
  });
});

describe("stdio and join (-o, -e, -i, -j)", () => {
  it("translates paths and skips host-qualified alternatives", () => {
    const job = run("#!/bin/bash\n#$ -o host:/x.log,:/scratch/$USER/$JOB_ID.out\n#$ -i input.txt\n");
    expect(job.stdOut).toBe("/scratch/%u/%j.out");
    expect(job.stdIn).toBe("input.txt");
  });

  it("derives a separate stderr path on -j n", () => {
    expect(run("#!/bin/bash\n#$ -o out/run.out\n#$ -j n\n").stdErr).toBe("out/run.err");
    expect(run("#!/bin/bash\n#$ -o run.log -j no\n").stdErr).toBe("run.log.err");
    expect(run("#!/bin/bash\n#$ -j N\n").stdErr).toBe("slurm-%j.err");
    expect(run("#!/bin/bash\n#$ -j n\n", { stdOut: "job.out" }).stdErr).toBe("job.err");
  });

  it("keeps an explicit -e and leaves stderr unset on -j y", () => {
    expect(run("#!/bin/bash\n#$ -j n\n#$ -e err.log\n").stdErr).toBe("err.log");
    expect(run("#!/bin/bash\n#$ -o run.out -j yes\n").stdErr).toBeNull();
  });

  it("leaves paths set on the command line alone", () => {
    const script = "#!/bin/bash\n#$ -o script.out\n#$ -e script.err\n#$ -i script.in\n";
    const job = run(script, { stdOut: "cli.out", stdErr: "cli.err", stdIn: "cli.in" });
    expect(job.stdOut).toBe("cli.out");
    expect(job.stdErr).toBe("cli.err");
    expect(job.stdIn).toBe("cli.in");

    expect(run("#!/bin/bash\n#$ -j n\n", { stdErr: "cli.err" }).stdErr).toBe("cli.err");
  });

  it("rejects other join values", () => {
    expect(() => run("#!/bin/bash\n#$ -j maybe\n")).toThrow("line 2");
  });
});

describe("resource list (-l)", () => {
  it("sets per-CPU memory and the time limit", () => {
    const job = run("#!/bin/bash\n#$ -l m_mem_free=2G,h_rt=01:30:00\n");
    expect(job.pnMinMemory).toEqual({ mib: 2048, perCpu: true });
    expect(job.timeLimit).toBe(90);
  });

  it("raises small memory requests to the per-slot floor", () => {
    expect(run("#!/bin/bash\n#$ -l mem_free=100M\n").pnMinMemory).toEqual({ mib: 1024, perCpu: true });
  });
});

describe("parseDirectiveLine", () => {
  it("stops quietly at an unknown flag or a non-option token", () => {
    expect(parseDirectiveLine(" -V -N foo", 2)).toEqual([]);
    expect(parseDirectiveLine(" -N foo -V -q bar", 2).map((o) => o.kind)).toEqual(["job-name"]);
    expect(parseDirectiveLine(" echo -N foo", 2)).toEqual([]);
    expect(parseDirectiveLine(" -cwd", 2)).toEqual([]);
  });

  it("reports a flag without its argument", () => {
    expect(() => parseDirectiveLine(" -N", 7)).toThrow("GridEngine directive error at line 7: option -N requires an argument");
  });
});
