import { JobFilterError } from "../core/errors.js";
import { getLog, type Logger } from "../core/log.js";
import type { JobRecord } from "../job/jobRecord.js";
import { assertAccountUnchanged } from "../policy/modifyGuard.js";
import { runSubmitPipeline } from "../policy/pipeline.js";
import type { SitePolicy } from "../policy/sitePolicy.js";
import type { GroupDirectory } from "../system/groups.js";

export type FilterOutcome = { ok: true } | { ok: false; error: JobFilterError };

export interface JobModification {
  account: string | null;
}

export interface JobSubmitFilterDeps {
  policy: SitePolicy;
  groups: GroupDirectory;
  log?: Logger;
}

export class JobSubmitFilter {
  private readonly log: Logger;

  constructor(private readonly deps: JobSubmitFilterDeps) {
    this.log = deps.log ?? getLog(import.meta);
  }

  get policy(): SitePolicy {
    return this.deps.policy;
  }

  submit(job: JobRecord, submitUid: number): FilterOutcome {
    const log = this.log.child({ op: "submit", uid: submitUid, gid: job.groupId });
    return this.guarded(log, () =>
      runSubmitPipeline(job, submitUid, { policy: this.deps.policy, groups: this.deps.groups, log })
    );
  }

  modify(incoming: JobModification, existing: JobModification, submitUid: number): FilterOutcome {
    const log = this.log.child({ op: "modify", uid: submitUid });
    return this.guarded(log, () => assertAccountUnchanged(incoming.account, existing.account));
  }

  private guarded(log: Logger, step: () => void): FilterOutcome {
    try {
      step();
      return { ok: true };
    } catch (e) {
      if (e instanceof JobFilterError) {
        log.error({ kind: e.kind, line: e.line }, e.message);
        return { ok: false, error: e };
      }
      throw e;
    }
  }
}
