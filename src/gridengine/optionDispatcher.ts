import { MalformedDirectiveError } from "../core/errors.js";
import type { Logger } from "../core/log.js";
import { MailType, joinPartitions, type JobRecord } from "../job/jobRecord.js";
import { appendEnv, envValue } from "../system/environment.js";
import { readEscapedToken, readToken, scanDirectiveLines, skipSpaces } from "./directiveScanner.js";
import { translateStdioPath } from "./pathTokens.js";
import { applyResourceEntries, parseResourceList, type ResourceEntry } from "./resourceList.js";
import { isDigit } from "./tokens.js";

export type ParallelEnv = "threads" | "mpi";
export type StdioStream = "stdout" | "stderr" | "stdin";

export type ParsedOption =
  | { kind: "parallel-env"; line: number; env: ParallelEnv; minSlots: number; maxSlots: number }
  | { kind: "mail-mode"; line: number; mailType: number }
  | { kind: "mail-user"; line: number; address: string }
  | { kind: "job-name"; line: number; name: string }
  | { kind: "stdio"; line: number; stream: StdioStream; path: string | null; skipped: string[] }
  | { kind: "join"; line: number; join: boolean }
  | { kind: "partition"; line: number; partitions: string[] }
  | { kind: "resources"; line: number; entries: ResourceEntry[] };

export interface DirectiveContext {
  minMemPerSlotMib: number;
  log: Logger;
}

export interface DirectiveSummary {
  directiveLines: number;
  applied: number;
}

export interface DirectiveState {
  join: boolean | null;
  stderrExplicit: boolean;
}

const PARALLEL_ENVS: Record<string, { env: ParallelEnv; maxSlots: number }> = {
  threads: { env: "threads", maxSlots: 0xfffd },
  mpi: { env: "mpi", maxSlots: 0xfffffffd },
  "generic-mpi": { env: "mpi", maxSlots: 0xfffffffd }
};

const MAIL_FLAGS: Record<string, number> = {
  b: MailType.BEGIN,
  e: MailType.END,
  a: MailType.FAIL,
  s: MailType.REQUEUE
};

const JOB_NAME_STOP_CHARS = "/:@\\*?";

const STDIO_FLAGS: Record<string, StdioStream> = { o: "stdout", e: "stderr", i: "stdin" };

type OptionParser = (body: string, pos: number, line: number) => { option: ParsedOption; end: number };

function requireArgument(body: string, pos: number, line: number, flag: string, stopChars = "") {
  const token = readToken(body, pos, stopChars);
  if (!token) throw new MalformedDirectiveError(line, `option -${flag} requires an argument`);
  return token;
}

/**
 * `N`, `N-M`, `-M` (from 1) or `N-` (exactly N). At most two numbers are read;
 * `which` says whether the next one is the lower or the upper bound.
 */
export function parseSlotRange(spec: string, line: number, limit: number): { min: number; max: number } {
  let which: "min" | "max" = "min";
  let i = 0;
  let min = 1;
  let max: number | null = null;

  if (spec.startsWith("-")) {
    which = "max";
    i = 1;
  }

  for (let round = 0; round < 2 && max === null; round++) {
    const start = i;
    while (isDigit(spec[i])) i++;
    if (i === start) throw new MalformedDirectiveError(line, `invalid slot count "${spec}"`);

    const n = Number(spec.slice(start, i));
    if (n === 0) throw new MalformedDirectiveError(line, `slot count must be positive in "${spec}"`);
    if (n > limit) throw new MalformedDirectiveError(line, `slot count ${spec.slice(start, i)} exceeds the maximum of ${limit}`);

    if (which === "max") {
      max = n;
    } else {
      min = n;
      if (spec[i] === "-" && i + 1 < spec.length) {
        i++;
        which = "max";
      } else {
        if (spec[i] === "-") i++;
        max = n;
      }
    }
  }

  if (max === null || i !== spec.length) throw new MalformedDirectiveError(line, `invalid slot range "${spec}"`);
  if (min > max) {
    throw new MalformedDirectiveError(line, `invalid slot range "${spec}": minimum ${min} exceeds maximum ${max}`);
  }
  return { min, max };
}

const parseParallelEnv: OptionParser = (body, pos, line) => {
  const name = requireArgument(body, pos, line, "pe");
  const pe = Object.hasOwn(PARALLEL_ENVS, name.value) ? PARALLEL_ENVS[name.value] : undefined;
  if (!pe) throw new MalformedDirectiveError(line, `unsupported parallel environment "${name.value}"`);

  const slots = readToken(body, name.end);
  if (!slots) throw new MalformedDirectiveError(line, `option -pe ${name.value} requires a slot count`);

  const range = parseSlotRange(slots.value, line, pe.maxSlots);
  return {
    option: { kind: "parallel-env", line, env: pe.env, minSlots: range.min, maxSlots: range.max },
    end: slots.end
  };
};

const parseMailMode: OptionParser = (body, pos, line) => {
  const token = requireArgument(body, pos, line, "m");
  let mailType = 0;
  for (const ch of token.value) {
    if (ch === "n") {
      mailType = 0;
      continue;
    }
    const bit = MAIL_FLAGS[ch];
    if (bit === undefined) throw new MalformedDirectiveError(line, `invalid mail option "${ch}" in "${token.value}"`);
    mailType |= bit;
  }
  return { option: { kind: "mail-mode", line, mailType }, end: token.end };
};

const parseMailUser: OptionParser = (body, pos, line) => {
  const token = requireArgument(body, pos, line, "M");
  return { option: { kind: "mail-user", line, address: token.value }, end: token.end };
};

const parseJobName: OptionParser = (body, pos, line) => {
  const token = requireArgument(body, pos, line, "N", JOB_NAME_STOP_CHARS);
  return { option: { kind: "job-name", line, name: token.value }, end: token.end };
};

function stdioParser(flag: string, stream: StdioStream): OptionParser {
  return (body, pos, line) => {
    const token = readEscapedToken(body, pos);
    if (!token) throw new MalformedDirectiveError(line, `option -${flag} requires a path`);
    const translated = translateStdioPath(token.value);
    return {
      option: { kind: "stdio", line, stream, path: translated.path, skipped: translated.skipped },
      end: token.end
    };
  };
}

const parseJoin: OptionParser = (body, pos, line) => {
  const token = requireArgument(body, pos, line, "j");
  const value = token.value.toLowerCase();
  if (value === "y" || value === "yes") return { option: { kind: "join", line, join: true }, end: token.end };
  if (value === "n" || value === "no") return { option: { kind: "join", line, join: false }, end: token.end };
  throw new MalformedDirectiveError(line, `invalid value "${token.value}" for -j (expected y[es] or n[o])`);
};

const parseQueueList: OptionParser = (body, pos, line) => {
  const token = requireArgument(body, pos, line, "q");
  const partitions = token.value
    .split(",")
    .map((spec) => {
      const at = spec.indexOf("@");
      return (at >= 0 ? spec.slice(0, at) : spec).trim();
    })
    .filter((name) => name.length > 0);
  return { option: { kind: "partition", line, partitions }, end: token.end };
};

const parseResources: OptionParser = (body, pos, line) => {
  const parsed = parseResourceList(body, pos, line);
  return { option: { kind: "resources", line, entries: parsed.entries }, end: parsed.end };
};

const OPTION_PARSERS: Record<string, OptionParser> = {
  pe: parseParallelEnv,
  m: parseMailMode,
  M: parseMailUser,
  N: parseJobName,
  o: stdioParser("o", "stdout"),
  e: stdioParser("e", "stderr"),
  i: stdioParser("i", "stdin"),
  j: parseJoin,
  q: parseQueueList,
  l: parseResources
};

/**
 * Parses every recognized option on one directive line. Parsing of the line
 * stops quietly at the first thing that is not a known flag.
 */
export function parseDirectiveLine(body: string, line: number, log?: Logger): ParsedOption[] {
  const options: ParsedOption[] = [];
  let pos = skipSpaces(body, 0);

  while (pos < body.length && body[pos] === "-") {
    let nameEnd = pos + 1;
    while (nameEnd < body.length && /[A-Za-z]/.test(body[nameEnd] ?? "")) nameEnd++;
    const flag = body.slice(pos + 1, nameEnd);
    const parser = Object.hasOwn(OPTION_PARSERS, flag) ? OPTION_PARSERS[flag] : undefined;

    if (!parser || (nameEnd < body.length && !/\s/.test(body[nameEnd] ?? ""))) {
      log?.trace({ line, flag }, "ignoring unsupported GridEngine option");
      break;
    }

    const parsed = parser(body, nameEnd, line);
    options.push(parsed.option);
    pos = skipSpaces(body, parsed.end);
  }

  return options;
}

const PE_GUARDED_FIELDS = [
  "numTasks",
  "cpusPerTask",
  "minCpus",
  "maxCpus",
  "minNodes",
  "maxNodes",
  "pnMinCpus",
  "ntasksPerNode"
] as const satisfies ReadonlyArray<keyof JobRecord>;

/**
 * -pe touches the whole task geometry, so it only applies when none of those
 * fields were given on the command line.
 */
export function taskGeometryUnset(job: JobRecord): boolean {
  return PE_GUARDED_FIELDS.every((field) => job[field] === null);
}

function applyParallelEnv(job: JobRecord, option: Extract<ParsedOption, { kind: "parallel-env" }>, log: Logger): boolean {
  if (!taskGeometryUnset(job)) {
    log.trace({ line: option.line }, "task geometry already set; ignoring -pe");
    return false;
  }

  const numTasks = option.env === "threads" ? 1 : option.maxSlots;
  const cpusPerTask = option.env === "threads" ? option.maxSlots : 1;
  const exports: [string, string][] = [
    ["SLURM_NTASKS", String(numTasks)],
    ["SLURM_NPROCS", String(numTasks)],
    ["SLURM_CPUS_PER_TASK", String(cpusPerTask)]
  ];
  // Values the submitter already exported must agree with the derived geometry.
  for (const [key, value] of exports) {
    const existing = envValue(job.environment, key);
    if (existing !== null && existing !== value) {
      throw new MalformedDirectiveError(
        option.line,
        `-pe ${option.env} requires ${key}=${value} but the job environment already has ${key}=${existing}`
      );
    }
  }

  if (option.env === "threads") {
    job.numTasks = 1;
    job.cpusPerTask = option.maxSlots;
    job.minNodes = 1;
    job.maxNodes = 1;
    job.pnMinCpus = option.maxSlots;
  } else {
    job.numTasks = option.maxSlots;
    job.cpusPerTask = 1;
    job.pnMinCpus = 1;
  }
  job.minCpus = option.minSlots;
  job.maxCpus = option.maxSlots;

  for (const [key, value] of exports) appendEnv(job.environment, key, value);
  return true;
}

function applyStdio(job: JobRecord, option: Extract<ParsedOption, { kind: "stdio" }>, state: DirectiveState, log: Logger): boolean {
  for (const entry of option.skipped) {
    log.trace({ line: option.line, entry }, "host-qualified stdio path is not supported; skipping");
  }
  if (option.stream === "stderr") state.stderrExplicit = true;
  if (option.path === null) return false;

  switch (option.stream) {
    case "stdout":
      if (job.stdOut !== null) return false;
      job.stdOut = option.path;
      return true;
    case "stderr":
      if (job.stdErr !== null) return false;
      job.stdErr = option.path;
      return true;
    case "stdin":
      if (job.stdIn !== null) return false;
      job.stdIn = option.path;
      return true;
  }
}

export function applyOption(
  job: JobRecord,
  option: ParsedOption,
  state: DirectiveState,
  ctx: DirectiveContext
): boolean {
  switch (option.kind) {
    case "parallel-env":
      return applyParallelEnv(job, option, ctx.log);
    case "mail-mode":
      if (job.mailType !== null) return false;
      job.mailType = option.mailType;
      return true;
    case "mail-user":
      if (job.mailUser !== null) return false;
      job.mailUser = option.address;
      return true;
    case "job-name":
      if (job.name === null) {
        job.name = option.name;
        return true;
      }
      if (job.comment === null) {
        job.comment = option.name;
        return true;
      }
      return false;
    case "stdio":
      return applyStdio(job, option, state, ctx.log);
    case "join":
      state.join = option.join;
      return true;
    case "partition":
      if (job.partition !== null || option.partitions.length === 0) return false;
      job.partition = joinPartitions(option.partitions);
      return true;
    case "resources": {
      const ignored = applyResourceEntries(job, option.entries, {
        line: option.line,
        minMemPerSlotMib: ctx.minMemPerSlotMib
      });
      if (ignored.length > 0) ctx.log.trace({ line: option.line, ignored }, "ignoring unrecognized resources");
      return true;
    }
  }
}

/** GridEngine keeps stderr separate unless asked to join; Slurm does the opposite. */
export function deriveSeparateStderr(stdOut: string | null): string {
  if (stdOut === null) return "slurm-%j.err";
  return stdOut.endsWith(".out") ? `${stdOut.slice(0, -4)}.err` : `${stdOut}.err`;
}

/**
 * Reads the `#$` directives of `script` and merges them into `job`.
 */
export function applyGridEngineDirectives(job: JobRecord, script: string, ctx: DirectiveContext): DirectiveSummary {
  const state: DirectiveState = { join: null, stderrExplicit: false };
  const lines = scanDirectiveLines(script);
  let applied = 0;

  for (const { line, body } of lines) {
    for (const option of parseDirectiveLine(body, line, ctx.log)) {
      if (applyOption(job, option, state, ctx)) {
        applied++;
        ctx.log.trace({ line, option: option.kind }, "applied GridEngine option");
      } else {
        ctx.log.trace({ line, option: option.kind }, "GridEngine option overridden by submission flags");
      }
    }
  }

  if (state.join === false && !state.stderrExplicit && job.stdErr === null) {
    job.stdErr = deriveSeparateStderr(job.stdOut);
  }

  return { directiveLines: lines.length, applied };
}
