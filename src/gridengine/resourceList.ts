import { MalformedDirectiveError } from "../core/errors.js";
import type { JobRecord } from "../job/jobRecord.js";
import { isSpace, skipSpaces } from "./directiveScanner.js";
import { scanBoolean, scanMemory, scanTime } from "./tokens.js";

export type QuoteChar = '"' | "'";

export interface ResourceEntry {
  name: string;
  /** null for a bare `name` entry */
  value: string | null;
  quote: QuoteChar | null;
}

export interface ResourceContext {
  line: number;
  minMemPerSlotMib: number;
}

function isQuote(ch: string | undefined): ch is QuoteChar {
  return ch === '"' || ch === "'";
}

/**
 * Parses the argument of `-l` starting at `pos`. The list ends at the first
 * whitespace outside a quoted value.
 */
export function parseResourceList(
  text: string,
  pos: number,
  line: number
): { entries: ResourceEntry[]; end: number } {
  const entries: ResourceEntry[] = [];
  let i = skipSpaces(text, pos);

  while (i < text.length && !isSpace(text[i])) {
    const nameStart = i;
    while (i < text.length && text[i] !== "=" && text[i] !== "," && !isSpace(text[i])) i++;
    const name = text.slice(nameStart, i);

    let value: string | null = null;
    let quote: QuoteChar | null = null;

    if (text[i] === "=") {
      i++;
      const opening = text[i];
      if (isQuote(opening)) {
        quote = opening;
        i++;
        let buf = "";
        let closed = false;
        while (i < text.length) {
          const ch = text[i];
          if (ch === "\\" && text[i + 1] === quote) {
            buf += quote;
            i += 2;
          } else if (ch === quote) {
            closed = true;
            i++;
            break;
          } else {
            buf += ch;
            i++;
          }
        }
        if (!closed) {
          throw new MalformedDirectiveError(line, `unterminated ${quote}-quoted value for resource "${name}"`);
        }
        value = buf;
      } else {
        const valueStart = i;
        while (i < text.length && text[i] !== "," && !isSpace(text[i])) i++;
        value = text.slice(valueStart, i);
      }
    }

    if (name.length > 0) entries.push({ name, value, quote });

    if (text[i] === ",") {
      i++;
      continue;
    }
    if (i < text.length && !isSpace(text[i])) {
      throw new MalformedDirectiveError(line, `unexpected "${text[i]}" after resource "${name}"`);
    }
  }

  if (entries.length === 0) {
    throw new MalformedDirectiveError(line, "option -l requires a resource list");
  }
  return { entries, end: i };
}

type ResourceHandler = (job: JobRecord, entry: ResourceEntry, ctx: ResourceContext) => void;

function requireValue(entry: ResourceEntry, ctx: ResourceContext): string {
  if (entry.value === null || entry.value.length === 0) {
    throw new MalformedDirectiveError(ctx.line, `resource "${entry.name}" requires a value`);
  }
  return entry.value;
}

const applyMemory: ResourceHandler = (job, entry, ctx) => {
  const value = requireValue(entry, ctx);
  const scanned = scanMemory(value, ctx.minMemPerSlotMib);
  if (!scanned) throw new MalformedDirectiveError(ctx.line, `invalid memory size "${value}" for ${entry.name}`);
  if (job.pnMinMemory === null) {
    job.pnMinMemory = { mib: scanned.value, perCpu: true };
  }
};

const applyRuntime: ResourceHandler = (job, entry, ctx) => {
  const value = requireValue(entry, ctx);
  const scanned = scanTime(value);
  if (!scanned) throw new MalformedDirectiveError(ctx.line, `invalid time "${value}" for ${entry.name}`);
  if (job.timeLimit === null) job.timeLimit = scanned.value;
};

const applyExclusive: ResourceHandler = (job, entry, ctx) => {
  // A bare boolean resource is a request for `true`.
  const value = entry.value ?? "TRUE";
  const scanned = scanBoolean(value);
  if (!scanned) throw new MalformedDirectiveError(ctx.line, `invalid boolean "${value}" for ${entry.name}`);
  if (job.shared === null) job.shared = scanned.value ? "exclusive" : "shared";
};

const RESOURCE_HANDLERS: ReadonlyArray<{ aliases: readonly string[]; apply: ResourceHandler }> = [
  { aliases: ["m_mem_free", "mfree", "mem_free", "mf"], apply: applyMemory },
  { aliases: ["h_rt"], apply: applyRuntime },
  { aliases: ["exclusive", "excl"], apply: applyExclusive }
];

/**
 * Applies recognized entries to the job. Returns the names that were not
 * recognized so the caller can log them.
 */
export function applyResourceEntries(job: JobRecord, entries: ResourceEntry[], ctx: ResourceContext): string[] {
  const ignored: string[] = [];
  for (const entry of entries) {
    const key = entry.name.toLowerCase();
    const handler = RESOURCE_HANDLERS.find((h) => h.aliases.includes(key));
    if (handler) {
      handler.apply(job, entry, ctx);
    } else {
      ignored.push(entry.name);
    }
  }
  return ignored;
}
