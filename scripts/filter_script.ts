import { promises as fs } from "fs";
import path from "path";
import { createJobRecord } from "../src/job/jobRecord.js";
import { JobSubmitFilter } from "../src/filter/jobSubmitFilter.js";
import { jobToWire } from "../src/mcp/jobWire.js";
import { SitePolicy } from "../src/policy/sitePolicy.js";
import { GetentGroupDirectory, LastGroupLookupCache } from "../src/system/groups.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/filter_script.ts --script <file> --gid <n> [--uid <n>] [--partition <list>] [--account <name>] [--policy <yaml>]",
    "",
    "notes:",
    "  - Runs the submit filter against the local group database and prints the resulting job as JSON",
    "  - A rejected job prints the rejection and exits 1",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

function parseId(value: string | boolean | undefined, flag: string, fallback: number | null): number {
  if (value === undefined && fallback !== null) return fallback;
  if (typeof value !== "string" || !/^[0-9]+$/.test(value)) {
    throw new Error(`--${flag} must be a non-negative integer\n\n${usage()}`);
  }
  return Number(value);
}

function optionalString(value: string | boolean | undefined): string | null {
  return typeof value === "string" ? value : null;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const scriptPath = args.script;
  if (typeof scriptPath !== "string") throw new Error(`--script is required\n\n${usage()}`);

  const gid = parseId(args.gid, "gid", null);
  const uid = parseId(args.uid, "uid", process.getuid?.() ?? 0);
  const policyPath = typeof args.policy === "string" ? args.policy : "policies/default.policy.yaml";

  const policy = await SitePolicy.loadFromFile(path.resolve(policyPath));
  const filter = new JobSubmitFilter({ policy, groups: new LastGroupLookupCache(new GetentGroupDirectory()) });

  const job = createJobRecord({
    groupId: gid,
    script: await fs.readFile(path.resolve(scriptPath), "utf8"),
    partition: optionalString(args.partition),
    account: optionalString(args.account)
  });

  const outcome = filter.submit(job, uid);
  if (!outcome.ok) {
    const { kind, message, line } = outcome.error;
    process.stdout.write(JSON.stringify({ accepted: false, rejection: { kind, message, line } }, null, 2) + "\n");
    process.exitCode = 1;
    return;
  }

  const { script: _script, ...rest } = jobToWire(job);
  process.stdout.write(JSON.stringify({ accepted: true, job: rest }, null, 2) + "\n");
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
