import { spawnSync, type SpawnSyncReturns } from "child_process";

export interface GroupDirectory {
  lookupGroupName(gid: number): string | null;
  groupExists(name: string): boolean;
}

const INITIAL_BUFFER_BYTES = 1024;
const BUFFER_GROWTH_BYTES = 1024;
const MAX_BUFFER_BYTES = 64 * 1024;

interface GetentResult {
  status: "found" | "missing";
  stdout: string;
}

export type GetentRunner = (args: string[], maxBuffer: number) => SpawnSyncReturns<Buffer>;

const defaultRunner: GetentRunner = (args, maxBuffer) =>
  spawnSync("getent", args, { stdio: ["ignore", "pipe", "pipe"], maxBuffer });

function isBufferOverflow(error: Error): boolean {
  return "code" in error && error.code === "ENOBUFS";
}

/**
 * Group database access through `getent group`, so NSS sources (files, LDAP,
 * sssd) are honoured. A group entry with a long member list can outgrow the
 * output buffer; the query is then repeated with a larger buffer, up to 64 KiB.
 */
export class GetentGroupDirectory implements GroupDirectory {
  constructor(private readonly run: GetentRunner = defaultRunner) {}

  private query(key: string): GetentResult {
    let maxBuffer = INITIAL_BUFFER_BYTES;
    for (;;) {
      const res = this.run(["group", key], maxBuffer);
      if (res.error) {
        if (isBufferOverflow(res.error) && maxBuffer < MAX_BUFFER_BYTES) {
          maxBuffer += BUFFER_GROWTH_BYTES;
          continue;
        }
        throw res.error;
      }
      // getent exits 2 when the key is not in the database.
      if (res.status === 2) return { status: "missing", stdout: "" };
      if (res.status !== 0) {
        const stderr = res.stderr ? res.stderr.toString("utf8").trim() : "";
        throw new Error(`getent group ${key} failed (exit ${res.status})${stderr ? `: ${stderr}` : ""}`);
      }
      return { status: "found", stdout: res.stdout ? res.stdout.toString("utf8") : "" };
    }
  }

  lookupGroupName(gid: number): string | null {
    const res = this.query(String(gid));
    if (res.status === "missing") return null;
    const name = res.stdout.split(/\r?\n/)[0]?.split(":")[0]?.trim() ?? "";
    return name.length > 0 ? name : null;
  }

  groupExists(name: string): boolean {
    if (!/^[A-Za-z0-9_.][A-Za-z0-9_.-]*$/.test(name)) return false;
    return this.query(name).status === "found";
  }
}

/**
 * Remembers the most recent gid → name resolution for the life of the process.
 * A lookup for any other gid replaces the entry; misses are not cached.
 */
export class LastGroupLookupCache implements GroupDirectory {
  private last: { gid: number; name: string } | null = null;

  constructor(private readonly inner: GroupDirectory) {}

  lookupGroupName(gid: number): string | null {
    if (this.last?.gid === gid) return this.last.name;
    const name = this.inner.lookupGroupName(gid);
    this.last = name === null ? null : { gid, name };
    return name;
  }

  groupExists(name: string): boolean {
    return this.inner.groupExists(name);
  }

  invalidate(): void {
    this.last = null;
  }
}
