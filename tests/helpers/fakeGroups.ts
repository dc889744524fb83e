import type { GroupDirectory } from "../../src/system/groups.js";

export class FakeGroupDirectory implements GroupDirectory {
  readonly lookups: number[] = [];
  private readonly byGid: Map<number, string>;

  constructor(groups: Record<number, string>, private readonly failWith: Error | null = null) {
    this.byGid = new Map(Object.entries(groups).map(([gid, name]) => [Number(gid), name]));
  }

  lookupGroupName(gid: number): string | null {
    this.lookups.push(gid);
    if (this.failWith) throw this.failWith;
    return this.byGid.get(gid) ?? null;
  }

  groupExists(name: string): boolean {
    return [...this.byGid.values()].includes(name);
  }
}
