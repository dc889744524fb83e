import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { NodeSharing } from "../job/jobRecord.js";

const zNodeSharing = z.enum(["exclusive", "user", "mcs", "shared"]);
const zPositiveInt = z.number().int().min(1);

export const zSitePolicyConfig = z.object({
  version: z.literal(1),
  gridengine: z
    .object({
      enabled: z.boolean().optional(),
      min_mem_per_slot_mib: z.number().int().min(0).optional()
    })
    .optional(),
  memory: z
    .object({
      default_mem_per_cpu_mib: zPositiveInt.optional()
    })
    .optional(),
  accounts: z
    .object({
      base_gid: z.number().int().min(0).optional()
    })
    .optional(),
  sharing: z
    .object({
      disallowed: z.array(zNodeSharing).optional()
    })
    .optional(),
  partitions: z
    .object({
      reserved_check: z.boolean().optional(),
      reserved_name: z.string().min(1).optional(),
      owned_resource_qos: z.boolean().optional(),
      owned_resource_types: z.array(z.string().min(1)).optional(),
      priority_access_qos: z.boolean().optional(),
      priority_access_qos_name: z.string().min(1).optional(),
      workgroup_substitution: z.boolean().optional(),
      workgroup_placeholder: z.string().min(1).optional()
    })
    .optional(),
  gpu: z
    .object({
      gres_adjustments: z.boolean().optional(),
      types: z.array(z.string().min(1)).optional()
    })
    .optional()
});

export type SitePolicyConfig = z.infer<typeof zSitePolicyConfig>;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Site-tunable knobs for the submission filter. Keys left out of the YAML take
 * the defaults below.
 */
export class SitePolicy {
  readonly policyHash: `sha256:${string}`;
  private readonly ownedPartitionPattern: RegExp | null;

  constructor(private readonly config: SitePolicyConfig) {
    this.policyHash = sha256Prefixed(stableJsonStringify(config));
    const types = this.ownedResourceTypes();
    this.ownedPartitionPattern =
      types.length > 0 ? new RegExp(`^(?:${types.map(escapeRegExp).join("|")})-[0-9]+[A-Za-z]+$`) : null;
  }

  static fromObject(raw: unknown, source = "<inline>"): SitePolicy {
    const parsed = zSitePolicyConfig.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`invalid site policy at ${source}: ${z.prettifyError(parsed.error)}`);
    }
    return new SitePolicy(parsed.data);
  }

  static async loadFromFile(filePath: string): Promise<SitePolicy> {
    const raw = await fs.readFile(filePath, "utf8");
    return SitePolicy.fromObject(YAML.parse(raw), filePath);
  }

  snapshot(): Record<string, unknown> {
    return JSON.parse(JSON.stringify(this.config)) as Record<string, unknown>;
  }

  gridEngineEnabled(): boolean {
    return this.config.gridengine?.enabled ?? true;
  }

  minMemPerSlotMib(): number {
    return this.config.gridengine?.min_mem_per_slot_mib ?? 1024;
  }

  defaultMemPerCpuMib(): number {
    return this.config.memory?.default_mem_per_cpu_mib ?? 1024;
  }

  baseGid(): number {
    return this.config.accounts?.base_gid ?? 1001;
  }

  sharingAllowed(mode: NodeSharing): boolean {
    const disallowed = this.config.sharing?.disallowed ?? ["user", "mcs"];
    return !disallowed.includes(mode);
  }

  reservedCheckEnabled(): boolean {
    return this.config.partitions?.reserved_check ?? true;
  }

  reservedPartitionName(): string {
    return this.config.partitions?.reserved_name ?? "reserved";
  }

  ownedResourceQosEnabled(): boolean {
    return this.config.partitions?.owned_resource_qos ?? true;
  }

  ownedResourceTypes(): string[] {
    return this.config.partitions?.owned_resource_types ?? ["compute", "gpu", "bigmem"];
  }

  /** `<type>-<size><unit>`, e.g. `compute-100gb`. */
  isOwnedResourcePartition(partition: string): boolean {
    return this.ownedPartitionPattern?.test(partition) ?? false;
  }

  priorityAccessQosEnabled(): boolean {
    return this.config.partitions?.priority_access_qos ?? true;
  }

  priorityAccessQosName(): string {
    return this.config.partitions?.priority_access_qos_name ?? "priority-access";
  }

  workgroupSubstitutionEnabled(): boolean {
    return this.config.partitions?.workgroup_substitution ?? true;
  }

  workgroupPlaceholder(): string {
    return this.config.partitions?.workgroup_placeholder ?? "_workgroup_";
  }

  gpuGresAdjustmentsEnabled(): boolean {
    return this.config.gpu?.gres_adjustments ?? true;
  }

  gpuTypes(): string[] {
    return this.config.gpu?.types ?? ["p100"];
  }
}
