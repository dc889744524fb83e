import * as z from "zod/v4";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zFilterRunId = z.string().regex(new RegExp(`^frun_${ulid26}$`), "invalid run id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);

const zCount = z.number().int().min(0);
const zNodeSharing = z.enum(["exclusive", "user", "mcs", "shared"]);
const zMemoryRequest = z.object({
  mib: zCount,
  per_cpu: z.boolean()
});

// Wire form of a job record. On input every field but group_id may be left
// out, which means unset.
const jobFields = {
  account: z.string().nullable(),
  partition: z.string().nullable(),
  reservation: z.string().nullable(),
  qos: z.string().nullable(),
  name: z.string().nullable(),
  comment: z.string().nullable(),
  std_out: z.string().nullable(),
  std_err: z.string().nullable(),
  std_in: z.string().nullable(),
  mail_type: zCount.nullable(),
  mail_user: z.string().nullable(),
  num_tasks: zCount.nullable(),
  cpus_per_task: zCount.nullable(),
  min_cpus: zCount.nullable(),
  max_cpus: zCount.nullable(),
  min_nodes: zCount.nullable(),
  max_nodes: zCount.nullable(),
  pn_min_cpus: zCount.nullable(),
  ntasks_per_node: zCount.nullable(),
  pn_min_memory: zMemoryRequest.nullable(),
  time_limit: zCount.nullable(),
  time_min: zCount.nullable(),
  shared: zNodeSharing.nullable(),
  gres_spec: z.string().nullable(),
  gres_enforce_bind: z.boolean(),
  sockets_per_node: zCount.nullable(),
  group_id: zCount,
  script: z.string().nullable(),
  environment: z.array(z.string())
};

export const zWireJob = z.object(jobFields);
export const zWireJobInput = zWireJob.partial().required({ group_id: true });

export type WireJob = z.infer<typeof zWireJob>;
export type WireJobInput = z.infer<typeof zWireJobInput>;

export const zRejection = z.object({
  kind: z.enum(["MalformedDirective", "PolicyViolation", "LookupFailure", "InvalidRequest", "UnsupportedSyntax"]),
  message: z.string(),
  line: z.number().int().nullable()
});

export const zProvenance = z.object({
  provenance_run_id: zFilterRunId
});

export const zJobSubmitInput = z.object({
  job: zWireJobInput,
  submit_uid: zCount
});

export const zJobSubmitOutput = zProvenance.extend({
  accepted: z.boolean(),
  job: zWireJob,
  rejection: zRejection.nullable(),
  policy_hash: zSha256
});

const zAccountHolder = z.object({
  account: z.string().nullable().optional()
});

export const zJobModifyInput = z.object({
  incoming: zAccountHolder,
  existing: zAccountHolder,
  submit_uid: zCount
});

export const zJobModifyOutput = zProvenance.extend({
  accepted: z.boolean(),
  rejection: zRejection.nullable()
});

export const zTaskEnvInput = z.object({
  slurm_env: z.record(z.string(), z.string()),
  tmpdir_base: z.string().min(1).optional(),
  job_id: zCount.optional(),
  // Omitted or null for the batch step.
  step_id: zCount.nullable().optional()
});

export const zTaskEnvOutput = zProvenance.extend({
  env: z.record(z.string(), z.string()),
  tmpdir: z.string().nullable(),
  warnings: z.array(z.string())
});
