import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createAuditDb, createMemoryPool, createPgPool } from "./db/connection.js";
import { applySchema } from "./db/bootstrap.js";
import { getLog } from "./core/log.js";
import { JobSubmitFilter } from "./filter/jobSubmitFilter.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { SitePolicy } from "./policy/sitePolicy.js";
import { PostgresStore } from "./store/postgresStore.js";
import { GetentGroupDirectory, LastGroupLookupCache } from "./system/groups.js";

const log = getLog(import.meta);

async function main(): Promise<void> {
  const policyPath = process.env.SITE_POLICY_PATH ?? "policies/default.policy.yaml";
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const policy = await SitePolicy.loadFromFile(policyPath);
  log.info({ policyPath, policyHash: policy.policyHash }, "loaded site policy");

  const databaseUrl = process.env.DATABASE_URL;
  const pool = databaseUrl ? createPgPool(databaseUrl) : createMemoryPool();
  if (!databaseUrl || autoSchema) {
    await applySchema(pool);
  }

  const store = new PostgresStore(createAuditDb(pool));
  const groups = new LastGroupLookupCache(new GetentGroupDirectory());
  const filter = new JobSubmitFilter({ policy, groups });

  const server = createGatewayServer({ filter, store });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ mode: databaseUrl ? "postgres" : "pg-mem" }, "sgecompat gateway ready");
}

main().catch((err) => {
  log.fatal({ err }, "gateway failed to start");
  process.exitCode = 1;
});
