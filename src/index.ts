import { join } from "node:path";
import Fastify from "fastify";
import cors from "@fastify/cors";

import { EnvConfig } from "./config/config_source";
import { createDefaultLogger } from "./logging/logger";
import { MessageBase } from "./msgbase/message_base";
import { healthRoutes } from "./routes/healthz";
import { messageRoutes } from "./routes/messages";
import { tagRoutes } from "./routes/tags";
import { SqliteKeyValueStore } from "./store/sqlite_key_value_store";

const app = Fastify({ logger: true });

async function main() {
  const config = new EnvConfig();
  const log = createDefaultLogger();
  const dbPath =
    process.env.MSGBASE_DB_PATH ?? join(config.get("system", "datapath") ?? "./data", "msgbase.db");

  const store = new SqliteKeyValueStore(dbPath, log);
  const base = new MessageBase({ store, config, log });
  app.addHook("onClose", async () => {
    store.close();
  });

  // CORS: terminal front ends run on other origins.
  app.register(cors, {
    origin: true,
  });

  // Routes
  app.register(healthRoutes);
  app.register(messageRoutes, { prefix: "/v1", base });
  app.register(tagRoutes, { prefix: "/v1", base });

  const port = Number(process.env.PORT ?? 3333);
  await app.listen({ port, host: "0.0.0.0" });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
