// server.ts
import { messageOf } from "@labframe/notify-core";
import { loadConfig, type AppConfig } from "../app/config";
import { startServer } from "../app/server/http";

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error(`[server] ${messageOf(err)}`);
  process.exit(1);
}

const { app } = await startServer(config);
const base = `http://localhost:${config.port}`;
app.logger.info(`listening on ${base}`);
app.logger.info(`  stream:  ${base}/events/database-changes?project=<name>`);
app.logger.info(`  status:  ${base}/status.json`);
app.logger.info(`  metrics: ${base}/metrics`);
