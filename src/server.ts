/**
 * Express API Server — scanner backend
 *
 * Routes live in app.ts.
 * Start: npm run server
 */

import { config } from "./config/index.js";
import { componentLogger } from "./utils/logger.js";
import { errorMessage } from "./utils/errors.js";
import { createContext } from "./engine/context.js";
import { createApp } from "./app.js";

const log = componentLogger("server");

async function startServer(): Promise<void> {
  const app = createApp(createContext(config));

  const PORT = config.port;
  app.listen(PORT, () => {
    log.info(`═══════════════════════════════════════════`);
    log.info(`  IV/RV Scanner API`);
    log.info(`  http://localhost:${PORT}`);
    log.info(`  Provider key: ${config.marketData.apiKey ? "set ✓" : "missing (scan/backfill disabled)"}`);
    log.info(`═══════════════════════════════════════════`);
  });
}

startServer().catch((err) => {
  log.error("Server startup failed", { error: errorMessage(err) });
  process.exit(1);
});
