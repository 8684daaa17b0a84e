import { ApiServer } from "../api/server.js";
import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { LumenConfig } from "../config/types.js";
import { HueBridgeClient } from "../devices/hue-client.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { CronScheduler } from "../scheduler/cron-scheduler.js";
import { SqliteAutomationStore } from "../storage/automation-store.js";
import { LumenDB } from "../storage/db.js";
import { SqliteEventStore } from "../storage/event-store.js";
import { LumenService } from "./service.js";

export interface LumenContext {
  readonly config: LumenConfig;
  readonly logger: Logger;
  readonly db: LumenDB;
  readonly service: LumenService;
  readonly api: ApiServer | null;
  shutdown(): Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 10_000;

export async function startLumen(configPath?: string): Promise<LumenContext> {
  // 1. Config and logger
  const config = loadConfig(configPath);
  const logger = createLogger(config.logging);
  logger.info("Starting Lumen...");

  const { host, username } = config.bridge;
  if (!host || !username) {
    throw new Error("bridge.host and bridge.username must be set in the config file");
  }

  // 2. Storage
  const stateDir = ensureDir(getStateDir());
  const db = new LumenDB(stateDir);
  const timezone = config.location.timezone;
  const events = new SqliteEventStore(db, { timezone, logger: logger.child({ component: "store" }) });
  const automations = new SqliteAutomationStore(db, logger.child({ component: "store" }));

  // 3. Collaborators
  const gateway = new HueBridgeClient({ host, username, timeoutMs: config.bridge.timeoutMs }, logger);
  const jobs = new CronScheduler(logger.child({ component: "jobs" }), { timezone });

  // 4. Service and API
  const service = new LumenService({ config, events, automations, gateway, jobs, logger });
  await service.start();

  let api: ApiServer | null = null;
  if (config.server.enabled) {
    api = new ApiServer({ service, events, automations, gateway, logger });
    await api.start(config.server.port, config.server.hostname);
  }

  // 5. Graceful shutdown (use 'once' to avoid handler accumulation)
  let shutdownInProgress = false;
  const shutdown = async (): Promise<void> => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    try {
      await api?.stop();
      await service.stop();
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
    }
    jobs.stop();
    db.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = (): void => {
    shutdown()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info({ stateDir, api: config.server.enabled ? config.server.port : null }, "Lumen is running");
  return { config, logger, db, service, api, shutdown };
}
