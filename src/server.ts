import { createApp } from "./app.js";
import { DiskMediaStore } from "./collaborators/media.js";
import { env, escalationThresholdsFrom } from "./config/env.js";
import { JurisdictionRegistry } from "./config/jurisdictions.js";
import { closeDb, initDb, seedDemoUsers } from "./db.js";
import { logger } from "./logger.js";
import { CivicIssueService } from "./services/civicService.js";

const db = initDb(env.DATABASE_PATH);
const registry = JurisdictionRegistry.fromFile(env.JURISDICTIONS_PATH);
if (env.SEED_DEMO_USERS) seedDemoUsers(db, registry);

const service = new CivicIssueService(
  { db, registry },
  {
    mergeRadiusMeters: env.MERGE_RADIUS_METERS,
    mergeThreshold: env.MERGE_THRESHOLD,
    transitionMaxAttempts: env.TRANSITION_MAX_ATTEMPTS,
    escalation: { intervalMs: env.ESCALATION_INTERVAL_MS, thresholds: escalationThresholdsFrom(env) }
  }
);

const app = createApp({
  service,
  media: new DiskMediaStore(env.UPLOADS_DIR),
  corsOrigin: env.CORS_ORIGIN,
  accessLog: env.NODE_ENV === "production" ? "combined" : env.NODE_ENV === "test" ? null : "dev"
});

const shutdown = new AbortController();
service.start(shutdown.signal);

const server = app.listen(env.PORT, () => {
  logger.info(`API running on http://localhost:${env.PORT}`, { units: registry.units.length });
});

process.on("SIGHUP", () => {
  try {
    registry.reload();
  } catch (error) {
    logger.error("Jurisdiction reload failed, keeping the previous table", {
      error: error instanceof Error ? error.message : String(error)
    });
  }
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    logger.info("Shutting down", { signal });
    shutdown.abort();
    server.close(() => {
      closeDb();
      process.exit(0);
    });
  });
}
