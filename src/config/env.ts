import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATABASE_PATH: z.string().default("data/civic.db"),
  JURISDICTIONS_PATH: z.string().default("config/jurisdictions.json"),
  UPLOADS_DIR: z.string().default("uploads"),
  CORS_ORIGIN: z.string().default("*"),
  MERGE_RADIUS_METERS: z.coerce.number().positive().default(150),
  MERGE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.75),
  ESCALATION_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  ESCALATION_REPORTED_HOURS: z.coerce.number().positive().default(72),
  ESCALATION_ACKNOWLEDGED_HOURS: z.coerce.number().positive().default(168),
  ESCALATION_IN_PROGRESS_HOURS: z.coerce.number().positive().default(336),
  TRANSITION_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  SEED_DEMO_USERS: booleanFlag
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);

const HOUR_MS = 60 * 60 * 1000;

export function escalationThresholdsFrom(source: Env) {
  return {
    reported: source.ESCALATION_REPORTED_HOURS * HOUR_MS,
    acknowledged: source.ESCALATION_ACKNOWLEDGED_HOURS * HOUR_MS,
    in_progress: source.ESCALATION_IN_PROGRESS_HOURS * HOUR_MS
  };
}
