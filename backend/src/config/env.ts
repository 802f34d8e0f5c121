import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().default("http://localhost:3000"),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_WEBHOOK_SECRET: z.string().min(1).optional(),
  // Public URL of POST /v1/telegram/webhook; registered with the Bot API at start-up when set
  TELEGRAM_WEBHOOK_URL: z.string().url().optional(),
  TELEGRAM_API_BASE: z.string().url().default("https://api.telegram.org"),
  OWNER_ID: z.coerce.number().int(),

  APP_TIMEZONE: z.string().default("Asia/Kolkata"),
  DIGEST_TIME: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM")
    .default("21:01"),

  LEADERBOARD_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(30),
  STORE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  STORE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(100),
  DISPATCH_DELAY_MS: z.coerce.number().int().min(0).default(200),
  POLL_RETENTION_DAYS: z.coerce.number().int().positive().default(7),
  SCHEDULER_TICK_MS: z.coerce.number().int().positive().default(30_000)
});

export type Env = z.infer<typeof EnvSchema>;

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // dotenv is loaded in server.ts (entrypoint)
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment variables");
  }
  return parsed.data;
}
