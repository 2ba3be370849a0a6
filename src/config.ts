import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { parseClassSpec } from "./classKey.js";
import { ClassTarget } from "./types.js";

const positiveInt = (fallback: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((v) => Math.max(1, parseInt(v, 10) || fallback));

const nonNegativeInt = (fallback: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((v) => {
      const n = parseInt(v, 10);
      return Number.isNaN(n) || n < 0 ? fallback : n;
    });

const schema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(10),
  TELEGRAM_ADMIN_CHAT_ID: z.string().optional(),
  CATALOG_TERM: z.string().min(2).default("26W"),
  WATCH_CLASSES: z.string().default(""),
  CRON_SCHEDULE: z.string().default("*/5 * * * *"),
  PLAYWRIGHT_HEADLESS: z
    .string()
    .default("true")
    .transform((v) => v.toLowerCase() === "true"),
  CHROMIUM_EXECUTABLE_PATH: z.string().optional(),
  CHECK_CONCURRENCY: positiveInt(3),
  SCRAPE_TIMEOUT_MS: positiveInt(60000),
  NOTIFY_TIMEOUT_MS: positiveInt(15000),
  NOTIFY_DELAY_MS: nonNegativeInt(250),
  STATE_PATH: z.string().default("./data/state.json"),
  FIRESTORE_COLLECTION: z.string().default("class_states"),
  FIRESTORE_SUBSCRIPTIONS_COLLECTION: z.string().default("user_subscriptions"),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
});

export type AppConfig = z.infer<typeof schema> & { watchClasses: ClassTarget[] };

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    // Show concise errors without secrets
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`Invalid configuration: ${errs}`);
  }

  const watchClasses: ClassTarget[] = [];
  for (const spec of parsed.data.WATCH_CLASSES.split(",")) {
    if (!spec.trim()) continue;
    const target = parseClassSpec(spec, parsed.data.CATALOG_TERM);
    if (!target) {
      throw new Error(`Invalid configuration: WATCH_CLASSES: cannot parse "${spec.trim()}"`);
    }
    watchClasses.push(target);
  }

  return { ...parsed.data, watchClasses };
}

let cached: AppConfig | undefined;

export function loadConfig(): AppConfig {
  if (!cached) {
    loadDotenv();
    cached = parseConfig(process.env);
  }
  return cached;
}
