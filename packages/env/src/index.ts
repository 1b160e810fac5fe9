import { config } from "dotenv";
import { z } from "zod";

import { isValidTimestamp } from "@jetstream-sync/cursor";

// Load .env file in development.
// In a monorepo, this will be called from the root, where .env should be.
if (process.env.NODE_ENV === "development") {
  config();
}

export const PUBLIC_INSTANCES = [
  "jetstream1.us-east.bsky.network",
  "jetstream2.us-east.bsky.network",
  "jetstream1.us-west.bsky.network",
  "jetstream2.us-west.bsky.network",
] as const;

export const VALID_COLLECTIONS = [
  "app.bsky.feed.post",
  "app.bsky.feed.like",
  "app.bsky.feed.repost",
  "app.bsky.graph.follow",
  "app.bsky.graph.block",
] as const;

const connectionString = (name: string) =>
  z
    .string()
    .min(1, { message: `${name} cannot be empty.` })
    .refine((val) => val.includes("://"), {
      message: `${name} must be a valid connection string / URI, including a scheme (e.g., "protocol://...").`,
    });

const commaList = (name: string, check: (value: string) => boolean, hint: string) =>
  z
    .string()
    .transform((val) => val.split(",").map((item) => item.trim()).filter((item) => item.length > 0))
    .refine((items) => items.every(check), { message: `${name} ${hint}` });

const timestamp = (name: string) =>
  z.string().refine(isValidTimestamp, {
    message: `${name} must use YYYY-MM-DD or YYYY-MM-DD-HH:MM:SS format.`,
  });

const positiveInt = z.coerce.number().int().positive();

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((val) => val === "true" || val === "1");

const isCollection = (value: string): boolean =>
  VALID_COLLECTIONS.some((collection) => collection === value);

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // --- Queue ---
    REDIS_URL: connectionString("REDIS_URL").optional(),
    SYNC_QUEUE_NAME: z.string().min(1, "SYNC_QUEUE_NAME cannot be empty.").default("jetstream_sync"),
    SYNC_BATCH_SIZE: positiveInt.default(100),

    // --- Source ---
    JETSTREAM_INSTANCE: z.enum(PUBLIC_INSTANCES).default(PUBLIC_INSTANCES[0]),
    JETSTREAM_COLLECTIONS: commaList(
      "JETSTREAM_COLLECTIONS",
      isCollection,
      `must only contain: ${VALID_COLLECTIONS.join(", ")}.`,
    ).default(VALID_COLLECTIONS[0]),
    JETSTREAM_IDENTITIES: commaList(
      "JETSTREAM_IDENTITIES",
      (value) => value.startsWith("did:"),
      "must be a comma-separated list of did: identifiers.",
    ).optional(),
    JETSTREAM_START_CURSOR: z.string().regex(/^\d+$/, "JETSTREAM_START_CURSOR must contain only digits.").optional(),
    JETSTREAM_START_TIMESTAMP: timestamp("JETSTREAM_START_TIMESTAMP").optional(),
    JETSTREAM_END_TIMESTAMP: timestamp("JETSTREAM_END_TIMESTAMP").optional(),

    // --- Session budgets ---
    SYNC_TARGET_COUNT: positiveInt.default(1000),
    SYNC_MAX_TIME_SECONDS: positiveInt.default(300),

    // --- Backfill ---
    BACKFILL_CHUNK_SIZE: positiveInt.default(100),
    BACKFILL_IDENTITIES_FILE: z.string().min(1).optional(),
    BACKFILL_IDENTITY_COLUMN: z.string().min(1).default("did"),
    BACKFILL_OUTPUT_DIR: z.string().min(1).default("."),
    BACKFILL_DRY_RUN: flag.default("false"),
  })
  .refine((env) => !(env.JETSTREAM_START_CURSOR && env.JETSTREAM_START_TIMESTAMP), {
    message: "JETSTREAM_START_CURSOR and JETSTREAM_START_TIMESTAMP cannot both be set.",
    path: ["JETSTREAM_START_CURSOR"],
  });

export type Config = z.infer<typeof EnvSchema>;

/**
 * Parses and returns the environment variables.
 * Throws a detailed error if the environment variables are invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    console.error(
      "Invalid environment variables:",
      parsed.error.flatten().fieldErrors
    );
    // Embed the Zod error message into the thrown error for better test reports.
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}
