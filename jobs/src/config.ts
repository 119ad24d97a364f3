import { z } from "zod";

const EnvSchema = z
  .object({
    PARCEL_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(30),
    PARCEL_PAGE_SIZE: z.coerce.number().int().positive().default(100),
    PARCEL_MAX_PAGES: z.coerce.number().int().positive().default(10),
    PARCEL_PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
    PARCEL_CELL_JITTER_MIN_MS: z.coerce.number().int().nonnegative().default(500),
    PARCEL_CELL_JITTER_MAX_MS: z.coerce.number().int().nonnegative().default(1500),
    PARCEL_BASE_URL: z.string().url().optional(),
    PARCEL_SESSION_COOKIE: z.string().optional(),
    PARCEL_USER_AGENT: z.string().optional(),
    PROXY_USERNAME: z.string().optional(),
    PROXY_PASSWORD: z.string().optional(),
    PROXY_HOST: z.string().default("pr.oxylabs.io:7777"),
  })
  .refine((env) => env.PARCEL_CELL_JITTER_MIN_MS <= env.PARCEL_CELL_JITTER_MAX_MS, {
    message: "PARCEL_CELL_JITTER_MIN_MS must not exceed PARCEL_CELL_JITTER_MAX_MS",
    path: ["PARCEL_CELL_JITTER_MIN_MS"],
  });

export type JobsConfig = z.infer<typeof EnvSchema>;

/** Parse search settings from the environment. Throws on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): JobsConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
