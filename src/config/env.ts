import { z } from "zod/v4";

const portSchema = z
  .string()
  .default("2668")
  .transform((val) => Number(val))
  .pipe(z.number().int().min(1).max(65535));

const intFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().int().min(0));

const positiveIntFromString = (defaultVal: string) =>
  z
    .string()
    .default(defaultVal)
    .transform((val) => Number(val))
    .pipe(z.number().int().positive());

export const envSchema = z.object({
  // Required
  VALKEY_URL: z.url(),

  // Server
  HOST: z.string().default("127.0.0.1"),
  PORT: portSchema,
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // CORS ("*" allows any embedding page)
  CORS_ORIGINS: z.string().default("*"),

  // Storage
  KEY_NAMESPACE: z.string().min(1).default("comments"),
  COMMENTS_PAGE_SIZE: positiveIntFromString("10"),

  // Identifier allocation (0 attempts = retry until a free second is found)
  ALLOCATION_MAX_ATTEMPTS: intFromString("0"),
  ALLOCATION_RETRY_DELAY_MS: positiveIntFromString("1000"),

  // Spam classification (Akismet). Unset key leaves every comment pending.
  AKISMET_KEY: z.string().min(1).optional(),
  SITE_URL: z.url().default("http://localhost:2668/"),
  CLASSIFIER_TIMEOUT_MS: positiveIntFromString("10000"),

  // Monitoring (GlitchTip - Sentry SDK compatible)
  GLITCHTIP_DSN: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(env: Record<string, unknown>): Env {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const formatted = z.prettifyError(result.error);
    throw new Error(`Invalid environment configuration:\n${formatted}`);
  }
  return result.data;
}

export interface ListenAddress {
  host: string;
  port: number;
}

/**
 * Resolve the listen address from the command line. At most one argument is
 * accepted, in `host:port` form; without one the configured HOST/PORT apply.
 */
export function resolveListenAddress(args: readonly string[], env: Env): ListenAddress {
  if (args.length > 1) {
    throw new Error("too many arguments, expecting one or zero");
  }

  const arg = args[0];
  if (arg === undefined) {
    return { host: env.HOST, port: env.PORT };
  }

  const sep = arg.lastIndexOf(":");
  if (sep === -1) {
    throw new Error(`Invalid listen address "${arg}", expected host:port`);
  }

  const host = arg.slice(0, sep).replace(/^\[(.*)\]$/, "$1");
  const port = portSchema.safeParse(arg.slice(sep + 1));
  if (!port.success) {
    throw new Error(`Invalid port in listen address "${arg}"`);
  }

  return { host: host === "" ? "0.0.0.0" : host, port: port.data };
}
