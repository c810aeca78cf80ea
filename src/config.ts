import { z } from "zod";

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);
const Transport = z.enum(["stdio", "http"]);

const OAuthClientSchema = z.object({
  clientId: z.string().min(1, "GOOGLE_CLIENT_ID is required"),
  clientSecret: z.string().min(1, "GOOGLE_CLIENT_SECRET is required"),
  redirectPort: z.number().int().min(1).max(65535).default(53682),
});

const ConfigSchema = z.object({
  google: OAuthClientSchema.extend({
    refreshToken: z
      .string()
      .min(1, "GOOGLE_REFRESH_TOKEN is required. Generate one with: npm run auth login"),
    retries: z.number().int().min(0).max(10).default(3),
  }),
  server: z.object({
    logLevel: LogLevel.default("info"),
    transport: Transport.default("stdio"),
    /** HTTP mode only. */
    port: z.number().int().min(1).max(65535).default(8000),
    host: z.string().min(1).default("0.0.0.0"),
  }),
  limits: z.object({
    defaultMaxResults: z.number().int().min(1).max(500).default(50),
  }),
});

type OAuthClientConfig = z.infer<typeof OAuthClientSchema>;
type Config = z.infer<typeof ConfigSchema>;

function parseInteger(value: string | undefined): number | undefined {
  return value ? Number.parseInt(value, 10) : undefined;
}

function readOAuthClient(env: NodeJS.ProcessEnv) {
  return {
    clientId: env.GOOGLE_CLIENT_ID ?? "",
    clientSecret: env.GOOGLE_CLIENT_SECRET ?? "",
    redirectPort: parseInteger(env.GOOGLE_REDIRECT_PORT),
  };
}

/**
 * Client id and secret only. Used by `auth login`, which runs before a refresh token exists.
 */
export function loadOAuthClientConfig(env: NodeJS.ProcessEnv = process.env): OAuthClientConfig {
  return OAuthClientSchema.parse(readOAuthClient(env));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse({
    google: {
      ...readOAuthClient(env),
      refreshToken: env.GOOGLE_REFRESH_TOKEN ?? "",
      retries: parseInteger(env.GOOGLE_API_RETRIES),
    },
    server: {
      logLevel: env.LOG_LEVEL ?? "info",
      transport: env.MCP_TRANSPORT || undefined,
      port: parseInteger(env.PORT),
      host: env.HOST || undefined,
    },
    limits: {
      defaultMaxResults: parseInteger(env.DEFAULT_MAX_RESULTS),
    },
  });
}

type LimitsConfig = Config["limits"];
type ServerConfig = Config["server"];

export { type Config, ConfigSchema, type LimitsConfig, type OAuthClientConfig, OAuthClientSchema, type ServerConfig };
