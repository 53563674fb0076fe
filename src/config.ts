import type { Level } from "pino";

export interface Config {
  server: {
    port: number;
    transport: "stdio" | "http";
    corsOrigins: string[];
  };
  auth: {
    /** When set, `/mcp` requires `Authorization: Bearer <apiToken>` */
    apiToken?: string;
  };
  rateLimit: {
    rpm: number;
  };
  analysis: {
    /** Default z-score threshold for the anomaly tools */
    sensitivity: number;
    /** Default normalised-slope threshold for trend classification */
    classificationThreshold: number;
  };
  logLevel: Level;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

export function loadConfig(
  env: Env = process.env,
  argv: readonly string[] = process.argv,
): Config {
  return {
    server: {
      port: parseIntEnv(env, "PORT", 3300),
      transport: resolveTransport(env, argv),
      corsOrigins: (env.CORS_ORIGINS || "http://localhost:3300")
        .split(",")
        .map((o) => o.trim())
        .filter((o) => o.length > 0),
    },
    auth: {
      apiToken: env.API_TOKEN || undefined,
    },
    rateLimit: {
      rpm: parseIntEnv(env, "RATE_LIMIT_RPM", 60),
    },
    analysis: {
      sensitivity: parseNumberEnv(env, "ANOMALY_SENSITIVITY", 2.0),
      classificationThreshold: parseNumberEnv(env, "TREND_THRESHOLD", 0.1),
    },
    logLevel: resolveLogLevel(env),
  };
}

function resolveTransport(env: Env, argv: readonly string[]): "stdio" | "http" {
  // CLI flag takes precedence
  const args = argv.slice(2);
  const transportIdx = args.indexOf("--transport");
  if (transportIdx !== -1 && args[transportIdx + 1]) {
    const val = args[transportIdx + 1];
    if (val === "stdio" || val === "http") return val;
  }

  // Then env var
  const envTransport = env.TRANSPORT;
  if (envTransport === "stdio" || envTransport === "http") return envTransport;

  // Default
  return "stdio";
}

function resolveLogLevel(env: Env): Level {
  const raw = (env.LOG_LEVEL || "info").toLowerCase();
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) {
    throw new Error(
      `Invalid LOG_LEVEL "${raw}". Use one of: ${LOG_LEVELS.join(", ")}.`,
    );
  }
  return level;
}

function parseIntEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer. Received "${raw}".`);
  }
  return value;
}

function parseNumberEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${key} must be a non-negative number. Received "${raw}".`);
  }
  return value;
}
