export interface AppConfig {
  dataDir: string;
  port: number;
  jwtSecret: string;
  tokenTtlSeconds: number;
  corsOrigin: string | true;
}

const DEFAULT_TOKEN_TTL_MINUTES = 30;

function readPositiveNumber(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) {
    throw new Error("JWT_SECRET is required");
  }

  return {
    dataDir: env.DATA_DIR || "data",
    port: readPositiveNumber(env.PORT, "PORT", 4000),
    jwtSecret,
    tokenTtlSeconds:
      readPositiveNumber(env.TOKEN_TTL_MINUTES, "TOKEN_TTL_MINUTES", DEFAULT_TOKEN_TTL_MINUTES) * 60,
    corsOrigin: env.CORS_ORIGIN || true,
  };
}
