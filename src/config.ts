import "dotenv/config";

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) throw new Error(`Missing required env var: ${name}`);
  return value;
}

function getNumberEnv(env: NodeJS.ProcessEnv, name: string, fallback: number) {
  const raw = env[name];
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return n;
}

export type AppConfig = {
  mongoUri: string;
  jwtSecret: string;
  port: number;
  defaultTimezone: string;
  seedChallenges: boolean;
  env: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    mongoUri: requireEnv(env, "MONGODB_URI"),
    jwtSecret: requireEnv(env, "JWT_SECRET"),
    port: getNumberEnv(env, "PORT", 3000),
    defaultTimezone: env.DEFAULT_TIMEZONE || "UTC",
    seedChallenges: env.SEED_CHALLENGES !== "false",
    env: env.NODE_ENV ?? "development",
  };
}
