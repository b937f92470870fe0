import type { Level } from "./logger";

export type Env = {
  LLM_API_KEY: string;
  LLM_BASE_URL: string;
  LLM_MODEL: string;
  LLM_TEMPERATURE: number;
  LLM_MAX_TOKENS: number;
  SPOTIFY_CLIENT_ID?: string;
  SPOTIFY_CLIENT_SECRET?: string;
  SPOTIFY_REDIRECT_URI?: string;
  SPOTIFY_TOKEN_CACHE: string;
  HOST: string;
  PORT: number;
  LOG_LEVEL: Level;
};

const LOG_LEVELS: readonly Level[] = ["debug", "info", "warn", "error"];

function requireEnv(source: NodeJS.ProcessEnv, key: string): string {
  const value = source[key];
  if (!value) {
    throw new Error(`Missing required env: ${key}`);
  }
  return value;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseLogLevel(value: string | undefined): Level {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return {
    LLM_API_KEY: requireEnv(source, "LLM_API_KEY"),
    LLM_BASE_URL: source.LLM_BASE_URL || "https://api.groq.com/openai/v1",
    LLM_MODEL: source.LLM_MODEL || "llama-3.3-70b-versatile",
    LLM_TEMPERATURE: parseNumber(source.LLM_TEMPERATURE, 0.3),
    LLM_MAX_TOKENS: Math.floor(parseNumber(source.LLM_MAX_TOKENS, 1024)),
    SPOTIFY_CLIENT_ID: source.SPOTIFY_CLIENT_ID,
    SPOTIFY_CLIENT_SECRET: source.SPOTIFY_CLIENT_SECRET,
    SPOTIFY_REDIRECT_URI: source.SPOTIFY_REDIRECT_URI,
    SPOTIFY_TOKEN_CACHE: source.SPOTIFY_TOKEN_CACHE || ".spotify_cache",
    HOST: source.HOST || "0.0.0.0",
    PORT: Math.floor(parseNumber(source.PORT, 8000)),
    LOG_LEVEL: parseLogLevel(source.LOG_LEVEL),
  };
}
