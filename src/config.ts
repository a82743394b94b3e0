import "dotenv/config";
import { DEFAULT_PAGE_SIZE } from "./batch";
import { isLogLevel } from "./logger";
import type { LogLevel } from "./logger";

export interface AppConfig {
  spotifyClientId: string;
  spotifyClientSecret: string;
  spotifyRefreshToken: string;
  savedTracksPageSize: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  return value;
}

function parsePageSize(raw: string | undefined): number {
  const value = raw?.trim();
  if (!value) {
    return DEFAULT_PAGE_SIZE;
  }

  const size = Number(value);
  if (!Number.isInteger(size) || size < 1 || size > DEFAULT_PAGE_SIZE) {
    throw new Error(`Invalid SAVED_TRACKS_PAGE_SIZE: ${value}`);
  }

  return size;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (!value) {
    return "info";
  }

  if (!isLogLevel(value)) {
    throw new Error(`Invalid LOG_LEVEL: ${value}`);
  }

  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    spotifyClientId: requireEnv(env, "SPOTIFY_CLIENT_ID"),
    spotifyClientSecret: requireEnv(env, "SPOTIFY_CLIENT_SECRET"),
    spotifyRefreshToken: requireEnv(env, "SPOTIFY_REFRESH_TOKEN"),
    savedTracksPageSize: parsePageSize(env.SAVED_TRACKS_PAGE_SIZE),
    logLevel: parseLogLevel(env.LOG_LEVEL)
  };
}
