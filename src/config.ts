import "dotenv/config";
import { readFileSync } from "node:fs";
import path from "node:path";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

export interface SpotifyCredentials {
  spotifyClientId: string;
  spotifyClientSecret: string;
}

export interface AppConfig extends SpotifyCredentials {
  spotifyRefreshToken: string;
  runTimeoutMs: number;
  blockedArtists: string[];
  blockedArtistsFile: string | null;
}

export interface AuthConfig extends SpotifyCredentials {
  redirectUri: string;
  port: number;
  timeoutMs: number;
}

function requireEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`);
  }

  return value;
}

function readMinutes(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback * 60_000;
  }

  const minutes = Number(raw);
  if (!Number.isFinite(minutes) || minutes <= 0) {
    throw new ConfigError(`${name} must be a positive number of minutes`);
  }

  return minutes * 60_000;
}

// One artist per line; blank lines and `#` comments are ignored.
export function parseArtistList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export function readArtistFile(filePath: string): string[] {
  const resolved = path.resolve(process.cwd(), filePath);

  try {
    return parseArtistList(readFileSync(resolved, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read artist list (${resolved}): ${message}`);
  }
}

export function loadConfig(env: Env = process.env): AppConfig {
  const fromList = (env.BLOCKED_ARTISTS ?? "")
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  return {
    spotifyClientId: requireEnv(env, "SPOTIFY_CLIENT_ID"),
    spotifyClientSecret: requireEnv(env, "SPOTIFY_CLIENT_SECRET"),
    spotifyRefreshToken: requireEnv(env, "SPOTIFY_REFRESH_TOKEN"),
    runTimeoutMs: readMinutes(env, "RUN_TIMEOUT_MINUTES", 30),
    blockedArtists: fromList,
    blockedArtistsFile: env.BLOCKED_ARTISTS_FILE?.trim() || null
  };
}

// The artist file is only read by commands that filter by artist.
export function loadBlockedArtists(config: Pick<AppConfig, "blockedArtists" | "blockedArtistsFile">): string[] {
  const fromFile = config.blockedArtistsFile ? readArtistFile(config.blockedArtistsFile) : [];
  return [...config.blockedArtists, ...fromFile];
}

export function loadAuthConfig(env: Env = process.env): AuthConfig {
  const port = Number(env.SPOTIFY_AUTH_PORT?.trim() || "8888");
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError("SPOTIFY_AUTH_PORT must be a valid TCP port number");
  }

  return {
    spotifyClientId: requireEnv(env, "SPOTIFY_CLIENT_ID"),
    spotifyClientSecret: requireEnv(env, "SPOTIFY_CLIENT_SECRET"),
    redirectUri: env.SPOTIFY_REDIRECT_URI?.trim() || `http://127.0.0.1:${port}/callback`,
    port,
    timeoutMs: readMinutes(env, "AUTH_TIMEOUT_MINUTES", 3)
  };
}
