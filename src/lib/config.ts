import dotenv from "dotenv";
import { MAX_DEFER_TIMEOUT_MS, isValidDeferTimeout } from "../dispatch/deferPolicy";

dotenv.config();

export type Env = Record<string, string | undefined>;

export interface AutoDeferConfig {
  enabled: boolean;
  timeoutMs: number;
  ephemeral: boolean;
}

export interface FollowupConfig {
  apiBaseUrl: string;
  maxRetries: number;
}

export interface CommandSyncConfig {
  /** Overwrite the registered commands on startup. */
  onStartup: boolean;
  /** Sync into one guild instead of globally. */
  guildId: string | null;
}

export interface AppConfig {
  port: number;
  publicKey: string;
  applicationId: string;
  handlerConfigFile: string | null;
  autoDefer: AutoDeferConfig;
  followup: FollowupConfig;
  /** Needed only for command sync; interaction webhooks authorize with their own token. */
  botToken: string | null;
  commandSync: CommandSyncConfig;
}

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable ${name}`);
  }
  return value;
}

function parsePositiveNumber(env: Env, name: string, fallback: string, allowZero = false): number {
  const raw = env[name] ?? fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

function parseDeferTimeout(env: Env): number {
  const timeoutMs = parsePositiveNumber(env, "AUTO_DEFER_TIMEOUT_MS", "2000", true);
  if (!isValidDeferTimeout(timeoutMs)) {
    throw new Error(`Invalid AUTO_DEFER_TIMEOUT_MS value: must not exceed ${MAX_DEFER_TIMEOUT_MS}`);
  }
  return timeoutMs;
}

function parseFlag(env: Env, name: string): boolean {
  const raw = env[name];
  return raw === "1" || raw === "true";
}

export function loadConfig(env: Env = process.env): AppConfig {
  const port = parsePositiveNumber(env, "PORT", "3000");

  const publicKey = requireEnv(env, "PUBLIC_KEY");
  if (!/^[0-9a-fA-F]{64}$/.test(publicKey)) {
    throw new Error("Invalid PUBLIC_KEY value: expected 32 bytes of hex");
  }

  const botToken = env.BOT_TOKEN || null;
  const syncOnStartup = parseFlag(env, "SYNC_COMMANDS");
  if (syncOnStartup && !botToken) {
    throw new Error("Missing required environment variable BOT_TOKEN (needed by SYNC_COMMANDS)");
  }

  return {
    port,
    publicKey,
    applicationId: requireEnv(env, "APPLICATION_ID"),
    handlerConfigFile: env.HANDLER_CONFIG_FILE || null,
    autoDefer: {
      enabled: parseFlag(env, "AUTO_DEFER"),
      timeoutMs: parseDeferTimeout(env),
      ephemeral: parseFlag(env, "AUTO_DEFER_EPHEMERAL"),
    },
    followup: {
      apiBaseUrl: (env.API_BASE_URL ?? "https://discord.com/api/v10").replace(/\/+$/, ""),
      maxRetries: parsePositiveNumber(env, "FOLLOWUP_MAX_RETRIES", "3"),
    },
    botToken,
    commandSync: {
      onStartup: syncOnStartup,
      guildId: env.SYNC_GUILD_ID || null,
    },
  };
}
