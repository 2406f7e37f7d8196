import { createFetchWithRetry, readJsonBody } from "../lib/fetchWithRetry";
import type { FetchFn } from "../lib/fetchWithRetry";
import { createSpineLogger } from "../lib/logging";
import type { Logger } from "../lib/logging";
import { CommandSyncError } from "./errors";
import type { CommandPayload } from "./types";

export interface CommandSyncClient {
  /** Replaces every global command of the application with `commands`. */
  overwriteGlobalCommands(commands: CommandPayload[]): Promise<unknown>;
  /** Replaces the application's commands in one guild; guild commands update at once. */
  overwriteGuildCommands(guildId: string, commands: CommandPayload[]): Promise<unknown>;
}

export interface CommandSyncClientOptions {
  baseUrl: string;
  applicationId: string;
  botToken: string;
  maxRetries: number;
  logger?: Logger;
  fetchImpl?: FetchFn;
  retryBaseDelayMs?: number;
}

/**
 * Bulk-overwrites application commands. Unlike the follow-up endpoints these
 * calls are authorized with the bot token.
 */
export function createCommandSyncClient(options: CommandSyncClientOptions): CommandSyncClient {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const logger = (options.logger ?? createSpineLogger({ app: "interactions", domain: "" })).withDomain("commands");
  const doFetchWithRetry = createFetchWithRetry({
    maxRetries: options.maxRetries,
    logger,
    fetchImpl: options.fetchImpl,
    retryBaseDelayMs: options.retryBaseDelayMs,
  });
  const applicationPath = `/applications/${encodeURIComponent(options.applicationId)}`;

  async function put(path: string, commands: CommandPayload[]): Promise<unknown> {
    const response = await doFetchWithRetry(`${baseUrl}${path}`, {
      method: "PUT",
      headers: { "Content-Type": "application/json", Authorization: `Bot ${options.botToken}` },
      body: JSON.stringify(commands),
    });

    if (!response.ok) {
      const body = await response.text();
      logger.log("error", "command_sync_failed", { path, status: response.status });
      throw new CommandSyncError({ path, status: response.status, body });
    }

    logger.log("info", "commands_synced", { path, commands: commands.length, status: response.status });
    return readJsonBody(response);
  }

  return {
    overwriteGlobalCommands(commands) {
      return put(`${applicationPath}/commands`, commands);
    },
    overwriteGuildCommands(guildId, commands) {
      return put(`${applicationPath}/guilds/${encodeURIComponent(guildId)}/commands`, commands);
    },
  };
}
