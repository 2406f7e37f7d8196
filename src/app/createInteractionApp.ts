import express from "express";
import { toCommandPayload } from "../commands/definitions";
import { createCommandSyncClient } from "../commands/syncClient";
import type { CommandSyncClient } from "../commands/syncClient";
import type { CommandDefinition, CommandPayload } from "../commands/types";
import { InteractionDispatcher } from "../dispatch/engine";
import { BackgroundSupervisor } from "../dispatch/supervisor";
import { createFollowupClient } from "../followup/client";
import type { FollowupClient } from "../followup/types";
import { applyHandlerConfig } from "../handlerConfig/parseHandlerConfig";
import type { HandlerConfig } from "../handlerConfig/parseHandlerConfig";
import { createInteractionsRouter } from "../http/createInteractionsRouter";
import type { AppConfig } from "../lib/config";
import { createSpineLogger, describeError } from "../lib/logging";
import type { LogSink, Logger } from "../lib/logging";
import { GroupAlreadyLoadedError } from "../registry/errors";
import { HandlerRegistry } from "../registry/registry";
import type { Registration, RegistrationInit } from "../registry/types";
import { ed25519PublicKeyFromHex } from "../webhook";
import type { HandlerGroup } from "./handlerGroup";
import { HandlerRegistrar } from "./registrar";

export interface InteractionAppOptions {
  config: AppConfig;
  /** Per-handler defer overrides read from the handler config file. */
  handlerConfig?: HandlerConfig;
  /** Defaults to the webhook client built from `config.followup`. */
  followups?: FollowupClient;
  /** Defaults to a client built from `config.botToken`, when there is one. */
  commandSync?: CommandSyncClient;
  sink?: LogSink;
}

const APP_NAME = "interactions";

export class InteractionApp extends HandlerRegistrar {
  readonly registry: HandlerRegistry;
  readonly dispatcher: InteractionDispatcher;
  readonly logger: Logger;
  private readonly config: AppConfig;
  private readonly handlerConfig: HandlerConfig;
  private readonly sink?: LogSink;
  private readonly groups = new Map<string, { group: HandlerGroup; registrations: Registration[] }>();
  private readonly commandSync: CommandSyncClient | null;

  constructor(options: InteractionAppOptions) {
    super();
    const { config } = options;
    this.config = config;
    this.sink = options.sink;
    this.handlerConfig = options.handlerConfig ?? new Map();
    this.logger = createSpineLogger({ app: APP_NAME, domain: "", sink: options.sink });
    this.registry = new HandlerRegistry(this.logger.withDomain("registry"));

    const followups =
      options.followups ??
      createFollowupClient({
        baseUrl: config.followup.apiBaseUrl,
        applicationId: config.applicationId,
        maxRetries: config.followup.maxRetries,
        logger: this.logger,
      });

    this.commandSync =
      options.commandSync ??
      (config.botToken
        ? createCommandSyncClient({
            baseUrl: config.followup.apiBaseUrl,
            applicationId: config.applicationId,
            botToken: config.botToken,
            maxRetries: config.followup.maxRetries,
            logger: this.logger,
          })
        : null);

    this.dispatcher = new InteractionDispatcher({
      registry: this.registry,
      followups,
      defaults: config.autoDefer,
      logger: this.logger,
      supervisor: new BackgroundSupervisor(this.logger),
    });
  }

  protected add(init: RegistrationInit): void {
    this.registry.register(applyHandlerConfig(init, this.handlerConfig));
  }

  /**
   * Registers every handler in the group, then runs its `onLoad` hook. If a
   * registration or the hook fails, the handlers already registered are
   * removed again before the error propagates.
   */
  load(group: HandlerGroup): void {
    if (this.groups.has(group.name)) {
      throw new GroupAlreadyLoadedError(group.name);
    }
    const log = this.logger.withDomain("groups");

    const added: Registration[] = [];
    try {
      for (const init of group.registrations) {
        added.push(this.registry.register(applyHandlerConfig(init, this.handlerConfig, group.defer)));
      }
      group.onLoad?.(this);
    } catch (err) {
      for (const registration of added) {
        this.registry.deregister(registration);
      }
      log.log("error", "group_load_failed", { group: group.name, rolled_back: added.length });
      throw err;
    }

    this.groups.set(group.name, { group, registrations: added });
    log.log("info", "group_loaded", { group: group.name, handlers: added.length });
  }

  /**
   * Returns false when no group of that name is loaded. The group is gone
   * even if its `onUnload` hook throws; the error still propagates.
   */
  unload(name: string): boolean {
    const loaded = this.groups.get(name);
    if (!loaded) return false;
    const log = this.logger.withDomain("groups");

    for (const registration of loaded.registrations) {
      this.registry.deregister(registration);
    }
    this.groups.delete(name);
    log.log("info", "group_unloaded", { group: name, handlers: loaded.registrations.length });

    try {
      loaded.group.onUnload?.(this);
    } catch (err) {
      log.log("error", "group_unload_hook_failed", { group: name, ...describeError(err) });
      throw err;
    }
    return true;
  }

  /** Command definitions of every named command handler currently registered. */
  commandDefinitions(): CommandDefinition[] {
    return this.registry.commandDefinitions();
  }

  /**
   * Overwrites the platform's command list with the registered definitions,
   * globally or for one guild.
   */
  async syncCommands(options: { guildId?: string | null } = {}): Promise<CommandPayload[]> {
    if (!this.commandSync) {
      throw new Error("Missing required environment variable BOT_TOKEN (needed to sync commands)");
    }
    const payloads = this.commandDefinitions().map(toCommandPayload);
    const guildId = options.guildId ?? null;

    if (guildId) {
      await this.commandSync.overwriteGuildCommands(guildId, payloads);
    } else {
      await this.commandSync.overwriteGlobalCommands(payloads);
    }
    return payloads;
  }

  get loadedGroups(): string[] {
    return [...this.groups.keys()];
  }

  createExpressApp(): express.Express {
    const app = express();
    app.use(
      createInteractionsRouter({
        publicKey: ed25519PublicKeyFromHex(this.config.publicKey),
        dispatcher: this.dispatcher,
        appName: APP_NAME,
        sink: this.sink,
      }),
    );
    return app;
  }
}

export function createInteractionApp(options: InteractionAppOptions): InteractionApp {
  return new InteractionApp(options);
}
