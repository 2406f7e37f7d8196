import { createInteractionApp } from "./app/createInteractionApp";
import { loadHandlerConfig } from "./handlerConfig/loadHandlerConfig";
import { sampleHandlers } from "./handlers/sampleHandlers";
import { loadConfig } from "./lib/config";
import { createSpineLogger, describeError } from "./lib/logging";

const logger = createSpineLogger({ app: "interactions", domain: "server" });

async function main(): Promise<void> {
  const config = loadConfig();
  const handlerConfig = await loadHandlerConfig(config.handlerConfigFile, logger);

  const app = createInteractionApp({ config, handlerConfig });
  app.load(sampleHandlers);

  if (config.commandSync.onStartup) {
    const synced = await app.syncCommands({ guildId: config.commandSync.guildId });
    logger.log("info", "commands_synced", { commands: synced.length, guild_id: config.commandSync.guildId ?? undefined });
  }

  app.createExpressApp().listen(config.port, () => {
    logger.log("info", "listening", {
      url: `http://localhost:${config.port}`,
      auto_defer: config.autoDefer.enabled,
      auto_defer_timeout_ms: config.autoDefer.timeoutMs,
    });
  });
}

main().catch((err: unknown) => {
  logger.log("error", "startup_failed", describeError(err));
  process.exitCode = 1;
});
