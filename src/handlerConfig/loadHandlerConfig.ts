import fs from "fs/promises";
import type { Logger } from "../lib/logging";
import { parseHandlerConfigYaml } from "./parseHandlerConfig";
import type { HandlerConfig } from "./parseHandlerConfig";

export async function loadHandlerConfig(filePath: string | null, logger: Logger): Promise<HandlerConfig> {
  if (!filePath) {
    return new Map();
  }
  const text = await fs.readFile(filePath, "utf8");
  logger.withDomain("handler_config").log("info", "handler_config_loaded", { file: filePath });
  return parseHandlerConfigYaml(text, logger);
}
