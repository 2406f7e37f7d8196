import yaml from "js-yaml";
import { MAX_DEFER_TIMEOUT_MS, isValidDeferTimeout } from "../dispatch/deferPolicy";
import type { Logger } from "../lib/logging";
import type { DeferOverride, RegistrationInit } from "../registry/types";

/** Defer overrides keyed by `<kind>:<matchKey>`, `<kind>:*` or `catch_all`. */
export type HandlerConfig = ReadonlyMap<string, DeferOverride>;

const KEY_PATTERN = /^(catch_all|(command|component|autocomplete|modal):.+)$/;
const KNOWN_FIELDS = new Set(["auto_defer", "timeout_ms", "ephemeral"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseEntry(value: Record<string, unknown>): DeferOverride | string {
  const unknownField = Object.keys(value).find((k) => !KNOWN_FIELDS.has(k));
  if (unknownField) return `Unknown field '${unknownField}'`;

  const override: DeferOverride = {};
  if (value.auto_defer !== undefined) {
    if (typeof value.auto_defer !== "boolean") return "auto_defer must be a boolean";
    override.enabled = value.auto_defer;
  }
  if (value.timeout_ms !== undefined) {
    if (typeof value.timeout_ms !== "number" || !isValidDeferTimeout(value.timeout_ms)) {
      return `timeout_ms must be a number between 0 and ${MAX_DEFER_TIMEOUT_MS}`;
    }
    override.timeoutMs = value.timeout_ms;
  }
  if (value.ephemeral !== undefined) {
    if (typeof value.ephemeral !== "boolean") return "ephemeral must be a boolean";
    override.ephemeral = value.ephemeral;
  }
  return override;
}

/**
 * Reads the per-handler override file. Entries that do not validate are
 * logged and skipped; a document that is not a mapping yields no overrides.
 */
export function parseHandlerConfigYaml(yamlText: string, logger: Logger): HandlerConfig {
  const config = new Map<string, DeferOverride>();
  const log = logger.withDomain("handler_config");

  if (!yamlText.trim()) {
    return config;
  }

  let raw: unknown;
  try {
    raw = yaml.load(yamlText);
  } catch (err) {
    log.log("error", "handler_config_parse_failed", { error: err });
    return config;
  }

  if (!isRecord(raw)) {
    log.log("error", "handler_config_parse_failed", {
      error: "YAML must be a mapping of handler key -> { auto_defer, timeout_ms, ephemeral }",
    });
    return config;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!KEY_PATTERN.test(key)) {
      log.log("error", "handler_config_entry_skipped", { key, error: "Expected <kind>:<match key> or catch_all" });
      continue;
    }
    if (!isRecord(value)) {
      log.log("error", "handler_config_entry_skipped", { key, error: "Expected a mapping of defer settings" });
      continue;
    }
    const parsed = parseEntry(value);
    if (typeof parsed === "string") {
      log.log("error", "handler_config_entry_skipped", { key, error: parsed });
      continue;
    }
    config.set(key, parsed);
  }

  log.log("info", "handler_config_parsed", { entries: config.size });
  return config;
}

export function handlerConfigKey(init: Pick<RegistrationInit, "kind" | "matchKey">): string {
  if (init.kind === "catch_all") return "catch_all";
  return `${init.kind}:${init.matchKey ?? "*"}`;
}

/**
 * Fills the defer fields the registration leaves unset: first from the file,
 * then from the group the handler was loaded with.
 */
export function applyHandlerConfig(
  init: RegistrationInit,
  config: HandlerConfig,
  groupDefer: DeferOverride = {},
): RegistrationInit {
  const fromFile = config.get(handlerConfigKey(init));
  const hasGroupDefaults =
    groupDefer.enabled !== undefined || groupDefer.timeoutMs !== undefined || groupDefer.ephemeral !== undefined;
  if (!fromFile && !hasGroupDefaults) return init;

  const own = init.defer ?? {};
  const file = fromFile ?? {};
  return {
    ...init,
    defer: {
      enabled: own.enabled ?? file.enabled ?? groupDefer.enabled,
      timeoutMs: own.timeoutMs ?? file.timeoutMs ?? groupDefer.timeoutMs,
      ephemeral: own.ephemeral ?? file.ephemeral ?? groupDefer.ephemeral,
    },
  };
}
