import path from "path";
import { describe, expect, it } from "vitest";
import { captureLogger } from "../testing/fixtures";
import type { DeferOverride } from "../registry/types";
import { loadHandlerConfig } from "./loadHandlerConfig";
import { applyHandlerConfig, handlerConfigKey, parseHandlerConfigYaml } from "./parseHandlerConfig";
import type { HandlerConfig } from "./parseHandlerConfig";

const routine = () => "ok";

describe("parseHandlerConfigYaml", () => {
  it("maps snake_case settings onto defer overrides", () => {
    const { logger } = captureLogger();
    const config = parseHandlerConfigYaml(
      ["command:report:", "  auto_defer: true", "  timeout_ms: 1500", "catch_all:", "  ephemeral: true"].join("\n"),
      logger,
    );

    expect([...config.entries()]).toEqual([
      ["command:report", { enabled: true, timeoutMs: 1500 }],
      ["catch_all", { ephemeral: true }],
    ]);
  });

  it("skips invalid entries and keeps the rest", () => {
    const { logger, lines } = captureLogger();
    const config = parseHandlerConfigYaml(
      [
        "command:ok:",
        "  timeout_ms: 10",
        "command:bad:",
        "  timeout_ms: soon",
        "command:forever:",
        "  timeout_ms: 2147483648",
        "widget:thing:",
        "  auto_defer: true",
        "modal:extra:",
        "  colour: blue",
      ].join("\n"),
      logger,
    );

    expect([...config.keys()]).toEqual(["command:ok"]);
    expect(lines.filter((l) => l.includes("handler_config_entry_skipped"))).toEqual([
      'ERROR: [interactions:handler_config] handler_config_entry_skipped\n  key=command:bad\n  error="timeout_ms must be a number between 0 and 2147483647"',
      'ERROR: [interactions:handler_config] handler_config_entry_skipped\n  key=command:forever\n  error="timeout_ms must be a number between 0 and 2147483647"',
      'ERROR: [interactions:handler_config] handler_config_entry_skipped\n  key=widget:thing\n  error="Expected <kind>:<match key> or catch_all"',
      "ERROR: [interactions:handler_config] handler_config_entry_skipped\n  key=modal:extra\n  error=\"Unknown field 'colour'\"",
    ]);
  });

  it("returns nothing for empty, malformed or non-mapping documents", () => {
    const { logger, lines } = captureLogger();

    expect(parseHandlerConfigYaml("   ", logger).size).toBe(0);
    expect(parseHandlerConfigYaml("- a\n- b", logger).size).toBe(0);
    expect(parseHandlerConfigYaml("key: [unclosed", logger).size).toBe(0);
    expect(lines.filter((l) => l.startsWith("ERROR: [interactions:handler_config] handler_config_parse_failed"))).toHaveLength(2);
  });
});

describe("applyHandlerConfig", () => {
  const config: HandlerConfig = new Map<string, DeferOverride>([
    ["command:report", { enabled: true, timeoutMs: 1500, ephemeral: true }],
    ["component:*", { enabled: false }],
  ]);

  it("keys registrations by kind and match key", () => {
    expect(handlerConfigKey({ kind: "command", matchKey: "report" })).toBe("command:report");
    expect(handlerConfigKey({ kind: "component" })).toBe("component:*");
    expect(handlerConfigKey({ kind: "catch_all" })).toBe("catch_all");
  });

  it("fills only the fields the registration leaves unset", () => {
    const applied = applyHandlerConfig(
      { kind: "command", matchKey: "report", routine, defer: { ephemeral: false } },
      config,
    );

    expect(applied.defer).toEqual({ enabled: true, timeoutMs: 1500, ephemeral: false });
  });

  it("leaves registrations without an entry untouched", () => {
    const init = { kind: "command" as const, matchKey: "other", routine };

    expect(applyHandlerConfig(init, config)).toBe(init);
  });

  it("falls back to the group's defaults after the file", () => {
    const group: DeferOverride = { enabled: true, timeoutMs: 250, ephemeral: true };

    expect(
      applyHandlerConfig({ kind: "component", routine, defer: { timeoutMs: 50 } }, config, group).defer,
    ).toEqual({ enabled: false, timeoutMs: 50, ephemeral: true });
    expect(applyHandlerConfig({ kind: "command", matchKey: "other", routine }, config, group).defer).toEqual(group);
  });
});

describe("loadHandlerConfig", () => {
  it("reads the example file shipped with the project", async () => {
    const { logger } = captureLogger();
    const config = await loadHandlerConfig(path.resolve(process.cwd(), "config/handlers.example.yaml"), logger);

    expect(config.get("command:report")).toEqual({ enabled: true, timeoutMs: 1500, ephemeral: true });
    expect(config.get("component:*")).toEqual({ enabled: false });
    expect(config.get("catch_all")).toEqual({ timeoutMs: 500 });
  });

  it("returns an empty config when no file is configured", async () => {
    const { logger } = captureLogger();

    expect((await loadHandlerConfig(null, logger)).size).toBe(0);
  });
});
