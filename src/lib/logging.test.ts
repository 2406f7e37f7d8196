import { describe, expect, it } from "vitest";
import { createRequestContext, createSpineLogger, formatSpineLines } from "./logging";

describe("formatSpineLines", () => {
  it("renders a header line and one indented line per field", () => {
    const text = formatSpineLines({
      level: "info",
      app: "interactions",
      domain: "dispatch",
      action: "handler_resolved",
      requestId: "0123456789abcdef",
      fields: { interaction: "command:hello", kind: "command", note: "two words", skipped: undefined },
    });

    expect(text.split("\n")).toEqual([
      'INFO: [interactions:dispatch] handler_resolved rid=01234567 interaction="command:hello"',
      "  kind=command",
      '  note="two words"',
    ]);
  });
});

describe("createRequestContext", () => {
  it("nests domains and keeps base fields across children", () => {
    const lines: string[] = [];
    const ctx = createRequestContext({ app: "interactions", requestId: "feedbeef00", sink: (l) => lines.push(l) });
    ctx.set({ interaction_id: "42" });

    ctx.withDomain("http").withDomain("ingress").log("warn", "slow");

    expect(lines).toEqual(["WARN: [interactions:http:ingress] slow rid=feedbeef\n  interaction_id=42"]);
  });
});

describe("createSpineLogger", () => {
  it("defaults the domain to request", () => {
    const lines: string[] = [];
    const logger = createSpineLogger({ app: "interactions", domain: "", sink: (l) => lines.push(l) });

    logger.log("error", "boom", { count: 2 });

    expect(lines).toEqual(["ERROR: [interactions:request] boom\n  count=2"]);
  });
});
