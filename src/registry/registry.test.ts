import { describe, expect, it } from "vitest";
import { defineCommand } from "../commands/definitions";
import { CommandType, ComponentType } from "../interactions/types";
import { InvalidTemplateError } from "../matching/customIdTemplate";
import { DuplicateRegistrationError, InvalidRegistrationError } from "./errors";
import { HandlerRegistry } from "./registry";

const noop = () => "ok";

function buildRegistry() {
  const registry = new HandlerRegistry();
  const hello = registry.register({ kind: "command", matchKey: "hello", routine: noop });
  const clickButton = registry.register({
    kind: "component",
    matchKey: "click",
    subType: ComponentType.Button,
    routine: noop,
  });
  const clickAny = registry.register({ kind: "component", matchKey: "click", routine: noop });
  const role = registry.register({
    kind: "component",
    matchKey: "add_role:{role}",
    paramTypes: { role: "int" },
    routine: noop,
  });
  const genericButton = registry.register({ kind: "component", subType: ComponentType.Button, routine: noop });
  const genericComponent = registry.register({ kind: "component", routine: noop });
  const genericUserCommand = registry.register({ kind: "command", subType: CommandType.User, routine: noop });
  const catchAll = registry.register({ kind: "catch_all", routine: noop });
  return {
    registry,
    hello,
    clickButton,
    clickAny,
    role,
    genericButton,
    genericComponent,
    genericUserCommand,
    catchAll,
  };
}

describe("HandlerRegistry.resolve", () => {
  it("returns the exact registration for its own key", () => {
    const { registry, hello } = buildRegistry();

    expect(registry.resolve({ kind: "command", key: "hello", subType: CommandType.ChatInput })).toEqual({
      registration: hello,
      params: {},
      via: "exact",
    });
  });

  it("prefers the exact sub-type over an unfiltered entry with the same key", () => {
    const { registry, clickButton, clickAny } = buildRegistry();

    expect(
      registry.resolve({ kind: "component", key: "click", subType: ComponentType.Button })?.registration,
    ).toBe(clickButton);
    expect(
      registry.resolve({ kind: "component", key: "click", subType: ComponentType.StringSelect })?.registration,
    ).toBe(clickAny);
  });

  it("matches custom-id templates before generic fallbacks", () => {
    const { registry, role } = buildRegistry();

    expect(registry.resolve({ kind: "component", key: "add_role:123", subType: ComponentType.Button })).toEqual({
      registration: role,
      params: { role: 123 },
      via: "template",
    });
  });

  it("falls back through generic sub-type, generic and catch-all in order", () => {
    const { registry, genericButton, genericComponent, genericUserCommand, catchAll } = buildRegistry();

    expect(registry.resolve({ kind: "component", key: "nope", subType: ComponentType.Button })).toMatchObject({
      registration: genericButton,
      via: "generic_subtype",
    });
    expect(
      registry.resolve({ kind: "component", key: "nope", subType: ComponentType.StringSelect }),
    ).toMatchObject({ registration: genericComponent, via: "generic" });
    expect(registry.resolve({ kind: "command", key: "who", subType: CommandType.User })).toMatchObject({
      registration: genericUserCommand,
      via: "generic_subtype",
    });
    expect(registry.resolve({ kind: "command", key: "who", subType: CommandType.ChatInput })).toMatchObject({
      registration: catchAll,
      via: "catch_all",
    });
    expect(registry.resolve({ kind: "modal", key: "survey" })).toMatchObject({
      registration: catchAll,
      via: "catch_all",
    });
  });

  it("returns null when nothing matches and there is no catch-all", () => {
    const registry = new HandlerRegistry();
    registry.register({ kind: "command", matchKey: "hello", routine: noop });

    expect(registry.resolve({ kind: "command", key: "bye" })).toBeNull();
    expect(registry.resolve({ kind: "autocomplete", key: "hello" })).toBeNull();
  });

  it("gives identical answers for identical queries", () => {
    const { registry } = buildRegistry();
    const query = { kind: "component" as const, key: "add_role:9", subType: ComponentType.Button };

    expect(registry.resolve(query)).toEqual(registry.resolve(query));
  });

  it("tries templates in registration order and honours their sub-type filter", () => {
    const registry = new HandlerRegistry();
    const selectOnly = registry.register({
      kind: "component",
      matchKey: "pick:{id}",
      subType: ComponentType.StringSelect,
      routine: noop,
    });
    const broad = registry.register({ kind: "component", matchKey: "pick:{id}:{n:int}", routine: noop });

    expect(registry.resolve({ kind: "component", key: "pick:a:1", subType: ComponentType.StringSelect })).toEqual({
      registration: selectOnly,
      params: { id: "a:1" },
      via: "template",
    });
    expect(registry.resolve({ kind: "component", key: "pick:a:1", subType: ComponentType.Button })).toEqual({
      registration: broad,
      params: { id: "a", n: 1 },
      via: "template",
    });
  });
});

describe("HandlerRegistry.register", () => {
  it("rejects a duplicate key for the same kind", () => {
    const registry = new HandlerRegistry();
    registry.register({ kind: "command", matchKey: "hello", routine: noop });

    expect(() => registry.register({ kind: "command", matchKey: "hello", routine: noop })).toThrow(
      new DuplicateRegistrationError("command 'hello'"),
    );
    expect(() => registry.register({ kind: "autocomplete", matchKey: "hello", routine: noop })).not.toThrow();
  });

  it("rejects duplicate generics, templates and catch-alls", () => {
    const registry = new HandlerRegistry();
    registry.register({ kind: "component", subType: ComponentType.Button, routine: noop });
    registry.register({ kind: "modal", matchKey: "form:{id}", routine: noop });
    registry.register({ kind: "catch_all", routine: noop });

    expect(() => registry.register({ kind: "component", subType: ComponentType.Button, routine: noop })).toThrow(
      "A handler is already registered for component <generic> (sub-type 2)",
    );
    expect(() => registry.register({ kind: "modal", matchKey: "form:{id}", routine: noop })).toThrow(
      DuplicateRegistrationError,
    );
    expect(() => registry.register({ kind: "catch_all", routine: noop })).toThrow(
      "A handler is already registered for the catch-all",
    );
  });

  it("rejects malformed registrations", () => {
    const registry = new HandlerRegistry();

    expect(() => registry.register({ kind: "component", matchKey: "a:{x}{y}", routine: noop })).toThrow(
      InvalidTemplateError,
    );
    expect(() => registry.register({ kind: "command", matchKey: "say:{what}", routine: noop })).toThrow(
      new InvalidRegistrationError("command handlers cannot use custom-id templates"),
    );
    expect(() => registry.register({ kind: "modal", subType: 1, routine: noop })).toThrow(
      new InvalidRegistrationError("modal handlers cannot filter by sub-type"),
    );
    expect(() => registry.register({ kind: "catch_all", matchKey: "x", routine: noop })).toThrow(
      InvalidRegistrationError,
    );
    expect(() =>
      registry.register({ kind: "command", matchKey: "slow", defer: { timeoutMs: -1 }, routine: noop }),
    ).toThrow("Invalid defer timeout: -1");
    expect(() =>
      registry.register({ kind: "command", matchKey: "slow", defer: { timeoutMs: 2_147_483_648 }, routine: noop }),
    ).toThrow("Invalid defer timeout: 2147483648");
    expect(() =>
      registry.register({ kind: "component", matchKey: "btn", command: defineCommand("btn"), routine: noop }),
    ).toThrow("Only named command handlers can carry a command definition");
    expect(() =>
      registry.register({ kind: "command", matchKey: "ping", command: defineCommand("pong"), routine: noop }),
    ).toThrow("Command definition 'pong' does not match handler 'ping'");
  });
});

describe("HandlerRegistry.deregister", () => {
  it("removes exactly the given entry and falls back to the next match", () => {
    const { registry, clickButton, clickAny, role, catchAll, genericButton } = buildRegistry();

    registry.deregister(clickButton);
    expect(registry.resolve({ kind: "component", key: "click", subType: ComponentType.Button })?.registration).toBe(
      clickAny,
    );

    registry.deregister(role);
    expect(registry.resolve({ kind: "component", key: "add_role:1", subType: ComponentType.Button })).toMatchObject({
      registration: genericButton,
    });

    registry.deregister(catchAll);
    expect(registry.resolve({ kind: "modal", key: "form" })).toBeNull();
  });

  it("ignores registrations it does not hold", () => {
    const { registry, hello } = buildRegistry();
    const other = new HandlerRegistry().register({ kind: "command", matchKey: "hello", routine: noop });

    registry.deregister(other);
    expect(registry.resolve({ kind: "command", key: "hello" })?.registration).toBe(hello);

    registry.deregister(hello);
    registry.deregister(hello);
    expect(registry.resolve({ kind: "command", key: "hello" })?.registration).not.toBe(hello);
  });

  it("allows a key to be registered again after removal", () => {
    const registry = new HandlerRegistry();
    const first = registry.register({ kind: "catch_all", routine: noop });
    registry.deregister(first);

    expect(() => registry.register({ kind: "catch_all", routine: noop })).not.toThrow();
  });
});
