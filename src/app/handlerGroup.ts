import type { DeferOverride, RegistrationInit } from "../registry/types";
import type { InteractionApp } from "./createInteractionApp";
import { HandlerRegistrar } from "./registrar";

export type GroupHook = (app: InteractionApp) => void;

export interface HandlerGroupOptions {
  /** Defer settings every handler in the group inherits unless it or the handler config file sets them. */
  defer?: DeferOverride;
  /** Runs after every handler is registered; throwing undoes the load. */
  onLoad?: GroupHook;
  /** Runs after the group's handlers are removed. */
  onUnload?: GroupHook;
}

export interface HandlerGroup {
  readonly name: string;
  readonly registrations: readonly RegistrationInit[];
  readonly defer: Readonly<DeferOverride>;
  readonly onLoad: GroupHook | null;
  readonly onUnload: GroupHook | null;
}

class HandlerGroupBuilder extends HandlerRegistrar {
  readonly registrations: RegistrationInit[] = [];

  protected add(init: RegistrationInit): void {
    this.registrations.push(init);
  }
}

/**
 * Collects a named set of handlers that load and unload together.
 *
 * @example
 * const roles = defineHandlerGroup("roles", (g) => {
 *   g.component("add_role:{role}", (ctx) => `Added ${String(ctx.params.role)}`);
 * }, { defer: { enabled: true } });
 */
export function defineHandlerGroup(
  name: string,
  build: (group: HandlerRegistrar) => void,
  options: HandlerGroupOptions = {},
): HandlerGroup {
  const builder = new HandlerGroupBuilder();
  build(builder);
  return Object.freeze({
    name,
    registrations: Object.freeze([...builder.registrations]),
    defer: Object.freeze({ ...(options.defer ?? {}) }),
    onLoad: options.onLoad ?? null,
    onUnload: options.onUnload ?? null,
  });
}
