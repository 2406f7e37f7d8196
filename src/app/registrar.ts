import { defineCommand } from "../commands/definitions";
import type { CommandOptionDefinition } from "../commands/types";
import type { CommandTypeCode, ComponentTypeCode } from "../interactions/types";
import type { ParamType } from "../matching/customIdTemplate";
import type { DeferOverride, RegistrationInit } from "../registry/types";
import type { HandlerRoutine } from "../response/types";

export interface HandlerOptions {
  defer?: DeferOverride;
  followup?: HandlerRoutine;
}

export interface CommandHandlerOptions extends HandlerOptions {
  commandType?: CommandTypeCode;
  /** Chat-input commands only; defaults to a placeholder. */
  description?: string;
  options?: CommandOptionDefinition[];
  defaultPermission?: boolean;
}

export interface ComponentHandlerOptions extends HandlerOptions {
  componentType?: ComponentTypeCode;
  paramTypes?: Record<string, ParamType>;
}

export interface ModalHandlerOptions extends HandlerOptions {
  paramTypes?: Record<string, ParamType>;
}

/**
 * Registration surface shared by the app and handler groups. A `null` key
 * registers the generic fallback for that kind.
 */
export abstract class HandlerRegistrar {
  protected abstract add(init: RegistrationInit): void;

  /** Named commands also describe themselves for `syncCommands`. */
  command(name: string | null, routine: HandlerRoutine, options: CommandHandlerOptions = {}): this {
    this.add({
      kind: "command",
      matchKey: name ?? undefined,
      subType: options.commandType,
      routine,
      defer: options.defer,
      followup: options.followup,
      command:
        name === null
          ? undefined
          : defineCommand(name, {
              type: options.commandType,
              description: options.description,
              options: options.options,
              defaultPermission: options.defaultPermission,
            }),
    });
    return this;
  }

  component(customId: string | null, routine: HandlerRoutine, options: ComponentHandlerOptions = {}): this {
    this.add({
      kind: "component",
      matchKey: customId ?? undefined,
      subType: options.componentType,
      routine,
      defer: options.defer,
      followup: options.followup,
      paramTypes: options.paramTypes,
    });
    return this;
  }

  autocomplete(name: string | null, routine: HandlerRoutine, options: HandlerOptions = {}): this {
    this.add({ kind: "autocomplete", matchKey: name ?? undefined, routine, followup: options.followup });
    return this;
  }

  modal(customId: string | null, routine: HandlerRoutine, options: ModalHandlerOptions = {}): this {
    this.add({
      kind: "modal",
      matchKey: customId ?? undefined,
      routine,
      followup: options.followup,
      paramTypes: options.paramTypes,
    });
    return this;
  }

  catchAll(routine: HandlerRoutine, options: HandlerOptions = {}): this {
    this.add({ kind: "catch_all", routine, defer: options.defer, followup: options.followup });
    return this;
  }
}
