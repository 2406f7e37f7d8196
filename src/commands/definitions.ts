import { CommandType } from "../interactions/types";
import type { CommandTypeCode } from "../interactions/types";
import { InvalidCommandDefinitionError } from "./errors";
import { OptionType } from "./types";
import type {
  CommandDefinition,
  CommandOptionDefinition,
  CommandOptionPayload,
  CommandPayload,
  OptionTypeCode,
} from "./types";

export const DEFAULT_COMMAND_DESCRIPTION = "No description set";

const MAX_OPTIONS = 25;
const MAX_CHOICES = 25;
const MAX_DESCRIPTION_LENGTH = 100;
const CHAT_INPUT_NAME = /^[-_\p{L}\p{N}]{1,32}$/u;

const CHOICE_TYPES: ReadonlySet<OptionTypeCode> = new Set([OptionType.String, OptionType.Integer, OptionType.Number]);
const RANGE_TYPES: ReadonlySet<OptionTypeCode> = new Set([OptionType.Integer, OptionType.Number]);

export interface CommandDefinitionInit {
  type?: CommandTypeCode;
  description?: string;
  options?: CommandOptionDefinition[];
  defaultPermission?: boolean;
}

export function defineCommand(name: string, init: CommandDefinitionInit = {}): CommandDefinition {
  const type = init.type ?? CommandType.ChatInput;
  return {
    name,
    type,
    description: type === CommandType.ChatInput ? init.description ?? DEFAULT_COMMAND_DESCRIPTION : init.description ?? "",
    options: init.options ?? [],
    defaultPermission: init.defaultPermission ?? true,
  };
}

function isNestingType(type: OptionTypeCode): boolean {
  return type === OptionType.Subcommand || type === OptionType.SubcommandGroup;
}

function validateOptions(
  command: string,
  options: readonly CommandOptionDefinition[],
  parent: OptionTypeCode | null,
): void {
  const fail = (reason: string) => {
    throw new InvalidCommandDefinitionError(command, reason);
  };

  if (options.length > MAX_OPTIONS) fail(`at most ${MAX_OPTIONS} options are allowed`);

  const seen = new Set<string>();
  let optionalSeen = false;

  for (const option of options) {
    const label = `option '${option.name}'`;
    if (!CHAT_INPUT_NAME.test(option.name) || option.name !== option.name.toLowerCase()) {
      fail(`${label} must be 1-32 lowercase letters, digits, '-' or '_'`);
    }
    if (seen.has(option.name)) fail(`duplicate ${label}`);
    seen.add(option.name);

    if (option.description.length === 0 || option.description.length > MAX_DESCRIPTION_LENGTH) {
      fail(`${label} needs a description of 1-${MAX_DESCRIPTION_LENGTH} characters`);
    }

    if (parent === OptionType.SubcommandGroup && option.type !== OptionType.Subcommand) {
      fail(`${label} must be a subcommand inside a subcommand group`);
    }
    if (parent === OptionType.Subcommand && isNestingType(option.type)) {
      fail(`${label} cannot nest subcommands inside a subcommand`);
    }

    if (!isNestingType(option.type)) {
      if (option.required) {
        if (optionalSeen) fail(`required ${label} must come before optional options`);
      } else {
        optionalSeen = true;
      }
    }

    if (option.choices) {
      if (!CHOICE_TYPES.has(option.type)) fail(`${label} cannot offer choices`);
      if (option.choices.length > MAX_CHOICES) fail(`${label} has more than ${MAX_CHOICES} choices`);
      if (option.autocomplete) fail(`${label} cannot combine choices with autocomplete`);
    }
    if (option.autocomplete && !CHOICE_TYPES.has(option.type)) fail(`${label} cannot autocomplete`);

    if (option.minValue !== undefined || option.maxValue !== undefined) {
      if (!RANGE_TYPES.has(option.type)) fail(`${label} cannot take a value range`);
      if (option.minValue !== undefined && option.maxValue !== undefined && option.minValue > option.maxValue) {
        fail(`${label} has minValue greater than maxValue`);
      }
    }

    if (option.options && option.options.length > 0) {
      if (!isNestingType(option.type)) fail(`${label} cannot have child options`);
      validateOptions(command, option.options, option.type);
    }
  }
}

/** Throws `InvalidCommandDefinitionError` for anything the platform would refuse. */
export function validateCommandDefinition(definition: CommandDefinition): void {
  const { name, type } = definition;

  if (type === CommandType.ChatInput) {
    if (!CHAT_INPUT_NAME.test(name) || name !== name.toLowerCase()) {
      throw new InvalidCommandDefinitionError(name, "name must be 1-32 lowercase letters, digits, '-' or '_'");
    }
    if (definition.description.length === 0 || definition.description.length > MAX_DESCRIPTION_LENGTH) {
      throw new InvalidCommandDefinitionError(
        name,
        `description must be 1-${MAX_DESCRIPTION_LENGTH} characters`,
      );
    }
    validateOptions(name, definition.options, null);
    return;
  }

  if (name.length === 0 || name.length > 32) {
    throw new InvalidCommandDefinitionError(name, "name must be 1-32 characters");
  }
  if (definition.description.length > 0 || definition.options.length > 0) {
    throw new InvalidCommandDefinitionError(name, "context menu commands take no description or options");
  }
}

function toOptionPayload(option: CommandOptionDefinition): CommandOptionPayload {
  const payload: CommandOptionPayload = {
    type: option.type,
    name: option.name,
    description: option.description,
  };
  if (option.required !== undefined) payload.required = option.required;
  if (option.choices) payload.choices = option.choices.map((c) => ({ name: c.name, value: c.value }));
  if (option.minValue !== undefined) payload.min_value = option.minValue;
  if (option.maxValue !== undefined) payload.max_value = option.maxValue;
  if (option.autocomplete !== undefined) payload.autocomplete = option.autocomplete;
  if (option.channelTypes) payload.channel_types = [...option.channelTypes];
  if (option.options && option.options.length > 0) payload.options = option.options.map(toOptionPayload);
  return payload;
}

export function toCommandPayload(definition: CommandDefinition): CommandPayload {
  if (definition.type !== CommandType.ChatInput) {
    return { name: definition.name, type: definition.type, default_permission: definition.defaultPermission };
  }
  const payload: CommandPayload = {
    name: definition.name,
    type: definition.type,
    description: definition.description,
    default_permission: definition.defaultPermission,
  };
  if (definition.options.length > 0) payload.options = definition.options.map(toOptionPayload);
  return payload;
}
