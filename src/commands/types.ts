import type { CommandTypeCode } from "../interactions/types";

export const OptionType = {
  Subcommand: 1,
  SubcommandGroup: 2,
  String: 3,
  Integer: 4,
  Boolean: 5,
  User: 6,
  Channel: 7,
  Role: 8,
  Mentionable: 9,
  Number: 10,
  Attachment: 11,
} as const;

export type OptionTypeCode = (typeof OptionType)[keyof typeof OptionType];

export interface CommandOptionChoice {
  name: string;
  value: string | number;
}

export interface CommandOptionDefinition {
  type: OptionTypeCode;
  name: string;
  description: string;
  required?: boolean;
  choices?: CommandOptionChoice[];
  minValue?: number;
  maxValue?: number;
  /** The platform asks the autocomplete handler of the same command for choices. */
  autocomplete?: boolean;
  channelTypes?: number[];
  /** Children of a subcommand or subcommand group. */
  options?: CommandOptionDefinition[];
}

/**
 * What the platform is told about a command. Context menus (user and
 * message commands) carry no description and no options.
 */
export interface CommandDefinition {
  name: string;
  type: CommandTypeCode;
  description: string;
  options: CommandOptionDefinition[];
  defaultPermission: boolean;
}

export interface CommandOptionPayload {
  type: OptionTypeCode;
  name: string;
  description: string;
  required?: boolean;
  choices?: CommandOptionChoice[];
  min_value?: number;
  max_value?: number;
  autocomplete?: boolean;
  channel_types?: number[];
  options?: CommandOptionPayload[];
}

export interface CommandPayload {
  name: string;
  type: CommandTypeCode;
  description?: string;
  options?: CommandOptionPayload[];
  default_permission: boolean;
}
