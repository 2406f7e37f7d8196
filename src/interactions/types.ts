/**
 * Wire-level codes used by the platform's interaction webhooks.
 */
export const InteractionType = {
  Ping: 1,
  ApplicationCommand: 2,
  MessageComponent: 3,
  ApplicationCommandAutocomplete: 4,
  ModalSubmit: 5,
} as const;

export const ResponseType = {
  Pong: 1,
  ChannelMessage: 4,
  DeferredChannelMessage: 5,
  DeferredUpdateMessage: 6,
  UpdateMessage: 7,
  AutocompleteResult: 8,
  Modal: 9,
} as const;

export type ResponseTypeCode = (typeof ResponseType)[keyof typeof ResponseType];

export const CommandType = {
  ChatInput: 1,
  User: 2,
  Message: 3,
} as const;

export type CommandTypeCode = (typeof CommandType)[keyof typeof CommandType];

export const ComponentType = {
  ActionRow: 1,
  Button: 2,
  StringSelect: 3,
  TextInput: 4,
  UserSelect: 5,
  RoleSelect: 6,
  MentionableSelect: 7,
  ChannelSelect: 8,
} as const;

export type ComponentTypeCode = (typeof ComponentType)[keyof typeof ComponentType];

export const MessageFlags = {
  Ephemeral: 64,
} as const;

/** Kinds of interaction that reach a handler (PING never does). */
export type InteractionKind = "command" | "component" | "autocomplete" | "modal";

export type HandlerKind = InteractionKind | "catch_all";

export type OptionValue = string | number | boolean;

export interface CommandOption {
  name: string;
  type: number;
  value?: OptionValue;
  focused?: boolean;
  options?: CommandOption[];
}

export interface CommandData {
  kind: "command";
  id: string;
  name: string;
  commandType: CommandTypeCode;
  options: CommandOption[];
  targetId?: string;
  resolved?: Record<string, unknown>;
}

export interface AutocompleteData {
  kind: "autocomplete";
  id: string;
  name: string;
  commandType: CommandTypeCode;
  options: CommandOption[];
  focused: CommandOption | null;
}

export interface ComponentData {
  kind: "component";
  customId: string;
  componentType: ComponentTypeCode;
  values: string[];
}

export interface ModalData {
  kind: "modal";
  customId: string;
  /** Submitted text input values keyed by the input's custom id. */
  fields: Record<string, string>;
}

export type InteractionData = CommandData | AutocompleteData | ComponentData | ModalData;

export interface InteractionCredentials {
  applicationId: string;
  token: string;
}

export interface InteractionUser {
  id: string;
  username: string;
  globalName?: string | null;
}

export interface InteractionEvent {
  id: string;
  credentials: InteractionCredentials;
  data: InteractionData;
  guildId: string | null;
  channelId: string | null;
  user: InteractionUser | null;
  locale: string | null;
  guildLocale: string | null;
  message: Record<string, unknown> | null;
  member: Record<string, unknown> | null;
}
