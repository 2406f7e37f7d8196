import { CommandType, ComponentType, InteractionType } from "../interactions/types";
import type {
  CommandOption,
  CommandTypeCode,
  ComponentTypeCode,
  InteractionData,
  InteractionEvent,
  InteractionUser,
  OptionValue,
} from "../interactions/types";

export type NormalizedInteraction = { type: "ping" } | { type: "interaction"; event: InteractionEvent };

type RawBody = Record<string, unknown>;

function isRecord(value: unknown): value is RawBody {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function asObject(payload: unknown, what = "Interaction payload"): RawBody {
  if (!isRecord(payload)) {
    throw new Error(`${what} must be a JSON object`);
  }
  return payload;
}

function requireString(obj: RawBody, key: string, where: string): string {
  const value = obj[key];
  if (typeof value === "string" && value) return value;
  throw new Error(`Missing ${where}.${key}`);
}

function optionalString(obj: RawBody | null, key: string): string | null {
  const value = obj?.[key];
  return typeof value === "string" ? value : null;
}

function toCommandType(value: unknown): CommandTypeCode {
  if (value === undefined) return CommandType.ChatInput;
  const code = Object.values(CommandType).find((c) => c === value);
  if (code === undefined) throw new Error(`Unknown command type ${String(value)}`);
  return code;
}

function toComponentType(value: unknown): ComponentTypeCode {
  const code = Object.values(ComponentType).find((c) => c === value);
  if (code === undefined) throw new Error(`Unknown component type ${String(value)}`);
  return code;
}

function toOptionValue(value: unknown): OptionValue | undefined {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean" ? value : undefined;
}

function parseOptions(raw: unknown): CommandOption[] {
  if (!Array.isArray(raw)) return [];
  return raw.map((item) => {
    const opt = asObject(item, "Command option");
    return {
      name: requireString(opt, "name", "option"),
      type: typeof opt.type === "number" ? opt.type : 0,
      value: toOptionValue(opt.value),
      focused: opt.focused === true ? true : undefined,
      options: Array.isArray(opt.options) ? parseOptions(opt.options) : undefined,
    };
  });
}

function findFocused(options: CommandOption[]): CommandOption | null {
  for (const opt of options) {
    if (opt.focused) return opt;
    const nested = opt.options ? findFocused(opt.options) : null;
    if (nested) return nested;
  }
  return null;
}

/** Text input values of a submitted modal, keyed by the input's custom id. */
function collectModalFields(rows: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (!Array.isArray(rows)) return fields;
  for (const row of rows) {
    const children = isRecord(row) && Array.isArray(row.components) ? row.components : [];
    for (const child of children) {
      if (!isRecord(child)) continue;
      if (typeof child.custom_id === "string" && typeof child.value === "string") {
        fields[child.custom_id] = child.value;
      }
    }
  }
  return fields;
}

function decodeData(type: unknown, data: RawBody): InteractionData {
  switch (type) {
    case InteractionType.ApplicationCommand:
      return {
        kind: "command",
        id: requireString(data, "id", "data"),
        name: requireString(data, "name", "data"),
        commandType: toCommandType(data.type),
        options: parseOptions(data.options),
        targetId: optionalString(data, "target_id") ?? undefined,
        resolved: isRecord(data.resolved) ? data.resolved : undefined,
      };
    case InteractionType.ApplicationCommandAutocomplete: {
      const options = parseOptions(data.options);
      return {
        kind: "autocomplete",
        id: requireString(data, "id", "data"),
        name: requireString(data, "name", "data"),
        commandType: toCommandType(data.type),
        options,
        focused: findFocused(options),
      };
    }
    case InteractionType.MessageComponent:
      return {
        kind: "component",
        customId: requireString(data, "custom_id", "data"),
        componentType: toComponentType(data.component_type),
        values: Array.isArray(data.values) ? data.values.filter((v): v is string => typeof v === "string") : [],
      };
    case InteractionType.ModalSubmit:
      return {
        kind: "modal",
        customId: requireString(data, "custom_id", "data"),
        fields: collectModalFields(data.components),
      };
    default:
      throw new Error(`Unsupported interaction type ${String(type)}`);
  }
}

function decodeUser(obj: RawBody): InteractionUser | null {
  const member = isRecord(obj.member) ? obj.member : null;
  const raw = isRecord(member?.user) ? member?.user : obj.user;
  if (!isRecord(raw) || typeof raw.id !== "string") return null;
  return {
    id: raw.id,
    username: typeof raw.username === "string" ? raw.username : "",
    globalName: optionalString(raw, "global_name"),
  };
}

/**
 * Decodes a raw interaction body. The result is a closed union decided here,
 * so nothing downstream inspects raw type codes again.
 */
export function normalizeInteraction(payload: unknown): NormalizedInteraction {
  const obj = asObject(payload);

  if (obj.type === InteractionType.Ping) {
    return { type: "ping" };
  }

  const data = decodeData(obj.type, asObject(obj.data, "Interaction data"));

  return {
    type: "interaction",
    event: {
      id: requireString(obj, "id", "interaction"),
      credentials: {
        applicationId: requireString(obj, "application_id", "interaction"),
        token: requireString(obj, "token", "interaction"),
      },
      data,
      guildId: optionalString(obj, "guild_id"),
      channelId: optionalString(obj, "channel_id"),
      user: decodeUser(obj),
      locale: optionalString(obj, "locale"),
      guildLocale: optionalString(obj, "guild_locale"),
      message: isRecord(obj.message) ? obj.message : null,
      member: isRecord(obj.member) ? obj.member : null,
    },
  };
}
