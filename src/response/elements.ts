import { ComponentType } from "../interactions/types";
import type { ResponseTypeCode } from "../interactions/types";

const MAX_ROWS = 5;
const MAX_ROW_WEIGHT = 5;

/** Forces the response type when returned alongside other elements. */
export class ResponseTypeTag {
  constructor(readonly code: ResponseTypeCode) {}
}

export function responseType(code: ResponseTypeCode): ResponseTypeTag {
  return new ResponseTypeTag(code);
}

export class Choice {
  constructor(
    readonly name: string,
    readonly value: string | number,
  ) {}

  toJSON(): { name: string; value: string | number } {
    return { name: this.name, value: this.value };
  }
}

export function choice(name: string, value: string | number = name): Choice {
  return new Choice(name, value);
}

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface EmbedInit {
  title?: string;
  description?: string;
  url?: string;
  color?: number;
  timestamp?: Date;
  footer?: { text: string; iconUrl?: string };
  author?: { name: string; url?: string; iconUrl?: string };
  imageUrl?: string;
  thumbnailUrl?: string;
  fields?: EmbedField[];
}

export class Embed {
  private readonly init: EmbedInit;
  private readonly fields: EmbedField[];

  constructor(init: EmbedInit = {}) {
    this.init = { ...init };
    this.fields = [...(init.fields ?? [])];
  }

  addField(name: string, value: string, inline = false): this {
    this.fields.push({ name, value, inline });
    return this;
  }

  toJSON(): Record<string, unknown> {
    const { title, description, url, color, timestamp, footer, author, imageUrl, thumbnailUrl } =
      this.init;
    const json: Record<string, unknown> = {};
    if (title !== undefined) json.title = title;
    if (description !== undefined) json.description = description;
    if (url !== undefined) json.url = url;
    if (color !== undefined) json.color = color;
    if (timestamp !== undefined) json.timestamp = timestamp.toISOString();
    if (footer) json.footer = { text: footer.text, icon_url: footer.iconUrl };
    if (author) json.author = { name: author.name, url: author.url, icon_url: author.iconUrl };
    if (imageUrl) json.image = { url: imageUrl };
    if (thumbnailUrl) json.thumbnail = { url: thumbnailUrl };
    if (this.fields.length > 0) json.fields = this.fields.map((f) => ({ ...f, inline: f.inline ?? false }));
    return json;
  }
}

/**
 * Base for every interactive component. `weight` is how much of an action
 * row (5 units) the component takes.
 */
export abstract class Component {
  abstract readonly type: number;
  abstract readonly weight: number;
  abstract toJSON(): Record<string, unknown>;
}

export const ButtonStyle = {
  Primary: 1,
  Secondary: 2,
  Success: 3,
  Danger: 4,
  Link: 5,
} as const;

export type ButtonStyleCode = (typeof ButtonStyle)[keyof typeof ButtonStyle];

export interface ButtonInit {
  label: string;
  customId?: string;
  url?: string;
  style?: ButtonStyleCode;
  disabled?: boolean;
  emoji?: string;
}

export class Button extends Component {
  readonly type = ComponentType.Button;
  readonly weight = 1;

  constructor(private readonly init: ButtonInit) {
    super();
    if (init.url === undefined && init.customId === undefined) {
      throw new Error("Button requires either a customId or a url");
    }
    if (init.style === ButtonStyle.Link && init.url === undefined) {
      throw new Error("Link button requires a url");
    }
  }

  toJSON(): Record<string, unknown> {
    const { label, customId, url, disabled, emoji } = this.init;
    const style = url !== undefined ? ButtonStyle.Link : (this.init.style ?? ButtonStyle.Primary);
    return {
      type: this.type,
      style,
      label,
      ...(url !== undefined ? { url } : { custom_id: customId }),
      disabled: disabled ?? false,
      ...(emoji !== undefined ? { emoji: { name: emoji } } : {}),
    };
  }
}

export interface SelectOption {
  label: string;
  value: string;
  description?: string;
  default?: boolean;
}

export interface SelectMenuInit {
  customId: string;
  options: SelectOption[];
  placeholder?: string;
  minValues?: number;
  maxValues?: number;
  disabled?: boolean;
}

export class SelectMenu extends Component {
  readonly type = ComponentType.StringSelect;
  readonly weight = 5;

  constructor(private readonly init: SelectMenuInit) {
    super();
    if (init.options.length === 0) {
      throw new Error("Select requires at least one option");
    }
    if (init.options.length > 25) {
      throw new Error("Select cannot have more than 25 options");
    }
    if ((init.minValues ?? 1) > (init.maxValues ?? 1)) {
      throw new Error("minValues cannot be greater than maxValues");
    }
  }

  toJSON(): Record<string, unknown> {
    const { customId, options, placeholder, minValues, maxValues, disabled } = this.init;
    return {
      type: this.type,
      custom_id: customId,
      options: options.map((o) => ({ ...o })),
      placeholder,
      min_values: Math.max(minValues ?? 1, 0),
      max_values: Math.min(maxValues ?? 1, 25),
      disabled: disabled ?? false,
    };
  }
}

export const TextInputStyle = {
  Short: 1,
  Paragraph: 2,
} as const;

export interface TextInputInit {
  customId: string;
  label: string;
  style?: (typeof TextInputStyle)[keyof typeof TextInputStyle];
  required?: boolean;
  placeholder?: string;
  value?: string;
  minLength?: number;
  maxLength?: number;
}

export class TextInput extends Component {
  readonly type = ComponentType.TextInput;
  readonly weight = 5;

  constructor(private readonly init: TextInputInit) {
    super();
  }

  toJSON(): Record<string, unknown> {
    const { customId, label, style, required, placeholder, value, minLength, maxLength } = this.init;
    return {
      type: this.type,
      custom_id: customId,
      label,
      style: style ?? TextInputStyle.Short,
      required: required ?? true,
      placeholder,
      value,
      min_length: minLength,
      max_length: maxLength,
    };
  }
}

export interface ActionRowJson {
  type: typeof ComponentType.ActionRow;
  components: Record<string, unknown>[];
}

/**
 * Packs components into action rows first-fit: each component goes into the
 * earliest row with room left, so a later button can land above an earlier
 * select. A new row opens only when no existing row has room.
 */
export function layoutComponents(components: Component[]): ActionRowJson[] {
  const rows: { weight: number; items: Component[] }[] = [];

  for (const component of components) {
    const row = rows.find((r) => r.weight + component.weight <= MAX_ROW_WEIGHT);
    if (row) {
      row.items.push(component);
      row.weight += component.weight;
      continue;
    }
    if (rows.length >= MAX_ROWS) {
      throw new Error("Cannot add component, weight limit exceeded");
    }
    rows.push({ weight: component.weight, items: [component] });
  }

  return rows.map((r) => ({
    type: ComponentType.ActionRow,
    components: r.items.map((c) => c.toJSON()),
  }));
}
