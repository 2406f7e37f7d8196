export type ParamType = "string" | "int" | "float" | "bool" | "bigint";

export type TemplateValue = string | number | boolean | bigint;

export type TemplateSegment =
  | { kind: "literal"; text: string }
  | { kind: "param"; name: string; type: ParamType };

export interface CustomIdTemplate {
  source: string;
  segments: TemplateSegment[];
  params: { name: string; type: ParamType }[];
}

export class InvalidTemplateError extends Error {
  constructor(template: string, reason: string) {
    super(`Invalid custom id template '${template}': ${reason}`);
    this.name = "InvalidTemplateError";
  }
}

const PARAM_TYPES: readonly ParamType[] = ["string", "int", "float", "bool", "bigint"];

function isParamType(value: string): value is ParamType {
  return PARAM_TYPES.some((t) => t === value);
}

export function isTemplate(key: string): boolean {
  return key.includes("{");
}

/**
 * Parses `"role:{id:int}:{user}"` into literal and parameter segments.
 * A slot's type comes from its `:type` suffix, then `paramTypes`, then
 * defaults to string.
 */
export function parseCustomIdTemplate(
  source: string,
  paramTypes: Record<string, ParamType> = {},
): CustomIdTemplate {
  const segments: TemplateSegment[] = [];
  const seen = new Set<string>();
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf("{", cursor);
    if (open === -1) {
      segments.push({ kind: "literal", text: source.slice(cursor) });
      break;
    }
    if (open > cursor) {
      segments.push({ kind: "literal", text: source.slice(cursor, open) });
    }
    const close = source.indexOf("}", open);
    if (close === -1) {
      throw new InvalidTemplateError(source, "unclosed '{'");
    }

    const body = source.slice(open + 1, close);
    const [rawName, rawType, ...extra] = body.split(":");
    if (extra.length > 0) {
      throw new InvalidTemplateError(source, `'{${body}}' has more than one ':'`);
    }
    const name = rawName.trim();
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      throw new InvalidTemplateError(source, `bad parameter name '${rawName}'`);
    }
    if (seen.has(name)) {
      throw new InvalidTemplateError(source, `duplicate parameter '${name}'`);
    }
    seen.add(name);

    const declared = rawType?.trim() ?? paramTypes[name] ?? "string";
    if (!isParamType(declared)) {
      throw new InvalidTemplateError(source, `unknown type '${declared}' for '${name}'`);
    }

    const previous = segments[segments.length - 1];
    if (previous?.kind === "param") {
      throw new InvalidTemplateError(
        source,
        `parameters '${previous.name}' and '${name}' need a literal between them`,
      );
    }
    segments.push({ kind: "param", name, type: declared });
    cursor = close + 1;
  }

  const params = segments.flatMap((s) => (s.kind === "param" ? [{ name: s.name, type: s.type }] : []));
  if (params.length > 0 && !segments.some((s) => s.kind === "literal")) {
    throw new InvalidTemplateError(source, "a template needs at least one literal segment");
  }

  return { source, segments, params };
}

function coerce(value: string, type: ParamType): TemplateValue {
  switch (type) {
    case "int": {
      if (!/^[+-]?\d+$/.test(value)) return value;
      const n = Number(value);
      return Number.isSafeInteger(n) ? n : value;
    }
    case "float": {
      if (value.trim() === "") return value;
      const n = Number(value);
      return Number.isFinite(n) ? n : value;
    }
    case "bool":
      if (value === "true" || value === "1") return true;
      if (value === "false" || value === "0") return false;
      return value;
    case "bigint":
      return /^[+-]?\d+$/.test(value) ? BigInt(value) : value;
    default:
      return value;
  }
}

/**
 * Linear, non-backtracking match. Each slot captures up to the first
 * occurrence of the literal that follows it; the last slot takes the rest.
 * Returns null when the custom id does not fit the template.
 */
export function matchCustomId(
  template: CustomIdTemplate,
  customId: string,
): Record<string, TemplateValue> | null {
  const captured: string[] = [];
  let rest = customId;

  for (let i = 0; i < template.segments.length; i += 1) {
    const segment = template.segments[i];

    if (segment.kind === "literal") {
      if (!rest.startsWith(segment.text)) return null;
      rest = rest.slice(segment.text.length);
      continue;
    }

    const next = template.segments[i + 1];
    if (!next) {
      captured.push(rest);
      rest = "";
      continue;
    }
    // next is a literal: adjacent slots are rejected at parse time
    const text = next.kind === "literal" ? next.text : "";
    const idx = rest.indexOf(text);
    if (idx === -1) return null;
    captured.push(rest.slice(0, idx));
    rest = rest.slice(idx);
  }

  if (rest.length > 0) return null;
  if (captured.length !== template.params.length) return null;

  const values: Record<string, TemplateValue> = {};
  template.params.forEach((param, idx) => {
    values[param.name] = coerce(captured[idx], param.type);
  });
  return values;
}

export function formatCustomId(
  template: CustomIdTemplate,
  values: Record<string, TemplateValue>,
): string {
  return template.segments
    .map((segment) => {
      if (segment.kind === "literal") return segment.text;
      const value = values[segment.name];
      if (value === undefined) {
        throw new Error(`Missing value for custom id parameter '${segment.name}'`);
      }
      return String(value);
    })
    .join("");
}
