import { MessageFlags, ResponseType } from "../interactions/types";
import { Choice, Component, Embed, ResponseTypeTag, TextInput, layoutComponents } from "./elements";
import { UnsupportedResponseElementError } from "./errors";
import { envelopeBrand, isResponseEnvelope } from "./types";
import type { ResponseEnvelope, ResponsePayload } from "./types";

interface Accumulator {
  type: number | null;
  content?: string;
  embeds: Record<string, unknown>[];
  components: Component[];
  choices: Choice[];
  overrides: ResponsePayload;
}

function describeElement(element: unknown): string {
  if (element === null) return "null";
  if (typeof element !== "object") return typeof element;
  const ctor = Object.getPrototypeOf(element)?.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "object";
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function toChoice(item: unknown): Choice {
  if (item instanceof Choice) return item;
  if (typeof item === "string" || typeof item === "number") return new Choice(String(item), item);
  throw new UnsupportedResponseElementError(`${describeElement(item)} in choice list`);
}

function accumulate(acc: Accumulator, element: unknown): void {
  if (element instanceof ResponseTypeTag) {
    acc.type = element.code;
    return;
  }
  if (element instanceof Embed) {
    acc.embeds.push(element.toJSON());
    acc.type ??= ResponseType.ChannelMessage;
    return;
  }
  if (element instanceof Component) {
    acc.components.push(element);
    acc.type ??= element instanceof TextInput ? ResponseType.Modal : ResponseType.ChannelMessage;
    return;
  }
  if (typeof element === "string") {
    acc.content = element;
    acc.type ??= ResponseType.ChannelMessage;
    return;
  }
  if (element instanceof Choice) {
    acc.choices.push(element);
    acc.type ??= ResponseType.AutocompleteResult;
    return;
  }
  if (Array.isArray(element)) {
    acc.choices.push(...element.map(toChoice));
    acc.type ??= ResponseType.AutocompleteResult;
    return;
  }
  if (isPlainObject(element)) {
    Object.assign(acc.overrides, element);
    return;
  }
  throw new UnsupportedResponseElementError(describeElement(element));
}

function buildData(acc: Accumulator): ResponsePayload {
  const data: ResponsePayload = {};
  if (acc.content !== undefined) data.content = acc.content;
  if (acc.embeds.length > 0) data.embeds = acc.embeds;
  if (acc.components.length > 0) data.components = layoutComponents(acc.components);
  if (acc.choices.length > 0 || acc.type === ResponseType.AutocompleteResult) data.choices = acc.choices.map((c) => c.toJSON());
  return { ...data, ...acc.overrides };
}

function toEnvelope(type: number, data: ResponsePayload): ResponseEnvelope {
  switch (type) {
    case ResponseType.ChannelMessage:
      return { [envelopeBrand]: true, kind: "message", type: ResponseType.ChannelMessage, data };
    case ResponseType.UpdateMessage:
      return { [envelopeBrand]: true, kind: "message", type: ResponseType.UpdateMessage, data };
    case ResponseType.DeferredChannelMessage:
    case ResponseType.DeferredUpdateMessage: {
      const flags = typeof data.flags === "number" ? data.flags : 0;
      return {
        [envelopeBrand]: true,
        kind: "deferred",
        type:
          type === ResponseType.DeferredUpdateMessage
            ? ResponseType.DeferredUpdateMessage
            : ResponseType.DeferredChannelMessage,
        ephemeral: (flags & MessageFlags.Ephemeral) !== 0,
        data,
      };
    }
    case ResponseType.AutocompleteResult:
      return { [envelopeBrand]: true, kind: "autocomplete", type: ResponseType.AutocompleteResult, data };
    case ResponseType.Modal:
      return { [envelopeBrand]: true, kind: "modal", type: ResponseType.Modal, data };
    default:
      return { [envelopeBrand]: true, kind: "raw", type, data };
  }
}

/**
 * Turns whatever a handler returned into a response envelope.
 *
 * Envelopes pass through unchanged. Anything else is read as a tuple of
 * elements (a lone value is a one-element tuple): scalar fields are last
 * write wins, collections append, and the first element that implies a type
 * picks it unless a `ResponseTypeTag` says otherwise.
 */
export function resolveResponse(value: unknown): ResponseEnvelope {
  if (isResponseEnvelope(value)) return value;

  const acc: Accumulator = { type: null, embeds: [], components: [], choices: [], overrides: {} };
  const elements: unknown[] = Array.isArray(value) ? value : [value];

  for (const element of elements) {
    if (isResponseEnvelope(element)) {
      throw new UnsupportedResponseElementError("nested response envelope");
    }
    accumulate(acc, element);
  }

  return toEnvelope(acc.type ?? ResponseType.ChannelMessage, buildData(acc));
}
