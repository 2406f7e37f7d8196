import { MessageFlags, ResponseType } from "../interactions/types";
import { layoutComponents } from "./elements";
import type { Choice, Component, Embed } from "./elements";
import { envelopeBrand } from "./types";
import type {
  AutocompleteEnvelope,
  DeferredEnvelope,
  HandlerRoutine,
  MessageEnvelope,
  ModalEnvelope,
  RawEnvelope,
  ResponsePayload,
} from "./types";

export interface MessageInit {
  content?: string;
  embeds?: Embed[];
  components?: Component[];
  ephemeral?: boolean;
  /** Update the message the component is attached to instead of sending a new one. */
  update?: boolean;
}

export function message(init: MessageInit | string): MessageEnvelope {
  const opts = typeof init === "string" ? { content: init } : init;
  const data: ResponsePayload = {};
  if (opts.content !== undefined) data.content = opts.content;
  if (opts.embeds && opts.embeds.length > 0) data.embeds = opts.embeds.map((e) => e.toJSON());
  if (opts.components && opts.components.length > 0) data.components = layoutComponents(opts.components);
  if (opts.ephemeral) data.flags = MessageFlags.Ephemeral;

  return {
    [envelopeBrand]: true,
    kind: "message",
    type: opts.update ? ResponseType.UpdateMessage : ResponseType.ChannelMessage,
    data,
  };
}

export function deferred(
  init: { ephemeral?: boolean; continuation?: HandlerRoutine } = {},
): DeferredEnvelope {
  const ephemeral = init.ephemeral ?? false;
  return {
    [envelopeBrand]: true,
    kind: "deferred",
    // Rewritten per interaction kind when the response is serialized.
    type: ResponseType.DeferredChannelMessage,
    ephemeral,
    data: ephemeral ? { flags: MessageFlags.Ephemeral } : {},
    continuation: init.continuation,
  };
}

export function autocomplete(choices: Choice[]): AutocompleteEnvelope {
  return {
    [envelopeBrand]: true,
    kind: "autocomplete",
    type: ResponseType.AutocompleteResult,
    data: { choices: choices.map((c) => c.toJSON()) },
  };
}

export function modal(init: { customId: string; title: string; components: Component[] }): ModalEnvelope {
  return {
    [envelopeBrand]: true,
    kind: "modal",
    type: ResponseType.Modal,
    data: {
      custom_id: init.customId,
      title: init.title,
      components: layoutComponents(init.components),
    },
  };
}

/** Passes a response through untouched. */
export function raw(type: number, data: ResponsePayload = {}): RawEnvelope {
  return { [envelopeBrand]: true, kind: "raw", type, data };
}
