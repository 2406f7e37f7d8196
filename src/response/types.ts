import type { InteractionContext } from "../interactions/context";

export type ResponsePayload = Record<string, unknown>;

/**
 * A handler routine: receives the interaction and returns anything the
 * response resolver understands (an envelope, a string, an embed, a tuple...).
 */
export type HandlerRoutine = (ctx: InteractionContext) => unknown;

export const envelopeBrand: unique symbol = Symbol("interaction.response-envelope");

interface EnvelopeBase {
  readonly [envelopeBrand]: true;
  data: ResponsePayload;
}

export interface MessageEnvelope extends EnvelopeBase {
  kind: "message";
  type: 4 | 7;
}

export interface DeferredEnvelope extends EnvelopeBase {
  kind: "deferred";
  type: 5 | 6;
  ephemeral: boolean;
  /** Work to await in the background before editing the original response. */
  continuation?: HandlerRoutine;
}

export interface AutocompleteEnvelope extends EnvelopeBase {
  kind: "autocomplete";
  type: 8;
}

export interface ModalEnvelope extends EnvelopeBase {
  kind: "modal";
  type: 9;
}

export interface RawEnvelope extends EnvelopeBase {
  kind: "raw";
  type: number;
}

export type ResponseEnvelope =
  | MessageEnvelope
  | DeferredEnvelope
  | AutocompleteEnvelope
  | ModalEnvelope
  | RawEnvelope;

export type ResponseKind = ResponseEnvelope["kind"];

export interface WireResponse {
  type: number;
  data?: ResponsePayload;
}

export function isResponseEnvelope(value: unknown): value is ResponseEnvelope {
  return typeof value === "object" && value !== null && envelopeBrand in value;
}
