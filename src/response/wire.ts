import { ResponseType } from "../interactions/types";
import type { InteractionKind } from "../interactions/types";
import { UndeliverableResponseError } from "./errors";
import type { ResponseEnvelope, ResponsePayload, WireResponse } from "./types";

/** Deferred acknowledgment code for an interaction kind. */
export function deferredTypeFor(kind: InteractionKind): 5 | 6 {
  return kind === "component" ? ResponseType.DeferredUpdateMessage : ResponseType.DeferredChannelMessage;
}

/**
 * Serializes an envelope for the initial response slot. Deferred
 * acknowledgments always get the code that matches the interaction kind,
 * whatever code the envelope was built with.
 */
export function toWireResponse(envelope: ResponseEnvelope, kind: InteractionKind): WireResponse {
  if (envelope.kind === "deferred") {
    return { type: deferredTypeFor(kind), data: { ...envelope.data } };
  }
  if (envelope.kind === "raw" && Object.keys(envelope.data).length === 0) {
    return { type: envelope.type };
  }
  return { type: envelope.type, data: { ...envelope.data } };
}

/** Payload for an edit-original or follow-up message call. */
export function toFollowupPayload(envelope: ResponseEnvelope): ResponsePayload {
  if (envelope.kind === "message" || envelope.kind === "raw") {
    return { ...envelope.data };
  }
  throw new UndeliverableResponseError(envelope.kind);
}
