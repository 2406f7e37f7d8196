import type { KeyObject } from "crypto";
import { WebhookAuthError, WebhookParseError } from "./errors";
import { normalizeInteraction } from "./normalizeInteraction";
import type { NormalizedInteraction } from "./normalizeInteraction";
import { verifyInteractionSignature } from "./verifySignature";

export { WebhookAuthError, WebhookParseError } from "./errors";
export { ed25519PublicKeyFromHex } from "./verifySignature";
export type { NormalizedInteraction } from "./normalizeInteraction";

export interface AuthenticateAndNormalizeInteractionArgs {
  publicKey: KeyObject;
  headers: Record<string, string | string[] | undefined>;
  rawBody: Buffer;
}

function headerValue(headers: AuthenticateAndNormalizeInteractionArgs["headers"], name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Webhook boundary: signature check and decoding only. Dispatch is the
 * router's decision.
 */
export function authenticateAndNormalizeInteraction(
  args: AuthenticateAndNormalizeInteractionArgs,
): NormalizedInteraction {
  const { publicKey, headers, rawBody } = args;

  const signature = headerValue(headers, "x-signature-ed25519");
  const timestamp = headerValue(headers, "x-signature-timestamp");
  if (!signature || !timestamp) {
    throw new WebhookAuthError("Missing request signature headers");
  }
  if (!verifyInteractionSignature({ publicKey, signature, timestamp, body: rawBody })) {
    throw new WebhookAuthError();
  }

  let payload: unknown;
  try {
    payload = JSON.parse(rawBody.toString("utf8"));
  } catch {
    throw new WebhookParseError("Interaction body is not valid JSON");
  }

  try {
    return normalizeInteraction(payload);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Invalid interaction payload";
    throw new WebhookParseError(message);
  }
}
