import type { InteractionCredentials } from "../interactions/types";
import { createFetchWithRetry, readJsonBody } from "../lib/fetchWithRetry";
import type { FetchFn } from "../lib/fetchWithRetry";
import { createSpineLogger } from "../lib/logging";
import type { Logger } from "../lib/logging";
import type { ResponsePayload } from "../response/types";
import { FollowupHttpError } from "./errors";
import type { FollowupClient } from "./types";

export type { FetchFn };

export interface FollowupClientOptions {
  baseUrl: string;
  /** Overrides the application id carried by each interaction. */
  applicationId?: string;
  maxRetries: number;
  logger?: Logger;
  fetchImpl?: FetchFn;
  /** First backoff step; doubles on each retry. */
  retryBaseDelayMs?: number;
}

/**
 * Webhook client for the edit-original and follow-up endpoints. Interaction
 * tokens authorize these calls, so no bot token is sent.
 */
export function createFollowupClient(options: FollowupClientOptions): FollowupClient {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const logger = (options.logger ?? createSpineLogger({ app: "interactions", domain: "" })).withDomain("followup");
  const doFetchWithRetry = createFetchWithRetry({
    maxRetries: options.maxRetries,
    logger,
    fetchImpl: options.fetchImpl,
    retryBaseDelayMs: options.retryBaseDelayMs,
  });

  async function request(method: "PATCH" | "POST", path: string, payload: ResponsePayload): Promise<unknown> {
    const response = await doFetchWithRetry(`${baseUrl}${path}`, {
      method,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const body = await response.text();
      // Tokens are part of the path; log only the endpoint shape.
      logger.log("error", "request_failed", { method, status: response.status });
      throw new FollowupHttpError({ method, path: path.split("/").slice(0, 3).join("/"), status: response.status, body });
    }

    logger.log("info", "request_succeeded", { method, status: response.status });
    return readJsonBody(response);
  }

  function webhookPath(credentials: InteractionCredentials): string {
    const applicationId = options.applicationId ?? credentials.applicationId;
    return `/webhooks/${encodeURIComponent(applicationId)}/${encodeURIComponent(credentials.token)}`;
  }

  return {
    editOriginalResponse(credentials, payload) {
      return request("PATCH", `${webhookPath(credentials)}/messages/@original`, payload);
    },
    sendFollowupMessage(credentials, payload) {
      return request("POST", webhookPath(credentials), payload);
    },
  };
}
