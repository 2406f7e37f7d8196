import type { InteractionCredentials } from "../interactions/types";
import type { ResponsePayload } from "../response/types";

/**
 * Delivery endpoints used once the initial response slot is spent or reserved.
 */
export interface FollowupClient {
  editOriginalResponse(credentials: InteractionCredentials, payload: ResponsePayload): Promise<unknown>;
  sendFollowupMessage(credentials: InteractionCredentials, payload: ResponsePayload): Promise<unknown>;
}
