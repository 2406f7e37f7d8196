export * from "./builders";
export * from "./elements";
export * from "./errors";
export { resolveResponse } from "./resolveResponse";
export { isResponseEnvelope } from "./types";
export type * from "./types";
export { deferredTypeFor, toFollowupPayload, toWireResponse } from "./wire";
