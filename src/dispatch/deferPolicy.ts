import type { InteractionKind } from "../interactions/types";
import type { DeferOverride } from "../registry/types";

export interface DeferPolicy {
  enabled: boolean;
  timeoutMs: number;
  ephemeral: boolean;
}

/** Largest delay `setTimeout` honours; anything above fires almost at once. */
export const MAX_DEFER_TIMEOUT_MS = 2_147_483_647;

export function isValidDeferTimeout(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= MAX_DEFER_TIMEOUT_MS;
}

/** Each field falls back to the client default on its own. */
export function resolveDeferPolicy(override: DeferOverride, defaults: DeferPolicy): DeferPolicy {
  return {
    enabled: override.enabled ?? defaults.enabled,
    timeoutMs: override.timeoutMs ?? defaults.timeoutMs,
    ephemeral: override.ephemeral ?? defaults.ephemeral,
  };
}

/** Autocomplete and modal submissions are never auto-deferred. */
export function canAutoDefer(kind: InteractionKind): boolean {
  return kind === "command" || kind === "component";
}
