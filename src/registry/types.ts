import type { CommandDefinition } from "../commands/types";
import type { CustomIdTemplate, ParamType, TemplateValue } from "../matching/customIdTemplate";
import type { HandlerKind, InteractionKind } from "../interactions/types";
import type { HandlerRoutine } from "../response/types";

/**
 * Per-handler auto-defer override. An absent field inherits the client default.
 */
export interface DeferOverride {
  enabled?: boolean;
  timeoutMs?: number;
  ephemeral?: boolean;
}

export interface RegistrationInit {
  kind: HandlerKind;
  /** Command name, custom id or custom-id template. Absent registers a generic fallback. */
  matchKey?: string;
  /** Command type for commands, component type for components. */
  subType?: number;
  routine: HandlerRoutine;
  defer?: DeferOverride;
  /** Runs after the primary response has been delivered; its result is sent as a new message. */
  followup?: HandlerRoutine;
  paramTypes?: Record<string, ParamType>;
  /** Definition synced to the platform; named command handlers only. */
  command?: CommandDefinition;
}

export interface Registration {
  readonly kind: HandlerKind;
  readonly matchKey: string | null;
  readonly subType: number | null;
  readonly routine: HandlerRoutine;
  readonly defer: Readonly<DeferOverride>;
  readonly followup: HandlerRoutine | null;
  readonly template: CustomIdTemplate | null;
  readonly command: CommandDefinition | null;
}

export interface ResolveQuery {
  kind: InteractionKind;
  key: string;
  subType?: number;
}

export interface Resolution {
  registration: Registration;
  params: Record<string, TemplateValue>;
  /** Which step of the fallback chain produced the match. */
  via: "exact" | "template" | "generic_subtype" | "generic" | "catch_all";
}
