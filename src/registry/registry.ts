import { validateCommandDefinition } from "../commands/definitions";
import type { CommandDefinition } from "../commands/types";
import { isValidDeferTimeout } from "../dispatch/deferPolicy";
import { isTemplate, matchCustomId, parseCustomIdTemplate } from "../matching/customIdTemplate";
import type { CustomIdTemplate } from "../matching/customIdTemplate";
import type { InteractionKind } from "../interactions/types";
import type { Logger } from "../lib/logging";
import { DuplicateRegistrationError, InvalidRegistrationError } from "./errors";
import type { Registration, RegistrationInit, Resolution, ResolveQuery } from "./types";

type SubTypeKey = number | null;

const SUBTYPED_KINDS: ReadonlySet<string> = new Set(["command", "component"]);
const TEMPLATED_KINDS: ReadonlySet<string> = new Set(["component", "modal"]);

function describe(kind: string, matchKey: string | null, subType: SubTypeKey): string {
  const key = matchKey === null ? "<generic>" : `'${matchKey}'`;
  return subType === null ? `${kind} ${key}` : `${kind} ${key} (sub-type ${subType})`;
}

/**
 * Handler tables for one server. Mutated only while handlers are loaded or
 * unloaded; callers serialize those phases themselves.
 */
export class HandlerRegistry {
  private readonly exact = new Map<InteractionKind, Map<string, Registration[]>>();
  private readonly templates = new Map<InteractionKind, Registration[]>();
  private readonly generic = new Map<InteractionKind, Map<SubTypeKey, Registration>>();
  private catchAll: Registration | null = null;

  constructor(private readonly logger?: Logger) {}

  register(init: RegistrationInit): Registration {
    const registration = this.build(init);
    const { kind, matchKey, subType } = registration;

    if (kind === "catch_all") {
      if (this.catchAll) {
        throw new DuplicateRegistrationError("the catch-all");
      }
      this.catchAll = registration;
    } else if (matchKey === null) {
      const bySubType = this.generic.get(kind) ?? new Map<SubTypeKey, Registration>();
      if (bySubType.has(subType)) {
        throw new DuplicateRegistrationError(describe(kind, null, subType));
      }
      bySubType.set(subType, registration);
      this.generic.set(kind, bySubType);
    } else if (registration.template) {
      const list = this.templates.get(kind) ?? [];
      if (list.some((r) => r.matchKey === matchKey && r.subType === subType)) {
        throw new DuplicateRegistrationError(describe(kind, matchKey, subType));
      }
      list.push(registration);
      this.templates.set(kind, list);
    } else {
      const byKey = this.exact.get(kind) ?? new Map<string, Registration[]>();
      const list = byKey.get(matchKey) ?? [];
      if (list.some((r) => r.subType === subType)) {
        throw new DuplicateRegistrationError(describe(kind, matchKey, subType));
      }
      list.push(registration);
      byKey.set(matchKey, list);
      this.exact.set(kind, byKey);
    }

    this.logger?.log("info", "handler_registered", {
      kind,
      match_key: matchKey ?? undefined,
      sub_type: subType ?? undefined,
      templated: registration.template !== null,
    });
    return registration;
  }

  /** Removes exactly this registration. Unknown registrations are ignored. */
  deregister(registration: Registration): void {
    const { kind, matchKey, subType } = registration;
    let removed = false;

    if (kind === "catch_all") {
      if (this.catchAll === registration) {
        this.catchAll = null;
        removed = true;
      }
    } else if (matchKey === null) {
      const bySubType = this.generic.get(kind);
      if (bySubType?.get(subType) === registration) {
        bySubType.delete(subType);
        removed = true;
      }
    } else if (registration.template) {
      const list = this.templates.get(kind) ?? [];
      const idx = list.indexOf(registration);
      if (idx !== -1) {
        list.splice(idx, 1);
        removed = true;
      }
    } else {
      const byKey = this.exact.get(kind);
      const list = byKey?.get(matchKey) ?? [];
      const idx = list.indexOf(registration);
      if (idx !== -1) {
        list.splice(idx, 1);
        if (list.length === 0) byKey?.delete(matchKey);
        removed = true;
      }
    }

    if (removed) {
      this.logger?.log("info", "handler_deregistered", {
        kind,
        match_key: matchKey ?? undefined,
        sub_type: subType ?? undefined,
      });
    }
  }

  /** Definitions of every registered named command, in registration order per name. */
  commandDefinitions(): CommandDefinition[] {
    const byKey = this.exact.get("command");
    if (!byKey) return [];
    return [...byKey.values()].flatMap((list) => list.flatMap((r) => (r.command ? [r.command] : [])));
  }

  /**
   * First match in precedence order: exact key, custom-id template,
   * generic for the sub-type, generic, catch-all.
   */
  resolve(query: ResolveQuery): Resolution | null {
    const { kind, key } = query;
    const subType = query.subType ?? null;
    const fitsSubType = (r: Registration) => r.subType === null || r.subType === subType;

    const exact = this.exact.get(kind)?.get(key) ?? [];
    const exactHit =
      (subType !== null ? exact.find((r) => r.subType === subType) : undefined) ??
      exact.find((r) => r.subType === null);
    if (exactHit) {
      return { registration: exactHit, params: {}, via: "exact" };
    }

    for (const registration of this.templates.get(kind) ?? []) {
      if (!registration.template || !fitsSubType(registration)) continue;
      const params = matchCustomId(registration.template, key);
      if (params) {
        return { registration, params, via: "template" };
      }
    }

    const generic = this.generic.get(kind);
    if (subType !== null) {
      const narrowed = generic?.get(subType);
      if (narrowed) return { registration: narrowed, params: {}, via: "generic_subtype" };
    }
    const unfiltered = generic?.get(null);
    if (unfiltered) return { registration: unfiltered, params: {}, via: "generic" };

    if (this.catchAll) return { registration: this.catchAll, params: {}, via: "catch_all" };

    return null;
  }

  private build(init: RegistrationInit): Registration {
    const matchKey = init.matchKey ?? null;
    const subType = init.subType ?? null;

    if (init.kind === "catch_all" && (matchKey !== null || subType !== null)) {
      throw new InvalidRegistrationError("The catch-all handler takes no match key or sub-type");
    }
    if (subType !== null && !SUBTYPED_KINDS.has(init.kind)) {
      throw new InvalidRegistrationError(`${init.kind} handlers cannot filter by sub-type`);
    }
    if (matchKey !== null && matchKey.length === 0) {
      throw new InvalidRegistrationError("Match key must be a non-empty string");
    }

    let template: CustomIdTemplate | null = null;
    if (matchKey !== null && isTemplate(matchKey)) {
      if (!TEMPLATED_KINDS.has(init.kind)) {
        throw new InvalidRegistrationError(`${init.kind} handlers cannot use custom-id templates`);
      }
      template = parseCustomIdTemplate(matchKey, init.paramTypes);
    }

    const timeoutMs = init.defer?.timeoutMs;
    if (timeoutMs !== undefined && !isValidDeferTimeout(timeoutMs)) {
      throw new InvalidRegistrationError(`Invalid defer timeout: ${timeoutMs}`);
    }

    const command = init.command ?? null;
    if (command) {
      if (init.kind !== "command" || matchKey === null) {
        throw new InvalidRegistrationError("Only named command handlers can carry a command definition");
      }
      if (command.name !== matchKey || (subType !== null && command.type !== subType)) {
        throw new InvalidRegistrationError(
          `Command definition '${command.name}' does not match handler '${matchKey}'`,
        );
      }
      validateCommandDefinition(command);
    }

    return Object.freeze({
      kind: init.kind,
      matchKey,
      subType,
      routine: init.routine,
      defer: Object.freeze({ ...(init.defer ?? {}) }),
      followup: init.followup ?? null,
      template,
      command,
    });
  }
}
