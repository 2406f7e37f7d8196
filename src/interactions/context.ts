import { AlreadyRespondedError } from "../dispatch/errors";
import { resolveResponse } from "../response/resolveResponse";
import type { ResponseEnvelope } from "../response/types";
import type { TemplateValue } from "../matching/customIdTemplate";
import type {
  InteractionCredentials,
  InteractionData,
  InteractionEvent,
  InteractionKind,
  InteractionUser,
} from "./types";

/**
 * One inbound interaction as handlers see it. Created per request and
 * discarded once its response and any background follow-up are done.
 */
export class InteractionContext {
  readonly id: string;
  readonly credentials: InteractionCredentials;
  readonly data: InteractionData;
  readonly guildId: string | null;
  readonly channelId: string | null;
  readonly user: InteractionUser | null;
  readonly locale: string | null;
  readonly guildLocale: string | null;
  readonly message: Record<string, unknown> | null;
  readonly member: Record<string, unknown> | null;

  /** Values captured from the custom-id template that selected the handler. */
  params: Record<string, TemplateValue> = {};

  private respondedFlag = false;
  private committedResponse: ResponseEnvelope | null = null;

  constructor(event: InteractionEvent) {
    this.id = event.id;
    this.credentials = event.credentials;
    this.data = event.data;
    this.guildId = event.guildId;
    this.channelId = event.channelId;
    this.user = event.user;
    this.locale = event.locale;
    this.guildLocale = event.guildLocale;
    this.message = event.message;
    this.member = event.member;
  }

  get kind(): InteractionKind {
    return this.data.kind;
  }

  /** Command name or custom id, whichever the interaction kind carries. */
  get key(): string {
    return this.data.kind === "command" || this.data.kind === "autocomplete"
      ? this.data.name
      : this.data.customId;
  }

  get subType(): number | undefined {
    switch (this.data.kind) {
      case "command":
        return this.data.commandType;
      case "component":
        return this.data.componentType;
      default:
        return undefined;
    }
  }

  get responded(): boolean {
    return this.respondedFlag;
  }

  get committed(): ResponseEnvelope | null {
    return this.committedResponse;
  }

  /**
   * Claims the initial response slot. Throws on any second claim.
   */
  markResponded(): void {
    if (this.respondedFlag) {
      throw new AlreadyRespondedError(this.id);
    }
    this.respondedFlag = true;
  }

  /**
   * Commits a response from inside a handler. The dispatcher sends it when
   * the handler returns nothing (or returns this envelope), or as soon as the
   * auto-defer timer fires while the handler is still running.
   */
  respond(value: unknown): ResponseEnvelope {
    const envelope = resolveResponse(value);
    if (envelope.kind === "deferred") {
      throw new TypeError("Return deferred() from the handler instead of committing it");
    }
    this.markResponded();
    this.committedResponse = envelope;
    return envelope;
  }

  /** Option value for a command or autocomplete interaction, searching nested subcommands. */
  option(name: string): string | number | boolean | undefined {
    if (this.data.kind !== "command" && this.data.kind !== "autocomplete") return undefined;
    const stack = [...this.data.options];
    while (stack.length > 0) {
      const opt = stack.shift();
      if (!opt) break;
      if (opt.name === name && opt.value !== undefined) return opt.value;
      if (opt.options) stack.push(...opt.options);
    }
    return undefined;
  }
}
