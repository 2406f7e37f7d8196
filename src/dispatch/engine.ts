import type { InteractionContext } from "../interactions/context";
import { createSpineLogger } from "../lib/logging";
import type { Logger } from "../lib/logging";
import type { FollowupClient } from "../followup/types";
import type { HandlerRegistry } from "../registry/registry";
import type { Registration } from "../registry/types";
import { deferred } from "../response/builders";
import { resolveResponse } from "../response/resolveResponse";
import type { DeferredEnvelope, ResponseEnvelope, WireResponse } from "../response/types";
import { toFollowupPayload, toWireResponse } from "../response/wire";
import { canAutoDefer, resolveDeferPolicy } from "./deferPolicy";
import type { DeferPolicy } from "./deferPolicy";
import { AlreadyRespondedError, EmptyResponseError } from "./errors";
import { raceWithTimeout } from "./race";
import { BackgroundSupervisor } from "./supervisor";

export type InteractionState =
  | "RECEIVED"
  | "ROUTED"
  | "EXECUTING"
  | "RESPONDED_IMMEDIATE"
  | "DEFERRED"
  | "FOLLOWUP_SENT"
  | "HANDLER_NOT_FOUND";

interface Delivery {
  /** The transport has written the response. */
  delivered(): void;
  /** The transport gave up on the response; background work is skipped. */
  abandoned(): void;
}

export type DispatchResult =
  | { kind: "not_found" }
  | ({ kind: "responded" | "deferred"; response: WireResponse } & Delivery);

export interface InteractionDispatcherOptions {
  registry: HandlerRegistry;
  followups: FollowupClient;
  defaults: DeferPolicy;
  logger?: Logger;
  supervisor?: BackgroundSupervisor;
}

interface DeliveryGate extends Delivery {
  /** Resolves true once delivered, false if abandoned. */
  settled: Promise<boolean>;
}

function createDeliveryGate(): DeliveryGate {
  let settle: (ok: boolean) => void = () => undefined;
  const settled = new Promise<boolean>((resolve) => {
    settle = resolve;
  });
  return {
    settled,
    delivered: () => settle(true),
    abandoned: () => settle(false),
  };
}

function describeRegistration(registration: Registration): string {
  return registration.matchKey === null
    ? `${registration.kind}:<generic>`
    : `${registration.kind}:${registration.matchKey}`;
}

/**
 * Owns one interaction from handler lookup to its last follow-up.
 */
export class InteractionDispatcher {
  readonly supervisor: BackgroundSupervisor;
  private readonly registry: HandlerRegistry;
  private readonly followups: FollowupClient;
  private readonly defaults: DeferPolicy;
  private readonly logger: Logger;

  constructor(options: InteractionDispatcherOptions) {
    this.registry = options.registry;
    this.followups = options.followups;
    this.defaults = { ...options.defaults };
    this.logger = options.logger ?? createSpineLogger({ app: "interactions", domain: "" });
    this.supervisor = options.supervisor ?? new BackgroundSupervisor(this.logger);
  }

  async dispatch(ctx: InteractionContext, options: { logger?: Logger } = {}): Promise<DispatchResult> {
    const log = (options.logger ?? this.logger).withDomain("dispatch");
    log.set({ interaction: `${ctx.kind}:${ctx.key}`, interaction_id: ctx.id });
    const transition = (state: InteractionState, fields?: Record<string, unknown>) =>
      log.log(state === "HANDLER_NOT_FOUND" ? "warn" : "info", "state_changed", { state, ...fields });

    transition("RECEIVED", { sub_type: ctx.subType });

    const resolution = this.registry.resolve({ kind: ctx.kind, key: ctx.key, subType: ctx.subType });
    if (!resolution) {
      transition("HANDLER_NOT_FOUND");
      return { kind: "not_found" };
    }

    const { registration } = resolution;
    ctx.params = resolution.params;
    transition("ROUTED", { via: resolution.via, handler: describeRegistration(registration) });

    const task: Promise<unknown> = Promise.resolve().then(() => registration.routine(ctx));
    const policy = resolveDeferPolicy(registration.defer, this.defaults);
    const autoDefer = policy.enabled && canAutoDefer(ctx.kind);
    transition("EXECUTING", { auto_defer: autoDefer, timeout_ms: autoDefer ? policy.timeoutMs : undefined });

    const gate = createDeliveryGate();

    if (autoDefer) {
      const outcome = await raceWithTimeout(task, policy.timeoutMs);
      if (outcome.kind === "timed_out") {
        const committed = ctx.committed;
        if (committed) {
          return this.respondCommitted(ctx, registration, committed, task, gate, log, transition);
        }
        const response = this.acknowledgeDeferred(ctx, deferred({ ephemeral: policy.ephemeral }));
        transition("DEFERRED", { reason: "timeout", ephemeral: policy.ephemeral });
        this.supervisor.spawn(
          "deferred_response",
          () => this.completeDeferred(ctx, registration, gate.settled, () => task, log),
          log,
        );
        return { kind: "deferred", response, delivered: gate.delivered, abandoned: gate.abandoned };
      }
      return this.respond(ctx, registration, outcome.value, gate, log, transition);
    }

    return this.respond(ctx, registration, await task, gate, log, transition);
  }

  private respond(
    ctx: InteractionContext,
    registration: Registration,
    value: unknown,
    gate: DeliveryGate,
    log: Logger,
    transition: (state: InteractionState, fields?: Record<string, unknown>) => void,
  ): DispatchResult {
    const envelope = this.settle(ctx, registration, value);

    if (envelope.kind === "deferred") {
      const response = this.acknowledgeDeferred(ctx, envelope);
      transition("DEFERRED", { reason: "handler", ephemeral: envelope.ephemeral });
      const continuation = envelope.continuation;
      if (continuation) {
        this.supervisor.spawn(
          "deferred_response",
          () =>
            this.completeDeferred(
              ctx,
              registration,
              gate.settled,
              async () => continuation(ctx),
              log,
            ),
          log,
        );
      } else if (registration.followup) {
        this.spawnFollowup(ctx, registration, gate.settled, log);
      }
      return { kind: "deferred", response, delivered: gate.delivered, abandoned: gate.abandoned };
    }

    if (envelope !== ctx.committed) {
      ctx.markResponded();
    }
    const response = toWireResponse(envelope, ctx.kind);
    transition("RESPONDED_IMMEDIATE", { response_type: response.type });

    if (registration.followup) {
      this.spawnFollowup(ctx, registration, gate.settled, log);
    }
    return { kind: "responded", response, delivered: gate.delivered, abandoned: gate.abandoned };
  }

  /**
   * The routine committed a response and is still running when the defer
   * timer fires: the committed response goes out now and whatever the routine
   * returns later is sent as a follow-up message.
   */
  private respondCommitted(
    ctx: InteractionContext,
    registration: Registration,
    committed: ResponseEnvelope,
    task: Promise<unknown>,
    gate: DeliveryGate,
    log: Logger,
    transition: (state: InteractionState, fields?: Record<string, unknown>) => void,
  ): DispatchResult {
    const response = toWireResponse(committed, ctx.kind);
    transition("RESPONDED_IMMEDIATE", { response_type: response.type, reason: "committed" });

    this.supervisor.spawn(
      "committed_remainder",
      async () => {
        if (!(await gate.settled)) {
          log.log("warn", "committed_remainder_skipped", { reason: "response_not_delivered" });
          return;
        }
        const value = await task;
        if (value !== undefined && value !== committed) {
          await this.followups.sendFollowupMessage(ctx.credentials, toFollowupPayload(resolveResponse(value)));
          log.log("info", "followup_message_sent", { source: "routine" });
        }
        await this.runFollowup(ctx, registration, log);
      },
      log,
    );
    return { kind: "responded", response, delivered: gate.delivered, abandoned: gate.abandoned };
  }

  /**
   * Picks the envelope for a finished routine: its return value, or the
   * response it committed through `ctx.respond` when it returned nothing
   * (or returned that same envelope).
   */
  private settle(ctx: InteractionContext, registration: Registration, value: unknown): ResponseEnvelope {
    const committed = ctx.committed;
    if (value === undefined || (committed !== null && value === committed)) {
      if (committed) return committed;
      throw new EmptyResponseError(describeRegistration(registration));
    }
    if (ctx.responded) {
      throw new AlreadyRespondedError(ctx.id);
    }
    return resolveResponse(value);
  }

  /** Deferred acknowledgments check the slot but leave it open. */
  private acknowledgeDeferred(ctx: InteractionContext, envelope: DeferredEnvelope): WireResponse {
    if (ctx.responded) {
      throw new AlreadyRespondedError(ctx.id);
    }
    return toWireResponse(envelope, ctx.kind);
  }

  private async completeDeferred(
    ctx: InteractionContext,
    registration: Registration,
    settled: Promise<boolean>,
    produce: () => Promise<unknown>,
    log: Logger,
  ): Promise<void> {
    if (!(await settled)) {
      log.log("warn", "deferred_response_skipped", { reason: "acknowledgment_not_delivered" });
      return;
    }

    let envelope = this.settle(ctx, registration, await produce());
    if (envelope.kind === "deferred" && envelope.continuation) {
      envelope = this.settle(ctx, registration, await envelope.continuation(ctx));
    }

    if (envelope.kind !== "deferred") {
      await this.followups.editOriginalResponse(ctx.credentials, toFollowupPayload(envelope));
      log.log("info", "state_changed", { state: "FOLLOWUP_SENT", delivery: "edit_original" });
    }

    await this.runFollowup(ctx, registration, log);
  }

  private spawnFollowup(
    ctx: InteractionContext,
    registration: Registration,
    settled: Promise<boolean>,
    log: Logger,
  ): void {
    this.supervisor.spawn(
      "followup_message",
      async () => {
        if (!(await settled)) {
          log.log("warn", "followup_skipped", { reason: "response_not_delivered" });
          return;
        }
        await this.runFollowup(ctx, registration, log);
      },
      log,
    );
  }

  private async runFollowup(ctx: InteractionContext, registration: Registration, log: Logger): Promise<void> {
    const followup = registration.followup;
    if (!followup) return;

    const value: unknown = await followup(ctx);
    if (value === undefined) return;

    await this.followups.sendFollowupMessage(ctx.credentials, toFollowupPayload(resolveResponse(value)));
    log.log("info", "followup_message_sent");
  }
}
