import crypto from "crypto";
import type { KeyObject } from "crypto";
import express from "express";
import type { Request, Response } from "express";
import type { InteractionDispatcher } from "../dispatch/engine";
import { InteractionContext } from "../interactions/context";
import { createRequestContext, describeError } from "../lib/logging";
import type { LogSink } from "../lib/logging";
import { WebhookAuthError, WebhookParseError, authenticateAndNormalizeInteraction } from "../webhook";

export interface InteractionsRouterOptions {
  publicKey: KeyObject;
  dispatcher: InteractionDispatcher;
  appName?: string;
  sink?: LogSink;
}

function getPayloadPreview(body: Buffer, limit = 500): string {
  const text = body.toString("utf8");
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

async function handleInteractionRequest(
  options: InteractionsRouterOptions,
  req: Request,
  res: Response,
): Promise<Response> {
  const requestId = crypto.randomUUID();
  const ctx = createRequestContext({ app: options.appName ?? "interactions", requestId, sink: options.sink });
  const startedAt = Date.now();
  const httpCtx = ctx.withDomain("http");
  const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

  res.on("finish", () => {
    httpCtx.log("info", "response_finished", {
      status_code: res.statusCode,
      duration_ms: Date.now() - startedAt,
    });
  });

  try {
    httpCtx.log("info", "request_received", { content_length: rawBody.length });

    if (process.env.DEBUG_PAYLOADS === "1") {
      httpCtx.withDomain("ingress").log("info", "payload_preview", { payload_preview: getPayloadPreview(rawBody) });
    }

    const normalized = authenticateAndNormalizeInteraction({
      publicKey: options.publicKey,
      headers: req.headers,
      rawBody,
    });

    if (normalized.type === "ping") {
      httpCtx.log("info", "ping_answered");
      return res.status(200).json({ type: 1 });
    }

    // The platform may hang up while a handler runs; that must reach the gate too.
    let closedEarly = false;
    const markClosed = () => {
      closedEarly = true;
    };
    res.once("close", markClosed);

    const interaction = new InteractionContext(normalized.event);
    const result = await options.dispatcher.dispatch(interaction, { logger: ctx });
    res.off("close", markClosed);

    if (result.kind === "not_found") {
      return res.status(404).json({
        ok: false,
        error: `No handler registered for ${interaction.kind} '${interaction.key}'`,
      });
    }

    if (closedEarly || res.destroyed || req.socket.destroyed) {
      httpCtx.log("warn", "client_disconnected", {
        outcome: result.kind,
        duration_ms: Date.now() - startedAt,
      });
      result.abandoned();
      return res;
    }

    // Background work for this interaction waits on the socket outcome.
    res.on("finish", result.delivered);
    res.on("close", result.abandoned);
    return res.status(200).json(result.response);
  } catch (err) {
    if (err instanceof WebhookAuthError) {
      httpCtx.log("warn", "auth_failed", { error: err.message });
      return res.status(401).json({ ok: false, error: err.message });
    }
    if (err instanceof WebhookParseError) {
      httpCtx.log("warn", "parse_failed", { error: err.message });
      return res.status(400).json({ ok: false, error: err.message });
    }
    httpCtx.log("error", "unexpected_error", describeError(err));
    return res.status(500).json({ ok: false, error: "Internal server error" });
  }
}

export function createInteractionsRouter(options: InteractionsRouterOptions): express.Router {
  const router = express.Router();

  router.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  router.post("/interactions", express.raw({ type: "*/*", limit: "1mb" }), async (req: Request, res: Response) => {
    return await handleInteractionRequest(options, req, res);
  });

  return router;
}
