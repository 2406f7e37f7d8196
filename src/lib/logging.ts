export type LogLevel = "info" | "warn" | "error";

export type LogSink = (line: string) => void;

export interface Logger {
  log(level: LogLevel, event: string, fields?: Record<string, unknown>): void;
  withDomain(domain: string): Logger;
  set(fields: Record<string, unknown>): void;
}

export interface RequestContext extends Logger {
  app: string;
  requestId: string;
  startedAtMs: number;
  domain: string;
  base: Record<string, unknown>;
  withDomain(domain: string): RequestContext;
}

// eslint-disable-next-line no-console
const consoleSink: LogSink = (line) => console.log(line);

function mergeDomain(base: string, next: string): string {
  if (!base) return next;
  if (!next) return base;
  return `${base}:${next}`;
}

function formatValue(value: unknown): string | null {
  if (value === undefined) return null;
  if (value === null) return "null";
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "string") {
    const needsQuotes = /\s/.test(value) || /["=]/.test(value);
    if (!needsQuotes) return value;
    return `"${value.replace(/"/g, '\\"')}"`;
  }
  if (value instanceof Error) {
    const msg = value.message || String(value);
    return `"${msg.replace(/"/g, '\\"')}"`;
  }
  const json = JSON.stringify(value);
  return json ?? '"[unserializable]"';
}

export function formatSpineLines(args: {
  level: LogLevel;
  app: string;
  domain: string;
  action: string;
  requestId?: string;
  base?: Record<string, unknown>;
  fields?: Record<string, unknown>;
}): string {
  const domain = args.domain || "request";
  const rid = args.requestId ? args.requestId.slice(0, 8) : undefined;
  const mergedFields = { ...(args.base ?? {}), ...(args.fields ?? {}) };
  const interactionRaw = mergedFields.interaction;
  const headerParts = [
    `${args.level.toUpperCase()}: [${args.app}:${domain}] ${args.action}`,
    rid ? `rid=${rid}` : null,
    typeof interactionRaw === "string" && interactionRaw.trim()
      ? `interaction="${interactionRaw.replace(/"/g, '\\"')}"`
      : null,
  ].filter(Boolean);
  const lines: string[] = [headerParts.join(" ")];

  for (const [key, value] of Object.entries(mergedFields)) {
    if (key === "interaction") continue;
    const formatted = formatValue(value);
    if (formatted === null) continue;
    lines.push(`  ${key}=${formatted}`);
  }

  return lines.join("\n");
}

export function createSpineLogger(args: {
  app: string;
  domain: string;
  requestId?: string;
  sink?: LogSink;
}): Logger {
  const { app, domain, requestId } = args;
  const sink = args.sink ?? consoleSink;
  let base: Record<string, unknown> = {};
  return {
    log(level: LogLevel, event: string, fields?: Record<string, unknown>) {
      sink(formatSpineLines({ level, app, domain, action: event, requestId, base, fields }));
    },
    withDomain(nextDomain: string) {
      const child = createSpineLogger({
        app,
        domain: mergeDomain(domain, nextDomain),
        requestId,
        sink,
      });
      child.set(base);
      return child;
    },
    set(fields: Record<string, unknown>) {
      base = { ...base, ...fields };
    },
  };
}

function buildRequestContext(args: {
  app: string;
  requestId: string;
  startedAtMs: number;
  domain: string;
  base: Record<string, unknown>;
  sink: LogSink;
}): RequestContext {
  const base = args.base;
  const logger = createSpineLogger({
    app: args.app,
    domain: args.domain,
    requestId: args.requestId,
    sink: args.sink,
  });
  logger.set(base);

  return {
    app: args.app,
    requestId: args.requestId,
    startedAtMs: args.startedAtMs,
    domain: args.domain,
    base,
    log(level: LogLevel, event: string, fields?: Record<string, unknown>) {
      logger.log(level, event, fields);
    },
    withDomain(nextDomain: string) {
      return buildRequestContext({
        ...args,
        domain: mergeDomain(args.domain, nextDomain),
      });
    },
    set(fields: Record<string, unknown>) {
      Object.assign(base, fields);
      logger.set(fields);
    },
  };
}

export function createRequestContext(args: {
  app: string;
  requestId: string;
  sink?: LogSink;
}): RequestContext {
  return buildRequestContext({
    app: args.app,
    requestId: args.requestId,
    startedAtMs: Date.now(),
    domain: "",
    base: {},
    sink: args.sink ?? consoleSink,
  });
}

/**
 * Error fields in the shape every module logs them; stacks only with DEBUG_STACKS=1.
 */
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return {
      error: err.message,
      error_name: err.name,
      error_stack: process.env.DEBUG_STACKS === "1" ? err.stack : undefined,
    };
  }
  return { error: String(err) };
}
