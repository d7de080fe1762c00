import { Hono, type Context } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { GatewayConfig } from "../config/types.js";
import { componentLogger, type Logger } from "../logging/logger.js";
import type { ActiveSessionStore } from "../sessions/active-store.js";
import type { ArchiveStore } from "../sessions/archive-store.js";
import { StorageError } from "../sessions/errors.js";
import type { FinalizationEngine } from "../sessions/finalizer.js";
import type { ScamIntelStore } from "../sessions/intel-store.js";
import type { GatewayMetrics } from "./metrics.js";
import type { TurnProcessor } from "./turn.js";

export interface ApiServerDeps {
  turns: TurnProcessor;
  engine: FinalizationEngine;
  active: ActiveSessionStore;
  archive: ArchiveStore;
  intel: ScamIntelStore;
  metrics: GatewayMetrics;
  logger: Logger;
  config: GatewayConfig;
  version: string;
}

const senderSchema = z.enum(["scammer", "user"]).catch("scammer");

const chatBodySchema = z.object({
  sessionId: z.string().optional(),
  session_id: z.string().optional(),
  message: z
    .union([
      z.string(),
      z.object({ sender: senderSchema.optional(), text: z.string().optional() }),
    ])
    .optional(),
  text: z.string().optional(),
  content: z.string().optional(),
  conversationHistory: z
    .array(z.object({ sender: senderSchema, text: z.string().catch("") }))
    .catch([])
    .optional(),
  metadata: z
    .object({
      channel: z.string().optional(),
      language: z.string().optional(),
      locale: z.string().optional(),
    })
    .optional(),
});

type ChatBody = z.infer<typeof chatBodySchema>;

const sessionRefSchema = z.object({
  sessionId: z.string().optional(),
  session_id: z.string().optional(),
});

const archiveQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).catch(50),
  offset: z.coerce.number().int().min(0).catch(0),
});

class InvalidJsonError extends Error {
  constructor() {
    super("Invalid JSON format");
    this.name = "InvalidJsonError";
  }
}

/** An empty body reads as `{}`. */
async function readJson(c: Context): Promise<unknown> {
  const raw = await c.req.text();
  if (!raw.trim()) return {};
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidJsonError();
  }
}

function messageText(body: ChatBody): string {
  if (typeof body.message === "string") return body.message;
  if (body.message) return body.message.text ?? "";
  return body.text || body.content || "";
}

export class ApiServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly deps: ApiServerDeps;
  private readonly logger: Logger;

  constructor(deps: ApiServerDeps) {
    this.deps = deps;
    this.logger = componentLogger(deps.logger, "api");
    this.app = new Hono();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    const { config, metrics } = this.deps;
    const logger = this.logger;

    this.app.use("*", async (_c, next) => {
      metrics.inc("requests");
      await next();
    });

    this.app.use("/api/*", async (c, next) => {
      if (!config.apiKey) return next();
      const key = c.req.header("x-api-key");
      if (!key) {
        logger.warn({ path: c.req.path }, "Request without API key");
        return c.json({ status: "error", message: "Missing x-api-key header" }, 401);
      }
      if (key !== config.apiKey) {
        logger.warn({ path: c.req.path }, "Invalid API key");
        return c.json({ status: "error", message: "Invalid API key" }, 401);
      }
      return next();
    });

    this.app.onError((err, c) => {
      if (err instanceof InvalidJsonError) {
        return c.json({ status: "error", message: err.message }, 400);
      }
      const sessionId = err instanceof StorageError ? err.sessionId : undefined;
      logger.error({ err, sessionId, path: c.req.path }, "Request failed");
      return c.json({ status: "error", message: err.message }, 500);
    });
  }

  private setupRoutes(): void {
    const { turns, engine, active, archive, intel, metrics, version } = this.deps;

    this.app.get("/health", (c) =>
      c.json({
        status: "ok",
        version,
        uptime: metrics.uptimeMs(),
        activeSessions: active.count(),
      }),
    );

    this.app.get("/ping", (c) => c.json({ status: "pong", timestamp: new Date().toISOString() }));

    this.app.get("/metrics", (c) => {
      c.header("Content-Type", "text/plain; charset=utf-8");
      return c.text(
        metrics.render({ activeSessions: active.count(), pendingReports: intel.listPending().length }),
      );
    });

    this.app.post("/api/chat", async (c) => {
      const parsed = chatBodySchema.safeParse(await readJson(c));
      if (!parsed.success) {
        return c.json(
          { status: "error", message: "Invalid request", details: parsed.error.flatten() },
          400,
        );
      }
      const body = parsed.data;
      const sender = typeof body.message === "object" ? body.message.sender : undefined;

      const result = await turns.handle({
        sessionId: body.sessionId || body.session_id,
        text: messageText(body),
        sender,
        history: body.conversationHistory,
        metadata: body.metadata,
      });
      return c.json({ status: "success", reply: result.reply });
    });

    this.app.post("/api/end-session", async (c) => {
      const parsed = sessionRefSchema.safeParse(await readJson(c));
      const sessionId = parsed.success ? parsed.data.sessionId || parsed.data.session_id : undefined;
      if (!sessionId) {
        return c.json({ status: "error", message: "sessionId is required" }, 400);
      }

      const result = await engine.finalize(sessionId, true);
      if (result.status === "not_found") {
        return c.json({ status: "error", message: `Session ${sessionId} not found` }, 404);
      }
      return c.json({
        status: "success",
        message: `Session ${sessionId} finalized`,
        wasScam: result.isScam,
        scamFlags: result.scamFlags,
        totalMessages: result.totalMessages,
        reported: result.reported,
      });
    });

    this.app.get("/api/session-status/:id", (c) => {
      const sessionId = c.req.param("id");
      const session = active.getFullSession(sessionId);
      if (!session) {
        return c.json({ status: "error", message: `Session ${sessionId} not found` }, 404);
      }
      return c.json({
        status: "success",
        sessionId,
        scamFlags: session.scamFlags,
        isConfirmedScam: session.isConfirmedScam,
        messageCount: session.messages.length,
        extractedIntelligence: session.intelligence.evidence,
        agentNotes: session.intelligence.agentNotes,
      });
    });

    this.app.post("/api/finalize-timeout", async (c) => {
      const count = await engine.finalizeTimedOut();
      return c.json({
        status: "success",
        finalizedCount: count,
        message: `Finalized ${count} timed-out session(s)`,
      });
    });

    this.app.post("/api/push-pending", async (c) => {
      const stats = await engine.pushPending();
      return c.json({ status: "success", ...stats });
    });

    this.app.get("/api/archive", (c) => {
      const { limit, offset } = archiveQuerySchema.parse({
        limit: c.req.query("limit"),
        offset: c.req.query("offset"),
      });
      return c.json({
        status: "success",
        total: archive.count(),
        sessions: archive.list(limit, offset),
      });
    });

    this.app.get("/api/intel/pending", (c) =>
      c.json({ status: "success", pending: intel.listPending() }),
    );

    this.app.post("/api/clear-all", (c) => {
      const cleared = active.clearAll();
      this.logger.warn({ cleared }, "Active sessions cleared");
      return c.json({ status: "success", cleared });
    });
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.deps.config.port,
      hostname: this.deps.config.hostname,
    });
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}
