import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import { ConfigError, NoEligibleModelError, RoutingAbortedError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ModelStore } from "../models/store.js";
import { allEntries } from "../router/registry.js";
import { decisionHeaders, decisionSummary, route } from "../router/index.js";
import type { RoutingDecision, RoutingSettings } from "../router/types.js";
import type { DecisionLog } from "../storage/stats.js";
import type { ChatCompletionRequest, DecisionRecord, ModelInvoker } from "../types.js";
import { doAuditLog, logDecision, readBody, sendError, sendJson } from "./helpers.js";

export type ServerContext = {
    store: ModelStore;
    client: ModelInvoker;
    decisions?: DecisionLog;
    /** Re-reads configuration for POST /admin/reload; without it reload only re-fetches models */
    loadSettings?: () => RoutingSettings;
};

const contentPartSchema = z.object({ type: z.string() }).passthrough();

const chatRequestSchema = z
    .object({
        model: z.string().optional(),
        messages: z
            .array(
                z
                    .object({
                        role: z.enum(["system", "developer", "user", "assistant", "tool"]),
                        content: z.union([z.string(), z.array(contentPartSchema), z.null()]),
                        name: z.string().optional(),
                    })
                    .passthrough(),
            )
            .min(1),
        tools: z
            .array(
                z
                    .object({
                        type: z.string(),
                        function: z
                            .object({
                                name: z.string(),
                                description: z.string().optional(),
                                parameters: z.unknown().optional(),
                            })
                            .passthrough()
                            .optional(),
                    })
                    .passthrough(),
            )
            .optional(),
        functions: z.array(z.object({ name: z.string() }).passthrough()).optional(),
        temperature: z.number().optional(),
        max_tokens: z.number().int().positive().optional(),
        stream: z.boolean().optional(),
    })
    .passthrough();

function tryParseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

function parseChatRequest(text: string): ChatCompletionRequest | string {
    const raw = tryParseJson(text);
    if (raw === undefined) return "Request body is not valid JSON";
    const parsed = chatRequestSchema.safeParse(raw);
    if (!parsed.success) {
        return parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    }
    return parsed.data;
}

// ── POST /v1/chat/completions ───────────────────────────────────────

export async function handleChatCompletion(
    ctx: ServerContext,
    req: IncomingMessage,
    res: ServerResponse,
): Promise<void> {
    const body = parseChatRequest(await readBody(req));
    if (typeof body === "string") {
        sendError(res, 400, "invalid_request", body);
        return;
    }

    const controller = new AbortController();
    res.on("close", () => {
        if (!res.writableEnded) controller.abort();
    });

    const startTime = Date.now();
    const requestedModel = body.model ?? null;
    let decision: RoutingDecision;
    try {
        decision = await route(body, {
            generation: ctx.store.current(),
            invoker: ctx.client,
            signal: controller.signal,
        });
    } catch (err) {
        if (err instanceof RoutingAbortedError) {
            logger.debug("Client disconnected during classification; decision dropped");
            return;
        }
        if (err instanceof NoEligibleModelError) {
            logger.error(err.message);
            sendError(res, 503, err.code, err.message);
            return;
        }
        throw err;
    }
    logDecision(decision);

    const finish = (success: boolean, error?: string) => {
        const entry: DecisionRecord = {
            timestamp: startTime,
            requestedModel,
            selectedModel: decision.selectedModel,
            tier: decision.tier,
            routingPath: decision.routingPath,
            score: decision.score,
            preferCoder: decision.preferCoder,
            latencyMs: Date.now() - startTime,
            success,
            error,
        };
        ctx.decisions?.record(entry);
        doAuditLog(entry);
    };

    const isStreaming = body.stream === true;
    let upstream: Response;
    try {
        upstream = await ctx.client.complete(
            { ...body, model: decision.selectedModel },
            { signal: controller.signal },
        );
    } catch (err) {
        if (controller.signal.aborted) {
            finish(false, "client disconnected");
            return;
        }
        finish(false, errorMessage(err));
        sendError(res, 502, "backend_unreachable", `Backend request failed: ${errorMessage(err)}`);
        return;
    }

    const routingHeaders = decisionHeaders(decision);
    const contentType = upstream.headers.get("Content-Type") ?? "";

    if (!upstream.ok) {
        const errText = await upstream.text();
        logger.error(`Backend error ${upstream.status} from ${decision.selectedModel}: ${errText.slice(0, 500)}`);
        finish(false, `${upstream.status}`);
        res.writeHead(upstream.status, {
            "Content-Type": contentType || "application/json",
            ...routingHeaders,
        });
        res.end(errText);
        return;
    }

    if (isStreaming && upstream.body && contentType.includes("event-stream")) {
        res.writeHead(200, {
            "Content-Type": "text/event-stream",
            "Cache-Control": "no-cache",
            Connection: "keep-alive",
            ...routingHeaders,
        });

        const reader = upstream.body.getReader();
        try {
            while (true) {
                const { done, value } = await reader.read();
                if (done) break;
                res.write(value);
            }
            finish(true);
        } catch (err) {
            finish(false, controller.signal.aborted ? "client disconnected" : errorMessage(err));
        } finally {
            res.end();
        }
        return;
    }

    const text = await upstream.text();
    const payload = tryParseJson(text);

    finish(true);
    if (typeof payload === "object" && payload !== null && !Array.isArray(payload)) {
        sendJson(res, upstream.status, { ...payload, _routing: decisionSummary(decision) }, routingHeaders);
    } else {
        res.writeHead(upstream.status, { "Content-Type": contentType || "text/plain", ...routingHeaders });
        res.end(text);
    }
}

// ── GET /v1/models ──────────────────────────────────────────────────

export function handleModels(ctx: ServerContext, _req: IncomingMessage, res: ServerResponse): void {
    const { snapshot } = ctx.store.current();
    const created = Math.floor(snapshot.builtAt / 1000);
    const data = [
        { id: "auto", object: "model", created, owned_by: "tierwise" },
        ...allEntries(snapshot).map((entry) => ({
            id: entry.id,
            object: "model",
            created,
            owned_by: "tierwise",
            tier: entry.tier,
            tier_source: entry.tierSource,
            total_params_b: entry.capability.totalParams,
            active_params_b: entry.capability.activeParams,
            coder: entry.capability.isCoder,
        })),
    ];
    sendJson(res, 200, { object: "list", data });
}

// ── GET /health ─────────────────────────────────────────────────────

export function handleHealth(ctx: ServerContext, _req: IncomingMessage, res: ServerResponse): void {
    sendJson(res, 200, ctx.store.health());
}

// ── POST /admin/reload ──────────────────────────────────────────────

export async function handleReload(ctx: ServerContext, _req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (!ctx.loadSettings) {
        sendJson(res, 200, await ctx.store.refresh());
        return;
    }

    let settings: RoutingSettings;
    try {
        settings = ctx.loadSettings();
    } catch (err) {
        if (err instanceof ConfigError) {
            sendError(res, 400, err.code, err.message);
            return;
        }
        throw err;
    }
    sendJson(res, 200, await ctx.store.reload(settings));
}

// ── GET /api/stats ──────────────────────────────────────────────────

export function handleStats(ctx: ServerContext, _req: IncomingMessage, res: ServerResponse): void {
    if (!ctx.decisions) {
        sendError(res, 404, "stats_disabled", "Decision log is not enabled");
        return;
    }
    sendJson(res, 200, {
        summary: ctx.decisions.summary(),
        recent: ctx.decisions.recent(20),
    });
}
