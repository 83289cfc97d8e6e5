import { createServer, type Server } from "node:http";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import {
    handleChatCompletion,
    handleHealth,
    handleModels,
    handleReload,
    handleStats,
    type ServerContext,
} from "./handlers.js";
import { sendError } from "./helpers.js";

export type { ServerContext } from "./handlers.js";

export function createProxyServer(ctx: ServerContext): Server {
    return createServer(async (req, res) => {
        const url = new URL(req.url ?? "/", "http://localhost");

        res.setHeader("Access-Control-Allow-Origin", "*");
        res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
        res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
        res.setHeader("Access-Control-Expose-Headers", "X-Router-Tier, X-Router-Model, X-Router-Path, X-Router-Score, X-Router-Coder");

        if (req.method === "OPTIONS") {
            res.writeHead(204);
            res.end();
            return;
        }

        try {
            if (url.pathname === "/v1/chat/completions" && req.method === "POST") {
                await handleChatCompletion(ctx, req, res);
            } else if (url.pathname === "/v1/models" && req.method === "GET") {
                handleModels(ctx, req, res);
            } else if (url.pathname === "/health" && req.method === "GET") {
                handleHealth(ctx, req, res);
            } else if (url.pathname === "/admin/reload" && req.method === "POST") {
                await handleReload(ctx, req, res);
            } else if (url.pathname === "/api/stats" && req.method === "GET") {
                handleStats(ctx, req, res);
            } else {
                sendError(res, 404, "not_found", `No route for ${req.method} ${url.pathname}`);
            }
        } catch (err) {
            logger.error("Request error:", errorMessage(err));
            if (!res.headersSent) {
                sendError(res, 500, "internal_error", "Internal error");
            } else {
                res.end();
            }
        }
    });
}

export function startProxy(ctx: ServerContext, port: number, host = "127.0.0.1"): Server {
    const server = createProxyServer(ctx);

    server.listen(port, host, () => {
        const health = ctx.store.health();
        logger.ok(`tierwise proxy listening on http://${host}:${port}`);
        logger.info(`Models: ${health.models} eligible (generation ${health.generation})`);
        logger.info(`Endpoints:`);
        logger.info(`  POST /v1/chat/completions  — OpenAI-compatible, model "auto" routes`);
        logger.info(`  GET  /v1/models            — Eligible models with tiers`);
        logger.info(`  GET  /health               — Registry health`);
        logger.info(`  POST /admin/reload         — Re-read config and models`);
        logger.info(`  GET  /api/stats            — Decision log summary`);
    });

    return server;
}
