import type { IncomingMessage, ServerResponse } from "node:http";
import type { RoutingDecision } from "../router/types.js";
import { logger } from "../logger.js";
import type { DecisionRecord } from "../types.js";

// ── Request body parsing ────────────────────────────────────────────

export function readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        req.on("data", (c: Buffer) => chunks.push(c));
        req.on("end", () => resolve(Buffer.concat(chunks).toString()));
        req.on("error", reject);
    });
}

// ── Responses ───────────────────────────────────────────────────────

export function sendJson(
    res: ServerResponse,
    status: number,
    payload: unknown,
    headers: Record<string, string> = {},
): void {
    res.writeHead(status, { "Content-Type": "application/json", ...headers });
    res.end(JSON.stringify(payload));
}

export function sendError(res: ServerResponse, status: number, code: string, message: string): void {
    sendJson(res, status, { error: { code, message } });
}

// ── Auditing ────────────────────────────────────────────────────────

export function formatScore(score: number | null): string {
    return score === null ? "-" : score.toFixed(3);
}

export function logDecision(decision: RoutingDecision): void {
    logger.route(
        `${decision.routingPath.toUpperCase()} → \x1b[36m${decision.selectedModel}\x1b[0m ` +
        `[${decision.tier}] score=${formatScore(decision.score)}` +
        `${decision.preferCoder ? " coder" : ""}`,
    );
    logger.debug(`Reasons: ${decision.reasons.join(" | ")}`);
}

export function doAuditLog(entry: DecisionRecord): void {
    logger.audit(
        `Model: \x1b[36m${entry.selectedModel}\x1b[0m | ` +
        `Tier: \x1b[33m${entry.tier}\x1b[0m (${formatScore(entry.score)}) via ${entry.routingPath} | ` +
        `Latency: ${Math.round(entry.latencyMs)}ms | ` +
        `Status: ${entry.success ? "\x1b[32mOK\x1b[0m" : "\x1b[31mERR\x1b[0m"}${entry.error ? ` (${entry.error})` : ""}`,
    );
}
