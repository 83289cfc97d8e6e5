import type { DecisionRecord } from "../types.js";
import type { DecisionDatabase } from "./db.js";

export type DecisionSummary = {
    totalRequests: number;
    tierBreakdown: Record<string, number>;
    pathBreakdown: Record<string, number>;
    coderPreferred: number;
    avgLatencyMs: number;
    successRate: number;
};

type DecisionRow = {
    timestamp: number;
    requested_model: string | null;
    selected_model: string;
    tier: string;
    routing_path: string;
    score: number | null;
    prefer_coder: number;
    latency_ms: number;
    success: number;
    error_msg: string | null;
};

type TotalsRow = { count: number; avgLatency: number | null; successes: number | null; coder: number | null };
type CountRow = { key: string; count: number };

export type DecisionLog = {
    record(entry: DecisionRecord): void;
    recent(limit?: number): DecisionRecord[];
    summary(): DecisionSummary;
};

function breakdown(rows: CountRow[]): Record<string, number> {
    const out: Record<string, number> = {};
    for (const row of rows) out[row.key] = row.count;
    return out;
}

export function createDecisionLog(db: DecisionDatabase): DecisionLog {
    const insert = db.prepare(`
        INSERT INTO decisions (
            timestamp, requested_model, selected_model, tier, routing_path,
            score, prefer_coder, latency_ms, success, error_msg
        ) VALUES (
            @timestamp, @requestedModel, @selectedModel, @tier, @routingPath,
            @score, @preferCoder, @latencyMs, @success, @error
        )
    `);

    return {
        record(entry: DecisionRecord): void {
            insert.run({
                timestamp: entry.timestamp,
                requestedModel: entry.requestedModel,
                selectedModel: entry.selectedModel,
                tier: entry.tier,
                routingPath: entry.routingPath,
                score: entry.score,
                preferCoder: entry.preferCoder ? 1 : 0,
                latencyMs: Math.round(entry.latencyMs),
                success: entry.success ? 1 : 0,
                error: entry.error ?? null,
            });
        },

        recent(limit = 100): DecisionRecord[] {
            const rows = db.prepare<[number], DecisionRow>(`
                SELECT * FROM decisions
                ORDER BY timestamp DESC, id DESC
                LIMIT ?
            `).all(limit);

            return rows.map((row) => ({
                timestamp: row.timestamp,
                requestedModel: row.requested_model,
                selectedModel: row.selected_model,
                tier: row.tier,
                routingPath: row.routing_path,
                score: row.score,
                preferCoder: row.prefer_coder === 1,
                latencyMs: row.latency_ms,
                success: row.success === 1,
                error: row.error_msg,
            }));
        },

        summary(): DecisionSummary {
            const totals = db.prepare<[], TotalsRow>(`
                SELECT
                    COUNT(*) AS count,
                    AVG(latency_ms) AS avgLatency,
                    SUM(success) AS successes,
                    SUM(prefer_coder) AS coder
                FROM decisions
            `).get();
            const count = totals?.count ?? 0;

            const tiers = db.prepare<[], CountRow>(
                "SELECT tier AS key, COUNT(*) AS count FROM decisions GROUP BY tier",
            ).all();
            const paths = db.prepare<[], CountRow>(
                "SELECT routing_path AS key, COUNT(*) AS count FROM decisions GROUP BY routing_path",
            ).all();

            return {
                totalRequests: count,
                tierBreakdown: breakdown(tiers),
                pathBreakdown: breakdown(paths),
                coderPreferred: totals?.coder ?? 0,
                avgLatencyMs: Math.round(totals?.avgLatency ?? 0),
                successRate: count > 0 ? (totals?.successes ?? 0) / count : 1,
            };
        },
    };
}
