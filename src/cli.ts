#!/usr/bin/env node
import "dotenv/config";
import { ConfigError, errorMessage } from "./errors.js";
import { loadConfig, toRoutingSettings, type TierwiseConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { ModelStore } from "./models/store.js";
import { route } from "./router/index.js";
import { allEntries } from "./router/registry.js";
import { scoreRequest, scoreToTier } from "./router/rules.js";
import { startProxy } from "./server/index.js";
import { openDatabase } from "./storage/db.js";
import { createDecisionLog } from "./storage/stats.js";
import type { ChatCompletionRequest, ChatMessage } from "./types.js";
import { createBackendClient } from "./upstream/client.js";

// ── CLI arg parsing ─────────────────────────────────────────────────

const args = process.argv.slice(2);
const command = args[0];

function getFlag(flag: string): string | undefined {
    const idx = args.indexOf(flag);
    return idx >= 0 ? args[idx + 1] : undefined;
}

/** First positional argument after the command */
function getText(): string | undefined {
    for (let i = 1; i < args.length; i++) {
        if (args[i].startsWith("--")) {
            i++;
            continue;
        }
        return args[i];
    }
    return undefined;
}

function config(): TierwiseConfig {
    const cfg = loadConfig({ path: getFlag("--config") });
    setLogLevel(cfg.logLevel);
    return cfg;
}

function buildRequest(): ChatCompletionRequest {
    const text = getText();
    if (!text) {
        throw new ConfigError(`Usage: tierwise ${command} "<prompt>" [--system "<text>"] [--model <id>]`);
    }
    const messages: ChatMessage[] = [];
    const system = getFlag("--system");
    if (system) messages.push({ role: "system", content: system });
    messages.push({ role: "user", content: text });
    return { model: getFlag("--model"), messages };
}

async function createStore(cfg: TierwiseConfig) {
    const client = createBackendClient({
        baseUrl: cfg.backend.baseUrl,
        apiKey: cfg.backend.apiKey,
        requestTimeoutMs: cfg.backend.requestTimeoutMs,
    });
    const store = new ModelStore(client, toRoutingSettings(cfg));
    await store.refresh();
    return { client, store };
}

// ── Commands ────────────────────────────────────────────────────────

async function cmdStart() {
    const cfg = config();
    const port = Number(getFlag("--port") ?? cfg.server.port);
    const host = getFlag("--host") ?? cfg.server.host;

    const { client, store } = await createStore(cfg);
    store.startPolling(cfg.registry.refreshIntervalMs);

    const db = openDatabase(cfg.storage.dbPath);
    const server = startProxy(
        {
            store,
            client,
            decisions: createDecisionLog(db),
            loadSettings: () => {
                const next = loadConfig({ path: getFlag("--config") });
                setLogLevel(next.logLevel);
                return toRoutingSettings(next);
            },
        },
        port,
        host,
    );

    const shutdown = () => {
        logger.info("Shutting down...");
        store.stopPolling();
        server.close(() => {
            db.close();
            process.exit(0);
        });
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
}

function cmdScore() {
    const cfg = config();
    const settings = toRoutingSettings(cfg);
    const request = buildRequest();
    const result = scoreRequest(request, { rules: settings.rules, uncertainBand: settings.uncertainBand });
    const tier = scoreToTier(result.score, settings.scoreThresholds);

    console.log(`\n\x1b[36m━━ Heuristic score ━━\x1b[0m`);
    console.log(`  Score:      ${result.score.toFixed(3)}`);
    console.log(`  Confidence: ${result.confidence}${result.confidence === "low" ? " (would ask the classifier)" : ""}`);
    console.log(`  Tier:       ${tier}`);
    for (const reason of result.reasons) {
        console.log(`  \x1b[90m• ${reason}\x1b[0m`);
    }
    console.log();
}

async function cmdRoute() {
    const cfg = config();
    const request = buildRequest();
    const { client, store } = await createStore(cfg);
    const decision = await route(request, { generation: store.current(), invoker: client });
    console.log(JSON.stringify(decision, null, 2));
}

async function cmdModels() {
    const cfg = config();
    const { store } = await createStore(cfg);
    const health = store.health();
    const { snapshot } = store.current();

    console.log(`\n\x1b[36m━━ Eligible models (generation ${health.generation}) ━━\x1b[0m\n`);
    for (const entry of allEntries(snapshot)) {
        const { totalParams, activeParams, isCoder, paramsSource } = entry.capability;
        const size = activeParams === null ? `${totalParams}B` : `${totalParams}B (${activeParams}B active)`;
        const flags = [
            entry.tierSource === "override" ? "override" : "",
            isCoder ? "coder" : "",
            paramsSource === "default" ? "size unknown" : "",
        ].filter(Boolean).join(", ");
        console.log(`  \x1b[33m${entry.tier.padEnd(7)}\x1b[0m ${entry.id.padEnd(40)} ${size.padEnd(20)} \x1b[90m${flags}\x1b[0m`);
    }
    if (health.status === "degraded") {
        logger.warn(`Registry degraded: ${health.lastError}`);
    }
    console.log();
}

function cmdStats() {
    const cfg = config();
    const db = openDatabase(cfg.storage.dbPath);
    try {
        const s = createDecisionLog(db).summary();
        console.log(`\n\x1b[36m━━ Routing stats ━━\x1b[0m`);
        console.log(`  Requests:      ${s.totalRequests}`);
        console.log(`  Success rate:  ${(s.successRate * 100).toFixed(1)}%`);
        console.log(`  Avg latency:   ${s.avgLatencyMs}ms`);
        console.log(`  Coder picks:   ${s.coderPreferred}`);
        console.log(`  By tier:       ${JSON.stringify(s.tierBreakdown)}`);
        console.log(`  By path:       ${JSON.stringify(s.pathBreakdown)}`);
        console.log();
    } finally {
        db.close();
    }
}

function printHelp() {
    console.log(`
\x1b[36mtierwise\x1b[0m — complexity-aware model router

\x1b[33mUsage:\x1b[0m
  tierwise start [--port <n>] [--host <h>] [--config <file>]   Start the proxy
  tierwise score "<prompt>" [--system "<text>"]                Heuristic score only (offline)
  tierwise route "<prompt>" [--model <id>] [--system "<text>"] Full routing decision
  tierwise models [--config <file>]                            List eligible models by tier
  tierwise stats [--config <file>]                             Decision log summary
`);
}

async function main() {
    switch (command) {
        case "start":
            await cmdStart();
            break;
        case "score":
            cmdScore();
            break;
        case "route":
            await cmdRoute();
            break;
        case "models":
            await cmdModels();
            break;
        case "stats":
            cmdStats();
            break;
        default:
            printHelp();
    }
}

main().catch((err: unknown) => {
    logger.error(errorMessage(err));
    process.exit(1);
});
