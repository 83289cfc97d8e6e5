import type { ChatCompletionRequest, ChatMessage } from "../types.js";
import { DEFAULT_SCORE_THRESHOLDS, DEFAULT_UNCERTAIN_BAND, loadRoutingRules } from "./config.js";
import type { HeuristicResult, RoutingRules, ScoreBand, Tier } from "./types.js";

export type ScorableRequest = Pick<ChatCompletionRequest, "messages" | "tools" | "functions">;

export type ScoreOptions = {
    rules?: RoutingRules;
    uncertainBand?: ScoreBand;
};

const CODE_BLOCK = /```[\s\S]*?```/g;

// ── Text extraction ─────────────────────────────────────────────────

type ExtractedText = { text: string; images: number };

function extractText(messages: readonly ChatMessage[]): ExtractedText {
    const parts: string[] = [];
    let images = 0;
    for (const msg of messages) {
        const content = msg.content;
        if (typeof content === "string") {
            parts.push(content);
        } else if (Array.isArray(content)) {
            for (const block of content) {
                if (block.type === "text" && typeof block.text === "string") {
                    parts.push(block.text);
                } else if (block.type === "image_url") {
                    images++;
                }
            }
        }
    }
    return { text: parts.join("\n"), images };
}

/** ~4 characters per token */
export function estimateTokens(text: string): number {
    return Math.floor(text.length / 4);
}

function lastUserText(messages: readonly ChatMessage[]): string {
    for (let i = messages.length - 1; i >= 0; i--) {
        if (messages[i].role === "user") return extractText([messages[i]]).text;
    }
    return "";
}

function countTools(request: ScorableRequest): number {
    const names = new Set<string>();
    (request.tools ?? []).forEach((tool, i) => names.add(tool.function?.name ?? `#tool-${i}`));
    (request.functions ?? []).forEach((fn, i) => names.add(fn.name ?? `#function-${i}`));
    return names.size;
}

// ── Keyword matching ────────────────────────────────────────────────

const patternCache = new Map<string, RegExp>();

/**
 * One alternation over a keyword table, anchored on Unicode word
 * boundaries so "Übersetze" and "Schritt für Schritt" match.
 */
function keywordPattern(keywords: readonly string[]): RegExp | null {
    if (keywords.length === 0) return null;
    const key = keywords.join("\u0000");
    let pattern = patternCache.get(key);
    if (!pattern) {
        pattern = new RegExp(`(?<![\\p{L}\\p{N}_])(?:${keywords.join("|")})(?![\\p{L}\\p{N}_])`, "giu");
        patternCache.set(key, pattern);
    }
    return pattern;
}

export function findKeywords(text: string, keywords: readonly string[]): string[] {
    const pattern = keywordPattern(keywords);
    if (!pattern || text.length === 0) return [];
    return Array.from(text.matchAll(pattern), (m) => m[0]);
}

function preview(matches: string[]): string {
    return [...new Set(matches.map((m) => m.toLowerCase()))].slice(0, 3).join(", ");
}

// ── Scoring ─────────────────────────────────────────────────────────

export function isUncertain(score: number, band: ScoreBand = DEFAULT_UNCERTAIN_BAND): boolean {
    return score >= band.low && score <= band.high;
}

/** score < low → SMALL, score > high → LARGE, otherwise MEDIUM */
export function scoreToTier(score: number, thresholds: ScoreBand = DEFAULT_SCORE_THRESHOLDS): Tier {
    if (score < thresholds.low) return "SMALL";
    if (score > thresholds.high) return "LARGE";
    return "MEDIUM";
}

/**
 * Estimate request complexity from content alone. Never calls a model.
 * Signals are evaluated in a fixed order and each one that fires adds a reason.
 */
export function scoreRequest(request: ScorableRequest, options: ScoreOptions = {}): HeuristicResult {
    const rules = options.rules ?? loadRoutingRules();
    const messages = request.messages;
    const reasons: string[] = [];
    let score = 0;

    const full = extractText(messages);
    const totalTokens = estimateTokens(full.text);

    // Token count
    if (totalTokens < 50) {
        reasons.push(`very short (${totalTokens} est. tokens)`);
    } else if (totalTokens < 200) {
        score += 0.1;
        reasons.push(`short (${totalTokens} est. tokens)`);
    } else if (totalTokens < 800) {
        score += 0.25;
        reasons.push(`medium length (${totalTokens} est. tokens)`);
    } else if (totalTokens < 2000) {
        score += 0.4;
        reasons.push(`long (${totalTokens} est. tokens)`);
    } else {
        score += 0.5;
        reasons.push(`very long (${totalTokens} est. tokens)`);
    }

    // Conversation depth
    const turns = messages.length;
    if (turns > 10) {
        score += 0.15;
        reasons.push(`deep conversation (${turns} turns)`);
    } else if (turns > 4) {
        score += 0.08;
        reasons.push(`multi-turn (${turns} turns)`);
    }

    // Tool declarations
    const tools = countTools(request);
    if (tools > 3) {
        score += 0.2;
        reasons.push(`many tools (${tools})`);
    } else if (tools > 0) {
        score += 0.1;
        reasons.push(`tool use (${tools} tools)`);
    }

    // System prompt
    const system = messages.filter((m) => m.role === "system" || m.role === "developer");
    if (system.length > 0) {
        const systemTokens = estimateTokens(extractText(system).text);
        if (systemTokens > 500) {
            score += 0.15;
            reasons.push(`complex system prompt (${systemTokens} est. tokens)`);
        } else if (systemTokens > 100) {
            score += 0.05;
            reasons.push(`system prompt (${systemTokens} est. tokens)`);
        }
    }

    // Code blocks
    const codeBlocks = full.text.match(CODE_BLOCK)?.length ?? 0;
    if (codeBlocks > 2) {
        score += 0.15;
        reasons.push(`multiple code blocks (${codeBlocks})`);
    } else if (codeBlocks > 0) {
        score += 0.05;
        reasons.push(`code blocks (${codeBlocks})`);
    }

    // Images
    if (full.images > 0) {
        score += 0.1;
        reasons.push("contains images");
    }

    // Keywords, last user message only
    const lastUser = lastUserText(messages);
    const complex = findKeywords(lastUser, rules.complexKeywords);
    if (complex.length > 0) {
        // 1 → 0.3, 2 → 0.45, 3+ → 0.6
        score += Math.min(0.6, 0.15 + 0.15 * complex.length);
        reasons.push(`complex keywords (${complex.length}): ${preview(complex)}`);
    } else {
        const simple = findKeywords(lastUser, rules.simpleKeywords);
        if (simple.length > 0) {
            score -= 0.15;
            reasons.push(`simple keywords: ${preview(simple)}`);
        }
    }

    const clamped = Math.round(Math.max(0, Math.min(1, score)) * 1000) / 1000;

    return {
        score: clamped,
        reasons,
        confidence: isUncertain(clamped, options.uncertainBand) ? "low" : "high",
    };
}

// ── Coding task detection ───────────────────────────────────────────

export type CodingSignal = { isCoding: boolean; reason: string | null };

export function detectCodingTask(request: ScorableRequest, rules: RoutingRules = loadRoutingRules()): CodingSignal {
    const full = extractText(request.messages).text;
    if (/```/.test(full)) {
        return { isCoding: true, reason: "code fences in conversation" };
    }
    const hits = findKeywords(lastUserText(request.messages), rules.codingKeywords);
    if (hits.length > 0) {
        return { isCoding: true, reason: `coding keywords: ${preview(hits)}` };
    }
    return { isCoding: false, reason: null };
}
