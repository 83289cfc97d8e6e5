/**
 * Classifier Fallback
 *
 * Asks the smallest available model to label an ambiguous request with a
 * tier. One attempt, bounded by a timeout; every failure is reported as an
 * outcome rather than thrown.
 */

import { z } from "zod";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ChatCompletionRequest, ChatMessage, ModelInvoker } from "../types.js";
import type { ScorableRequest } from "./rules.js";
import type { Tier } from "./types.js";

export type ClassifierOutcome =
    | { ok: true; tier: Tier; model: string; answer: string }
    | { ok: false; model: string | null; reason: string };

export type ClassifierDeps = {
    invoker: ModelInvoker;
    timeoutMs: number;
};

const MAX_MESSAGE_CHARS = 2_000;

const CLASSIFICATION_PROMPT = `You route chat requests to language models of three sizes.
Decide which size is needed to answer the request below well.

SMALL: greetings, short factual questions, lookups, translation, reformatting, yes/no answers
MEDIUM: explanations, summaries of long text, routine code changes, how-to guides
LARGE: multi-step reasoning, architecture and design, large code generation, in-depth analysis

Answer with exactly one word, SMALL, MEDIUM or LARGE, optionally followed by a short justification.

Conversation turns: {turns}
Tools declared: {tools}
Request:
"""
{message}
"""`;

const completionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.union([
                        z.string(),
                        z.array(z.object({ type: z.string(), text: z.string().optional() })),
                        z.null(),
                    ]),
                }),
            }),
        )
        .min(1),
});

const TIER_TOKEN = /\b(SMALL|MEDIUM|LARGE)\b/i;

/** First tier word in the answer, case-insensitive */
export function parseTier(answer: string): Tier | null {
    const match = TIER_TOKEN.exec(answer);
    if (!match) return null;
    const word = match[1].toUpperCase();
    return word === "SMALL" || word === "MEDIUM" || word === "LARGE" ? word : null;
}

function messageText(message: ChatMessage | undefined): string {
    if (!message) return "";
    if (typeof message.content === "string") return message.content;
    if (!Array.isArray(message.content)) return "";
    return message.content
        .map((part) => (part.type === "text" && typeof part.text === "string" ? part.text : ""))
        .filter((text) => text.length > 0)
        .join("\n");
}

export function buildClassifierRequest(request: ScorableRequest, model: string): ChatCompletionRequest {
    const lastUser = [...request.messages].reverse().find((m) => m.role === "user");
    const tools = (request.tools?.length ?? 0) + (request.functions?.length ?? 0);
    const prompt = CLASSIFICATION_PROMPT
        .replace("{turns}", String(request.messages.length))
        .replace("{tools}", String(tools))
        .replace("{message}", messageText(lastUser).slice(0, MAX_MESSAGE_CHARS));

    return {
        model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: 20,
        temperature: 0,
        stream: false,
    };
}

/**
 * Classify a request with a single non-streaming completion.
 * The classifier model's own answer is never re-classified.
 */
export async function classifyWithModel(
    request: ScorableRequest,
    classifierModel: string,
    deps: ClassifierDeps,
): Promise<ClassifierOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), deps.timeoutMs);

    try {
        const res = await deps.invoker.complete(buildClassifierRequest(request, classifierModel), {
            signal: controller.signal,
        });
        if (!res.ok) {
            return { ok: false, model: classifierModel, reason: `classifier returned HTTP ${res.status}` };
        }

        const parsed = completionSchema.safeParse(await res.json());
        if (!parsed.success) {
            return { ok: false, model: classifierModel, reason: "classifier response was malformed" };
        }

        const content = parsed.data.choices[0].message.content;
        const answer = typeof content === "string"
            ? content
            : (content ?? []).map((part) => part.text ?? "").join("");
        const tier = parseTier(answer);
        if (!tier) {
            return { ok: false, model: classifierModel, reason: "classifier answer had no tier label" };
        }

        logger.debug(`Classifier ${classifierModel} answered ${tier}`);
        return { ok: true, tier, model: classifierModel, answer: answer.trim() };
    } catch (err) {
        const reason = controller.signal.aborted
            ? `classifier timed out after ${deps.timeoutMs}ms`
            : `classifier call failed: ${errorMessage(err)}`;
        logger.warn(`Classifier ${classifierModel}: ${reason}`);
        return { ok: false, model: classifierModel, reason };
    } finally {
        clearTimeout(timer);
    }
}
