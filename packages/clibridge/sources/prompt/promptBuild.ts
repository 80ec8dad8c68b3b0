import { stringTruncateChars } from "../utils/stringTruncateChars.js";
import { promptSystemExtract } from "./promptSystemExtract.js";
import type { ChatMessage, PromptBudget, PromptSystemRule } from "./promptTypes.js";

type PromptPart = {
    system: boolean;
    text: string;
};

/**
 * Flattens a conversation into a single prompt for a CLI backend.
 * User and assistant turns render as `User: ...` / `Assistant: ...`; system messages follow
 * the system rule; other roles are dropped. A leading system part is always kept while the
 * remaining parts are cut to the most recent maxHistoryTurns. The joined prompt is then
 * truncated to maxPromptChars.
 */
export function promptBuild(messages: ChatMessage[], systemRule: PromptSystemRule, budget: PromptBudget): string {
    budgetValidate(budget);

    const parts: PromptPart[] = [];
    for (const message of messages) {
        const part = partRender(message, systemRule);
        if (part) {
            parts.push(part);
        }
    }

    const pinned = parts[0]?.system ? parts.slice(0, 1) : [];
    const history = parts.slice(pinned.length);
    const window = history.slice(Math.max(0, history.length - budget.maxHistoryTurns));

    const prompt = [...pinned, ...window].map((part) => part.text).join("\n\n");
    return stringTruncateChars(prompt, budget.maxPromptChars);
}

function partRender(message: ChatMessage, systemRule: PromptSystemRule): PromptPart | null {
    switch (message.role) {
        case "system": {
            const text = promptSystemExtract(message.content, systemRule);
            return text === null ? null : { system: true, text };
        }
        case "user":
            return { system: false, text: `User: ${message.content}` };
        case "assistant":
            return { system: false, text: `Assistant: ${message.content}` };
        default:
            return null;
    }
}

function budgetValidate(budget: PromptBudget): void {
    if (!Number.isInteger(budget.maxPromptChars) || budget.maxPromptChars < 0) {
        throw new Error(`maxPromptChars must be a non-negative integer, got ${budget.maxPromptChars}`);
    }
    if (!Number.isInteger(budget.maxHistoryTurns) || budget.maxHistoryTurns < 0) {
        throw new Error(`maxHistoryTurns must be a non-negative integer, got ${budget.maxHistoryTurns}`);
    }
}
