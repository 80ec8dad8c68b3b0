import { promptBuild } from "./promptBuild.js";
import type { ChatMessage, PromptBudget, PromptSystemRule } from "./promptTypes.js";

/**
 * Builds the prompt for one user message with an optional system instruction.
 */
export function promptSingleTurnBuild(
    system: string | null,
    message: string,
    systemRule: PromptSystemRule,
    budget: PromptBudget
): string {
    const messages: ChatMessage[] = [];
    if (system !== null) {
        messages.push({ role: "system", content: system });
    }
    messages.push({ role: "user", content: message });
    return promptBuild(messages, systemRule, { ...budget, maxHistoryTurns: Math.max(1, budget.maxHistoryTurns) });
}
