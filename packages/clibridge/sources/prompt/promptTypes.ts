/**
 * Conversation entry supplied by the caller. Role stays a plain string because
 * history can carry roles (tool, function) that prompt building drops.
 */
export type ChatMessage = {
    role: string;
    content: string;
};

export type PromptBudget = {
    maxPromptChars: number;
    maxHistoryTurns: number;
};

/**
 * How system messages enter the prompt.
 * full: copied as `System: <content>`.
 * anchor: only the block starting at the anchor header, for backends that inject
 * their own system prompt.
 */
export type PromptSystemRule = { mode: "full" } | { mode: "anchor"; anchor: string };
