import type { PromptSystemRule } from "./promptTypes.js";

/**
 * Renders the prompt contribution of a system message under the given rule.
 * Returns null when an anchored rule finds no anchor in the content.
 */
export function promptSystemExtract(content: string, rule: PromptSystemRule): string | null {
    if (rule.mode === "full") {
        return `System: ${content}`;
    }

    const start = content.indexOf(rule.anchor);
    if (start === -1) {
        return null;
    }
    return content.slice(start).trim();
}
