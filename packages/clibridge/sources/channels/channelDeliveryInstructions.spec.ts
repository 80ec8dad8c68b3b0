import { describe, expect, it } from "vitest";

import { channelDeliveryInstructions } from "./channelDeliveryInstructions.js";

describe("channelDeliveryInstructions", () => {
    it("returns Telegram specific instructions", () => {
        const text = channelDeliveryInstructions("telegram");

        expect(text).toContain("Telegram");
        expect(text).toContain("[IMAGE:<path-or-url>]");
        expect(text).toContain("**bold**");
    });

    it.each([
        "discord",
        "slack",
        "mattermost",
        "matrix",
        "dingtalk",
        "lark",
        "feishu",
        "signal",
        "whatsapp",
        "qq",
        "imessage",
        "email",
        "irc"
    ])("returns default instructions for %s", (channel) => {
        const text = channelDeliveryInstructions(channel);

        expect(text).toContain("[IMAGE:<path-or-url>]");
        expect(text).toContain("Be concise and direct");
    });

    it("lists every media marker in the default instructions", () => {
        const text = channelDeliveryInstructions("discord");

        for (const marker of ["IMAGE", "DOCUMENT", "VIDEO", "AUDIO", "VOICE"]) {
            expect(text).toContain(`[${marker}:<path-or-url>]`);
        }
    });

    it("guides conciseness and tool result usage", () => {
        const text = channelDeliveryInstructions("slack");

        expect(text).toContain("Skip filler phrases");
        expect(text).toContain("Use tool results silently");
        expect(text).toContain("do not narrate");
    });

    it.each(["cli", "dummy", "ClawdTalk", "Telegram", "SLACK"])("returns null for %s", (channel) => {
        expect(channelDeliveryInstructions(channel)).toBeNull();
    });
});
