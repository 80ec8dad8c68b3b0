import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { childProcessFakeCreate } from "../bridge/__tests__/childProcessFake.js";

const spawnMock = vi.fn();

vi.mock("node:child_process", () => ({
    spawn: (...args: unknown[]) => spawnMock(...args)
}));

import { chatCommand } from "./chat.js";

describe("chatCommand", () => {
    let dir: string;
    let settingsPath: string;
    let historyPath: string;

    beforeEach(async () => {
        spawnMock.mockReset();
        process.exitCode = undefined;
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "error").mockImplementation(() => undefined);
        dir = await mkdtemp(path.join(os.tmpdir(), "clibridge-chat-"));
        settingsPath = path.join(dir, "settings.json");
        historyPath = path.join(dir, "history.json");
        await writeFile(
            settingsPath,
            JSON.stringify({ cli: { executable: "/opt/kiro-cli" }, prompt: { maxHistoryTurns: 2 } })
        );
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        process.exitCode = undefined;
        await rm(dir, { recursive: true, force: true });
    });

    it("sends the compacted history and prints the reply", async () => {
        let prompt: Promise<string> = Promise.resolve("");
        spawnMock.mockImplementation(() => {
            const handle = childProcessFakeCreate({ stdout: "Here it is: ![plot](/tmp/plot.png)" });
            prompt = handle.stdinText;
            return handle.child;
        });
        await writeFile(
            historyPath,
            JSON.stringify([
                { role: "system", content: "Rules" },
                { role: "user", content: "first" },
                { role: "assistant", content: "second" },
                { role: "user", content: "plot it" }
            ])
        );

        await chatCommand(historyPath, { settings: settingsPath });

        expect(console.log).toHaveBeenCalledWith("Here it is: [IMAGE:/tmp/plot.png]");
        await expect(prompt).resolves.toBe("System: Rules\n\nAssistant: second\n\nUser: plot it");
        expect(process.exitCode).toBeUndefined();
    });

    it("rejects history that is not a message array", async () => {
        await writeFile(historyPath, JSON.stringify({ role: "user", content: "hi" }));

        await chatCommand(historyPath, { settings: settingsPath });

        expect(spawnMock).not.toHaveBeenCalled();
        expect(process.exitCode).toBe(1);
        expect(console.error).toHaveBeenCalledWith(
            `Failed to chat: History file must be an array of { role, content } messages: ${historyPath}`
        );
    });

    it("rejects history that is not JSON", async () => {
        await writeFile(historyPath, "[{");

        await chatCommand(historyPath, { settings: settingsPath });

        expect(process.exitCode).toBe(1);
        expect(console.error).toHaveBeenCalledWith(`Failed to chat: History file is not valid JSON: ${historyPath}`);
    });
});
