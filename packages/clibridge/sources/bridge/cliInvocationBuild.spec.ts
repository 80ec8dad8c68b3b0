import { describe, expect, it } from "vitest";

import { cliInvocationArgs, cliInvocationBuild } from "./cliInvocationBuild.js";

describe("cliInvocationBuild", () => {
    it("builds the non-interactive command without selectors", () => {
        const invocation = cliInvocationBuild({
            executable: "kiro-cli",
            agent: null,
            model: null,
            transport: "stdin",
            env: { PATH: "/usr/bin" }
        });

        expect(invocation.args).toEqual(["chat", "--no-interactive"]);
        expect(invocation.env).toEqual({ PATH: "/usr/bin", NO_COLOR: "1", TERM: "dumb" });
    });

    it("adds agent and model selectors", () => {
        const invocation = cliInvocationBuild({
            executable: "/opt/kiro/bin/kiro-cli",
            agent: "reviewer",
            model: "fast-model",
            transport: "stdin",
            env: {}
        });

        expect(invocation.executable).toBe("/opt/kiro/bin/kiro-cli");
        expect(invocation.args).toEqual(["chat", "--no-interactive", "--agent", "reviewer", "--model", "fast-model"]);
    });

    it("overrides color and terminal settings from the base environment", () => {
        const invocation = cliInvocationBuild({
            executable: "kiro-cli",
            agent: null,
            model: null,
            transport: "stdin",
            env: { TERM: "xterm-256color", NO_COLOR: "0", HOME: "/home/test" }
        });

        expect(invocation.env).toEqual({ TERM: "dumb", NO_COLOR: "1", HOME: "/home/test" });
    });

    it("is frozen", () => {
        const invocation = cliInvocationBuild({
            executable: "kiro-cli",
            agent: null,
            model: null,
            transport: "stdin",
            env: {}
        });

        expect(Object.isFrozen(invocation)).toBe(true);
        expect(Object.isFrozen(invocation.args)).toBe(true);
        expect(Object.isFrozen(invocation.env)).toBe(true);
    });
});

describe("cliInvocationArgs", () => {
    const base = { executable: "kiro-cli", agent: "coder", model: null, env: {} };

    it("appends the prompt for the argument transport", () => {
        const invocation = cliInvocationBuild({ ...base, transport: "argument" });

        expect(cliInvocationArgs(invocation, "User: hi")).toEqual([
            "chat",
            "--no-interactive",
            "--agent",
            "coder",
            "User: hi"
        ]);
    });

    it("leaves argv untouched for the stdin transport", () => {
        const invocation = cliInvocationBuild({ ...base, transport: "stdin" });

        expect(cliInvocationArgs(invocation, "User: hi")).toEqual(["chat", "--no-interactive", "--agent", "coder"]);
    });
});
