import { spawn } from "node:child_process";

import { getLogger } from "../log.js";
import { CliBridgeError } from "./cliBridgeError.js";
import { cliInvocationArgs } from "./cliInvocationBuild.js";
import type { CliInvocation, CliProcessResult } from "./cliInvocationTypes.js";

export type CliProcessRunOptions = {
    signal?: AbortSignal;
};

const logger = getLogger("bridge.process");

/**
 * Spawns the CLI once, delivers the prompt, and collects the complete output.
 * Resolves with the exit status whatever it is; rejects only when the process cannot be
 * started (spawn_failure) or the signal aborts it (aborted).
 * Expects: the caller owns any deadline and expresses it through options.signal.
 */
export function cliProcessRun(
    invocation: CliInvocation,
    prompt: string,
    options: CliProcessRunOptions = {}
): Promise<CliProcessResult> {
    return new Promise<CliProcessResult>((resolve, reject) => {
        if (options.signal?.aborted) {
            reject(new CliBridgeError("aborted", "CLI invocation aborted before start", { cause: options.signal.reason }));
            return;
        }

        const args = cliInvocationArgs(invocation, prompt);
        logger.debug(
            `start: Spawning CLI executable=${invocation.executable} argCount=${args.length} transport=${invocation.transport} promptChars=${prompt.length}`
        );

        const child = spawn(invocation.executable, args, {
            env: { ...invocation.env },
            stdio: ["pipe", "pipe", "pipe"],
            windowsHide: true,
            signal: options.signal
        });

        const stdoutChunks: Buffer[] = [];
        const stderrChunks: Buffer[] = [];
        let settled = false;

        const fail = (error: CliBridgeError) => {
            if (settled) {
                return;
            }
            settled = true;
            reject(error);
        };

        const streamFail = (stream: string) => (error: Error) => {
            logger.warn({ error, stream }, "error: Failed to read CLI output");
            fail(
                new CliBridgeError("spawn_failure", `Failed to read ${stream} from ${invocation.executable}: ${error.message}`, {
                    cause: error
                })
            );
            child.kill();
        };

        child.stdout?.on("data", (chunk: Buffer) => {
            stdoutChunks.push(chunk);
        });
        child.stdout?.on("error", streamFail("stdout"));
        child.stderr?.on("data", (chunk: Buffer) => {
            stderrChunks.push(chunk);
        });
        child.stderr?.on("error", streamFail("stderr"));

        child.on("error", (error: NodeJS.ErrnoException) => {
            if (error.name === "AbortError") {
                logger.debug(`event: CLI invocation aborted executable=${invocation.executable}`);
                fail(new CliBridgeError("aborted", "CLI invocation aborted", { cause: error }));
                return;
            }
            logger.warn({ error, executable: invocation.executable }, "error: Failed to start CLI");
            fail(
                new CliBridgeError("spawn_failure", `Failed to execute ${invocation.executable}: ${error.message}`, {
                    cause: error
                })
            );
        });

        child.on("close", (exitCode: number | null, signal: NodeJS.Signals | null) => {
            if (settled) {
                return;
            }
            settled = true;
            const result: CliProcessResult = {
                exitCode,
                signal,
                stdout: Buffer.concat(stdoutChunks).toString("utf8"),
                stderr: Buffer.concat(stderrChunks).toString("utf8")
            };
            logger.debug(
                `event: CLI exited exitCode=${exitCode ?? "null"} signal=${signal ?? "null"} stdoutChars=${result.stdout.length} stderrChars=${result.stderr.length}`
            );
            resolve(result);
        });

        const stdin = child.stdin;
        if (!stdin) {
            return;
        }
        stdin.on("error", (error: NodeJS.ErrnoException) => {
            // the exit status decides the outcome when the CLI stops reading early
            logger.warn({ error, code: error.code }, "event: CLI closed its input before the prompt was written");
        });
        if (invocation.transport === "stdin") {
            stdin.end(prompt, "utf8");
        } else {
            stdin.end();
        }
    });
}
