import { getLogger } from "../log.js";
import { outputAnsiStrip } from "../output/outputAnsiStrip.js";
import { DEFAULT_OVERFLOW_MARKERS, outputContextOverflowIs } from "../output/outputContextOverflowIs.js";
import { outputSanitize } from "../output/outputSanitize.js";
import { CliBridgeError } from "./cliBridgeError.js";
import type { CliInvocation, CliProcessResult } from "./cliInvocationTypes.js";
import { cliProcessRun } from "./cliProcessRun.js";

export type CliBridgeInvokeOptions = {
    overflowMarkers?: readonly string[];
    signal?: AbortSignal;
};

const logger = getLogger("bridge.invoke");

/**
 * Runs one CLI call and returns its sanitized output.
 * Rejects with non_zero_exit for a failing status and backend_overflow when a successful
 * run reports that the backend context window overflowed.
 */
export async function cliBridgeInvoke(
    invocation: CliInvocation,
    prompt: string,
    options: CliBridgeInvokeOptions = {}
): Promise<string> {
    const result = await cliProcessRun(invocation, prompt, { signal: options.signal });

    if (result.exitCode !== 0) {
        throw exitErrorBuild(invocation, result);
    }

    const output = outputSanitize(result.stdout);
    if (outputContextOverflowIs(output, options.overflowMarkers ?? DEFAULT_OVERFLOW_MARKERS)) {
        logger.warn(`event: CLI reported context overflow executable=${invocation.executable} promptChars=${prompt.length}`);
        throw new CliBridgeError("backend_overflow", "CLI backend reported a context window overflow", {
            details: output,
            exitCode: 0
        });
    }

    logger.debug(`event: CLI output sanitized outputChars=${output.length}`);
    return output;
}

function exitErrorBuild(invocation: CliInvocation, result: CliProcessResult): CliBridgeError {
    const status = result.exitCode === null ? `signal ${result.signal ?? "unknown"}` : `code ${result.exitCode}`;
    const diagnostic = result.stderr.trim() || outputAnsiStrip(result.stdout).trim();
    const message = diagnostic
        ? `${invocation.executable} exited with ${status}: ${diagnostic}`
        : `${invocation.executable} exited with ${status}`;
    logger.warn(`error: CLI failed executable=${invocation.executable} status="${status}"`);
    return new CliBridgeError("non_zero_exit", message, {
        details: diagnostic || undefined,
        exitCode: result.exitCode,
        signal: result.signal
    });
}
