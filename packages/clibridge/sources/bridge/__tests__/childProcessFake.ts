import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";

export type ChildProcessScript = {
    stdout?: string;
    stderr?: string;
    exitCode?: number | null;
    signal?: NodeJS.Signals | null;
    spawnError?: NodeJS.ErrnoException;
    // keeps running until killed or aborted
    hang?: boolean;
};

export type ChildProcessFake = EventEmitter & {
    stdin: PassThrough;
    stdout: PassThrough;
    stderr: PassThrough;
    killed: boolean;
    kill: (signal?: NodeJS.Signals) => boolean;
};

export type ChildProcessFakeHandle = {
    child: ChildProcessFake;
    stdinText: Promise<string>;
};

/**
 * Builds an in-process stand-in for a spawned CLI. Output is emitted once stdin closes,
 * then `close` fires with the scripted status.
 */
export function childProcessFakeCreate(script: ChildProcessScript, signal?: AbortSignal): ChildProcessFakeHandle {
    const emitter = new EventEmitter();
    const child: ChildProcessFake = Object.assign(emitter, {
        stdin: new PassThrough(),
        stdout: new PassThrough(),
        stderr: new PassThrough(),
        killed: false,
        kill: (killSignal: NodeJS.Signals = "SIGTERM") => {
            child.killed = true;
            setImmediate(() => finish(null, killSignal));
            return true;
        }
    });

    let finished = false;
    const finish = (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
        if (finished) {
            return;
        }
        finished = true;
        child.stdout.end();
        child.stderr.end();
        child.emit("exit", exitCode, exitSignal);
        child.emit("close", exitCode, exitSignal);
    };

    if (signal) {
        signal.addEventListener("abort", () => {
            const error = Object.assign(new Error("The operation was aborted"), { name: "AbortError", code: "ABORT_ERR" });
            child.emit("error", error);
            child.kill("SIGTERM");
        });
    }

    const chunks: Buffer[] = [];
    const stdinText = new Promise<string>((resolve) => {
        child.stdin.on("data", (chunk: Buffer) => chunks.push(chunk));
        child.stdin.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    });

    if (script.spawnError) {
        const spawnError = script.spawnError;
        setImmediate(() => {
            child.emit("error", spawnError);
            finish(-2, null);
        });
        return { child, stdinText };
    }

    void stdinText.then(() => {
        if (script.hang) {
            return;
        }
        if (script.stdout) {
            child.stdout.write(script.stdout);
        }
        if (script.stderr) {
            child.stderr.write(script.stderr);
        }
        setImmediate(() => finish(script.exitCode === undefined ? 0 : script.exitCode, script.signal ?? null));
    });

    return { child, stdinText };
}

export function spawnErrorBuild(code: string, message: string): NodeJS.ErrnoException {
    return Object.assign(new Error(message), { code });
}
