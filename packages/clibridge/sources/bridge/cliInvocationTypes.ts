export type CliTransport = "stdin" | "argument";

export type CliInvocation = {
    readonly executable: string;
    readonly args: readonly string[];
    readonly env: Readonly<Record<string, string>>;
    readonly transport: CliTransport;
};

export type CliInvocationOptions = {
    executable: string;
    agent: string | null;
    model: string | null;
    transport: CliTransport;
    env: Readonly<Record<string, string>>;
};

export type CliProcessResult = {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
};
