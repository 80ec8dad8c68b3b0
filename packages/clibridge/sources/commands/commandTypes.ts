export type ProviderCommandOptions = {
    settings?: string;
    executable?: string;
    agent?: string;
    model?: string;
};
