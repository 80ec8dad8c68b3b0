import type { ChatMessage } from "../prompt/promptTypes.js";

export type ProviderCallOptions = {
    signal?: AbortSignal;
};

/**
 * Text-in text-out chat backend as seen by the surrounding application.
 */
export type ChatProvider = {
    chatWithSystem: (system: string | null, message: string, options?: ProviderCallOptions) => Promise<string>;
    chatWithHistory: (messages: ChatMessage[], options?: ProviderCallOptions) => Promise<string>;
    supportsNativeTools: () => boolean;
};
