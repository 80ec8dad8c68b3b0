// Central type re-exports for cross-cutting concerns.
// Import via: import type { ... } from "@/types";

// Attachments
export type {
    Attachment,
    AttachmentKind,
    AttachmentMarkersParseResult,
    AttachmentTargetLocation
} from "./attachments/attachmentTypes.js";
// Bridge
export type { CliBridgeErrorKind, CliBridgeErrorOptions } from "./bridge/cliBridgeError.js";
export type {
    CliInvocation,
    CliInvocationOptions,
    CliProcessResult,
    CliTransport
} from "./bridge/cliInvocationTypes.js";
// Config
export type {
    CliProviderConfig,
    CliSettings,
    ConfigOverrides,
    PromptSettings,
    SettingsConfig
} from "./config/configTypes.js";
// Prompt
export type { ChatMessage, PromptBudget, PromptSystemRule } from "./prompt/promptTypes.js";
// Providers
export type { ChatProvider, ProviderCallOptions } from "./providers/providerTypes.js";
