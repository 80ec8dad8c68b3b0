export { attachmentKindFromMarker } from "./attachments/attachmentKindFromMarker.js";
export { attachmentKindMarkerName } from "./attachments/attachmentKindMarkerName.js";
export { attachmentMarkerBuild } from "./attachments/attachmentMarkerBuild.js";
export { attachmentMarkersParse } from "./attachments/attachmentMarkersParse.js";
export { attachmentTargetClassify } from "./attachments/attachmentTargetClassify.js";
export { ATTACHMENT_KINDS } from "./attachments/attachmentTypes.js";
export { CliBridgeError, cliBridgeErrorIs } from "./bridge/cliBridgeError.js";
export { cliBridgeInvoke } from "./bridge/cliBridgeInvoke.js";
export { cliExecutableFind } from "./bridge/cliExecutableFind.js";
export { CLI_EXECUTABLE_DEFAULT, CLI_EXECUTABLE_ENV, cliExecutableResolve } from "./bridge/cliExecutableResolve.js";
export { CLI_ENV_OVERRIDES, CLI_SUBCOMMAND, cliInvocationArgs, cliInvocationBuild } from "./bridge/cliInvocationBuild.js";
export { cliProcessRun } from "./bridge/cliProcessRun.js";
export { channelDeliveryInstructions } from "./channels/channelDeliveryInstructions.js";
export { configLoad } from "./config/configLoad.js";
export { configResolve } from "./config/configResolve.js";
export { configSettingsParse } from "./config/configSettingsParse.js";
export { getLogger, initLogging } from "./log.js";
export { outputAnsiStrip } from "./output/outputAnsiStrip.js";
export { outputBareImagePathsWrap } from "./output/outputBareImagePathsWrap.js";
export { DEFAULT_OVERFLOW_MARKERS, outputContextOverflowIs } from "./output/outputContextOverflowIs.js";
export { outputLineArtifactsClean } from "./output/outputLineArtifactsClean.js";
export { outputMarkdownImagesConvert } from "./output/outputMarkdownImagesConvert.js";
export { outputSanitize } from "./output/outputSanitize.js";
export { DEFAULT_SETTINGS_PATH } from "./paths.js";
export { promptBuild } from "./prompt/promptBuild.js";
export { promptSingleTurnBuild } from "./prompt/promptSingleTurnBuild.js";
export { promptSystemExtract } from "./prompt/promptSystemExtract.js";
export { CliProvider } from "./providers/cliProvider.js";
export type * from "./types.js";
