import { outputAnsiStrip } from "./outputAnsiStrip.js";
import { outputBareImagePathsWrap } from "./outputBareImagePathsWrap.js";
import { outputLineArtifactsClean } from "./outputLineArtifactsClean.js";
import { outputMarkdownImagesConvert } from "./outputMarkdownImagesConvert.js";

/**
 * Normalizes raw CLI output into plain text using the attachment-marker dialect:
 * control sequences, then line artifacts, then markdown images, then bare image paths.
 */
export function outputSanitize(raw: string): string {
    const stripped = outputAnsiStrip(raw);
    const cleaned = outputLineArtifactsClean(stripped);
    const converted = outputMarkdownImagesConvert(cleaned);
    return outputBareImagePathsWrap(converted);
}
