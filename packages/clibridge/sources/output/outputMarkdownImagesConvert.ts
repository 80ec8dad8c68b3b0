import path from "node:path";

import { attachmentMarkerBuild } from "../attachments/attachmentMarkerBuild.js";

const MARKDOWN_IMAGE_REGEX = /!\[([^\]\n]*)\]\(([^)\n]*)\)/g;
const FILE_SCHEME = "file://";

/**
 * Rewrites markdown images `![alt](url)` into `[IMAGE:target]` markers.
 * A `file://` prefix is dropped first. Absolute paths always convert; anything else
 * converts only when the alt text is non-empty. Other spans are left untouched.
 */
export function outputMarkdownImagesConvert(text: string): string {
    return text.replace(MARKDOWN_IMAGE_REGEX, (match: string, alt: string, url: string) => {
        const target = targetResolve(url);
        if (!target) {
            return match;
        }
        if (path.posix.isAbsolute(target) || alt.trim().length > 0) {
            return attachmentMarkerBuild("image", target);
        }
        return match;
    });
}

function targetResolve(url: string): string | null {
    const trimmed = url.trim();
    const target = trimmed.startsWith(FILE_SCHEME) ? trimmed.slice(FILE_SCHEME.length) : trimmed;
    if (target.length === 0 || target.includes("]")) {
        return null;
    }
    return target;
}
