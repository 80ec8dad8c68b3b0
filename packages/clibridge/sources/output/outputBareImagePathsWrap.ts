import { attachmentMarkerBuild } from "../attachments/attachmentMarkerBuild.js";
import { attachmentMarkersParse } from "../attachments/attachmentMarkersParse.js";

const IMAGE_EXTENSION_REGEX = /\.(png|jpe?g|gif|webp|bmp)$/i;
const LEADING_PUNCTUATION = new Set(["(", "<", "{", '"', "'", "`"]);
const TRAILING_PUNCTUATION = new Set([")", ">", "}", '"', "'", "`", ".", ",", ";", ":", "!", "?"]);

/**
 * Wraps bare absolute image paths (png, jpg, jpeg, gif, webp, bmp) in `[IMAGE:path]` markers.
 * Works in one forward pass over whitespace-separated words; punctuation around a word is
 * kept outside the marker. A path is wrapped at most once: paths that already have a marker
 * anywhere in the text, or were wrapped earlier in the pass, stay as they are.
 */
export function outputBareImagePathsWrap(text: string): string {
    const wrapped = new Set(
        attachmentMarkersParse(text)
            .attachments.filter((attachment) => attachment.kind === "image")
            .map((attachment) => attachment.target)
    );

    let result = "";
    for (const part of text.split(/(\s+)/)) {
        if (part.length === 0 || /^\s+$/.test(part)) {
            result += part;
            continue;
        }

        const word = wordSplit(part);
        if (!imagePathIs(word.core) || wrapped.has(word.core)) {
            result += part;
            continue;
        }

        wrapped.add(word.core);
        result += `${word.leading}${attachmentMarkerBuild("image", word.core)}${word.trailing}`;
    }
    return result;
}

function wordSplit(part: string): { leading: string; core: string; trailing: string } {
    let start = 0;
    let end = part.length;
    while (start < end && LEADING_PUNCTUATION.has(part.charAt(start))) {
        start += 1;
    }
    while (end > start && TRAILING_PUNCTUATION.has(part.charAt(end - 1))) {
        end -= 1;
    }
    return {
        leading: part.slice(0, start),
        core: part.slice(start, end),
        trailing: part.slice(end)
    };
}

function imagePathIs(candidate: string): boolean {
    if (!candidate.startsWith("/")) {
        return false;
    }
    if (candidate.includes("[") || candidate.includes("]")) {
        return false;
    }
    return IMAGE_EXTENSION_REGEX.test(candidate);
}
