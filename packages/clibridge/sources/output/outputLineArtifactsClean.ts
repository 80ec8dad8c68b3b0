/**
 * Cleans per-line rendering residue left by the CLI: a leading `> ` quote prefix and a
 * trailing `mm` (or else a single `m`) from stripped style codes. The joined result is trimmed.
 * CRLF and LF line endings both come back as LF. The suffix rule is unconditional, so words that end in `m` lose it too.
 */
export function outputLineArtifactsClean(text: string): string {
    return text
        .split(/\r?\n/)
        .map((line) => lineClean(line))
        .join("\n")
        .trim();
}

function lineClean(line: string): string {
    let result = line.startsWith("> ") ? line.slice(2) : line;
    if (result.endsWith("mm")) {
        result = result.slice(0, -2);
    } else if (result.endsWith("m")) {
        result = result.slice(0, -1);
    }
    return result;
}
