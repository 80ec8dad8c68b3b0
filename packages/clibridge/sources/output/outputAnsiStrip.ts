const ESCAPE = "\u001b";

type ScanState = "normal" | "sequence";

/**
 * Removes `ESC [` control sequences (colors, cursor movement) from terminal output.
 * A sequence runs until its first ASCII letter, which is consumed with it. An escape
 * not followed by `[` is copied through; an unterminated sequence is dropped.
 */
export function outputAnsiStrip(text: string): string {
    let state: ScanState = "normal";
    let result = "";

    for (let index = 0; index < text.length; index += 1) {
        const char = text[index];
        if (char === undefined) {
            break;
        }

        if (state === "sequence") {
            if (asciiLetterIs(char)) {
                state = "normal";
            }
            continue;
        }

        if (char === ESCAPE && text[index + 1] === "[") {
            state = "sequence";
            index += 1;
            continue;
        }

        result += char;
    }

    return result;
}

function asciiLetterIs(char: string): boolean {
    return (char >= "a" && char <= "z") || (char >= "A" && char <= "Z");
}
