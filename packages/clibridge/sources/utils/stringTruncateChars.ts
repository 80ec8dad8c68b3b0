/**
 * Cuts value to at most maxLength UTF-16 code units without splitting a surrogate pair.
 * Expects: maxLength >= 0.
 */
export function stringTruncateChars(value: string, maxLength: number): string {
    if (value.length <= maxLength) {
        return value;
    }

    let end = Math.max(0, Math.floor(maxLength));
    if (end > 0 && highSurrogateIs(value.charCodeAt(end - 1))) {
        end -= 1;
    }
    return value.slice(0, end);
}

function highSurrogateIs(code: number): boolean {
    return code >= 0xd800 && code <= 0xdbff;
}
