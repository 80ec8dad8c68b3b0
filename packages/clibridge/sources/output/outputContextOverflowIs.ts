export const DEFAULT_OVERFLOW_MARKERS: readonly string[] = ["context window has overflowed"];

/**
 * Checks whether CLI output reports a context-window overflow.
 * Matching is a case-insensitive substring search against each marker phrase.
 */
export function outputContextOverflowIs(
    output: string,
    markers: readonly string[] = DEFAULT_OVERFLOW_MARKERS
): boolean {
    const haystack = output.toLowerCase();
    return markers.some((marker) => {
        const needle = marker.trim().toLowerCase();
        return needle.length > 0 && haystack.includes(needle);
    });
}
