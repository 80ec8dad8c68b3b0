import { accessSync, constants, statSync } from "node:fs";
import path from "node:path";

/**
 * Looks up an executable by name on a PATH-style list of directories.
 * Returns the first absolute match that is a regular file with execute permission.
 */
export function cliExecutableFind(name: string, searchPath: string | undefined): string | null {
    if (!searchPath || name.length === 0 || name.includes(path.sep)) {
        return null;
    }

    for (const directory of searchPath.split(path.delimiter)) {
        if (!directory) {
            continue;
        }
        const candidate = path.resolve(directory, name);
        if (executableIs(candidate)) {
            return candidate;
        }
    }
    return null;
}

function executableIs(candidate: string): boolean {
    try {
        if (!statSync(candidate).isFile()) {
            return false;
        }
        accessSync(candidate, constants.X_OK);
        return true;
    } catch {
        return false;
    }
}
