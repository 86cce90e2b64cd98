/**
 * Entry-point resolution for plugin directories.
 *
 * @module
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

const CONVENTIONAL_ENTRIES = [
    "index.ts",
    "index.js",
    "index.mts",
    "index.mjs",
    "src/index.ts",
    "src/index.js",
];

/** `serviceConnectors.entry` from a plugin's package.json, if declared. */
function declaredEntry(dir: string): string | undefined {
    const pkgPath = join(dir, "package.json");
    if (!existsSync(pkgPath)) return undefined;

    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (typeof pkg !== "object" || pkg === null || !("serviceConnectors" in pkg)) return undefined;
    const field = pkg.serviceConnectors;
    if (typeof field !== "object" || field === null || !("entry" in field)) return undefined;
    return typeof field.entry === "string" ? field.entry : undefined;
}

/**
 * Resolve the entry-point file for a plugin directory.
 *
 * Resolution order:
 * 1. `package.json` → `serviceConnectors.entry`
 * 2. Conventional candidates: `index.ts`, `index.js`, `index.mts`, `index.mjs`,
 *    `src/index.ts`, `src/index.js`
 *
 * @param dir - Absolute path to the plugin directory.
 * @returns Absolute path to the entry-point file, or `null` if none is found.
 * @throws SyntaxError if the directory's package.json is not valid JSON.
 */
export function resolvePluginEntry(dir: string): string | null {
    const declared = declaredEntry(dir);
    if (declared !== undefined) {
        const resolved = join(dir, declared);
        if (existsSync(resolved)) return resolved;
    }

    for (const candidate of CONVENTIONAL_ENTRIES) {
        const fullPath = join(dir, candidate);
        if (existsSync(fullPath)) return fullPath;
    }

    return null;
}
