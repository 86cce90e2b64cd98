/**
 * Plugin loader: loads connector-type plugins from the filesystem.
 *
 * Each plugin is a directory holding a `connector.plugin.json` manifest and an
 * entry module. The entry's register function receives a {@link PluginApi}
 * and contributes connector types through it.
 *
 * Entry modules are loaded with a plain dynamic `import()`, so they must be
 * JavaScript or run under a TypeScript-aware loader (tsx, Vitest).
 *
 * @module
 */

import { existsSync, readFileSync, readdirSync } from "node:fs";
import { join, resolve } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { defaultLogger, describeError, type Logger } from "../shared/logger.js";
import { resolvePluginEntry } from "../shared/resolve-entry.js";
import type { ConnectorType, PluginApi } from "../types.js";

/** Manifest file name looked for in each plugin directory. */
export const PLUGIN_MANIFEST_FILE = "connector.plugin.json";

// =============================================================================
// Plugin Manifest
// =============================================================================

const PluginManifestSchema = Type.Object({
    id: Type.String({ minLength: 1 }),
    name: Type.Optional(Type.String()),
    description: Type.Optional(Type.String()),
    version: Type.Optional(Type.String()),
});

/** Parsed connector.plugin.json manifest. */
export type PluginManifest = Static<typeof PluginManifestSchema>;

// =============================================================================
// Loaded Plugin
// =============================================================================

/** A loaded plugin with the connector types it registered. */
export interface LoadedPlugin {
    id: string;
    name: string;
    description?: string;
    version?: string;
    /** Absolute path of the entry module. */
    source: string;
    connectorTypes: ConnectorType[];
}

// =============================================================================
// Loader Options
// =============================================================================

export interface PluginLoaderOptions {
    /**
     * Directories to scan for plugins. Each holds plugin subdirectories with a
     * `connector.plugin.json`.
     */
    searchPaths: string[];

    /**
     * Explicit plugin IDs to enable. If undefined, all discovered plugins are enabled.
     */
    enabledPlugins?: string[];

    /**
     * Plugin IDs to skip.
     */
    disabledPlugins?: string[];

    /** Defaults to {@link defaultLogger}. */
    logger?: Logger;
}

type RegisterFn = (api: PluginApi) => unknown;

// =============================================================================
// Plugin Loader
// =============================================================================

/**
 * Discover and load connector plugins.
 *
 * A plugin that fails to load (bad manifest, missing entry, throwing register
 * function) is reported through `logger.error` and skipped.
 *
 * @example
 * ```ts
 * const plugins = await loadConnectorPlugins({ searchPaths: ["./plugins"], logger: console });
 * for (const plugin of plugins) {
 *     for (const type of plugin.connectorTypes) registry.register(type);
 * }
 * ```
 */
export async function loadConnectorPlugins(options: PluginLoaderOptions): Promise<LoadedPlugin[]> {
    const { searchPaths, enabledPlugins, disabledPlugins } = options;
    const logger = options.logger ?? defaultLogger;
    const disabledSet = new Set(disabledPlugins ?? []);
    const enabledSet = enabledPlugins ? new Set(enabledPlugins) : null;
    const loaded: LoadedPlugin[] = [];

    for (const searchPath of searchPaths) {
        const absPath = resolve(searchPath);
        if (!existsSync(absPath)) {
            logger.warn(`Plugin search path ${absPath} does not exist, skipping.`);
            continue;
        }

        for (const candidate of discoverPluginCandidates(absPath)) {
            try {
                const manifest = readManifest(candidate);

                if (disabledSet.has(manifest.id)) {
                    logger.info(`Plugin "${manifest.id}" is disabled, skipping.`);
                    continue;
                }
                if (enabledSet && !enabledSet.has(manifest.id)) {
                    continue;
                }

                const plugin = await loadSinglePlugin(candidate, manifest);
                loaded.push(plugin);
                logger.info(`Loaded plugin: ${plugin.id} (${plugin.connectorTypes.length} connector types)`);
            } catch (err) {
                logger.error(`Failed to load plugin from ${candidate}: ${describeError(err)}`);
            }
        }
    }

    return loaded;
}

// =============================================================================
// Internal: Discovery
// =============================================================================

function discoverPluginCandidates(searchDir: string): string[] {
    return readdirSync(searchDir, { withFileTypes: true })
        .filter((entry) => entry.isDirectory())
        .map((entry) => join(searchDir, entry.name))
        .filter((dir) => existsSync(join(dir, PLUGIN_MANIFEST_FILE)))
        .sort();
}

function readManifest(pluginDir: string): PluginManifest {
    const raw: unknown = JSON.parse(readFileSync(join(pluginDir, PLUGIN_MANIFEST_FILE), "utf-8"));
    if (!Value.Check(PluginManifestSchema, raw)) {
        const problems = [...Value.Errors(PluginManifestSchema, raw)].map((e) => `${e.path || "/"}: ${e.message}`);
        throw new Error(`Invalid ${PLUGIN_MANIFEST_FILE}: ${problems.join("; ")}`);
    }
    return raw;
}

// =============================================================================
// Internal: Loading
// =============================================================================

async function loadSinglePlugin(pluginDir: string, manifest: PluginManifest): Promise<LoadedPlugin> {
    const entryPath = resolvePluginEntry(pluginDir);
    if (!entryPath) {
        throw new Error(`No entry module found in ${pluginDir}`);
    }

    const mod: unknown = await import(entryPath);

    // Prefer the default export; fall back to the module namespace so that
    // `export function register(api) {}` also works.
    const resolved = isObject(mod) && "default" in mod && mod.default !== undefined ? mod.default : mod;
    const registerFn = resolveRegisterFunction(resolved);
    if (!registerFn) {
        throw new Error(`${entryPath} exports no register function`);
    }

    const connectorTypes: ConnectorType[] = [];
    const api: PluginApi = {
        id: manifest.id,
        name: manifest.name ?? manifest.id,
        registerConnectorType(type) {
            connectorTypes.push(type);
        },
    };

    await registerFn(api);

    return {
        id: manifest.id,
        name: manifest.name ?? manifest.id,
        description: manifest.description,
        version: manifest.version,
        source: entryPath,
        connectorTypes,
    };
}

function isObject(value: unknown): value is object {
    return typeof value === "object" && value !== null;
}

/**
 * Resolve the register function from a loaded plugin module.
 *
 * Resolution order (applied to `mod.default ?? mod`):
 * 1. A function is used directly.
 * 2. An object's `register` method.
 * 3. An object's `activate` method.
 */
function resolveRegisterFunction(mod: unknown): RegisterFn | null {
    if (typeof mod === "function") {
        return (api) => Reflect.apply(mod, undefined, [api]);
    }
    if (isObject(mod)) {
        for (const key of ["register", "activate"]) {
            const fn: unknown = Reflect.get(mod, key);
            if (typeof fn === "function") {
                return (api) => Reflect.apply(fn, mod, [api]);
            }
        }
    }
    return null;
}
