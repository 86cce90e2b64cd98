/**
 * Plugin system: loading connector-type plugins from the filesystem.
 *
 * @example
 * ```ts
 * import { loadConnectorPlugins } from "service-connectors/plugins";
 *
 * const plugins = await loadConnectorPlugins({
 *   searchPaths: ["./connector-plugins"],
 *   logger: console,
 * });
 *
 * for (const plugin of plugins) {
 *   console.log(`${plugin.id}: ${plugin.connectorTypes.length} connector types`);
 * }
 * ```
 *
 * @module
 */

export {
    loadConnectorPlugins,
    PLUGIN_MANIFEST_FILE,
    type LoadedPlugin,
    type PluginLoaderOptions,
    type PluginManifest,
} from "./loader.js";
