/**
 * service-connectors: a pluggable framework for authenticated access to
 * external services.
 *
 * A connector type describes a provider family (auth methods, resource
 * types, capabilities) and knows how to turn validated credentials into
 * pre-authenticated clients. A {@link ServiceConnector} binds one type, one
 * auth method and one set of credentials, and caches the clients it builds.
 *
 * ## Quick Start
 *
 * ```ts
 * import { createServiceConnectors, ServiceConnector } from "service-connectors";
 *
 * const { registry } = await createServiceConnectors();
 *
 * const docker = ServiceConnector.create({
 *   type: "docker",
 *   authMethod: "password",
 *   config: { username: "ci-bot", password: "test-secret" },
 *   resourceId: "https://myhost:5000/team/app",
 * }, { registry });
 *
 * await docker.verify();
 * const client = await docker.connect();
 * await docker.disconnect();
 * ```
 *
 * ## Architecture
 *
 * - **connectors/**: registry, connector instances, client cache, storage form.
 * - **resources/**: resource ID resolvers.
 * - **providers/**: the built-in Docker and AWS connector types.
 * - **plugins/**: loader for connector-type plugins.
 *
 * @module
 */

// =============================================================================
// Re-exports: Types
// =============================================================================

export type {
    AuthMethodSpec,
    AutoConfigureRequest,
    AutoConfiguredConnector,
    ConnectorProvider,
    ConnectorType,
    ConnectorTypeSpec,
    ParsedResourceId,
    PluginApi,
    PluginDefinition,
    ProviderContext,
    ResourceIdResolver,
    ResourceTypeSpec,
    VerifyContext,
    VerifyOutcome,
} from "./types.js";

// =============================================================================
// Re-exports: Errors, logging, configuration
// =============================================================================

export {
    ServiceConnectorError,
    ConfigurationError,
    InvalidResourceIdError,
    AmbiguousResourceError,
    AuthorizationError,
    NotSupportedError,
    LocalToolError,
    DuplicateTypeError,
    UnknownTypeError,
    DuplicateConnectorError,
    UnknownConnectorError,
    type ServiceConnectorErrorCode,
} from "./errors.js";
export { defaultLogger, silentLogger, type Logger } from "./shared/logger.js";
export { runCommand, type CommandResult, type CommandRunner, type RunCommandOptions } from "./shared/run-command.js";
export {
    AuthenticationConfig,
    SecretField,
    SecretValue,
    SECRET_MASK,
    type ConfigField,
    type ConfigInput,
    type ConfigValue,
} from "./config/index.js";

// =============================================================================
// Re-exports: Connector system
// =============================================================================

export {
    ConnectorRegistry,
    ServiceConnector,
    ClientCache,
    defaultRegistry,
    registerConnectorType,
    getConnectorType,
    serializeConnector,
    deserializeConnector,
} from "./connectors/index.js";
export type {
    AutoConfigureOptions,
    ConnectorState,
    DeserializeConnectorOptions,
    RegisteredConnector,
    SerializedConnector,
    SerializedSecret,
    ServiceConnectorCreateInit,
    ServiceConnectorInit,
    ServiceConnectorOptions,
    VerifyOptions,
} from "./connectors/index.js";

export { createShapeResolver, dockerRepositoryResolver, s3BucketResolver } from "./resources/index.js";

export { builtinConnectorTypes, createAwsConnectorType, createDockerConnectorType } from "./providers/index.js";
export type { AwsConnectorOptions, BuiltinConnectorOptions, DockerConnectorOptions } from "./providers/index.js";

// =============================================================================
// Re-exports: Plugin system
// =============================================================================

export { loadConnectorPlugins } from "./plugins/index.js";
export type { LoadedPlugin, PluginLoaderOptions, PluginManifest } from "./plugins/index.js";

// =============================================================================
// Convenience: Pre-configured registry
// =============================================================================

import { ConnectorRegistry } from "./connectors/registry.js";
import { loadConnectorPlugins, type LoadedPlugin } from "./plugins/loader.js";
import { builtinConnectorTypes, type BuiltinConnectorOptions } from "./providers/index.js";
import { defaultLogger, describeError, type Logger } from "./shared/logger.js";

/**
 * Options for {@link createServiceConnectors}.
 */
export interface CreateServiceConnectorsOptions extends BuiltinConnectorOptions {
    /**
     * If true, skip registration of the built-in Docker and AWS connector
     * types.
     */
    skipBuiltinConnectors?: boolean;

    /** Directories to scan for connector-type plugins. */
    pluginPaths?: string[];

    /** Explicit plugin IDs to enable. All discovered plugins when omitted. */
    enabledPlugins?: string[];

    /** Plugin IDs to skip. */
    disabledPlugins?: string[];

    /** Defaults to {@link defaultLogger}. */
    logger?: Logger;
}

/**
 * A registry populated with connector types, and the plugins that
 * contributed to it.
 */
export interface ServiceConnectors {
    registry: ConnectorRegistry;
    plugins: LoadedPlugin[];
}

/**
 * Create a registry pre-loaded with the built-in connector types and the
 * types contributed by plugins.
 *
 * Plugin types whose ID is already taken are reported through
 * `logger.error` and skipped.
 *
 * @example
 * ```ts
 * const { registry, plugins } = await createServiceConnectors({
 *   pluginPaths: ["./connector-plugins"],
 *   logger: console,
 * });
 * console.log(registry.listSpecs().map((s) => s.id));
 * ```
 */
export async function createServiceConnectors(options: CreateServiceConnectorsOptions = {}): Promise<ServiceConnectors> {
    const registry = new ConnectorRegistry();
    const logger = options.logger ?? defaultLogger;

    if (!options.skipBuiltinConnectors) {
        for (const type of builtinConnectorTypes(options)) {
            registry.register(type);
        }
    }

    const plugins = options.pluginPaths?.length
        ? await loadConnectorPlugins({
              searchPaths: options.pluginPaths,
              enabledPlugins: options.enabledPlugins,
              disabledPlugins: options.disabledPlugins,
              logger,
          })
        : [];

    for (const plugin of plugins) {
        for (const type of plugin.connectorTypes) {
            try {
                registry.register(type);
            } catch (err) {
                logger.error(`Plugin "${plugin.id}" could not register connector type "${type.spec.id}": ${describeError(err)}`);
            }
        }
    }

    return { registry, plugins };
}
