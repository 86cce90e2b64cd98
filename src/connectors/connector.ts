/**
 * ServiceConnector: binds a connector type, an auth method, validated
 * credentials and a target resource to live behavior.
 *
 * Lifecycle: a connector starts `configured`. A successful `connect()` caches
 * a client and makes it `connected`; `disconnect()` or a credential rotation
 * returns it to `configured`. There is no background health check: a stale
 * client is only noticed on next use.
 *
 * @module
 */

import { AuthenticationConfig, type ConfigInput } from "../config/auth-config.js";
import {
    AmbiguousResourceError,
    ConfigurationError,
    InvalidResourceIdError,
    NotSupportedError,
} from "../errors.js";
import { defaultLogger, type Logger } from "../shared/logger.js";
import type {
    AuthMethodSpec,
    ConnectorType,
    ConnectorTypeSpec,
    ParsedResourceId,
    ProviderContext,
    ResourceIdResolver,
    ResourceTypeSpec,
} from "../types.js";
import { ClientCache, IMPLICIT_RESOURCE_KEY } from "./client-cache.js";
import { defaultRegistry, type ConnectorRegistry } from "./registry.js";

// =============================================================================
// Options
// =============================================================================

/** Settings of a connector instance. */
export interface ServiceConnectorInit {
    /** Auth method ID; must be allowed for the resource type. */
    authMethod: string;
    /** Credentials, validated against the auth method's schema. */
    config: ConfigInput | AuthenticationConfig;
    /**
     * Resource type ID. May be omitted when exactly one resource type of the
     * connector type allows the auth method.
     */
    resourceType?: string;
    /** Raw resource ID to bind; canonicalized on construction. */
    resourceId?: string;
    /** Optional display name. */
    name?: string;
}

/** Settings of a connector instance, naming its type. */
export interface ServiceConnectorCreateInit extends ServiceConnectorInit {
    /** Connector type ID (looked up in the registry) or the type itself. */
    type: string | ConnectorType;
}

export interface ServiceConnectorOptions {
    /** Registry to resolve type IDs against. Defaults to the process-wide one. */
    registry?: ConnectorRegistry;
    logger?: Logger;
}

/** Input to {@link ServiceConnector.autoConfigure}. */
export interface AutoConfigureOptions {
    authMethod?: string;
    resourceType?: string;
    resourceId?: string;
    /** Provider region, for connector types that have one. Takes precedence over the environment. */
    region?: string;
    /** Environment to harvest credentials from. Defaults to `process.env`. */
    env?: Readonly<Record<string, string | undefined>>;
}

/** Arguments of {@link ServiceConnector.verify}. */
export interface VerifyOptions {
    /** Must match the connector's resource type when given. */
    resourceType?: string;
    /** Raw resource ID to verify. Defaults to the connector's bound resource. */
    resourceId?: string;
}

export type ConnectorState = "configured" | "connected";

// =============================================================================
// ServiceConnector
// =============================================================================

/**
 * A configured connector instance.
 *
 * @typeParam TClient - Client handle produced by the connector type.
 *
 * @example
 * ```ts
 * const connector = ServiceConnector.create({
 *     type: "docker",
 *     authMethod: "password",
 *     config: { username: "ci-bot", password: "test-secret" },
 *     resourceType: "docker-registry",
 *     resourceId: "https://myhost:5000/team/app",
 * });
 *
 * connector.resourceId;            // "myhost:5000/team/app"
 * const client = await connector.connect();
 * await connector.disconnect();
 * ```
 */
export class ServiceConnector<TClient = unknown> {
    readonly type: ConnectorType<TClient>;
    readonly name: string | undefined;
    readonly authMethodSpec: AuthMethodSpec;
    readonly resourceTypeSpec: ResourceTypeSpec;
    readonly resource: ParsedResourceId | undefined;

    private currentConfig: AuthenticationConfig;
    private currentFingerprint: string;
    private readonly cache: ClientCache<TClient>;
    private readonly logger: Logger;

    /**
     * Validate the settings against the connector type.
     *
     * @throws ConfigurationError if the auth method or resource type is not
     *   declared, the auth method is not allowed for the resource type, the
     *   credentials do not match the method's schema, or a resource ID is
     *   bound to a resource type without instances.
     * @throws InvalidResourceIdError if the resource ID has no accepted shape.
     */
    constructor(type: ConnectorType<TClient>, init: ServiceConnectorInit, options?: { logger?: Logger }) {
        const spec = type.spec;
        this.type = type;
        this.name = init.name;
        this.logger = options?.logger ?? defaultLogger;

        const authMethod = spec.authMethods.find((m) => m.id === init.authMethod);
        if (!authMethod) {
            throw new ConfigurationError(
                `Connector type "${spec.id}" has no auth method "${init.authMethod}". Supported: ${spec.authMethods.map((m) => m.id).join(", ")}.`,
            );
        }
        this.authMethodSpec = authMethod;
        this.resourceTypeSpec = selectResourceType(spec, authMethod.id, init.resourceType);

        this.currentConfig = AuthenticationConfig.parse(authMethod, init.config);
        this.currentFingerprint = this.currentConfig.fingerprint();
        this.resource = init.resourceId === undefined ? undefined : this.parseResource(init.resourceId);

        const provider = type.provider;
        this.cache = new ClientCache<TClient>({
            dispose: provider.disconnect ? (client) => provider.disconnect?.(client) : undefined,
            logger: this.logger,
            label: this.label,
        });
    }

    /**
     * Create a connector from a type ID or type.
     *
     * @throws UnknownTypeError if a type ID is not registered.
     */
    static create<TClient>(
        init: ServiceConnectorInit & { type: ConnectorType<TClient> },
        options?: ServiceConnectorOptions,
    ): ServiceConnector<TClient>;
    static create(init: ServiceConnectorCreateInit, options?: ServiceConnectorOptions): ServiceConnector;
    static create(init: ServiceConnectorCreateInit, options?: ServiceConnectorOptions): ServiceConnector {
        const type = typeof init.type === "string" ? (options?.registry ?? defaultRegistry).get(init.type) : init.type;
        return new ServiceConnector(type, init, { logger: options?.logger });
    }

    /**
     * Build a connector from credentials found in the ambient environment
     * (environment variables, local provider config files).
     *
     * @throws NotSupportedError if the connector type does not declare
     *   auto-configuration, whatever the arguments.
     */
    static autoConfigure<TClient>(
        type: ConnectorType<TClient>,
        request?: AutoConfigureOptions,
        options?: ServiceConnectorOptions,
    ): Promise<ServiceConnector<TClient>>;
    static autoConfigure(
        type: string | ConnectorType,
        request?: AutoConfigureOptions,
        options?: ServiceConnectorOptions,
    ): Promise<ServiceConnector>;
    static async autoConfigure(
        typeOrId: string | ConnectorType,
        request: AutoConfigureOptions = {},
        options: ServiceConnectorOptions = {},
    ): Promise<ServiceConnector> {
        const type = typeof typeOrId === "string" ? (options.registry ?? defaultRegistry).get(typeOrId) : typeOrId;
        const { spec, provider } = type;
        if (!spec.supportsAutoConfiguration || !provider.autoConfigure) {
            throw new NotSupportedError(`Auto-configuration is not supported by the "${spec.id}" connector type.`);
        }
        if (request.authMethod !== undefined && !spec.authMethods.some((m) => m.id === request.authMethod)) {
            throw new ConfigurationError(`Connector type "${spec.id}" has no auth method "${request.authMethod}".`);
        }
        if (request.resourceType !== undefined && !spec.resourceTypes.some((r) => r.id === request.resourceType)) {
            throw new ConfigurationError(`Connector type "${spec.id}" has no resource type "${request.resourceType}".`);
        }

        const logger = options.logger ?? defaultLogger;
        const found = await provider.autoConfigure({
            authMethod: request.authMethod,
            resourceType: request.resourceType,
            resourceId: request.resourceId,
            region: request.region,
            env: request.env ?? process.env,
            logger,
        });
        logger.info(`${spec.id}: auto-configured auth method "${found.authMethod}" for resource type "${found.resourceType}"`);

        return new ServiceConnector(type, found, { logger });
    }

    // ---------------------------------------------------------------------------
    // Descriptive accessors
    // ---------------------------------------------------------------------------

    get spec(): ConnectorTypeSpec {
        return this.type.spec;
    }

    get typeId(): string {
        return this.type.spec.id;
    }

    get authMethod(): string {
        return this.authMethodSpec.id;
    }

    get resourceType(): string {
        return this.resourceTypeSpec.id;
    }

    /** Canonical form of the bound resource ID, if any. */
    get resourceId(): string | undefined {
        return this.resource?.canonicalId;
    }

    /** Current credentials. */
    get config(): AuthenticationConfig {
        return this.currentConfig;
    }

    /** `connected` while a client built with the current credentials is cached. */
    get state(): ConnectorState {
        return this.cache.hasFingerprint(this.currentFingerprint) ? "connected" : "configured";
    }

    private get label(): string {
        return this.name ? `${this.type.spec.id}/${this.name}` : this.type.spec.id;
    }

    // ---------------------------------------------------------------------------
    // Resource IDs
    // ---------------------------------------------------------------------------

    /**
     * Canonical form of a resource ID for any resource type of this
     * connector's type. Parsing the result again yields the same string.
     *
     * @throws InvalidResourceIdError if the ID has no accepted shape.
     * @throws ConfigurationError if the resource type is unknown or has no
     *   instances.
     */
    canonicalResourceId(resourceType: string, resourceId: string): string {
        return this.resolverFor(resourceType).parse(resourceId).canonicalId;
    }

    private resolverFor(resourceType: string): ResourceIdResolver {
        const spec = this.type.spec;
        if (!spec.resourceTypes.some((r) => r.id === resourceType)) {
            throw new ConfigurationError(`Connector type "${spec.id}" has no resource type "${resourceType}".`);
        }
        const resolver = this.type.resolvers[resourceType];
        if (!resolver) {
            throw new ConfigurationError(
                `Resource type "${resourceType}" of connector type "${spec.id}" does not take resource IDs.`,
            );
        }
        return resolver;
    }

    private parseResource(raw: string): ParsedResourceId {
        if (!this.resourceTypeSpec.supportsInstances) {
            throw new ConfigurationError(
                `Resource type "${this.resourceTypeSpec.id}" targets a single implicit resource and does not take a resource ID.`,
            );
        }
        return this.resolverFor(this.resourceTypeSpec.id).parse(raw);
    }

    /**
     * Explicit argument, else the bound resource, else the implicit resource
     * of a single-instance type.
     */
    private targetResource(resourceId: string | undefined): ParsedResourceId | undefined {
        if (resourceId !== undefined) return this.parseResource(resourceId);
        if (this.resource) return this.resource;
        if (this.resourceTypeSpec.supportsInstances) {
            throw new AmbiguousResourceError(this.resourceTypeSpec.id);
        }
        return undefined;
    }

    private context(resource: ParsedResourceId | undefined, config: AuthenticationConfig): ProviderContext {
        return {
            spec: this.type.spec,
            authMethod: this.authMethodSpec,
            config,
            resourceType: this.resourceTypeSpec,
            resource,
            logger: this.logger,
        };
    }

    // ---------------------------------------------------------------------------
    // Operations
    // ---------------------------------------------------------------------------

    /**
     * Return an authenticated client for a resource, reusing the cached one
     * when it was built with the current credentials. Concurrent calls for the
     * same resource share a single provider handshake.
     *
     * @param resourceId - Raw resource ID; defaults to the bound resource.
     * @throws AmbiguousResourceError if the resource type has instances and no
     *   resource ID is bound or given.
     * @throws AuthorizationError if the provider rejects the credentials.
     */
    async connect(resourceId?: string): Promise<TClient> {
        const resource = this.targetResource(resourceId);
        const key = resource?.canonicalId ?? IMPLICIT_RESOURCE_KEY;
        const config = this.currentConfig;
        return this.cache.acquire(key, this.currentFingerprint, () =>
            this.type.provider.connect(this.context(resource, config)),
        );
    }

    /**
     * Check that the credentials work without caching a client.
     *
     * - With a resource ID (given or bound): verifies that resource and
     *   returns `[canonicalId]`.
     * - Without one, on a discoverable resource type: returns every
     *   accessible resource ID, canonicalized and de-duplicated. Listed IDs
     *   of no accepted shape are skipped with a warning.
     * - Without one, on a non-discoverable resource type: checks the
     *   credentials only and returns `[]`. An empty list here means "no
     *   resource confirmed", not "no resource accessible".
     *
     * When the provider (or the local daemon verification goes through) is
     * unreachable, the result is inconclusive: a warning is logged and `[]`
     * is returned.
     *
     * @throws AuthorizationError if the provider rejects the credentials.
     */
    async verify(options: VerifyOptions = {}): Promise<string[]> {
        if (options.resourceType !== undefined && options.resourceType !== this.resourceTypeSpec.id) {
            throw new ConfigurationError(
                `Connector is bound to resource type "${this.resourceTypeSpec.id}", not "${options.resourceType}".`,
            );
        }
        const resource = options.resourceId !== undefined ? this.parseResource(options.resourceId) : this.resource;
        const discover =
            resource === undefined && this.resourceTypeSpec.supportsInstances && this.resourceTypeSpec.supportsDiscovery;

        const outcome = await this.type.provider.verify({
            ...this.context(resource, this.currentConfig),
            discover,
        });

        if (outcome.status === "unreachable") {
            this.logger.warn(`${this.label}: verification inconclusive, provider unreachable: ${outcome.reason}`);
            return [];
        }
        if (resource) {
            this.logger.info(`${this.label}: verified access to ${resource.canonicalId}`);
            return [resource.canonicalId];
        }
        if (!discover) {
            this.logger.info(`${this.label}: credentials verified for resource type ${this.resourceTypeSpec.id}`);
            return [];
        }

        const resolver = this.resolverFor(this.resourceTypeSpec.id);
        const ids = new Set<string>();
        for (const id of outcome.resourceIds) {
            try {
                ids.add(resolver.parse(id).canonicalId);
            } catch (err) {
                if (!(err instanceof InvalidResourceIdError)) throw err;
                // The provider may list names older than the accepted shapes.
                this.logger.warn(`${this.label}: skipping discovered resource "${id}": not a valid ${resolver.resourceType} ID`);
            }
        }
        this.logger.info(`${this.label}: discovered ${ids.size} accessible resource(s)`);
        return [...ids];
    }

    /**
     * Write the credentials into a local tool's own configuration (e.g.,
     * `docker login`).
     *
     * @throws NotSupportedError if the connector type has no local
     *   configuration routine.
     * @throws AuthorizationError if the credentials are rejected.
     * @throws LocalToolError if the tool invocation fails.
     */
    async configureLocalClient(resourceId?: string): Promise<void> {
        const provider = this.type.provider;
        if (!provider.configureLocalClient) {
            throw new NotSupportedError(
                `Connector type "${this.typeId}" cannot configure a local client for resource type "${this.resourceTypeSpec.id}".`,
            );
        }
        const resource = this.targetResource(resourceId);
        await provider.configureLocalClient(this.context(resource, this.currentConfig));
        this.logger.info(`${this.label}: configured local client${resource ? ` for ${resource.canonicalId}` : ""}`);
    }

    /**
     * Replace the credentials. Cached clients built with the previous
     * credentials are released before this resolves.
     *
     * @throws ConfigurationError if the new credentials do not match the auth
     *   method's schema; the previous credentials stay in place.
     */
    async rotateCredentials(config: ConfigInput | AuthenticationConfig): Promise<void> {
        const next = AuthenticationConfig.parse(this.authMethodSpec, config);
        this.currentConfig = next;
        this.currentFingerprint = next.fingerprint();
        const evicted = await this.cache.evictStale(this.currentFingerprint);
        if (evicted > 0) {
            this.logger.info(`${this.label}: credentials rotated, released ${evicted} cached client(s)`);
        }
    }

    /**
     * Release every cached client. Resolves once provider-side sessions are
     * closed.
     */
    async disconnect(): Promise<void> {
        await this.cache.clear();
    }

    /** Descriptive form without client handles; secrets are masked. */
    toJSON(): Record<string, unknown> {
        return {
            type: this.typeId,
            name: this.name,
            authMethod: this.authMethod,
            resourceType: this.resourceType,
            resourceId: this.resourceId,
            config: this.currentConfig.toJSON(),
        };
    }
}

function selectResourceType(
    spec: ConnectorTypeSpec,
    authMethod: string,
    requested: string | undefined,
): ResourceTypeSpec {
    if (requested !== undefined) {
        const resourceType = spec.resourceTypes.find((r) => r.id === requested);
        if (!resourceType) {
            throw new ConfigurationError(
                `Connector type "${spec.id}" has no resource type "${requested}". Supported: ${spec.resourceTypes.map((r) => r.id).join(", ")}.`,
            );
        }
        if (!resourceType.authMethods.includes(authMethod)) {
            throw new ConfigurationError(
                `Auth method "${authMethod}" is not allowed for resource type "${requested}" of connector type "${spec.id}".`,
            );
        }
        return resourceType;
    }

    const candidates = spec.resourceTypes.filter((r) => r.authMethods.includes(authMethod));
    const only = candidates[0];
    if (candidates.length !== 1 || !only) {
        throw new ConfigurationError(
            `A resource type must be given for auth method "${authMethod}" of connector type "${spec.id}".`,
        );
    }
    return only;
}
