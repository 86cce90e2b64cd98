/**
 * Connector Registry: catalog of connector types and live connector
 * instances.
 *
 * The type table is append-only and copy-on-write: `register` builds a new
 * frozen table and swaps it in, so lookups always read a complete snapshot and
 * are never blocked by a registration. Registrations normally happen at
 * startup or plugin load.
 *
 * @module
 */

import {
    ConfigurationError,
    DuplicateConnectorError,
    DuplicateTypeError,
    UnknownConnectorError,
    UnknownTypeError,
} from "../errors.js";
import type { ConnectorType, ConnectorTypeSpec } from "../types.js";

/**
 * A live connector as seen by the registry. Satisfied by `ServiceConnector`.
 */
export interface RegisteredConnector {
    readonly typeId: string;
    disconnect(): Promise<void>;
}

// =============================================================================
// Connector Registry
// =============================================================================

/**
 * Registry of connector types and named connector instances.
 *
 * @example
 * ```ts
 * import { ConnectorRegistry } from "service-connectors/connectors";
 * import { createDockerConnectorType } from "service-connectors/providers";
 *
 * const registry = new ConnectorRegistry();
 * registry.register(createDockerConnectorType());
 *
 * const docker = registry.get("docker");
 * console.log(docker.spec.resourceTypes.map((r) => r.id));
 * ```
 */
export class ConnectorRegistry {
    private types: ReadonlyMap<string, ConnectorType> = new Map();
    private readonly instances = new Map<string, RegisteredConnector>();

    // ---------------------------------------------------------------------------
    // Connector types
    // ---------------------------------------------------------------------------

    /**
     * Register a connector type.
     *
     * @throws DuplicateTypeError if a type with the same ID is registered.
     * @throws ConfigurationError if the spec is inconsistent.
     */
    register<TClient>(type: ConnectorType<TClient>): void {
        const id = type.spec.id;
        if (this.types.has(id)) {
            throw new DuplicateTypeError(id);
        }
        validateSpec(type);
        const next = new Map<string, ConnectorType>(this.types);
        next.set(id, Object.freeze({ ...type, spec: freezeSpec(type.spec) }));
        this.types = next;
    }

    /**
     * Get a connector type by ID.
     *
     * @throws UnknownTypeError if no such type is registered.
     */
    get(id: string): ConnectorType {
        const type = this.types.get(id);
        if (!type) throw new UnknownTypeError(id);
        return type;
    }

    /** Get a connector type by ID, or `undefined`. */
    find(id: string): ConnectorType | undefined {
        return this.types.get(id);
    }

    /** Check whether a connector type is registered. */
    has(id: string): boolean {
        return this.types.has(id);
    }

    /** List all registered connector types. */
    list(): ConnectorType[] {
        return Array.from(this.types.values());
    }

    /** List the specs of all registered connector types. */
    listSpecs(): ConnectorTypeSpec[] {
        return this.list().map((t) => t.spec);
    }

    /**
     * Iterate over registered connector types.
     *
     * ```ts
     * for (const type of registry) {
     *   console.log(type.spec.id);
     * }
     * ```
     */
    [Symbol.iterator](): Iterator<ConnectorType> {
        return this.types.values();
    }

    /** The number of registered connector types. */
    get size(): number {
        return this.types.size;
    }

    // ---------------------------------------------------------------------------
    // Connector instances
    // ---------------------------------------------------------------------------

    /**
     * Register a live connector under a name.
     *
     * @throws DuplicateConnectorError if the name is taken.
     * @throws UnknownTypeError if the connector's type is not registered here.
     */
    addConnector(name: string, connector: RegisteredConnector): void {
        if (this.instances.has(name)) {
            throw new DuplicateConnectorError(name);
        }
        this.get(connector.typeId);
        this.instances.set(name, connector);
    }

    /**
     * Get a live connector by name.
     *
     * @throws UnknownConnectorError if no connector has that name.
     */
    getConnector(name: string): RegisteredConnector {
        const connector = this.instances.get(name);
        if (!connector) throw new UnknownConnectorError(name);
        return connector;
    }

    /** Check whether a connector is registered under a name. */
    hasConnector(name: string): boolean {
        return this.instances.has(name);
    }

    /** Names of all registered connectors. */
    listConnectors(): string[] {
        return Array.from(this.instances.keys());
    }

    /**
     * Remove a connector and release its cached clients. Resolves after the
     * connector has disconnected.
     *
     * @returns false if no connector had that name.
     */
    async removeConnector(name: string): Promise<boolean> {
        const connector = this.instances.get(name);
        if (!connector) return false;
        this.instances.delete(name);
        await connector.disconnect();
        return true;
    }
}

/**
 * Every resource type must reference declared auth methods, and every
 * resource type with instances needs a resolver.
 */
function validateSpec<TClient>(type: ConnectorType<TClient>): void {
    const { spec, resolvers } = type;
    const methods = new Set(spec.authMethods.map((m) => m.id));
    const seen = new Set<string>();
    for (const resourceType of spec.resourceTypes) {
        if (seen.has(resourceType.id)) {
            throw new ConfigurationError(`Connector type "${spec.id}" declares resource type "${resourceType.id}" twice.`);
        }
        seen.add(resourceType.id);
        for (const method of resourceType.authMethods) {
            if (!methods.has(method)) {
                throw new ConfigurationError(
                    `Resource type "${resourceType.id}" of connector type "${spec.id}" allows undeclared auth method "${method}".`,
                );
            }
        }
        if (resourceType.supportsInstances && !resolvers[resourceType.id]) {
            throw new ConfigurationError(
                `Resource type "${resourceType.id}" of connector type "${spec.id}" supports instances but has no resource ID resolver.`,
            );
        }
    }
}

function freezeSpec(spec: ConnectorTypeSpec): ConnectorTypeSpec {
    return Object.freeze({
        ...spec,
        authMethods: Object.freeze(spec.authMethods.map((m) => Object.freeze({ ...m }))),
        resourceTypes: Object.freeze(
            spec.resourceTypes.map((r) => Object.freeze({ ...r, authMethods: Object.freeze([...r.authMethods]) })),
        ),
    });
}

// =============================================================================
// Process-wide registry
// =============================================================================

/** The process-wide registry used when no registry is passed explicitly. */
export const defaultRegistry = new ConnectorRegistry();

/**
 * Register a connector type with the process-wide registry.
 *
 * @throws DuplicateTypeError if the ID is already registered.
 */
export function registerConnectorType<TClient>(type: ConnectorType<TClient>): void {
    defaultRegistry.register(type);
}

/**
 * Look up a connector type in the process-wide registry.
 *
 * @throws UnknownTypeError if the ID is not registered.
 */
export function getConnectorType(id: string): ConnectorType {
    return defaultRegistry.get(id);
}
