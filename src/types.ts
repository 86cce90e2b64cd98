/**
 * Core type definitions for service connectors.
 *
 * A connector type is split in two halves:
 *
 * - a {@link ConnectorTypeSpec}: immutable, descriptive metadata shared by
 *   every instance of the type (auth methods, resource types, capabilities);
 * - a {@link ConnectorProvider}: the provider-specific routines that talk to
 *   the outside world (build a client, verify credentials, log a local tool
 *   in, harvest ambient credentials).
 *
 * @module
 */

import type { TObject } from "@sinclair/typebox";
import type { AuthenticationConfig, ConfigInput } from "./config/auth-config.js";
import type { Logger } from "./shared/logger.js";

// =============================================================================
// Descriptive metadata
// =============================================================================

/** One authentication method a connector type accepts. */
export interface AuthMethodSpec {
    /** Method identifier (e.g., "password", "secret-key"). */
    id: string;
    /** Human-readable name. */
    name: string;
    description: string;
    /**
     * Schema of the credential bundle. Secret fields are declared with
     * `SecretField()`.
     */
    configSchema: TObject;
}

/** A category of target a connector type can reach. */
export interface ResourceTypeSpec {
    /** Resource type identifier (e.g., "docker-registry", "s3-bucket"). */
    id: string;
    /** Human-readable name. */
    name: string;
    description?: string;
    /**
     * When false, the connector always targets exactly one implicit resource
     * and never takes a resource ID.
     */
    supportsInstances: boolean;
    /**
     * When false, accessible resource IDs cannot be enumerated from the
     * credentials and must be supplied by the caller.
     */
    supportsDiscovery: boolean;
    /** IDs of the auth methods allowed for this resource type. */
    authMethods: readonly string[];
}

/** Immutable description of a connector type. */
export interface ConnectorTypeSpec {
    /** Connector type identifier (e.g., "docker", "aws"). */
    id: string;
    /** Human-readable name. */
    name: string;
    description: string;
    authMethods: readonly AuthMethodSpec[];
    resourceTypes: readonly ResourceTypeSpec[];
    /**
     * Whether the type can build a connector from ambient credentials
     * (environment variables, local provider config files).
     */
    supportsAutoConfiguration: boolean;
}

// =============================================================================
// Resource identifiers
// =============================================================================

/** A resource ID split into its canonical form and decomposed fields. */
export interface ParsedResourceId {
    /** The raw string supplied by the caller. */
    raw: string;
    /** Canonical form; parsing it again yields the same value. */
    canonicalId: string;
    /**
     * Decomposed fields (e.g., `registry` for a Docker repository). A field
     * that does not apply to the matched shape is `undefined`.
     */
    fields: Readonly<Record<string, string | undefined>>;
}

/** Parses and canonicalizes resource IDs for one resource type. */
export interface ResourceIdResolver {
    readonly resourceType: string;
    /** Human-readable descriptions of the accepted formats. */
    readonly formats: readonly string[];
    /**
     * @throws InvalidResourceIdError when the string matches no accepted shape.
     */
    parse(raw: string): ParsedResourceId;
}

// =============================================================================
// Provider capability interface
// =============================================================================

/** Everything a provider routine needs about the calling connector. */
export interface ProviderContext {
    spec: ConnectorTypeSpec;
    authMethod: AuthMethodSpec;
    config: AuthenticationConfig;
    resourceType: ResourceTypeSpec;
    /** Target resource, or `undefined` for the implicit single resource. */
    resource: ParsedResourceId | undefined;
    logger: Logger;
}

/** Context of a verification call. */
export interface VerifyContext extends ProviderContext {
    /**
     * True when no resource was given and the resource type supports
     * discovery: the provider must list every accessible resource.
     */
    discover: boolean;
}

/**
 * Result of a provider verification.
 *
 * `unreachable` is the one recoverable outcome: the provider (or the local
 * daemon verification goes through) could not be reached, so the result is
 * inconclusive rather than a credential failure.
 */
export type VerifyOutcome =
    | {
        status: "verified";
        /** Raw resource IDs confirmed accessible; canonicalized by the caller. */
        resourceIds: string[];
    }
    | {
        status: "unreachable";
        reason: string;
    };

/** Input to a provider's auto-configuration routine. */
export interface AutoConfigureRequest {
    authMethod?: string;
    resourceType?: string;
    resourceId?: string;
    region?: string;
    /** Environment variables to harvest credentials from. */
    env: Readonly<Record<string, string | undefined>>;
    logger: Logger;
}

/** Connector settings harvested from the ambient environment. */
export interface AutoConfiguredConnector {
    authMethod: string;
    resourceType: string;
    resourceId?: string;
    config: ConfigInput;
}

/**
 * Provider-specific routines of a connector type.
 *
 * Errors thrown here reach the caller unchanged, so implementations raise the
 * library's error kinds (`AuthorizationError`, `LocalToolError`, …) directly.
 *
 * @typeParam TClient - Authenticated client handle produced by {@link connect}.
 */
export interface ConnectorProvider<TClient> {
    /** Build an authenticated client for the context's resource. */
    connect(ctx: ProviderContext): Promise<TClient>;
    /** Cheapest check that the credentials work; never returns a client. */
    verify(ctx: VerifyContext): Promise<VerifyOutcome>;
    /** Release any provider-side session held by a client. */
    disconnect?(client: TClient): Promise<void> | void;
    /** Write the credentials into a local tool's own configuration. */
    configureLocalClient?(ctx: ProviderContext): Promise<void>;
    /** Harvest credentials from the ambient environment. */
    autoConfigure?(request: AutoConfigureRequest): Promise<AutoConfiguredConnector>;
}

/**
 * A registrable connector type: its spec, a resolver per resource type that
 * supports instances, and its provider routines.
 */
export interface ConnectorType<TClient = unknown> {
    spec: ConnectorTypeSpec;
    resolvers: Readonly<Record<string, ResourceIdResolver>>;
    provider: ConnectorProvider<TClient>;
}

// =============================================================================
// Plugin Types
// =============================================================================

/** API handed to a plugin's register function. */
export interface PluginApi {
    /** Plugin ID from the manifest. */
    id: string;
    /** Plugin name from the manifest. */
    name: string;
    /** Contribute a connector type. */
    registerConnectorType<TClient>(type: ConnectorType<TClient>): void;
}

/** Shape of a plugin module's register export. */
export type PluginDefinition =
    | ((api: PluginApi) => void | Promise<void>)
    | { register: (api: PluginApi) => void | Promise<void> }
    | { activate: (api: PluginApi) => void | Promise<void> };
