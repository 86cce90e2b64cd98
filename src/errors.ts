/**
 * Error taxonomy for service connectors.
 *
 * Every error raised by the core extends {@link ServiceConnectorError} and
 * carries a stable `code`. Errors are surfaced to the immediate caller as-is:
 * nothing in the core retries, wraps or downgrades them.
 *
 * @module
 */

// =============================================================================
// Base
// =============================================================================

/** Stable machine-readable error codes. */
export type ServiceConnectorErrorCode =
    | "CONFIGURATION"
    | "INVALID_RESOURCE_ID"
    | "AMBIGUOUS_RESOURCE"
    | "AUTHORIZATION"
    | "NOT_SUPPORTED"
    | "LOCAL_TOOL"
    | "DUPLICATE_TYPE"
    | "UNKNOWN_TYPE"
    | "DUPLICATE_CONNECTOR"
    | "UNKNOWN_CONNECTOR";

/**
 * Base class for all service connector errors.
 */
export class ServiceConnectorError extends Error {
    readonly code: ServiceConnectorErrorCode;

    constructor(code: ServiceConnectorErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.code = code;
        this.name = "ServiceConnectorError";
    }
}

// =============================================================================
// Caller errors
// =============================================================================

/**
 * Thrown when credentials or a resource descriptor are malformed or fall
 * outside the connector type's declared scope.
 */
export class ConfigurationError extends ServiceConnectorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("CONFIGURATION", message, options);
        this.name = "ConfigurationError";
    }
}

/**
 * Thrown when a resource ID matches none of the shapes accepted for its
 * resource type.
 */
export class InvalidResourceIdError extends ServiceConnectorError {
    readonly resourceType: string;
    readonly resourceId: string;

    constructor(resourceType: string, resourceId: string, formats: readonly string[]) {
        const accepted = formats.length > 0 ? `\nAccepted formats:\n${formats.map((f) => `  - ${f}`).join("\n")}` : "";
        super("INVALID_RESOURCE_ID", `Invalid resource ID for resource type "${resourceType}": "${resourceId}".${accepted}`);
        this.name = "InvalidResourceIdError";
        this.resourceType = resourceType;
        this.resourceId = resourceId;
    }
}

/**
 * Thrown when an operation needs exactly one resource and the connector
 * targets a multi-instance resource type without one being supplied.
 */
export class AmbiguousResourceError extends ServiceConnectorError {
    readonly resourceType: string;

    constructor(resourceType: string) {
        super(
            "AMBIGUOUS_RESOURCE",
            `Resource type "${resourceType}" supports multiple instances: a resource ID must be configured on the connector or passed to the call.`,
        );
        this.name = "AmbiguousResourceError";
        this.resourceType = resourceType;
    }
}

// =============================================================================
// Provider errors
// =============================================================================

/**
 * Thrown when the provider rejects the credentials. Terminal: the provider's
 * own diagnostic is attached verbatim.
 */
export class AuthorizationError extends ServiceConnectorError {
    readonly diagnostic: string | undefined;

    constructor(message: string, options?: { diagnostic?: string; cause?: unknown }) {
        super("AUTHORIZATION", options?.diagnostic ? `${message}: ${options.diagnostic}` : message, {
            cause: options?.cause,
        });
        this.name = "AuthorizationError";
        this.diagnostic = options?.diagnostic;
    }
}

/**
 * Thrown when a capability is not implemented by a connector type, such as
 * auto-configuration or local client configuration.
 */
export class NotSupportedError extends ServiceConnectorError {
    constructor(message: string) {
        super("NOT_SUPPORTED", message);
        this.name = "NotSupportedError";
    }
}

/**
 * Thrown when an external tool invocation fails (missing binary or non-zero
 * exit). Carries the tool's raw diagnostic.
 */
export class LocalToolError extends ServiceConnectorError {
    readonly command: string;
    readonly exitCode: number | null;
    readonly stderr: string;

    constructor(command: string, exitCode: number | null, stderr: string, options?: { cause?: unknown }) {
        const status = exitCode === null ? "could not be started" : `exited with code ${exitCode}`;
        const detail = stderr.trim();
        super("LOCAL_TOOL", `"${command}" ${status}${detail ? `: ${detail}` : ""}`, options);
        this.name = "LocalToolError";
        this.command = command;
        this.exitCode = exitCode;
        this.stderr = stderr;
    }
}

// =============================================================================
// Registry errors
// =============================================================================

/** Thrown when a connector type ID is registered twice. */
export class DuplicateTypeError extends ServiceConnectorError {
    constructor(typeId: string) {
        super("DUPLICATE_TYPE", `Connector type "${typeId}" is already registered.`);
        this.name = "DuplicateTypeError";
    }
}

/** Thrown when a connector type ID is not registered. */
export class UnknownTypeError extends ServiceConnectorError {
    constructor(typeId: string) {
        super("UNKNOWN_TYPE", `Connector type "${typeId}" is not registered.`);
        this.name = "UnknownTypeError";
    }
}

/** Thrown when a connector instance name is already taken. */
export class DuplicateConnectorError extends ServiceConnectorError {
    constructor(name: string) {
        super("DUPLICATE_CONNECTOR", `A connector named "${name}" is already registered.`);
        this.name = "DuplicateConnectorError";
    }
}

/** Thrown when no connector instance is registered under a name. */
export class UnknownConnectorError extends ServiceConnectorError {
    constructor(name: string) {
        super("UNKNOWN_CONNECTOR", `No connector named "${name}" is registered.`);
        this.name = "UnknownConnectorError";
    }
}
