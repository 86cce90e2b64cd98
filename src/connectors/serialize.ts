/**
 * Storage form of a connector instance.
 *
 * Only the connector's settings round-trip: type, auth method, resource type,
 * resource ID, name and credentials. Client handles never do. Secret fields
 * are marked, and their cleartext is written only on explicit request.
 *
 * @module
 */

import type { ConfigValue } from "../config/auth-config.js";
import { SecretValue } from "../config/secret.js";
import type { Logger } from "../shared/logger.js";
import { ServiceConnector } from "./connector.js";
import type { ConnectorRegistry } from "./registry.js";

/** A stored secret field. `value` is present only when secrets were included. */
export interface SerializedSecret {
    secret: true;
    value?: string;
}

/**
 * The snake_case serialized form of a {@link ServiceConnector}.
 *
 * @see serializeConnector
 */
export interface SerializedConnector {
    type: string;
    auth_method: string;
    resource_type: string;
    resource_id?: string;
    name?: string;
    config: Record<string, ConfigValue | SerializedSecret>;
}

/**
 * Convert a connector to its storage form.
 *
 * ```ts
 * const row = serializeConnector(connector);
 * // row.config.password → { secret: true }
 * await db.run("INSERT INTO connectors VALUES (?)", [JSON.stringify(row)]);
 * ```
 *
 * @param options.includeSecrets - Write secret cleartext, for a caller-owned
 *   secret store. Off by default.
 */
export function serializeConnector<TClient>(
    connector: ServiceConnector<TClient>,
    options?: { includeSecrets?: boolean },
): SerializedConnector {
    const config: Record<string, ConfigValue | SerializedSecret> = {};
    for (const [key, value] of Object.entries(connector.config.toPlain())) {
        if (value instanceof SecretValue) {
            config[key] = options?.includeSecrets ? { secret: true, value: value.reveal() } : { secret: true };
        } else {
            config[key] = value;
        }
    }

    const result: SerializedConnector = {
        type: connector.typeId,
        auth_method: connector.authMethod,
        resource_type: connector.resourceType,
        config,
    };
    if (connector.resourceId !== undefined) result.resource_id = connector.resourceId;
    if (connector.name !== undefined) result.name = connector.name;
    return result;
}

export interface DeserializeConnectorOptions {
    /** Registry holding the connector type. Defaults to the process-wide one. */
    registry?: ConnectorRegistry;
    /** Cleartext for secret fields stored without a value. */
    secrets?: Record<string, string>;
    logger?: Logger;
}

function isSerializedSecret(value: ConfigValue | SerializedSecret): value is SerializedSecret {
    return typeof value === "object" && value.secret === true;
}

/**
 * Rebuild a connector from its storage form. The inverse of
 * {@link serializeConnector}.
 *
 * Secret fields stored without a value are taken from `options.secrets`.
 *
 * @throws UnknownTypeError if the connector type is not registered.
 * @throws ConfigurationError if a secret is missing or the credentials no
 *   longer match the auth method's schema.
 */
export function deserializeConnector(
    serialized: SerializedConnector,
    options?: DeserializeConnectorOptions,
): ServiceConnector {
    const config: Record<string, ConfigValue | SecretValue> = {};
    for (const [key, value] of Object.entries(serialized.config)) {
        if (isSerializedSecret(value)) {
            const cleartext = value.value ?? options?.secrets?.[key];
            if (cleartext !== undefined) config[key] = new SecretValue(cleartext);
        } else {
            config[key] = value;
        }
    }

    return ServiceConnector.create(
        {
            type: serialized.type,
            authMethod: serialized.auth_method,
            resourceType: serialized.resource_type,
            resourceId: serialized.resource_id,
            name: serialized.name,
            config,
        },
        { registry: options?.registry, logger: options?.logger },
    );
}
