/**
 * Connector system: the type registry, connector instances, their client
 * caches and their storage form.
 *
 * @example
 * ```ts
 * import { ConnectorRegistry, ServiceConnector, serializeConnector } from "service-connectors/connectors";
 * import { createDockerConnectorType } from "service-connectors/providers";
 *
 * const registry = new ConnectorRegistry();
 * registry.register(createDockerConnectorType());
 *
 * const connector = ServiceConnector.create({
 *   type: "docker",
 *   authMethod: "password",
 *   config: { username: "ci-bot", password: "test-secret" },
 *   resourceId: "ghcr.io/acme/app",
 * }, { registry });
 *
 * const row = serializeConnector(connector); // password → { secret: true }
 * ```
 *
 * @module
 */

export {
    ConnectorRegistry,
    defaultRegistry,
    registerConnectorType,
    getConnectorType,
    type RegisteredConnector,
} from "./registry.js";
export {
    ServiceConnector,
    type AutoConfigureOptions,
    type ConnectorState,
    type ServiceConnectorCreateInit,
    type ServiceConnectorInit,
    type ServiceConnectorOptions,
    type VerifyOptions,
} from "./connector.js";
export { ClientCache, IMPLICIT_RESOURCE_KEY, type ClientCacheOptions } from "./client-cache.js";
export {
    serializeConnector,
    deserializeConnector,
    type DeserializeConnectorOptions,
    type SerializedConnector,
    type SerializedSecret,
} from "./serialize.js";
