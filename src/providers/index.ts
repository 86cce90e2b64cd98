/**
 * Built-in connector types.
 *
 * @example
 * ```ts
 * import { ConnectorRegistry } from "service-connectors/connectors";
 * import { builtinConnectorTypes } from "service-connectors/providers";
 *
 * const registry = new ConnectorRegistry();
 * for (const type of builtinConnectorTypes()) {
 *   registry.register(type);
 * }
 * ```
 *
 * @module
 */

import type { ConnectorType } from "../types.js";
import { createAwsConnectorType, type AwsConnectorOptions } from "./aws.js";
import { createDockerConnectorType, type DockerConnectorOptions, type DockerEngine } from "./docker.js";

export {
    createDockerConnectorType,
    isDockerAuthRejection,
    DOCKER_CONNECTOR_SPEC,
    DOCKER_CONNECTOR_TYPE,
    DOCKER_HUB_SERVER,
    DOCKER_PASSWORD_AUTH,
    DockerCredentials,
    type DockerAuth,
    type DockerConnectorOptions,
    type DockerEngine,
    type DockerRegistryClient,
} from "./docker.js";
export {
    createAwsConnectorType,
    createS3Client,
    createStsClient,
    classifyAwsError,
    sdkAwsApi,
    AWS_CONNECTOR_SPEC,
    AWS_CONNECTOR_TYPE,
    AWS_DEFAULT_REGION,
    AWS_GENERIC_RESOURCE_TYPE,
    AWS_SECRET_KEY_AUTH,
    AWS_STS_TOKEN_AUTH,
    AwsSecretKeyCredentials,
    AwsStsTokenCredentials,
    type AwsApi,
    type AwsCallerIdentity,
    type AwsClient,
    type AwsConnectorOptions,
    type AwsCredentials,
    type AwsFailureKind,
    type AwsSession,
} from "./aws.js";

/** Per-provider options for the built-in connector types. */
export interface BuiltinConnectorOptions {
    docker?: DockerConnectorOptions<DockerEngine>;
    aws?: AwsConnectorOptions;
}

/** Build every built-in connector type. */
export function builtinConnectorTypes(options: BuiltinConnectorOptions = {}): ConnectorType[] {
    return [createDockerConnectorType(options.docker), createAwsConnectorType(options.aws)];
}
