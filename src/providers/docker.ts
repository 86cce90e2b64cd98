/**
 * Docker connector: authenticates with a Docker or OCI container registry.
 *
 * Clients are dockerode engine clients logged in against the registry of the
 * target repository. Local client configuration runs `docker login`.
 *
 * @module
 */

import Docker from "dockerode";
import { Type } from "@sinclair/typebox";
import { SecretField } from "../config/secret.js";
import { AuthorizationError, LocalToolError } from "../errors.js";
import { DOCKER_RESOURCE_TYPE, dockerRepositoryResolver } from "../resources/docker.js";
import { describeError } from "../shared/logger.js";
import { runCommand, type CommandResult, type CommandRunner } from "../shared/run-command.js";
import type { ConnectorType, ConnectorTypeSpec, ProviderContext } from "../types.js";

// =============================================================================
// Constants
// =============================================================================

export const DOCKER_CONNECTOR_TYPE = "docker";
export const DOCKER_PASSWORD_AUTH = "password";

/** Server address used for Docker Hub repositories. */
export const DOCKER_HUB_SERVER = "https://index.docker.io/v1/";

/** Registry responses that mean the credentials were rejected. */
const AUTH_REJECTED = /unauthorized|denied: requested access|incorrect username or password|authentication required/i;

export const DockerCredentials = Type.Object(
    {
        username: SecretField({ description: "Registry username" }),
        password: SecretField({ description: "Registry password or access token" }),
    },
    { additionalProperties: false },
);

export const DOCKER_CONNECTOR_SPEC: ConnectorTypeSpec = {
    id: DOCKER_CONNECTOR_TYPE,
    name: "Docker Service Connector",
    description:
        "Authenticates with a Docker or OCI container registry and provides pre-authenticated Docker engine clients.",
    authMethods: [
        {
            id: DOCKER_PASSWORD_AUTH,
            name: "Docker username and password/token",
            description: "Use a username and password or access token to authenticate with a container registry server.",
            configSchema: DockerCredentials,
        },
    ],
    resourceTypes: [
        {
            id: DOCKER_RESOURCE_TYPE,
            name: "Docker/OCI container registry",
            description:
                "A Docker/OCI repository, given as a repository URI ([https://]host[:port]/<repository-name>) or a Docker Hub repository name.",
            // Repositories must be configured or supplied: the registry API
            // offers no listing of what a set of credentials can reach.
            supportsInstances: true,
            supportsDiscovery: false,
            authMethods: [DOCKER_PASSWORD_AUTH],
        },
    ],
    supportsAutoConfiguration: false,
};

// =============================================================================
// Types
// =============================================================================

/** Registry credentials in the shape the Docker engine API takes. */
export interface DockerAuth {
    username: string;
    password: string;
    serveraddress: string;
}

/**
 * The part of the Docker engine API the connector drives. A dockerode client
 * satisfies it.
 */
export interface DockerEngine {
    ping(): Promise<unknown>;
    checkAuth(auth: DockerAuth): Promise<unknown>;
}

/** Authenticated client handle returned by `connect()`. */
export interface DockerRegistryClient<E extends DockerEngine = Docker> {
    engine: E;
    /** Registry host, or `undefined` for Docker Hub. */
    registry: string | undefined;
    /** Credentials to pass as `authconfig` on pulls and pushes. */
    auth: DockerAuth;
}

export interface DockerConnectorOptions<E extends DockerEngine = Docker> {
    /** Engine client factory. Defaults to `new Docker()` (honors `DOCKER_HOST`). */
    createEngine?: () => E;
    /** Runs the `docker` CLI for local client configuration. */
    runCommand?: CommandRunner;
    /** CLI binary name or path. */
    dockerBinary?: string;
}

// =============================================================================
// Helpers
// =============================================================================

function authFor(ctx: ProviderContext): DockerAuth {
    return {
        username: ctx.config.secret("username"),
        password: ctx.config.secret("password"),
        serveraddress: ctx.resource?.fields.registry ?? DOCKER_HUB_SERVER,
    };
}

function targetName(ctx: ProviderContext): string {
    return ctx.resource?.canonicalId ?? DOCKER_HUB_SERVER;
}

/** Whether an engine error means the registry rejected the credentials. */
export function isDockerAuthRejection(err: unknown): boolean {
    if (!(err instanceof Error)) return false;
    const status = "statusCode" in err ? err.statusCode : undefined;
    if (status === 401 || status === 403) return true;
    return AUTH_REJECTED.test(err.message);
}

async function login(engine: DockerEngine, ctx: ProviderContext): Promise<DockerAuth> {
    const auth = authFor(ctx);
    try {
        await engine.checkAuth(auth);
    } catch (err) {
        if (isDockerAuthRejection(err)) {
            throw new AuthorizationError(`Failed to authenticate to Docker registry "${targetName(ctx)}"`, {
                diagnostic: describeError(err),
                cause: err,
            });
        }
        throw err;
    }
    return auth;
}

// =============================================================================
// Connector type
// =============================================================================

/**
 * Build the Docker connector type.
 *
 * @example
 * ```ts
 * registry.register(createDockerConnectorType());
 * ```
 */
export function createDockerConnectorType(options?: DockerConnectorOptions<Docker>): ConnectorType<DockerRegistryClient<Docker>>;
export function createDockerConnectorType<E extends DockerEngine>(
    options: DockerConnectorOptions<E> & { createEngine: () => E },
): ConnectorType<DockerRegistryClient<E>>;
export function createDockerConnectorType(
    options?: DockerConnectorOptions<DockerEngine>,
): ConnectorType<DockerRegistryClient<DockerEngine>>;
export function createDockerConnectorType(
    options: DockerConnectorOptions<DockerEngine> = {},
): ConnectorType<DockerRegistryClient<DockerEngine>> {
    const createEngine = options.createEngine ?? ((): DockerEngine => new Docker());
    const run = options.runCommand ?? runCommand;
    const binary = options.dockerBinary ?? "docker";

    return {
        spec: DOCKER_CONNECTOR_SPEC,
        resolvers: { [DOCKER_RESOURCE_TYPE]: dockerRepositoryResolver },
        provider: {
            async connect(ctx) {
                const engine = createEngine();
                const auth = await login(engine, ctx);
                ctx.logger.info(`${DOCKER_CONNECTOR_TYPE}: logged in to ${auth.serveraddress}`);
                return { engine, registry: ctx.resource?.fields.registry, auth };
            },

            async verify(ctx) {
                // The engine may be absent where verification runs (e.g. a
                // server without a Docker daemon): that is inconclusive, not a
                // credential failure.
                const engine = createEngine();
                try {
                    await engine.ping();
                } catch (err) {
                    return { status: "unreachable", reason: `Docker daemon unavailable: ${describeError(err)}` };
                }
                if (!ctx.resource) {
                    return { status: "verified", resourceIds: [] };
                }
                await login(engine, ctx);
                return { status: "verified", resourceIds: [ctx.resource.canonicalId] };
            },

            async configureLocalClient(ctx) {
                const registry = ctx.resource?.fields.registry;
                const args = ["login", "-u", ctx.config.secret("username"), "--password-stdin"];
                if (registry) args.push(registry);

                const command = `${binary} login`;
                let result: CommandResult;
                try {
                    result = await run(binary, args, { input: ctx.config.secret("password") });
                } catch (err) {
                    throw new LocalToolError(command, null, describeError(err), { cause: err });
                }

                if (result.exitCode !== 0) {
                    if (AUTH_REJECTED.test(result.stderr)) {
                        throw new AuthorizationError(`Failed to authenticate to Docker registry "${targetName(ctx)}"`, {
                            diagnostic: result.stderr.trim(),
                        });
                    }
                    throw new LocalToolError(command, result.exitCode, result.stderr);
                }
                ctx.logger.info(`${DOCKER_CONNECTOR_TYPE}: local Docker CLI logged in to ${registry ?? "Docker Hub"}`);
            },
        },
    };
}
