/**
 * AWS connector: authenticates with AWS using long-lived or temporary access
 * keys.
 *
 * Resource types:
 * - `aws-generic`: the account itself, reached through an STS client.
 * - `s3-bucket`: individual S3 buckets, reached through an S3 client.
 *
 * @module
 */

import { HeadBucketCommand, ListBucketsCommand, S3Client } from "@aws-sdk/client-s3";
import { GetCallerIdentityCommand, STSClient } from "@aws-sdk/client-sts";
import { fromIni } from "@aws-sdk/credential-providers";
import { Type } from "@sinclair/typebox";
import type { AuthenticationConfig, ConfigInput } from "../config/auth-config.js";
import { SecretField } from "../config/secret.js";
import { AuthorizationError, ConfigurationError } from "../errors.js";
import { S3_RESOURCE_TYPE, s3BucketResolver } from "../resources/s3.js";
import { describeError } from "../shared/logger.js";
import type { AutoConfigureRequest, ConnectorType, ConnectorTypeSpec, ProviderContext, VerifyOutcome } from "../types.js";

// =============================================================================
// Constants
// =============================================================================

export const AWS_CONNECTOR_TYPE = "aws";
export const AWS_GENERIC_RESOURCE_TYPE = "aws-generic";
export const AWS_SECRET_KEY_AUTH = "secret-key";
export const AWS_STS_TOKEN_AUTH = "sts-token";
export const AWS_DEFAULT_REGION = "us-east-1";

const REGION_PATTERN = "^[a-z]{2}(-[a-z]+)+-[0-9]+$";

/** Error names AWS uses when it rejects or cannot authorize credentials. */
const REJECTED_ERROR_NAMES = new Set([
    "AccessDenied",
    "AccessDeniedException",
    "ExpiredToken",
    "ExpiredTokenException",
    "Forbidden",
    "InvalidAccessKeyId",
    "InvalidClientTokenId",
    "SignatureDoesNotMatch",
    "UnrecognizedClientException",
]);

const NOT_FOUND_ERROR_NAMES = new Set(["NoSuchBucket", "NotFound"]);

/** Socket-level failures: the endpoint was never reached. */
const NETWORK_ERROR_CODES = new Set([
    "EAI_AGAIN",
    "ECONNREFUSED",
    "ECONNRESET",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "ENOTFOUND",
    "ETIMEDOUT",
]);

const SECRET_KEY_PROPERTIES = {
    region: Type.String({ pattern: REGION_PATTERN, default: AWS_DEFAULT_REGION, description: "AWS region" }),
    accessKeyId: SecretField({ description: "AWS access key ID" }),
    secretAccessKey: SecretField({ description: "AWS secret access key" }),
    endpoint: Type.Optional(
        Type.String({ pattern: "^https?://", description: "Custom endpoint URL, e.g. for an S3-compatible store" }),
    ),
};

export const AwsSecretKeyCredentials = Type.Object(SECRET_KEY_PROPERTIES, { additionalProperties: false });

export const AwsStsTokenCredentials = Type.Object(
    { ...SECRET_KEY_PROPERTIES, sessionToken: SecretField({ description: "AWS session token" }) },
    { additionalProperties: false },
);

const AUTH_METHODS = [AWS_SECRET_KEY_AUTH, AWS_STS_TOKEN_AUTH];

export const AWS_CONNECTOR_SPEC: ConnectorTypeSpec = {
    id: AWS_CONNECTOR_TYPE,
    name: "AWS Service Connector",
    description: "Authenticates with AWS and provides pre-authenticated STS and S3 clients.",
    authMethods: [
        {
            id: AWS_SECRET_KEY_AUTH,
            name: "AWS secret key",
            description: "Long-lived access key ID and secret access key.",
            configSchema: AwsSecretKeyCredentials,
        },
        {
            id: AWS_STS_TOKEN_AUTH,
            name: "AWS STS token",
            description: "Temporary access key ID, secret access key and session token.",
            configSchema: AwsStsTokenCredentials,
        },
    ],
    resourceTypes: [
        {
            id: AWS_GENERIC_RESOURCE_TYPE,
            name: "Generic AWS resource",
            description: "The AWS account the credentials belong to.",
            supportsInstances: false,
            supportsDiscovery: false,
            authMethods: AUTH_METHODS,
        },
        {
            id: S3_RESOURCE_TYPE,
            name: "AWS S3 bucket",
            description: "An S3 bucket, given as a bucket name, an s3:// URI or an S3 ARN.",
            supportsInstances: true,
            supportsDiscovery: true,
            authMethods: AUTH_METHODS,
        },
    ],
    supportsAutoConfiguration: true,
};

// =============================================================================
// Types
// =============================================================================

export interface AwsCredentials {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
}

/** Region, endpoint and credentials an AWS client is built from. */
export interface AwsSession {
    region: string;
    endpoint?: string;
    credentials: AwsCredentials;
}

export interface AwsCallerIdentity {
    account?: string;
    arn?: string;
    userId?: string;
}

/**
 * The AWS calls the connector makes to check credentials. SDK errors pass
 * through unchanged; the connector maps them.
 */
export interface AwsApi {
    getCallerIdentity(session: AwsSession): Promise<AwsCallerIdentity>;
    listBuckets(session: AwsSession): Promise<string[]>;
    headBucket(session: AwsSession, bucket: string): Promise<void>;
}

/** Client handle returned by `connect()`: S3 for buckets, STS otherwise. */
export type AwsClient = S3Client | STSClient;

export interface AwsConnectorOptions {
    /** Verification calls. Defaults to {@link sdkAwsApi}. */
    api?: AwsApi;
}

// =============================================================================
// SDK clients
// =============================================================================

export function createS3Client(session: AwsSession): S3Client {
    return new S3Client({
        region: session.region,
        endpoint: session.endpoint,
        credentials: session.credentials,
        // S3-compatible stores behind a custom endpoint rarely serve
        // virtual-hosted buckets.
        forcePathStyle: session.endpoint !== undefined,
    });
}

export function createStsClient(session: AwsSession): STSClient {
    return new STSClient({
        region: session.region,
        endpoint: session.endpoint,
        credentials: session.credentials,
    });
}

/** {@link AwsApi} backed by the AWS SDK. Each call uses a short-lived client. */
export const sdkAwsApi: AwsApi = {
    async getCallerIdentity(session) {
        const sts = createStsClient(session);
        try {
            const output = await sts.send(new GetCallerIdentityCommand({}));
            return { account: output.Account, arn: output.Arn, userId: output.UserId };
        } finally {
            sts.destroy();
        }
    },

    async listBuckets(session) {
        const s3 = createS3Client(session);
        try {
            const names: string[] = [];
            let token: string | undefined;
            do {
                const output = await s3.send(new ListBucketsCommand({ ContinuationToken: token }));
                for (const bucket of output.Buckets ?? []) {
                    if (bucket.Name) names.push(bucket.Name);
                }
                token = output.ContinuationToken;
            } while (token);
            return names;
        } finally {
            s3.destroy();
        }
    },

    async headBucket(session, bucket) {
        const s3 = createS3Client(session);
        try {
            await s3.send(new HeadBucketCommand({ Bucket: bucket }));
        } finally {
            s3.destroy();
        }
    },
};

// =============================================================================
// Error mapping
// =============================================================================

/**
 * - `rejected`: the credentials were refused or lack permission.
 * - `not-found`: the target resource does not exist.
 * - `unreachable`: no HTTP response was received.
 */
export type AwsFailureKind = "rejected" | "not-found" | "unreachable" | "other";

function httpStatusOf(err: Error): number | undefined {
    if (!("$metadata" in err)) return undefined;
    const metadata = err.$metadata;
    if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) return undefined;
    return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

export function classifyAwsError(err: unknown): AwsFailureKind {
    if (!(err instanceof Error)) return "other";
    const status = httpStatusOf(err);
    if (status === 401 || status === 403 || REJECTED_ERROR_NAMES.has(err.name)) return "rejected";
    if (status === 404 || NOT_FOUND_ERROR_NAMES.has(err.name)) return "not-found";
    if (status === undefined) {
        const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
        if (err.name === "TimeoutError" || (code !== undefined && NETWORK_ERROR_CODES.has(code))) {
            return "unreachable";
        }
    }
    return "other";
}

async function guarded<T>(target: string, call: () => Promise<T>): Promise<T> {
    try {
        return await call();
    } catch (err) {
        const kind = classifyAwsError(err);
        if (kind === "rejected") {
            throw new AuthorizationError(`AWS rejected the credentials for ${target}`, {
                diagnostic: describeError(err),
                cause: err,
            });
        }
        if (kind === "not-found") {
            throw new AuthorizationError(`${target} does not exist or is not accessible with these credentials`, {
                diagnostic: describeError(err),
                cause: err,
            });
        }
        throw err;
    }
}

// =============================================================================
// Helpers
// =============================================================================

function sessionFrom(config: AuthenticationConfig): AwsSession {
    return {
        region: config.string("region") ?? AWS_DEFAULT_REGION,
        endpoint: config.string("endpoint"),
        credentials: {
            accessKeyId: config.secret("accessKeyId"),
            secretAccessKey: config.secret("secretAccessKey"),
            sessionToken: config.optionalSecret("sessionToken"),
        },
    };
}

/** Check the credentials against the context's target, mapping rejections. */
async function probe(api: AwsApi, ctx: ProviderContext, session: AwsSession): Promise<void> {
    const bucket = ctx.resource?.fields.bucket;
    if (bucket !== undefined) {
        await guarded(ctx.resource?.canonicalId ?? bucket, () => api.headBucket(session, bucket));
        return;
    }
    const identity = await guarded(`account in ${session.region}`, () => api.getCallerIdentity(session));
    ctx.logger.info(`${AWS_CONNECTOR_TYPE}: authenticated as ${identity.arn ?? "unknown principal"}`);
}

interface HarvestedCredentials extends AwsCredentials {
    source: string;
}

async function harvestCredentials(env: AutoConfigureRequest["env"]): Promise<HarvestedCredentials> {
    const accessKeyId = env.AWS_ACCESS_KEY_ID;
    const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;
    if (accessKeyId && secretAccessKey) {
        return { accessKeyId, secretAccessKey, sessionToken: env.AWS_SESSION_TOKEN || undefined, source: "environment" };
    }

    const profile = env.AWS_PROFILE ?? "default";
    try {
        const found = await fromIni({
            profile,
            filepath: env.AWS_SHARED_CREDENTIALS_FILE,
            configFilepath: env.AWS_CONFIG_FILE,
            ignoreCache: true,
        })();
        return {
            accessKeyId: found.accessKeyId,
            secretAccessKey: found.secretAccessKey,
            sessionToken: found.sessionToken,
            source: `profile "${profile}"`,
        };
    } catch (err) {
        throw new AuthorizationError("No AWS credentials found in the environment or the shared config files", {
            diagnostic: describeError(err),
            cause: err,
        });
    }
}

// =============================================================================
// Connector type
// =============================================================================

/**
 * Build the AWS connector type.
 *
 * @example
 * ```ts
 * registry.register(createAwsConnectorType());
 * const s3 = ServiceConnector.create({
 *     type: "aws",
 *     authMethod: "secret-key",
 *     resourceType: "s3-bucket",
 *     resourceId: "arn:aws:s3:::my-bucket",
 *     config: { region: "eu-west-1", accessKeyId: "test-key-id", secretAccessKey: "test-secret" },
 * }, { registry });
 * ```
 */
export function createAwsConnectorType(options: AwsConnectorOptions = {}): ConnectorType<AwsClient> {
    const api = options.api ?? sdkAwsApi;

    return {
        spec: AWS_CONNECTOR_SPEC,
        resolvers: { [S3_RESOURCE_TYPE]: s3BucketResolver },
        provider: {
            async connect(ctx) {
                const session = sessionFrom(ctx.config);
                await probe(api, ctx, session);
                return ctx.resourceType.id === S3_RESOURCE_TYPE ? createS3Client(session) : createStsClient(session);
            },

            async verify(ctx): Promise<VerifyOutcome> {
                const session = sessionFrom(ctx.config);
                try {
                    if (ctx.discover) {
                        const buckets = await guarded("bucket listing", () => api.listBuckets(session));
                        return { status: "verified", resourceIds: buckets };
                    }
                    await probe(api, ctx, session);
                } catch (err) {
                    if (classifyAwsError(err) === "unreachable") {
                        return { status: "unreachable", reason: `AWS endpoint unreachable: ${describeError(err)}` };
                    }
                    throw err;
                }
                return { status: "verified", resourceIds: ctx.resource ? [ctx.resource.canonicalId] : [] };
            },

            disconnect(client) {
                client.destroy();
            },

            async autoConfigure(request) {
                const found = await harvestCredentials(request.env);
                const authMethod = found.sessionToken ? AWS_STS_TOKEN_AUTH : AWS_SECRET_KEY_AUTH;
                if (request.authMethod !== undefined && request.authMethod !== authMethod) {
                    throw new ConfigurationError(
                        `AWS credentials from ${found.source} fit auth method "${authMethod}", not "${request.authMethod}".`,
                    );
                }

                const config: ConfigInput = {
                    region:
                        request.region ??
                        request.env.AWS_REGION ??
                        request.env.AWS_DEFAULT_REGION ??
                        AWS_DEFAULT_REGION,
                    accessKeyId: found.accessKeyId,
                    secretAccessKey: found.secretAccessKey,
                };
                if (found.sessionToken) config.sessionToken = found.sessionToken;
                const endpoint = request.env.AWS_ENDPOINT_URL;
                if (endpoint) config.endpoint = endpoint;

                request.logger.info(`${AWS_CONNECTOR_TYPE}: using credentials from ${found.source}`);
                return {
                    authMethod,
                    resourceType:
                        request.resourceType ??
                        (request.resourceId !== undefined ? S3_RESOURCE_TYPE : AWS_GENERIC_RESOURCE_TYPE),
                    resourceId: request.resourceId,
                    config,
                };
            },
        },
    };
}
