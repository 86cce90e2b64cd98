import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { S3Client } from "@aws-sdk/client-s3";
import { STSClient } from "@aws-sdk/client-sts";
import { AuthorizationError, ConfigurationError, NotSupportedError, ServiceConnector } from "service-connectors";
import { classifyAwsError, createAwsConnectorType } from "service-connectors/providers";
import { FakeAwsApi, makeAwsError, makeNetworkError, makeRecordingLogger } from "../../helpers/index.js";

const CREDENTIALS = { region: "eu-west-1", accessKeyId: "test-key-id", secretAccessKey: "test-secret" };

function setup(init: { resourceType: string; resourceId?: string; authMethod?: string; config?: Record<string, unknown> }) {
    const api = new FakeAwsApi();
    const logger = makeRecordingLogger();
    const type = createAwsConnectorType({ api });
    const connector = ServiceConnector.create(
        {
            type,
            authMethod: init.authMethod ?? "secret-key",
            resourceType: init.resourceType,
            resourceId: init.resourceId,
            config: init.config ?? CREDENTIALS,
        },
        { logger },
    );
    return { api, logger, connector };
}

describe("AWS connector type", () => {
    it("declares both auth methods for both resource types", () => {
        const { spec } = createAwsConnectorType();
        expect(spec.authMethods.map((m) => m.id)).toEqual(["secret-key", "sts-token"]);
        expect(spec.resourceTypes.map((r) => [r.id, r.supportsInstances, r.supportsDiscovery])).toEqual([
            ["aws-generic", false, false],
            ["s3-bucket", true, true],
        ]);
        expect(spec.supportsAutoConfiguration).toBe(true);
    });

    // ---------------------------------------------------------------------------
    // Credentials
    // ---------------------------------------------------------------------------

    describe("credentials", () => {
        it("defaults the region", () => {
            const { connector } = setup({
                resourceType: "aws-generic",
                config: { accessKeyId: "test-key-id", secretAccessKey: "test-secret" },
            });
            expect(connector.config.string("region")).toBe("us-east-1");
        });

        it("masks the keys but not the region", () => {
            const { connector } = setup({ resourceType: "aws-generic" });
            expect(connector.toJSON().config).toEqual({
                region: "eu-west-1",
                accessKeyId: "**********",
                secretAccessKey: "**********",
            });
        });

        it("rejects a malformed region", () => {
            expect(() => setup({ resourceType: "aws-generic", config: { ...CREDENTIALS, region: "Europe" } })).toThrow(
                ConfigurationError,
            );
        });

        it("requires a session token for sts-token", () => {
            expect(() => setup({ resourceType: "aws-generic", authMethod: "sts-token" })).toThrow(ConfigurationError);
        });
    });

    // ---------------------------------------------------------------------------
    // connect / disconnect
    // ---------------------------------------------------------------------------

    describe("connect", () => {
        it("checks the bucket and returns an S3 client", async () => {
            const { connector, api } = setup({ resourceType: "s3-bucket", resourceId: "arn:aws:s3:::data-lake" });
            api.buckets = ["data-lake"];

            const client = await connector.connect();

            expect(client).toBeInstanceOf(S3Client);
            expect(api.headed).toEqual(["data-lake"]);
            expect(api.sessions).toEqual([
                {
                    region: "eu-west-1",
                    endpoint: undefined,
                    credentials: { accessKeyId: "test-key-id", secretAccessKey: "test-secret", sessionToken: undefined },
                },
            ]);
            await connector.disconnect();
        });

        it("checks the caller identity and returns an STS client for the account", async () => {
            const { connector, logger } = setup({ resourceType: "aws-generic" });

            const client = await connector.connect();

            expect(client).toBeInstanceOf(STSClient);
            expect(logger.infos).toContain("aws: authenticated as arn:aws:iam::123456789012:user/ci");
            await connector.disconnect();
        });

        it("passes the session token through", async () => {
            const { connector, api } = setup({
                resourceType: "aws-generic",
                authMethod: "sts-token",
                config: { ...CREDENTIALS, sessionToken: "test-session" },
            });
            await connector.connect();
            expect(api.sessions[0]?.credentials.sessionToken).toBe("test-session");
            await connector.disconnect();
        });

        it("maps rejected credentials to AuthorizationError", async () => {
            const { connector, api } = setup({ resourceType: "aws-generic" });
            api.failure = makeAwsError("InvalidClientTokenId", 403, "The security token included in the request is invalid.");

            await expect(connector.connect()).rejects.toThrow(
                "AWS rejected the credentials for account in eu-west-1: The security token included in the request is invalid.",
            );
            expect(connector.state).toBe("configured");
        });

        it("maps a missing bucket to AuthorizationError", async () => {
            const { connector } = setup({ resourceType: "s3-bucket", resourceId: "missing-bucket" });
            await expect(connector.connect()).rejects.toThrow(
                "s3://missing-bucket does not exist or is not accessible with these credentials: NotFound",
            );
        });

        it("destroys the client on disconnect", async () => {
            const { connector, api } = setup({ resourceType: "s3-bucket", resourceId: "data-lake" });
            api.buckets = ["data-lake"];
            const client = await connector.connect();
            const destroy = vi.spyOn(client, "destroy");

            await connector.disconnect();

            expect(destroy).toHaveBeenCalledTimes(1);
        });
    });

    // ---------------------------------------------------------------------------
    // verify
    // ---------------------------------------------------------------------------

    describe("verify", () => {
        it("lists buckets when no bucket is given", async () => {
            const { connector, api } = setup({ resourceType: "s3-bucket" });
            api.buckets = ["logs", "data-lake"];
            expect(await connector.verify()).toEqual(["s3://logs", "s3://data-lake"]);
            expect(api.headed).toEqual([]);
        });

        it("returns the valid buckets when a listed name has no accepted shape", async () => {
            const { connector, api, logger } = setup({ resourceType: "s3-bucket" });
            api.buckets = ["logs", "Legacy_Bucket"];

            expect(await connector.verify()).toEqual(["s3://logs"]);
            expect(logger.warnings).toContain('aws: skipping discovered resource "Legacy_Bucket": not a valid s3-bucket ID');
        });

        it("checks one bucket when given", async () => {
            const { connector, api } = setup({ resourceType: "s3-bucket" });
            api.buckets = ["logs", "data-lake"];
            expect(await connector.verify({ resourceId: "s3://logs/" })).toEqual(["s3://logs"]);
            expect(api.headed).toEqual(["logs"]);
        });

        it("checks the account for aws-generic", async () => {
            const { connector, api } = setup({ resourceType: "aws-generic" });
            expect(await connector.verify()).toEqual([]);
            expect(api.sessions).toHaveLength(1);
        });

        it("maps a refused listing to AuthorizationError", async () => {
            const { connector, api } = setup({ resourceType: "s3-bucket" });
            api.failure = makeAwsError("AccessDenied", 403, "Access Denied");
            const failure = await connector.verify().catch((err: unknown) => err);
            expect(failure).toBeInstanceOf(AuthorizationError);
            expect(failure).toMatchObject({ diagnostic: "Access Denied" });
        });

        it("is inconclusive when the endpoint is unreachable", async () => {
            const { connector, api, logger } = setup({ resourceType: "aws-generic" });
            api.failure = makeNetworkError("ECONNREFUSED");

            expect(await connector.verify()).toEqual([]);
            expect(logger.warnings).toEqual([
                "aws: verification inconclusive, provider unreachable: AWS endpoint unreachable: connect ECONNREFUSED 127.0.0.1:443",
            ]);
        });

        it("lets other service errors through", async () => {
            const { connector, api } = setup({ resourceType: "aws-generic" });
            const failure = makeAwsError("InternalError", 500);
            api.failure = failure;
            await expect(connector.verify()).rejects.toBe(failure);
        });
    });

    it("cannot configure a local client", async () => {
        const { connector } = setup({ resourceType: "aws-generic" });
        await expect(connector.configureLocalClient()).rejects.toThrow(NotSupportedError);
    });

    // ---------------------------------------------------------------------------
    // autoConfigure
    // ---------------------------------------------------------------------------

    describe("autoConfigure", () => {
        const env = { AWS_ACCESS_KEY_ID: "test-key-id", AWS_SECRET_ACCESS_KEY: "test-secret", AWS_REGION: "eu-central-1" };

        it("builds a secret-key connector for the account from the environment", async () => {
            const logger = makeRecordingLogger();
            const connector = await ServiceConnector.autoConfigure(createAwsConnectorType({ api: new FakeAwsApi() }), { env }, { logger });

            expect(connector.authMethod).toBe("secret-key");
            expect(connector.resourceType).toBe("aws-generic");
            expect(connector.config.string("region")).toBe("eu-central-1");
            expect(connector.config.secret("accessKeyId")).toBe("test-key-id");
            expect(logger.infos).toEqual([
                "aws: using credentials from environment",
                'aws: auto-configured auth method "secret-key" for resource type "aws-generic"',
            ]);
        });

        it("selects sts-token when a session token is present", async () => {
            const connector = await ServiceConnector.autoConfigure(createAwsConnectorType(), {
                env: { ...env, AWS_SESSION_TOKEN: "test-session" },
            }, { logger: makeRecordingLogger() });
            expect(connector.authMethod).toBe("sts-token");
            expect(connector.config.secret("sessionToken")).toBe("test-session");
        });

        it("targets S3 when a bucket is requested", async () => {
            const connector = await ServiceConnector.autoConfigure(createAwsConnectorType(), {
                env,
                resourceId: "arn:aws:s3:::data-lake",
            }, { logger: makeRecordingLogger() });
            expect(connector.resourceType).toBe("s3-bucket");
            expect(connector.resourceId).toBe("s3://data-lake");
        });

        it("falls back through AWS_DEFAULT_REGION and takes the endpoint", async () => {
            const connector = await ServiceConnector.autoConfigure(createAwsConnectorType(), {
                env: {
                    AWS_ACCESS_KEY_ID: "test-key-id",
                    AWS_SECRET_ACCESS_KEY: "test-secret",
                    AWS_DEFAULT_REGION: "ap-southeast-2",
                    AWS_ENDPOINT_URL: "http://localhost:9000",
                },
            }, { logger: makeRecordingLogger() });
            expect(connector.config.string("region")).toBe("ap-southeast-2");
            expect(connector.config.string("endpoint")).toBe("http://localhost:9000");
        });

        it("prefers the requested region over the environment", async () => {
            const connector = await ServiceConnector.autoConfigure(createAwsConnectorType(), {
                env: { ...env, AWS_DEFAULT_REGION: "ap-southeast-2" },
                region: "us-west-2",
            }, { logger: makeRecordingLogger() });
            expect(connector.config.string("region")).toBe("us-west-2");
        });

        it("refuses an auth method the credentials do not fit", async () => {
            await expect(
                ServiceConnector.autoConfigure(createAwsConnectorType(), { env, authMethod: "sts-token" }, { logger: makeRecordingLogger() }),
            ).rejects.toThrow('AWS credentials from environment fit auth method "secret-key", not "sts-token".');
        });

        describe("shared config files", () => {
            let dir: string;

            beforeAll(() => {
                dir = mkdtempSync(join(tmpdir(), "service-connectors-aws-"));
                writeFileSync(
                    join(dir, "credentials"),
                    "[ci]\naws_access_key_id = test-profile-key\naws_secret_access_key = test-profile-secret\n",
                );
            });

            afterAll(() => {
                rmSync(dir, { recursive: true, force: true });
            });

            it("reads a named profile", async () => {
                const logger = makeRecordingLogger();
                const connector = await ServiceConnector.autoConfigure(createAwsConnectorType(), {
                    env: {
                        AWS_PROFILE: "ci",
                        AWS_SHARED_CREDENTIALS_FILE: join(dir, "credentials"),
                        AWS_CONFIG_FILE: join(dir, "config"),
                    },
                }, { logger });

                expect(connector.authMethod).toBe("secret-key");
                expect(connector.config.secret("accessKeyId")).toBe("test-profile-key");
                expect(connector.config.secret("secretAccessKey")).toBe("test-profile-secret");
                expect(connector.config.string("region")).toBe("us-east-1");
                expect(logger.infos[0]).toBe('aws: using credentials from profile "ci"');
            });

            it("fails with AuthorizationError when no credentials are found", async () => {
                await expect(
                    ServiceConnector.autoConfigure(createAwsConnectorType(), {
                        env: {
                            AWS_PROFILE: "absent",
                            AWS_SHARED_CREDENTIALS_FILE: join(dir, "credentials"),
                            AWS_CONFIG_FILE: join(dir, "config"),
                        },
                    }, { logger: makeRecordingLogger() }),
                ).rejects.toThrow("No AWS credentials found in the environment or the shared config files");
            });
        });
    });
});

describe("classifyAwsError", () => {
    it.each([
        ["a 403", makeAwsError("Whatever", 403), "rejected"],
        ["an expired token", makeAwsError("ExpiredToken", 400), "rejected"],
        ["a signature mismatch", makeAwsError("SignatureDoesNotMatch", 400), "rejected"],
        ["a 404", makeAwsError("Whatever", 404), "not-found"],
        ["NoSuchBucket", makeAwsError("NoSuchBucket", 400), "not-found"],
        ["a refused connection", makeNetworkError("ECONNREFUSED"), "unreachable"],
        ["a DNS failure", makeNetworkError("ENOTFOUND"), "unreachable"],
        ["a timeout", Object.assign(new Error("socket timed out"), { name: "TimeoutError" }), "unreachable"],
        ["a 500", makeAwsError("InternalError", 500), "other"],
        ["a non-error", "boom", "other"],
    ])("classifies %s", (_label, err, expected) => {
        expect(classifyAwsError(err)).toBe(expected);
    });
});
