/**
 * Static fixtures and in-process fakes for tests.
 *
 * Import directly. No side effects, no network.
 */

import { Type } from "@sinclair/typebox";
import {
    AuthorizationError,
    SecretField,
    createShapeResolver,
    type AutoConfigureRequest,
    type AutoConfiguredConnector,
    type ConnectorProvider,
    type ConnectorType,
    type ConnectorTypeSpec,
    type Logger,
    type ProviderContext,
    type VerifyContext,
    type VerifyOutcome,
} from "service-connectors";
import type { AwsApi, AwsCallerIdentity, AwsSession, DockerAuth, DockerEngine } from "service-connectors/providers";
import type { CommandResult, CommandRunner, RunCommandOptions } from "service-connectors";

// =============================================================================
// Logging
// =============================================================================

export interface RecordingLogger extends Logger {
    infos: string[];
    warnings: string[];
    errors: string[];
}

/** Logger that keeps every message for assertions. */
export function makeRecordingLogger(): RecordingLogger {
    const infos: string[] = [];
    const warnings: string[] = [];
    const errors: string[] = [];
    return {
        infos,
        warnings,
        errors,
        info: (msg) => infos.push(msg),
        warn: (msg) => warnings.push(msg),
        error: (msg) => errors.push(msg),
    };
}

// =============================================================================
// Widget connector type (core tests)
// =============================================================================

export const WIDGET_TYPE = "widget-service";
export const WIDGET_TOKEN_AUTH = "token";
export const WIDGET_KEY_AUTH = "api-key";

export const WidgetTokenCredentials = Type.Object(
    {
        token: SecretField({ description: "Widget service token" }),
        endpoint: Type.String({ default: "https://widgets.test", description: "Widget service URL" }),
        retries: Type.Optional(Type.Integer({ minimum: 0 })),
    },
    { additionalProperties: false },
);

export const WidgetKeyCredentials = Type.Object(
    { apiKey: SecretField() },
    { additionalProperties: false },
);

/**
 * Resource types:
 * - `widget`: instances, discoverable (`widget://<name>` or `<name>`).
 * - `gadget`: instances, not discoverable (`gadget:<name>`).
 * - `account`: one implicit resource.
 *
 * `api-key` is allowed for `account` only, so it selects that type on its own.
 */
export const WIDGET_SPEC: ConnectorTypeSpec = {
    id: WIDGET_TYPE,
    name: "Widget Service Connector",
    description: "Test connector type backed by an in-memory provider.",
    authMethods: [
        { id: WIDGET_TOKEN_AUTH, name: "Token", description: "Service token.", configSchema: WidgetTokenCredentials },
        { id: WIDGET_KEY_AUTH, name: "API key", description: "Account API key.", configSchema: WidgetKeyCredentials },
    ],
    resourceTypes: [
        {
            id: "widget",
            name: "Widget",
            supportsInstances: true,
            supportsDiscovery: true,
            authMethods: [WIDGET_TOKEN_AUTH],
        },
        {
            id: "gadget",
            name: "Gadget",
            supportsInstances: true,
            supportsDiscovery: false,
            authMethods: [WIDGET_TOKEN_AUTH],
        },
        {
            id: "account",
            name: "Account",
            supportsInstances: false,
            supportsDiscovery: false,
            authMethods: [WIDGET_TOKEN_AUTH, WIDGET_KEY_AUTH],
        },
    ],
    supportsAutoConfiguration: true,
};

export const widgetResolver = createShapeResolver("widget", [
    {
        name: "widget URI",
        format: "widget://<name>",
        pattern: /^widget:\/\/([a-z0-9-]+)\/?$/,
        decompose: (m) => ({ canonicalId: `widget://${m[1] ?? ""}`, fields: { name: m[1] } }),
    },
    {
        name: "widget name",
        format: "<name>",
        pattern: /^([a-z0-9-]+)$/,
        decompose: (m) => ({ canonicalId: `widget://${m[1] ?? ""}`, fields: { name: m[1] } }),
    },
]);

export const gadgetResolver = createShapeResolver("gadget", [
    {
        name: "gadget reference",
        format: "gadget:<name>",
        pattern: /^gadget:([a-z]+)$/,
        decompose: (m) => ({ canonicalId: `gadget:${m[1] ?? ""}`, fields: { name: m[1] } }),
    },
]);

export interface WidgetClient {
    /** 1-based number of the `connect` call that built this client. */
    serial: number;
    resource: string | undefined;
    credential: string;
}

/** Scriptable in-memory provider. */
export class FakeWidgetProvider implements ConnectorProvider<WidgetClient> {
    connectCalls = 0;
    readonly released: WidgetClient[] = [];
    readonly verifyCalls: VerifyContext[] = [];
    readonly localConfigured: Array<string | undefined> = [];

    /** When set, `connect` waits for it before answering. */
    gate: Promise<void> | undefined;
    /** Credential value the provider refuses. */
    rejected: string | undefined;
    unreachable = false;
    /** Raw IDs returned by discovery. */
    discoverable: string[] = [];

    async connect(ctx: ProviderContext): Promise<WidgetClient> {
        this.connectCalls += 1;
        const serial = this.connectCalls;
        const credential = credentialOf(ctx);
        if (this.gate) await this.gate;
        if (credential === this.rejected) {
            throw new AuthorizationError("Widget service rejected the credentials", { diagnostic: "401 bad token" });
        }
        return { serial, resource: ctx.resource?.canonicalId, credential };
    }

    async verify(ctx: VerifyContext): Promise<VerifyOutcome> {
        this.verifyCalls.push(ctx);
        if (this.unreachable) return { status: "unreachable", reason: "widget service offline" };
        if (credentialOf(ctx) === this.rejected) {
            throw new AuthorizationError("Widget service rejected the credentials", { diagnostic: "401 bad token" });
        }
        if (ctx.discover) return { status: "verified", resourceIds: [...this.discoverable] };
        return { status: "verified", resourceIds: ctx.resource ? [ctx.resource.canonicalId] : [] };
    }

    disconnect(client: WidgetClient): void {
        this.released.push(client);
    }

    async configureLocalClient(ctx: ProviderContext): Promise<void> {
        this.localConfigured.push(ctx.resource?.canonicalId);
    }

    async autoConfigure(request: AutoConfigureRequest): Promise<AutoConfiguredConnector> {
        const token = request.env.WIDGET_TOKEN;
        if (!token) throw new AuthorizationError("WIDGET_TOKEN is not set");
        return {
            authMethod: request.authMethod ?? WIDGET_TOKEN_AUTH,
            resourceType: request.resourceType ?? "widget",
            resourceId: request.resourceId,
            config: { token },
        };
    }
}

function credentialOf(ctx: ProviderContext): string {
    return ctx.config.has("token") ? ctx.config.secret("token") : ctx.config.secret("apiKey");
}

/** A fresh widget connector type around a fresh {@link FakeWidgetProvider}. */
export function makeWidgetType(provider = new FakeWidgetProvider()): {
    type: ConnectorType<WidgetClient>;
    provider: FakeWidgetProvider;
} {
    return {
        provider,
        type: {
            spec: WIDGET_SPEC,
            resolvers: { widget: widgetResolver, gadget: gadgetResolver },
            provider,
        },
    };
}

// =============================================================================
// Deferred
// =============================================================================

export interface Deferred {
    promise: Promise<void>;
    resolve: () => void;
}

export function deferred(): Deferred {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}

// =============================================================================
// Docker fakes
// =============================================================================

/** Error shaped like the ones dockerode raises for HTTP failures. */
export function makeEngineError(statusCode: number, message: string): Error {
    return Object.assign(new Error(message), { statusCode });
}

export class FakeDockerEngine implements DockerEngine {
    readonly logins: DockerAuth[] = [];
    pings = 0;
    pingError: Error | undefined;
    loginError: Error | undefined;

    async ping(): Promise<unknown> {
        this.pings += 1;
        if (this.pingError) throw this.pingError;
        return "OK";
    }

    async checkAuth(auth: DockerAuth): Promise<unknown> {
        this.logins.push(auth);
        if (this.loginError) throw this.loginError;
        return { Status: "Login Succeeded" };
    }
}

export interface RecordedCommand {
    command: string;
    args: readonly string[];
    input: string | undefined;
}

/** Command runner that records invocations and answers with a fixed result. */
export function makeFakeRunner(result: CommandResult | Error): { run: CommandRunner; calls: RecordedCommand[] } {
    const calls: RecordedCommand[] = [];
    const run: CommandRunner = async (command: string, args: readonly string[], options?: RunCommandOptions) => {
        calls.push({ command, args, input: options?.input });
        if (result instanceof Error) throw result;
        return result;
    };
    return { run, calls };
}

// =============================================================================
// AWS fakes
// =============================================================================

/** Error shaped like an AWS SDK service exception. */
export function makeAwsError(name: string, httpStatusCode: number, message = name): Error {
    return Object.assign(new Error(message), { name, $metadata: { httpStatusCode } });
}

/** Error shaped like a socket failure surfaced by the AWS SDK. */
export function makeNetworkError(code: string): Error {
    return Object.assign(new Error(`connect ${code} 127.0.0.1:443`), { code, $metadata: { attempts: 3 } });
}

export class FakeAwsApi implements AwsApi {
    readonly sessions: AwsSession[] = [];
    readonly headed: string[] = [];
    buckets: string[] = [];
    failure: Error | undefined;
    identity: AwsCallerIdentity = { account: "123456789012", arn: "arn:aws:iam::123456789012:user/ci", userId: "AIDTEST" };

    async getCallerIdentity(session: AwsSession): Promise<AwsCallerIdentity> {
        this.sessions.push(session);
        if (this.failure) throw this.failure;
        return this.identity;
    }

    async listBuckets(session: AwsSession): Promise<string[]> {
        this.sessions.push(session);
        if (this.failure) throw this.failure;
        return [...this.buckets];
    }

    async headBucket(session: AwsSession, bucket: string): Promise<void> {
        this.sessions.push(session);
        this.headed.push(bucket);
        if (this.failure) throw this.failure;
        if (!this.buckets.includes(bucket)) throw makeAwsError("NotFound", 404);
    }
}
