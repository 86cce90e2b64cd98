/**
 * Custom Connector Type Example
 *
 * Demonstrates how to implement a connector type from scratch and register it
 * with a ConnectorRegistry.
 *
 * This example uses a trivial in-memory "notebook" service, so it runs
 * without credentials or network access.
 *
 * Run: npx tsx examples/connector/custom/index.ts
 */

import { Type } from "@sinclair/typebox";
import {
    AuthorizationError,
    ConnectorRegistry,
    createShapeResolver,
    SecretField,
    ServiceConnector,
    type ConnectorType,
} from "service-connectors";

// ---------------------------------------------------------------------------
// 1. Describe the connector type
// ---------------------------------------------------------------------------

interface NotebookClient {
    notebook: string;
    read(): string[];
}

const NOTEBOOKS: Record<string, string[]> = {
    "team-notes": ["standup at 10", "ship the release"],
    "ops-log": ["rotated the CI token"],
};

const notebookResolver = createShapeResolver("notebook", [
    {
        name: "notebook URI",
        format: "notebook://<name>",
        pattern: /^notebook:\/\/([a-z-]+)$/,
        decompose: (m) => ({ canonicalId: `notebook://${m[1] ?? ""}`, fields: { name: m[1] } }),
    },
    {
        name: "notebook name",
        format: "<name>",
        pattern: /^([a-z-]+)$/,
        decompose: (m) => ({ canonicalId: `notebook://${m[1] ?? ""}`, fields: { name: m[1] } }),
    },
]);

const notebookType: ConnectorType<NotebookClient> = {
    spec: {
        id: "notebook",
        name: "Notebook Connector",
        description: "In-memory notebooks guarded by a shared token.",
        authMethods: [
            {
                id: "token",
                name: "Token",
                description: "Shared notebook token.",
                configSchema: Type.Object({ token: SecretField() }, { additionalProperties: false }),
            },
        ],
        resourceTypes: [
            {
                id: "notebook",
                name: "Notebook",
                supportsInstances: true,
                supportsDiscovery: true,
                authMethods: ["token"],
            },
        ],
        supportsAutoConfiguration: false,
    },
    resolvers: { notebook: notebookResolver },
    provider: {
        async connect(ctx) {
            if (ctx.config.secret("token") !== "example-token") {
                throw new AuthorizationError("Notebook service rejected the token");
            }
            const notebook = ctx.resource?.fields.name ?? "";
            return { notebook, read: () => NOTEBOOKS[notebook] ?? [] };
        },
        async verify(ctx) {
            if (ctx.discover) return { status: "verified", resourceIds: Object.keys(NOTEBOOKS) };
            return { status: "verified", resourceIds: ctx.resource ? [ctx.resource.canonicalId] : [] };
        },
    },
};

// ---------------------------------------------------------------------------
// 2. Register it with a ConnectorRegistry
// ---------------------------------------------------------------------------

const registry = new ConnectorRegistry();
registry.register(notebookType);

// ---------------------------------------------------------------------------
// 3. Use it
// ---------------------------------------------------------------------------

async function main() {
    const connector = ServiceConnector.create(
        { type: notebookType, authMethod: "token", config: { token: "example-token" } },
        { registry, logger: console },
    );

    console.log("Accessible notebooks:", await connector.verify());

    const client = await connector.connect("team-notes");
    for (const line of client.read()) console.log(`- ${line}`);

    await connector.disconnect();
}

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
