/**
 * Docker Connector Example
 *
 * Verifies registry credentials through the local Docker daemon, then hands
 * them to the local Docker CLI.
 *
 * Requires a running Docker daemon and:
 *   REGISTRY_USERNAME, REGISTRY_PASSWORD, REGISTRY_REPOSITORY
 *
 * Run: npx tsx examples/connector/docker/index.ts
 */

import { createServiceConnectors, ServiceConnector } from "service-connectors";

async function main() {
    const { REGISTRY_USERNAME, REGISTRY_PASSWORD, REGISTRY_REPOSITORY } = process.env;
    if (!REGISTRY_USERNAME || !REGISTRY_PASSWORD || !REGISTRY_REPOSITORY) {
        console.error("Set REGISTRY_USERNAME, REGISTRY_PASSWORD and REGISTRY_REPOSITORY.");
        process.exitCode = 1;
        return;
    }

    const { registry } = await createServiceConnectors({ logger: console });
    const connector = ServiceConnector.create(
        {
            type: "docker",
            authMethod: "password",
            resourceId: REGISTRY_REPOSITORY,
            config: { username: REGISTRY_USERNAME, password: REGISTRY_PASSWORD },
        },
        { registry, logger: console },
    );

    console.log("Connector:", JSON.stringify(connector));

    const verified = await connector.verify();
    if (verified.length === 0) {
        console.log("Verification inconclusive: is the Docker daemon running?");
        return;
    }
    console.log("Verified:", verified);

    await connector.configureLocalClient();
    await connector.disconnect();
}

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
