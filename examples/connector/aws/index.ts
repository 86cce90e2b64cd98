/**
 * AWS Connector Example
 *
 * Builds an AWS connector from the ambient credentials (environment
 * variables or the shared config files), lists the accessible S3 buckets and
 * stores the connector without its secrets.
 *
 * Run: npx tsx examples/connector/aws/index.ts
 */

import { createServiceConnectors, serializeConnector, ServiceConnector } from "service-connectors";

async function main() {
    const { registry } = await createServiceConnectors({ logger: console });

    const connector = await ServiceConnector.autoConfigure(
        "aws",
        { resourceType: "s3-bucket" },
        { registry, logger: console },
    );

    console.log("Auth method:", connector.authMethod);
    console.log("Buckets:", await connector.verify());
    console.log("Stored form:", JSON.stringify(serializeConnector(connector), null, 2));
}

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
