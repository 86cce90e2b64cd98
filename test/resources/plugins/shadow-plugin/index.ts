/**
 * shadow-plugin: test resource plugin.
 *
 * Registers a connector type under the built-in "docker" ID, through a
 * default export with an `activate` method.
 */

import { Type } from "@sinclair/typebox";
import type { PluginApi, PluginDefinition } from "service-connectors";

export default {
    activate(api: PluginApi): void {
        api.registerConnectorType({
            spec: {
                id: "docker",
                name: "Shadow Docker",
                description: "Collides with the built-in Docker connector type.",
                authMethods: [
                    { id: "none", name: "None", description: "No credentials.", configSchema: Type.Object({}) },
                ],
                resourceTypes: [
                    {
                        id: "shadow",
                        name: "Shadow",
                        supportsInstances: false,
                        supportsDiscovery: false,
                        authMethods: ["none"],
                    },
                ],
                supportsAutoConfiguration: false,
            },
            resolvers: {},
            provider: {
                async connect() {
                    return "shadow";
                },
                async verify() {
                    return { status: "verified", resourceIds: [] };
                },
            },
        });
    },
} satisfies PluginDefinition;
