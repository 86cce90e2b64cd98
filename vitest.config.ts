import { defineConfig } from "vitest/config";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const root = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
    test: {
        environment: "node",
        testTimeout: 20_000,
        include: [
            "test/tests-unit/**/*.test.ts",
            "test/tests-e2e/**/*.test.ts",
        ],
    },
    resolve: {
        // Map bare "service-connectors" imports to source files so tests
        // exercise the real implementation without a build step.
        // More-specific subpath patterns must come before the catch-all.
        alias: [
            {
                find: /^service-connectors\/connectors$/,
                replacement: resolve(root, "src/connectors/index.ts"),
            },
            {
                find: /^service-connectors\/resources$/,
                replacement: resolve(root, "src/resources/index.ts"),
            },
            {
                find: /^service-connectors\/providers$/,
                replacement: resolve(root, "src/providers/index.ts"),
            },
            {
                find: /^service-connectors\/plugins$/,
                replacement: resolve(root, "src/plugins/index.ts"),
            },
            {
                find: /^service-connectors$/,
                replacement: resolve(root, "src/index.ts"),
            },
        ],
    },
});
