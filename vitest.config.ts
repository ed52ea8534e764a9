import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const vitestConfig = defineConfig({
    resolve: {
        alias: {
            "@": fileURLToPath(new URL(".", import.meta.url)),
        },
    },
    test: {
        globals: false,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        testTimeout: 10_000,
    },
});

export default vitestConfig;
