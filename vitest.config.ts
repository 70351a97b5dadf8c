import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        globalSetup: "./tests/global-setup.ts",
        // Integration tests share the tmp/ directory and the process-wide observer
        fileParallelism: false,
        sequence: {
            concurrent: false,
        },
    },
});
