import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        // CLI tests write to temp dirs and share the global observer
        fileParallelism: false,
        sequence: {
            concurrent: false,
        },
        coverage: {
            provider: "v8",
            reporter: ["text", "json", "html"],
            exclude: ["node_modules/", "dist/", "tests/", "*.config.*"],
        },
    },
});
