import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        testTimeout: 10000,
        // Keep per-task INFO lines out of test output.
        env: {
            SWITCHYARD_LOG_LEVEL: "warn",
        },
        coverage: {
            // Run with: npm run test:coverage
            provider: "v8",
            reporter: ["text", "html"],
            include: ["src/**/*.ts"],
            exclude: ["src/index.ts"],
            thresholds: {
                "src/repositories/**": {
                    statements: 75,
                    branches: 65,
                    functions: 75,
                    lines: 75,
                },
            },
        },
    },
});
