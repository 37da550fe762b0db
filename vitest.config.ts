import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["backend/tests/**/*.test.ts"],
        setupFiles: ["./backend/tests/setup.ts"],
        environment: "node",
        testTimeout: 10000,
    },
});
