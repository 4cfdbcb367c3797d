import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["Frequencies/src/**/*.test.ts"],
        environment: "node",
    },
});
