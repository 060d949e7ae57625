import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        name: "censokit",
        include: ["{cli,core,service}/**/*.test.ts"],
        exclude: ["node_modules", "dist"],
        testTimeout: 30000,
        pool: "forks",
    },
});
