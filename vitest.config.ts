import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
    resolve: {
        alias: [
            { find: /^@\//, replacement: fileURLToPath(new URL("./", import.meta.url)) },
        ],
    },
    test: {
        environment: "node",
        include: ["lib/**/*.test.ts", "hooks/**/*.test.ts"],
    },
});
