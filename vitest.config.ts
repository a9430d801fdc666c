import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Tests run in a zone with daylight saving so calendar arithmetic is exercised
process.env.TZ = "Europe/Berlin";

export default defineConfig({
  resolve: {
    alias: {
      "@almanac/core": fileURLToPath(
        new URL("./packages/core/src/lib.ts", import.meta.url),
      ),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    env: {
      TZ: "Europe/Berlin",
    },
    clearMocks: true,
    restoreMocks: true,
  },
});
