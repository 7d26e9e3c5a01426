import { fileURLToPath, URL } from "node:url";
import react from "@vitejs/plugin-react";
import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./webapp/src", import.meta.url)),
    },
  },
  test: {
    // Component tests opt into jsdom with a `@vitest-environment jsdom` docblock.
    environment: "node",
    setupFiles: ["./webapp/src/test/setup.ts"],
    clearMocks: true,
    include: ["server/src/**/*.test.ts", "webapp/src/**/*.test.{ts,tsx}"],
    exclude: [...configDefaults.exclude, "dist/**"],
  },
});
