import { fileURLToPath, URL } from "node:url";
import react from "@vitejs/plugin-react";
import { defineConfig } from "vite";

const API_TARGET = process.env.VITE_DEV_API_TARGET ?? "http://127.0.0.1:8123";

export default defineConfig({
  root: fileURLToPath(new URL(".", import.meta.url)),
  plugins: [react()],
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  server: {
    port: 5173,
    strictPort: true,
    proxy: {
      "/api": API_TARGET,
    },
  },
  build: {
    outDir: fileURLToPath(new URL("../dist/webapp", import.meta.url)),
    emptyOutDir: true,
    chunkSizeWarningLimit: 600,
    cssCodeSplit: true,
    minify: "esbuild",
    sourcemap: false,
    rollupOptions: {
      output: {
        manualChunks: (id) => {
          // echarts-for-react must be in same chunk as echarts
          if (id.includes("echarts") || id.includes("echarts-for-react")) {
            return "echarts";
          }
          if (id.includes("framer-motion")) {
            return "framer-motion";
          }
          if (id.includes("@tanstack")) {
            return "tanstack";
          }
          if (id.includes("@radix-ui")) {
            return "radix-ui";
          }
          // Keep React in the entry chunk so it loads before echarts.
          if (id.includes("react") || id.includes("react-dom") || id.includes("react-router")) {
            return;
          }
        },
      },
    },
  },
});
