import { defineConfig } from "vite";

const bridgeTarget = process.env.TRAFFICVIEW_BRIDGE ?? "http://localhost:8813";

export default defineConfig({
  root: ".",
  base: "./",
  build: {
    outDir: "dist"
  },
  server: {
    port: 5173,
    open: true,
    strictPort: false,
    proxy: {
      "/engine": {
        target: bridgeTarget,
        changeOrigin: true
      }
    }
  }
});
