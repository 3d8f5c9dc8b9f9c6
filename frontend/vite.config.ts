import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

const apiProxyTarget = process.env.TIMELINE_API_PROXY_TARGET ?? "http://localhost:8080";

// https://vite.dev/config/
export default defineConfig({
  plugins: [react()],
  build: {
    assetsDir: "static",
  },
  server: {
    proxy: {
      "/api": apiProxyTarget,
    },
  },
});
