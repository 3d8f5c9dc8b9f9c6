import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],
  test: {
    include: [
      "backend/src/**/*.test.ts",
      "frontend/src/**/*.test.{ts,tsx}",
    ],
    environment: "node",
    setupFiles: ["./vitest.setup.ts"],
  },
});
