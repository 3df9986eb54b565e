import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    environment: "node", // server-side only
    include: ["src/**/*.spec.ts", "backend/**/*.spec.ts"],
  },
  resolve: {
    alias: {
      "@server": path.resolve(__dirname, "./src/server"),
      "@lib": path.resolve(__dirname, "./src/lib"),
    },
  },
});
