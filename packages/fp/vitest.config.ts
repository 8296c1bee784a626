import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@refract/fp",
    globals: true,
    environment: "node",
  },
});
