import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@refract/optics",
    globals: true,
    environment: "node",
  },
});
