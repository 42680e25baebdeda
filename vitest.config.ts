import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["rna-structure/tests/**/*.spec.ts"],
  },
});
