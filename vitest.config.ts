import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@seqaug/core": pkg("core"),
      "@seqaug/tensor": pkg("tensor"),
      "@seqaug/effect-runtime": pkg("effect-runtime"),
      "@seqaug/augment": pkg("augment"),
    },
  },
  test: {
    include: ["packages/tests/src/**/*.test.ts"],
  },
});
