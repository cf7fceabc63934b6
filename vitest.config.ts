import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));
const src = path.resolve(root, "packages/midir/src");

const subpath = (name: string, file: string) => ({
  find: new RegExp(`^${name}$`),
  replacement: path.resolve(src, file),
});

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
  },
  resolve: {
    alias: [
      subpath("#errors", "errors.ts"),
      subpath("#result", "result.ts"),
      subpath("#target", "target.ts"),
      subpath("#types", "types/index.ts"),
      subpath("#ir", "ir/index.ts"),
      subpath("#ir/spec", "ir/spec/index.ts"),
      subpath("#irgen", "irgen/index.ts"),
      subpath("#optimizer", "optimizer/index.ts"),
      {
        find: /^#test\/matchers$/,
        replacement: path.resolve(root, "packages/midir/test/matchers.ts"),
      },
    ],
  },
});
