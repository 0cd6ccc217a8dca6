import { fileURLToPath } from "node:url";
import ts from "typescript";
import { defineConfig, type Plugin } from "vitest/config";

const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

// Transpile TypeScript with tsc rather than esbuild: esbuild renames named
// function expressions that shadow an outer binding, and the runtime reads
// function names (getter wire names)
const typescript = (): Plugin => ({
  name: "wiremap:typescript",
  enforce: "pre",
  transform(code, id) {
    const file = id.split("?")[0] ?? id;
    if (!/\.m?ts$/.test(file) || file.includes("/node_modules/")) return null;
    const output = ts.transpileModule(code, {
      fileName: file,
      compilerOptions: {
        target: ts.ScriptTarget.ES2022,
        module: ts.ModuleKind.ESNext,
        sourceMap: true,
        inlineSources: true,
        esModuleInterop: true,
      },
    });
    return { code: output.outputText, map: output.sourceMapText };
  },
});

export default defineConfig({
  esbuild: false,
  plugins: [typescript()],
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    // Workspace packages resolve to their sources so tests need no build
    alias: {
      "@wiremap/core": source("core"),
      "@wiremap/transform": source("transform"),
    },
  },
});
