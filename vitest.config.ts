import { transform } from "esbuild";
import { defineConfig } from "vitest/config";

// Agent aliases come from function names. Vite's built-in esbuild step forces
// keepNames off, which lets esbuild rename shadowed function expressions
// (`const helper = forum.agent(function* helper() {})` -> `helper2`), so the
// TypeScript transform is done here with keepNames enabled instead.
export default defineConfig({
  esbuild: false,
  plugins: [
    {
      name: "typescript-keep-names",
      async transform(code, id) {
        if (!/\.[cm]?ts$/.test(id.split("?")[0])) return null;
        const result = await transform(code, {
          loader: "ts",
          format: "esm",
          target: "es2022",
          keepNames: true,
          sourcemap: true,
          sourcefile: id,
          tsconfigRaw: { compilerOptions: { useDefineForClassFields: true } },
        });
        return { code: result.code, map: result.map };
      },
    },
  ],
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
