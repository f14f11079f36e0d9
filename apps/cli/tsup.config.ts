import { fileURLToPath } from "node:url";
import { defineConfig, type Options } from "tsup";
import pkg from "./package.json";

const here = (path: string) => fileURLToPath(new URL(path, import.meta.url));

// The workspace package ships TypeScript sources, so it is bundled in.
// Registry dependencies stay external and resolve from node_modules.
export const cliBuild: Options = {
  entry: { index: here("./index.ts") },
  outDir: here("./dist"),
  tsconfig: here("../../tsconfig.json"),
  format: ["esm"],
  outExtension: () => ({ js: ".js" }),
  platform: "node",
  target: "node20",
  external: Object.keys(pkg.dependencies).filter(
    (name) => name !== "@ftsub/shared",
  ),
  noExternal: ["@ftsub/shared"],
  sourcemap: true,
  dts: false,
  clean: true,
  minify: false,
  splitting: false,
  shims: false,
};

export default defineConfig(cliBuild);
