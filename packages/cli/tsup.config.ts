import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "tsup";

const packageDir = dirname(fileURLToPath(import.meta.url));

// Read version from package.json at build time
const pkg: { version: string } = JSON.parse(
  readFileSync(resolve(packageDir, "package.json"), "utf-8")
);

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  target: "node20",
  platform: "node",
  splitting: false,
  sourcemap: false,
  minify: false,
  treeshake: true,
  shims: true,
  outExtension() {
    return { js: ".mjs" };
  },
  banner: {
    // Provide CJS compatibility for bundled dependencies that use require()
    js: `import { createRequire } from 'module';const require = createRequire(import.meta.url);`,
  },

  // Bundle the workspace packages into the CLI
  noExternal: ["@depsync/core", "@depsync/shared"],

  // undici keeps its own lazy requires; ship it as a dependency
  external: [/^node:/, "undici"],

  esbuildOptions(options) {
    // Inject version from package.json at build time
    options.define = {
      ...options.define,
      __VERSION__: JSON.stringify(pkg.version),
    };
  },
});
