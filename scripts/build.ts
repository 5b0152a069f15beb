import { build, type BuildOptions } from "esbuild";
import { rmSync } from "fs";
import { builtinModules } from "module";
import { dependencies } from "../package.json";

// both bundles sit directly in dist/, so ../templates resolves as it does from src/
const shared: BuildOptions = {
  bundle: true,
  platform: "node",
  target: "node20",
  format: "esm",
  outdir: "dist",
  external: Object.keys(dependencies).concat(builtinModules),
  sourcemap: true,
};

rmSync("dist", { recursive: true, force: true });

Promise.all([
  build({ ...shared, entryPoints: { index: "./src/index.ts" } }),
  build({
    ...shared,
    entryPoints: { bin: "./src/bin.ts" },
    banner: { js: "#!/usr/bin/env node" },
    sourcesContent: false,
  }),
]).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
