import { build } from "esbuild";
import { builtinModules } from "module";
import { dependencies } from "../package.json";

const external = Object.keys(dependencies).concat(builtinModules);

Promise.all([
  build({
    entryPoints: ["./src/index.ts"],
    bundle: true,
    platform: "node",
    target: "node20",
    format: "esm",
    outdir: "dist",
    external,
    sourcemap: true,
  }),
  build({
    entryPoints: ["./src/bin.ts"],
    bundle: true,
    platform: "node",
    target: "node20",
    format: "esm",
    outdir: "dist",
    external,
    banner: { js: "#!/usr/bin/env node" },
    sourcemap: true,
    sourcesContent: false,
  }),
]).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
