import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: "esm",
  target: "node20",
  platform: "node",
  clean: true,
  // the workspace package resolves to TypeScript sources, so it is bundled in
  noExternal: ["@pgp-mfa/core"],
  external: ["better-sqlite3"],
});
