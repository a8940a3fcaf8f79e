import { defineConfig } from "vite";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  build: {
    lib: {
      entry: resolve(__dirname, "src/index.ts"),
      name: "TransformBake",
      fileName: "transform-bake",
      formats: ["es", "cjs"],
    },
    outDir: "dist",
    sourcemap: true,
    minify: false,
  },
});
