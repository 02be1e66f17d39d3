import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import { fileURLToPath } from "url";

// Assets resolve under /<repo-name>/ when hosted on GitHub Pages; local builds
// fall back to the project folder name.
const repoName = process.env.GITHUB_REPOSITORY?.split("/").pop() ?? "desk-gis";

export default defineConfig({
  base: `/${repoName}/`,
  plugins: [react()],
  resolve: {
    alias: {
      "desk-gis-engine": fileURLToPath(new URL("../engine/src/index.ts", import.meta.url)),
    },
  },
});
