import {defineConfig} from "vitest/config";

export default defineConfig({
  test: {
    pool: "threads",
    include: ["**/*.test.ts"],
    exclude: [
      "**/node_modules/**",
      "**/dist/**",
      "**/.{idea,git,cache,output,temp}/**",
      "**/{vite,vitest}.config.*",
    ],
    reporters: ["default"],
    unstubEnvs: true,
  },
});
