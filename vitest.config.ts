import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    // 文件句柄与临时目录按进程隔离
    pool: "forks",
  },
});
