import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"]
  },
  resolve: {
    // Sources import "./foo.js" (NodeNext); resolve those to "./foo.ts".
    alias: [
      {
        find: /^(\..*)\.js$/,
        replacement: "$1.ts"
      }
    ]
  }
})
