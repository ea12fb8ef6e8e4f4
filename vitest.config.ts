import path from "path";
import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname( fileURLToPath( import.meta.url ) );

export default defineConfig( {
  resolve: {
    alias: {
      "@": path.join( rootDir, "src" ),
    },
  },
  test: {
    include: [ "test/**/*.test.ts" ],
    environment: "node",
    env: {
      APP_ENV: "test",
      LOG_LEVEL: "silent",
      LOG_PRETTY: "false",
      LOG_STDOUT: "false",
    },
  },
} );
