/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * vitest.config.ts: Test runner configuration for Slideshow Player.
 */
import { defineConfig } from "vitest/config";

export default defineConfig({

  test: {

    environment: "node",
    include: ["src/**/*.test.ts"],
    restoreMocks: true
  }
});
