/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * version.ts: Package version lookup for Slideshow Player.
 */
import type { Nullable } from "../types/index.js";
import { fileURLToPath } from "url";
import { readFileSync } from "fs";
import { resolve } from "path";

let cachedPackageVersion: Nullable<string> = null;

/**
 * Returns the absolute path of the package root. This file lives in src/utils/ or dist/utils/, two levels below it.
 */
export function getPackageRoot(): string {

  return resolve(fileURLToPath(new URL(".", import.meta.url)), "../..");
}

/**
 * Gets the current package version from package.json.
 * @returns The current version string (e.g., "1.0.0"), or "0.0.0" when package.json cannot be read.
 */
export function getPackageVersion(): string {

  if(cachedPackageVersion) {

    return cachedPackageVersion;
  }

  try {

    const packageJson: unknown = JSON.parse(readFileSync(resolve(getPackageRoot(), "package.json"), "utf-8"));

    if(packageJson && (typeof packageJson === "object") && ("version" in packageJson) && (typeof packageJson.version === "string")) {

      cachedPackageVersion = packageJson.version;

      return cachedPackageVersion;
    }
  } catch {

    return "0.0.0";
  }

  return "0.0.0";
}
