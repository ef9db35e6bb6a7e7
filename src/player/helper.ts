/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * helper.ts: Packaged player helper resolution.
 */
import { ProcessError } from "../utils/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/* The packaged player ships inside the application's resources directory, laid out the way each platform bundles an application:
 *
 *   macOS:    <resources>/<Name>.app/Contents/MacOS/<Name>
 *   Windows:  <resources>/<Name>/<Name>.exe
 *   Others:   <resources>/<Name>/<Name>
 */

/**
 * Resolves the helper executable path for a platform. Pure path arithmetic; see resolveHelperExecutable() for the filesystem check.
 * @param resourcesDir - The resources directory.
 * @param helperName - The helper's bundle and executable name.
 * @param platform - The platform to lay out for.
 */
export function helperExecutablePath(resourcesDir: string, helperName: string, platform: NodeJS.Platform = process.platform): string {

  switch(platform) {

    case "darwin": {

      return path.join(resourcesDir, helperName + ".app", "Contents", "MacOS", helperName);
    }

    case "win32": {

      return path.join(resourcesDir, helperName, helperName + ".exe");
    }

    default: {

      return path.join(resourcesDir, helperName, helperName);
    }
  }
}

/**
 * Resolves the packaged helper and checks it is an executable regular file.
 * @param resourcesDir - The resources directory.
 * @param helperName - The helper's bundle and executable name.
 * @returns The absolute executable path.
 * @throws ProcessError HelperNotFound when the helper is missing or not executable.
 */
export async function resolveHelperExecutable(resourcesDir: string, helperName: string): Promise<string> {

  const executable = helperExecutablePath(resourcesDir, helperName);

  try {

    const stats = await fsPromises.stat(executable);

    if(!stats.isFile()) {

      throw new Error("not a regular file");
    }

    // Windows has no execute bit; X_OK degrades to an existence check there.
    await fsPromises.access(executable, fs.constants.X_OK);
  } catch(error) {

    throw new ProcessError("HelperNotFound", [ "Player helper ", helperName, " not found at ", executable, " (",
      (error instanceof Error) ? error.message : String(error), ")." ].join(""));
  }

  return executable;
}
