/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * launcher.ts: Child process launching for the player runtime.
 */
import { LOG, ProcessError, formatError } from "../utils/index.js";
import type { Nullable } from "../types/index.js";
import type { Readable } from "node:stream";
import { spawn } from "node:child_process";

/* The supervisor never touches child_process directly. It hands a LaunchSpec to a ProcessLauncher and gets back a LaunchedProcess, which is everything it needs to
 * know about a running process: its PID, whether it is still alive, how to ask it to stop, and a promise that settles when it exits. Tests swap in a fake launcher.
 */

/**
 * What to launch.
 */
export interface LaunchSpec {

  args: string[];
  command: string;
  cwd?: string;

  // Added on top of the parent's environment.
  env: Record<string, string>;
}

/**
 * How a process ended.
 */
export interface ProcessExit {

  code: Nullable<number>;
  signal: Nullable<string>;
}

/**
 * A launched process.
 */
export interface LaunchedProcess {

  // Settles once, when the process exits for any reason. Never rejects.
  readonly exited: Promise<ProcessExit>;
  readonly pid: Nullable<number>;

  isAlive(): boolean;

  // Sends SIGTERM. A no-op once the process has exited.
  terminate(): void;
}

export interface ProcessLauncher {

  /**
   * Starts a process. Resolves once the OS reports it spawned.
   * @throws ProcessError LaunchFailed when the process could not be started.
   */
  launch(spec: LaunchSpec): Promise<LaunchedProcess>;
}

// Forwards a child's output to debug logging, one line at a time.
function forwardOutput(stream: Nullable<Readable>, name: string): void {

  if(!stream) {

    return;
  }

  let pending = "";

  stream.setEncoding("utf8");

  stream.on("data", (chunk: string) => {

    const lines = (pending + chunk).split(/\r?\n/);

    pending = lines.pop() ?? "";

    for(const line of lines) {

      if(line.trim().length > 0) {

        LOG.debug("player:output", "%s: %s", name, line);
      }
    }
  });

  stream.on("end", () => {

    if(pending.trim().length > 0) {

      LOG.debug("player:output", "%s: %s", name, pending);
    }
  });
}

/**
 * Launches processes with child_process.spawn.
 */
export const spawnLauncher: ProcessLauncher = {

  launch: (spec: LaunchSpec): Promise<LaunchedProcess> => new Promise((resolve, reject) => {

    // Since Node 20.12.2, batch files on Windows (npm.cmd) only run through a shell.
    const child = spawn(spec.command, spec.args, {

      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      shell: (process.platform === "win32") && spec.command.toLowerCase().endsWith(".cmd"),
      stdio: [ "ignore", "pipe", "pipe" ]
    });

    let spawned = false;
    let exited = false;

    const exitedPromise = new Promise<ProcessExit>((resolveExit) => {

      child.once("exit", (code, signal) => {

        exited = true;
        resolveExit({ code, signal });
      });
    });

    child.on("error", (error) => {

      if(!spawned) {

        reject(new ProcessError("LaunchFailed", [ "Unable to launch ", spec.command, ": ", formatError(error), "." ].join("")));

        return;
      }

      LOG.warn("Player process error: %s.", formatError(error));
    });

    child.once("spawn", () => {

      spawned = true;

      forwardOutput(child.stdout, "stdout");
      forwardOutput(child.stderr, "stderr");

      resolve({

        exited: exitedPromise,
        isAlive: (): boolean => !exited && (child.exitCode === null) && (child.signalCode === null),
        pid: child.pid ?? null,
        terminate: (): void => {

          if(!exited && !child.killed) {

            child.kill("SIGTERM");
          }
        }
      });
    });
  })
};
