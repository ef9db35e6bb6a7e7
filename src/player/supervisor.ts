/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * supervisor.ts: Player process supervision for Slideshow Player.
 */
import { CredentialError, LOG, ProcessError, formatError, redactCredential, startTimer } from "../utils/index.js";
import type { LaunchMode, Nullable } from "../types/index.js";
import type { LaunchSpec, LaunchedProcess, ProcessExit, ProcessLauncher } from "./launcher.js";
import fs from "node:fs";
import { resolveHelperExecutable } from "./helper.js";
import { spawnLauncher } from "./launcher.js";

const { promises: fsPromises } = fs;

/*
 * PROCESS SUPERVISION
 *
 * The supervisor owns at most one player process. ensureRunning() is the only way one gets started, and it is safe to call as often as callers like:
 *
 * 1. If the current process is alive, it returns immediately.
 * 2. If a launch is already in progress, the caller piggybacks on it instead of starting a second process.
 * 3. If a stop is still waiting for the old process to exit, the launch waits for that first, so two processes never overlap.
 *
 * Exits are observed through the launched process' exit promise. The exit handler only acts when the exiting process is still the current one, so a late exit
 * from a process we already replaced cannot clear its successor.
 */

const log = LOG.withComponent("Supervisor");

/**
 * Environment variable names the player runtime reads at startup.
 */
export const PLAYER_ENV = {

  accessToken: "SPOTIFY_ACCESS_TOKEN",
  backendBaseUrl: "ELECTRIC_BACKEND_BASE_URL",
  debugPort: "ELECTRIC_PLAYER_DEBUG_PORT",
  mode: "ELECTRIC_SLIDESHOW_MODE"
} as const;

export interface SupervisorOptions {

  debugPort: number;
  devRepoPath: Nullable<string>;
  helperName: string;
  launchMode: LaunchMode;
  launcher?: ProcessLauncher;
  resolveHelper?: (resourcesDir: string, helperName: string) => Promise<string>;
  resourcesDir: string;
}

/**
 * Listener for process exits. expected is true when the exit followed a stop() call.
 */
export type ExitListener = (exit: ProcessExit, expected: boolean) => void;

export class PlayerSupervisor {

  private current: Nullable<LaunchedProcess> = null;
  private readonly exitListeners = new Set<ExitListener>();
  private launchPromise: Nullable<Promise<LaunchedProcess>> = null;
  private readonly launcher: ProcessLauncher;
  private readonly options: SupervisorOptions;
  private pendingStop: Nullable<Promise<void>> = null;
  private readonly resolveHelper: (resourcesDir: string, helperName: string) => Promise<string>;
  private readonly stopping = new WeakSet<LaunchedProcess>();

  constructor(options: SupervisorOptions) {

    this.launcher = options.launcher ?? spawnLauncher;
    this.options = options;
    this.resolveHelper = options.resolveHelper ?? resolveHelperExecutable;
  }

  /**
   * Whether a live player process is currently owned.
   */
  get isRunning(): boolean {

    return this.current?.isAlive() ?? false;
  }

  get pid(): Nullable<number> {

    return this.current?.pid ?? null;
  }

  /**
   * Registers a termination callback.
   * @returns A function that removes the listener.
   */
  onExit(listener: ExitListener): () => void {

    this.exitListeners.add(listener);

    return (): void => {

      this.exitListeners.delete(listener);
    };
  }

  /**
   * Makes sure the player process is running, launching it when needed.
   * @param credential - The access token handed to the player in its environment.
   * @param backendBaseUrl - The companion backend base URL, passed through when set.
   * @throws CredentialError NoAccessCredential for an empty credential, ProcessError InvalidPath, HelperNotFound, or LaunchFailed when the launch fails.
   */
  async ensureRunning(credential: string, backendBaseUrl: Nullable<string>): Promise<void> {

    if(!credential) {

      throw new CredentialError("NoAccessCredential", "An access token is required to start the player.");
    }

    // A process that is being stopped does not count; the launch below waits for it to go away.
    if(this.current?.isAlive() && !this.stopping.has(this.current)) {

      return;
    }

    if(this.launchPromise) {

      await this.launchPromise;

      return;
    }

    this.launchPromise = this.launch(credential, backendBaseUrl);

    try {

      await this.launchPromise;
    } finally {

      this.launchPromise = null;
    }
  }

  /**
   * Asks the player process to terminate. The returned promise settles when it has exited; callers that do not need to wait can ignore it.
   */
  async stop(): Promise<void> {

    if(this.launchPromise) {

      try {

        await this.launchPromise;
      } catch(error) {

        log.info("Nothing to stop, the pending launch failed: %s.", formatError(error));

        return;
      }
    }

    const handle = this.current;

    if(!handle) {

      return;
    }

    if(!handle.isAlive()) {

      this.current = null;

      return;
    }

    if(this.pendingStop) {

      return this.pendingStop;
    }

    log.info("Stopping player process %s.", handle.pid ?? "(unknown PID)");

    this.stopping.add(handle);
    handle.terminate();

    const pendingStop = handle.exited.then(() => {

      if(this.pendingStop === pendingStop) {

        this.pendingStop = null;
      }
    });

    this.pendingStop = pendingStop;

    return pendingStop;
  }

  private async launch(credential: string, backendBaseUrl: Nullable<string>): Promise<LaunchedProcess> {

    const elapsed = startTimer();

    if(this.pendingStop) {

      log.info("Waiting for the previous player process to exit.");

      await this.pendingStop;
    }

    // The previous process died without us seeing its exit yet.
    if(this.current && !this.current.isAlive()) {

      this.current = null;
    }

    const spec = await this.buildLaunchSpec(credential, backendBaseUrl);

    log.info("Launching player (%s mode): %s %s with token %s.", this.options.launchMode, spec.command, spec.args.join(" "), redactCredential(credential));

    const handle = await this.launcher.launch(spec);

    this.current = handle;

    void handle.exited.then((exit) => this.handleExit(handle, exit));

    log.info("Player process started with PID %s.", handle.pid ?? "(unknown)");
    LOG.debug("timing:init", "Player process spawned. (+%sms)", elapsed());

    return handle;
  }

  private async buildLaunchSpec(credential: string, backendBaseUrl: Nullable<string>): Promise<LaunchSpec> {

    const debugArg = "--remote-debugging-port=" + String(this.options.debugPort);
    const env: Record<string, string> = {

      [PLAYER_ENV.accessToken]: credential,
      [PLAYER_ENV.debugPort]: String(this.options.debugPort),
      [PLAYER_ENV.mode]: "internal-player"
    };

    if(backendBaseUrl) {

      env[PLAYER_ENV.backendBaseUrl] = backendBaseUrl;
    }

    if(this.options.launchMode === "dev") {

      const repoPath = await this.checkDevRepoPath();

      return { args: [ "run", "dev", "--", debugArg ], command: (process.platform === "win32") ? "npm.cmd" : "npm", cwd: repoPath, env };
    }

    const executable = await this.resolveHelper(this.options.resourcesDir, this.options.helperName);

    return { args: [debugArg], command: executable, env };
  }

  private async checkDevRepoPath(): Promise<string> {

    const repoPath = this.options.devRepoPath;

    if(!repoPath) {

      throw new ProcessError("InvalidPath", "Dev launch mode needs a player repository path.");
    }

    let isDirectory = false;

    try {

      isDirectory = (await fsPromises.stat(repoPath)).isDirectory();
    } catch(error) {

      throw new ProcessError("InvalidPath", [ "Player repository ", repoPath, " is not accessible: ", formatError(error), "." ].join(""));
    }

    if(!isDirectory) {

      throw new ProcessError("InvalidPath", [ "Player repository ", repoPath, " is not a directory." ].join(""));
    }

    return repoPath;
  }

  private handleExit(handle: LaunchedProcess, exit: ProcessExit): void {

    if(this.current !== handle) {

      return;
    }

    this.current = null;

    const expected = this.stopping.has(handle);

    if(expected) {

      log.info("Player process exited.");
    } else {

      log.warn("Player process exited unexpectedly (code %s, signal %s).", exit.code ?? "none", exit.signal ?? "none");
    }

    for(const listener of this.exitListeners) {

      listener(exit, expected);
    }
  }
}
