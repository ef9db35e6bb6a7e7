/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * transport.ts: DevTools transport to the player runtime.
 */
import type { Browser, Page } from "puppeteer-core";
import { LOG, evaluateWithAbort, formatError, retryOperation, startTimer } from "../utils/index.js";
import type { PlayerCommand, PlayerTransport } from "./channel.js";
import { installMessageShim, installPlayerHooks, installSdkReadyBridge, invokePlayerMethod, isPlayerPageReady } from "./pageScripts.js";
import type { Nullable } from "../types/index.js";
import { connect } from "puppeteer-core";

/* The player runtime is a Chromium-based shell started with --remote-debugging-port. We attach to it with puppeteer-core over that port and drive the player page
 * directly:
 *
 * 1. Attach, retrying while the runtime is still opening its port.
 * 2. Take the runtime's first regular page, or open one.
 * 3. Expose __slideshowPlayerEvent and install the message shim, so the page's posts reach the channel.
 * 4. Navigate to the player page URL when one is configured, otherwise use what the runtime loaded itself, and wait for INTERNAL_PLAYER to appear.
 * 5. Install the SDK ready bridge and the player hooks.
 *
 * Closing only detaches. The supervisor owns the runtime's lifetime.
 */

const log = LOG.withComponent("Transport");

// Name of the function binding the page posts its events through.
const EVENT_BINDING = "__slideshowPlayerEvent";

export interface PuppeteerTransportOptions {

  // Timeout for one page command in milliseconds.
  commandTimeout: number;

  // Overall budget for attaching to the runtime's DevTools port in milliseconds.
  connectTimeout: number;

  // Timeout for the player page to load in milliseconds.
  contentTimeout: number;

  debugPort: number;

  // The player page to navigate to. Null keeps the page the runtime loaded on its own.
  pageUrl: Nullable<string>;
}

export class PuppeteerTransport implements PlayerTransport {

  private browser: Nullable<Browser> = null;
  private closing = false;
  private onMessage: Nullable<(payload: unknown) => void> = null;
  private readonly options: PuppeteerTransportOptions;
  private page: Nullable<Page> = null;

  constructor(options: PuppeteerTransportOptions) {

    this.options = options;
  }

  async open(onMessage: (payload: unknown) => void): Promise<void> {

    const elapsed = startTimer();

    this.closing = false;
    this.onMessage = onMessage;

    const browserURL = "http://127.0.0.1:" + String(this.options.debugPort);

    // Delays start at 250ms and are capped at 1s, so one attempt per second of budget keeps us inside the connect timeout.
    const browser = await retryOperation(async () => connect({ browserURL, defaultViewport: null }), {

      attemptTimeout: 2000,
      attempts: Math.max(1, Math.ceil(this.options.connectTimeout / 1000)),
      backoffJitter: 100,
      description: "attaching to the player runtime at " + browserURL,
      maxBackoffDelay: 1000,
      shouldAbort: () => this.closing
    });

    this.browser = browser;

    browser.once("disconnected", () => {

      if(this.browser !== browser) {

        return;
      }

      this.browser = null;
      this.page = null;

      if(!this.closing) {

        log.warn("Lost the DevTools connection to the player runtime.");
      }
    });

    LOG.debug("timing:init", "Attached to the player runtime. (+%sms)", elapsed());

    try {

      this.page = await this.preparePage(browser);
    } catch(error) {

      await this.close();

      throw error;
    }

    LOG.debug("timing:init", "Player page prepared. (+%sms)", elapsed());
  }

  async invoke(command: PlayerCommand, args: unknown[]): Promise<unknown> {

    if(!this.page) {

      throw new Error("The player page is not attached.");
    }

    LOG.debug("channel:transport", "Invoking %s with %j.", command, args);

    return evaluateWithAbort(this.page, invokePlayerMethod, [ command, args ], this.options.commandTimeout);
  }

  async close(): Promise<void> {

    const browser = this.browser;

    this.closing = true;
    this.browser = null;
    this.onMessage = null;
    this.page = null;

    if(!browser?.connected) {

      return;
    }

    try {

      await browser.disconnect();
    } catch(error) {

      LOG.debug("channel:transport", "Detaching from the player runtime failed: %s.", formatError(error));
    }
  }

  private async preparePage(browser: Browser): Promise<Page> {

    const pages = await browser.pages();
    const page = pages.find((candidate) => !candidate.url().startsWith("devtools://")) ?? await browser.newPage();

    await page.exposeFunction(EVENT_BINDING, (payload: unknown): void => {

      this.onMessage?.(payload);
    });

    await page.evaluateOnNewDocument(installMessageShim);

    if(this.options.pageUrl) {

      log.info("Loading player page %s.", this.options.pageUrl);

      await page.goto(this.options.pageUrl, { timeout: this.options.contentTimeout, waitUntil: "load" });
    } else {

      // The runtime loaded its page before we attached, so the shim has to be installed on the live document as well.
      await evaluateWithAbort(page, installMessageShim, [], this.options.commandTimeout);
    }

    await page.waitForFunction(isPlayerPageReady, { timeout: this.options.contentTimeout });

    await evaluateWithAbort(page, installSdkReadyBridge, [], this.options.commandTimeout);

    if(!(await evaluateWithAbort(page, installPlayerHooks, [], this.options.commandTimeout))) {

      throw new Error("The player page does not define INTERNAL_PLAYER.");
    }

    return page;
  }
}
