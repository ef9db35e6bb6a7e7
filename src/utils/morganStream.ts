/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Morgan logging stream adapter for Slideshow Player.
 */
import type { StreamOptions } from "morgan";
import df from "dateformat";
import { isConsoleLogging } from "./logger.js";
import { writeLogEntry } from "./fileLogger.js";

/* Morgan writes request lines to a stream. This adapter sends them wherever application logs go: stdout with a timestamp in console mode, or the file logger (which
 * stamps its own lines) otherwise.
 */

/**
 * Creates the Morgan stream options for the current logging mode.
 * @returns StreamOptions object for Morgan configuration.
 */
export function createMorganStream(): StreamOptions {

  return {

    write: (message: string): void => {

      // Morgan terminates each line with a newline; both sinks add their own.
      const line = message.trim();

      if(!isConsoleLogging()) {

        writeLogEntry("info", line);

        return;
      }

      // eslint-disable-next-line no-console
      console.log([ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", line ].join(""));
    }
  };
}
