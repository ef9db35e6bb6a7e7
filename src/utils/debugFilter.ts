/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for Slideshow Player.
 */

/* Debug output is grouped into colon-separated categories (e.g., "player:output", "channel:events"). SLIDESHOW_PLAYER_DEBUG takes a comma-separated list of
 * patterns:
 *
 *   - "*" enables all categories.
 *   - "category" enables an exact category or any sub-category (prefix match).
 *   - "-category" excludes a category or its sub-categories, even when wildcard is active.
 *
 * Examples:
 *   SLIDESHOW_PLAYER_DEBUG=channel             Every channel sub-category.
 *   SLIDESHOW_PLAYER_DEBUG=*,-player:output    Everything except the player's own stdout/stderr.
 */

interface DebugFilter {

  exclude: string[];
  include: string[];
  wildcard: boolean;
}

// Null when debug output is off entirely, which keeps the fast path to a single check.
let activeFilter: DebugFilter | null = null;

/**
 * Checks whether a category is covered by a pattern: either equal to it or a sub-category of it.
 */
function covers(pattern: string, category: string): boolean {

  return (category === pattern) || category.startsWith(pattern + ":");
}

/**
 * Parses a comma-separated pattern string and replaces the current filter. An empty string turns debug output off.
 * @param pattern - Comma-separated list of category patterns (e.g., "channel,discovery,-channel:events").
 */
export function initDebugFilter(pattern: string): void {

  const parts = pattern.split(",").map((p) => p.trim()).filter((p) => p.length > 0);

  if(parts.length === 0) {

    activeFilter = null;

    return;
  }

  const filter: DebugFilter = { exclude: [], include: [], wildcard: false };

  for(const part of parts) {

    if(part === "*") {

      filter.wildcard = true;
    } else if(part.startsWith("-")) {

      filter.exclude.push(part.substring(1));
    } else {

      filter.include.push(part);
    }
  }

  activeFilter = filter;
}

/**
 * Checks whether a specific debug category is enabled under the current filter.
 * @param category - The category to check (e.g., "channel:events").
 * @returns True if debug output should be produced for this category.
 */
export function isCategoryEnabled(category: string): boolean {

  if(!activeFilter) {

    return false;
  }

  // Excludes always win, even over wildcard.
  if(activeFilter.exclude.some((pattern) => covers(pattern, category))) {

    return false;
  }

  return activeFilter.wildcard || activeFilter.include.some((pattern) => covers(pattern, category));
}

/**
 * Fast-path check for whether any debug categories are configured.
 */
export function isAnyDebugEnabled(): boolean {

  return activeFilter !== null;
}

// Debug Category Registry.

/**
 * A known debug category with its description. Listed by --help.
 */
export interface DebugCategory {

  readonly category: string;
  readonly description: string;
}

export const DEBUG_CATEGORIES: readonly DebugCategory[] = [

  { category: "channel:commands", description: "Commands sent to the player page and their results." },
  { category: "channel:events", description: "Raw inbound player events before decoding." },
  { category: "channel:transport", description: "DevTools attach, page navigation, hook installation." },
  { category: "discovery", description: "Device list contents on each discovery attempt." },
  { category: "player:output", description: "Player process stdout and stderr." },
  { category: "retry", description: "Retry attempts and aborts." },
  { category: "timing:init", description: "Backend initialization waterfall: process, content, credential, device." },
  { category: "webapi", description: "Web API requests and response statuses." }
];

/**
 * Creates a lightweight elapsed-time closure using performance.now(). Call the returned function to get the elapsed milliseconds since creation.
 * @returns A closure that returns elapsed milliseconds as a number.
 */
export function startTimer(): () => number {

  const start = performance.now();

  return (): number => Math.round(performance.now() - start);
}
