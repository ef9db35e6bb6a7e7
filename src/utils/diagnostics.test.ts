/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * diagnostics.test.ts: Tests for the diagnostic log collector.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { clearDiagnostics, formattedDiagnostics, getDiagnostics, startDiagnosticCapture, stopDiagnosticCapture } from "./diagnostics.js";
import { LOG } from "./logger.js";

describe("diagnostic collector", () => {

  beforeEach(() => {

    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 0, 2, 3, 4, 5, 67));

    clearDiagnostics();
    startDiagnosticCapture();
  });

  afterEach(() => {

    stopDiagnosticCapture();
    clearDiagnostics();
    vi.useRealTimers();
  });

  it("reports that nothing was collected", () => {

    expect(formattedDiagnostics()).toBe("No logs available");
  });

  it("keeps component-tagged entries and formats them with time and component", () => {

    LOG.withComponent("Supervisor").info("Launching helper %s.", "Player");
    LOG.withComponent("Discovery").warn("Attempt %d found nothing.", 2);

    expect(formattedDiagnostics()).toBe([

      "[03:04:05.067] [Supervisor] Launching helper Player.",
      "[03:04:05.067] [Discovery] Attempt 2 found nothing."
    ].join("\n"));
  });

  it("ignores entries without a component", () => {

    LOG.info("Server listening.");

    expect(getDiagnostics()).toEqual([]);
  });

  it("keeps only the most recent 500 entries", () => {

    const log = LOG.withComponent("Channel");

    for(let i = 0; i < 505; i++) {

      log.info("Line %d.", i);
    }

    const entries = getDiagnostics();

    expect(entries).toHaveLength(500);
    expect(entries[0].message).toBe("Line 5.");
    expect(entries[499].message).toBe("Line 504.");
  });

  it("clears collected entries", () => {

    LOG.withComponent("Factory").info("Created backend.");
    clearDiagnostics();

    expect(formattedDiagnostics()).toBe("No logs available");
  });

  it("stops collecting once capture is stopped", () => {

    stopDiagnosticCapture();
    LOG.withComponent("Factory").info("Created backend.");

    expect(getDiagnostics()).toEqual([]);
  });
});
