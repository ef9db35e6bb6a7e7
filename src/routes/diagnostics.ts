/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * diagnostics.ts: Player diagnostic log routes for Slideshow Player.
 */
import type { Express, Request, Response } from "express";
import { clearDiagnostics, formattedDiagnostics, getDiagnostics } from "../utils/index.js";

/**
 * Creates the diagnostics endpoints. GET returns the collected lifecycle log as plain text, or as JSON entries with ?format=json. DELETE discards it.
 * @param app - The Express application.
 */
export function setupDiagnosticsEndpoint(app: Express): void {

  app.get("/diagnostics", (req: Request, res: Response): void => {

    if(req.query.format === "json") {

      res.json({

        entries: getDiagnostics().map((entry) => ({ ...entry, timestamp: entry.timestamp.toISOString() }))
      });

      return;
    }

    res.type("text/plain").send(formattedDiagnostics());
  });

  app.delete("/diagnostics", (_req: Request, res: Response): void => {

    clearDiagnostics();

    res.status(204).end();
  });
}
