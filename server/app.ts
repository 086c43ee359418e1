import express, { type Express, type Response } from "express";
import { z } from "zod";
import type { DatasetInfo } from "../src/types";
import { AqiDataError, InvalidCategoryError } from "../src/lib/errors";
import { AQI_CATEGORIES, classifyByCategory } from "../src/lib/categories";
import { buildView, isViewId, listViews } from "../src/lib/views";
import { CATEGORY_NAMES, VIEW_IDS } from "../src/types";
import type { DatasetCache } from "./cache";

/**
 * Map a failure to a JSON response. Bad category names are the caller's
 * mistake (400); load failures keep their message so the offending year and
 * file reach the client.
 */
function sendError(res: Response, route: string, err: unknown, fallback: string) {
  if (err instanceof InvalidCategoryError) {
    return res.status(400).json({ error: err.message, validCategories: err.validCategories });
  }
  console.error(`${route} error:`, err);
  const message = err instanceof AqiDataError ? err.message : fallback;
  return res.status(500).json({ error: message });
}

// Repeated (`?category=a&category=b`) or nested parameters fail the schema.
const ViewQuery = z.object({ category: z.string().optional() });

export function createApp(cache: DatasetCache): Express {
  const app = express();
  app.use(express.json());

  /** GET /api/dataset — Year range, locations and observation count. */
  app.get("/api/dataset", (_req, res) => {
    try {
      const dataset = cache.get();
      const info: DatasetInfo = {
        years: dataset.years,
        locations: [...dataset.locations],
        count: dataset.observations.length,
      };
      res.json(info);
    } catch (err) {
      sendError(res, "GET /api/dataset", err, "Failed to load dataset");
    }
  });

  /** GET /api/observations — The canonical date-sorted observations. */
  app.get("/api/observations", (_req, res) => {
    try {
      res.json(cache.get().observations);
    } catch (err) {
      sendError(res, "GET /api/observations", err, "Failed to load observations");
    }
  });

  /** GET /api/categories — The fixed AQI bands. */
  app.get("/api/categories", (_req, res) => {
    res.json(AQI_CATEGORIES);
  });

  /** GET /api/categories/:name — Observations in one band plus per-location, per-year counts. */
  app.get("/api/categories/:name", (req, res) => {
    try {
      res.json(classifyByCategory(cache.get(), req.params.name));
    } catch (err) {
      sendError(res, `GET /api/categories/${req.params.name}`, err, "Failed to classify observations");
    }
  });

  /** GET /api/views — Navigation entries for every chart view. */
  app.get("/api/views", (_req, res) => {
    res.json(listViews());
  });

  /** GET /api/views/:viewId — Chart specification for one view; `?category=` feeds the category view. */
  app.get("/api/views/:viewId", (req, res) => {
    const { viewId } = req.params;
    if (!isViewId(viewId)) {
      return res.status(404).json({ error: `Unknown view "${viewId}"`, validViews: VIEW_IDS });
    }
    try {
      const query = ViewQuery.safeParse(req.query);
      if (!query.success) throw new InvalidCategoryError(String(req.query.category), CATEGORY_NAMES);
      res.json(buildView(viewId, cache.get(), { category: query.data.category }));
    } catch (err) {
      sendError(res, `GET /api/views/${viewId}`, err, "Failed to build view");
    }
  });

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  return app;
}
