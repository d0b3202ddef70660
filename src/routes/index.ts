import { Router } from "express";
import type { Pipeline } from "../pipeline.js";
import documentRoutes from "./document_routes.js";
import queryRoutes from "./query_routes.js";

export const SERVICE_VERSION = "1.0.0";

export default function appRouter(pipeline: Pipeline, apiToken: string | undefined): Router {
  const router = Router();

  router.get("/health", (_req, res) => res.status(200).json({ status: "healthy", version: SERVICE_VERSION }));
  router.use("/", queryRoutes(pipeline, apiToken));
  router.use("/documents", documentRoutes(pipeline, apiToken));

  return router;
}
