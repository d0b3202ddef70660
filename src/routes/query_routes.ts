import { Router } from "express";
import type { Pipeline } from "../pipeline.js";
import { getStats, runQuery } from "../controllers/query_controllers.js";
import { verifyToken } from "../utils/token_manager.js";
import { queryRunValidator, validate } from "../utils/validators.js";

export default function queryRoutes(pipeline: Pipeline, apiToken: string | undefined): Router {
  const routes = Router();
  const auth = verifyToken(apiToken);

  // answer a batch of questions against one document
  routes.post("/hackrx/run", auth, validate(queryRunValidator), runQuery(pipeline));

  routes.get("/stats", auth, getStats(pipeline));

  return routes;
}
