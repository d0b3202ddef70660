import { Router } from "express";
import type { Pipeline } from "../pipeline.js";
import { invalidateDocument } from "../controllers/document_controllers.js";
import { verifyToken } from "../utils/token_manager.js";
import { documentIdValidator, validate } from "../utils/validators.js";

export default function documentRoutes(pipeline: Pipeline, apiToken: string | undefined): Router {
  const routes = Router();

  routes.delete("/:documentId", verifyToken(apiToken), validate(documentIdValidator), invalidateDocument(pipeline));

  return routes;
}
