import { Request, Response } from "express";
import type { Pipeline } from "../pipeline.js";

/** DELETE /documents/:documentId: drops the index and every cached answer. */
export const invalidateDocument =
  (pipeline: Pipeline) => (req: Request, res: Response) => {
    const { documentId } = req.params;
    const result = pipeline.orchestrator.invalidateDocument(documentId);
    req.log.info({ documentId, ...result }, "Document invalidated");
    return res.status(200).json({ documentId, ...result });
  };
