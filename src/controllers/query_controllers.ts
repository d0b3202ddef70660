import { NextFunction, Request, Response } from "express";
import type { Pipeline } from "../pipeline.js";

interface RunQueryBody {
  documents: string;
  questions: string[];
}

/* ────────────────────────────────────  POST /hackrx/run  ───── */
export const runQuery =
  (pipeline: Pipeline) =>
  async (req: Request, res: Response, next: NextFunction) => {
    // shape already checked by queryRunValidator
    const { documents, questions }: RunQueryBody = req.body;
    const requestId = String(req.id);

    try {
      req.log.info({ documents, questionCount: questions.length }, "Answering questions");
      const report = await pipeline.orchestrator.run(documents, questions, { requestId });

      const failed = report.outcomes.filter((outcome) => outcome.status === "failed").length;
      req.log.info({ documentId: report.documentId, failed, latencyMs: report.latencyMs }, "Questions answered");

      return res.status(200).json({ answers: report.outcomes.map((outcome) => outcome.answer) });
    } catch (error) {
      return next(error);
    }
  };

/* ────────────────────────────────────  GET /stats  ─────────── */
export const getStats = (pipeline: Pipeline) => (_req: Request, res: Response) =>
  res.status(200).json({
    ...pipeline.performance.report(),
    indexedDocuments: pipeline.store.size,
    cachedAnswers: pipeline.cache.size,
  });
