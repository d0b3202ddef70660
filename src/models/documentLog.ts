import mongoose, { Schema } from "mongoose";

export interface IDocumentLog {
  documentId: string;
  source?: string;
  status: "success" | "error";
  chunkCount?: number;
  processingTimeMs: number;
  errorMessage?: string;
  configFingerprint: string;
  requestId?: string;
  createdAt: Date;
}

const documentLogSchema = new Schema<IDocumentLog>(
  {
    documentId: { type: String, required: true, index: true },
    source: { type: String, required: false },
    status: {
      type: String,
      required: true,
      enum: ["success", "error"],
    },
    chunkCount: { type: Number, required: false },
    processingTimeMs: { type: Number, required: true },
    errorMessage: { type: String, required: false },
    configFingerprint: { type: String, required: true },
    requestId: { type: String, required: false },
    createdAt: {
      type: Date,
      default: Date.now,
    },
  },
  {
    collection: "document_processing_logs",
  }
);

export default mongoose.model<IDocumentLog>("DocumentLog", documentLogSchema);
