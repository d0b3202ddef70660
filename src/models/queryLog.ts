import mongoose, { Schema } from "mongoose";

export interface IQueryLog {
  documentId: string;
  question: string;
  answer?: string;
  status: "answered" | "error";
  errorCode?: string;
  processingTimeMs?: number;
  // top similarity scores of the chunks that grounded the answer
  similarityScores: number[];
  truncated?: boolean;
  requestId?: string;
  createdAt: Date;
}

const queryLogSchema = new Schema<IQueryLog>(
  {
    documentId: { type: String, required: true, index: true },
    question: { type: String, required: true },
    answer: { type: String, required: false },
    status: {
      type: String,
      required: true,
      enum: ["answered", "error"],
    },
    errorCode: { type: String, required: false },
    processingTimeMs: { type: Number, required: false },
    similarityScores: {
      type: [Number],
      default: [],
    },
    truncated: { type: Boolean, required: false },
    requestId: { type: String, required: false },
    createdAt: {
      type: Date,
      default: Date.now,
    },
  },
  {
    collection: "query_logs",
  }
);

export default mongoose.model<IQueryLog>("QueryLog", queryLogSchema);
