import axios, { type AxiosInstance, isAxiosError, isCancel } from "axios";
import { DocumentIngestionFailedError, TimeoutError } from "../utils/errors.js";
import { sha256 } from "../utils/hash.js";

/** Extracted plain text plus a stable identity. */
export interface SourceDocument {
  documentId: string;
  text: string;
  source?: string;
  etag?: string;
}

export interface DocumentLoader {
  load(url: string, signal?: AbortSignal): Promise<SourceDocument>;
}

export interface DocumentSourceOptions {
  maxBytes: number;
  timeoutMs: number;
  http?: AxiosInstance;
}

// format extraction happens upstream; these can't be read as text
const BINARY_TYPES = [
  "application/pdf",
  "application/msword",
  "application/vnd.openxmlformats",
  "application/zip",
  "image/",
  "audio/",
  "video/",
];

export const documentFromText = (text: string, source?: string): SourceDocument => ({
  documentId: sha256(text),
  text,
  source,
});

/**
 * Downloads a text document over HTTP(S). Identity is the SHA-256 of the
 * body, so a changed document gets a fresh index and fresh cache keys.
 */
export class DocumentSource implements DocumentLoader {
  private readonly http: AxiosInstance;
  private readonly maxBytes: number;

  constructor(options: DocumentSourceOptions) {
    this.maxBytes = options.maxBytes;
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs });
  }

  async load(url: string, signal?: AbortSignal): Promise<SourceDocument> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (err) {
      throw new DocumentIngestionFailedError(`Invalid document URL: ${url}`, err);
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new DocumentIngestionFailedError(`Unsupported document URL scheme: ${parsed.protocol}`);
    }

    try {
      const res = await this.http.get<string>(url, {
        responseType: "text",
        transformResponse: (body: unknown) => body,
        maxContentLength: this.maxBytes,
        signal,
      });

      const contentType = String(res.headers["content-type"] ?? "").toLowerCase();
      if (BINARY_TYPES.some((type) => contentType.startsWith(type))) {
        throw new DocumentIngestionFailedError(
          `Unsupported document format (${contentType}); provide extracted text`
        );
      }
      if (typeof res.data !== "string") {
        throw new DocumentIngestionFailedError("Document body is not text");
      }

      const etag = res.headers["etag"];
      return {
        ...documentFromText(res.data, url),
        etag: typeof etag === "string" ? etag : undefined,
      };
    } catch (err) {
      if (err instanceof DocumentIngestionFailedError) throw err;
      if (isCancel(err)) throw new TimeoutError("Document download aborted", err);
      if (isAxiosError(err) && err.response) {
        throw new DocumentIngestionFailedError(
          `Document download failed with HTTP ${err.response.status}`,
          err
        );
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new DocumentIngestionFailedError(`Document download failed: ${reason}`, err);
    }
  }
}
