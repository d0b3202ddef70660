import { loadSettings } from "../../src/config/settings.js";
import type { EventSink, PipelineEvent } from "../../src/events/types.js";
import { createPipeline, type PipelineDeps } from "../../src/pipeline.js";
import { FakeEmbeddingBackend, FakeGenerationBackend } from "./fake_backends.js";

export class RecordingSink implements EventSink {
  readonly name = "recording";
  readonly events: PipelineEvent[] = [];

  handle(event: PipelineEvent): void {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}

/**
 * Full pipeline over fake backends: 40/10 character chunks, no boundary
 * detection, a single attempt per backend call.
 */
export function testPipeline(env: NodeJS.ProcessEnv = {}, deps: PipelineDeps = {}) {
  const embedding = new FakeEmbeddingBackend();
  const generation = new FakeGenerationBackend("30 days");
  const recorder = new RecordingSink();
  const settings = loadSettings({
    CHUNK_SIZE: "40",
    CHUNK_OVERLAP: "10",
    CHUNK_BOUNDARY: "none",
    RETRY_ATTEMPTS: "1",
    RETRY_BASE_DELAY_MS: "0",
    API_TOKEN: "test-secret",
    ...env,
  });
  const pipeline = createPipeline(settings, {
    backends: { embedding, generation },
    sinks: [recorder],
    ...deps,
  });
  return { pipeline, settings, embedding, generation, recorder };
}
