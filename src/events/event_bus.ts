import type { Logger } from "pino";
import { moduleLogger } from "../utils/logger.js";
import type { EventInput, EventSink, PipelineEvent } from "./types.js";

/**
 * Fans events out to every sink. Emitting never throws and never waits:
 * sink failures are logged here and the pipeline carries on.
 */
export class EventBus {
  private readonly sinks: EventSink[] = [];
  private readonly pending = new Set<Promise<void>>();

  constructor(
    sinks: EventSink[] = [],
    private readonly log: Logger = moduleLogger("event_bus")
  ) {
    this.sinks.push(...sinks);
  }

  emit(input: EventInput): void {
    const event: PipelineEvent = { ...input, at: input.at ?? new Date() };

    for (const sink of this.sinks) {
      try {
        const result = sink.handle(event);
        if (result) this.track(sink, event, result);
      } catch (err) {
        this.log.warn({ err, sink: sink.name, eventType: event.type }, "Event sink failed");
      }
    }
  }

  /** Resolves once all in-flight sink writes have settled. */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.pending]);
    await Promise.allSettled(this.sinks.map((sink) => sink.flush?.() ?? Promise.resolve()));
  }

  private track(sink: EventSink, event: PipelineEvent, result: Promise<void>): void {
    const settled = result.then(
      () => undefined,
      (err: unknown) => {
        this.log.warn({ err, sink: sink.name, eventType: event.type }, "Event sink failed");
      }
    );
    this.pending.add(settled);
    void settled.finally(() => this.pending.delete(settled));
  }
}
