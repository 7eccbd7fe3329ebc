/**
 * Event emission. Sinks observe the run; nothing they do reaches the engine.
 */
import type { EventSink, SimEvent } from "../shared/types.js";

/** In-memory ordered list of everything recorded, for post-run checks. */
export class EventCollector implements EventSink {
  readonly events: SimEvent[] = [];

  record(event: SimEvent): void {
    this.events.push(event);
  }
}

/** Fans one event out to several sinks. */
export class MultiSink implements EventSink {
  constructor(private readonly sinks: EventSink[]) {}

  record(event: SimEvent): void {
    for (const sink of this.sinks) {
      emit(sink, event);
    }
  }
}

const reportedSinks = new WeakSet<EventSink>();

/**
 * Hand an event to a sink. A missing sink is a no-op; a throwing sink is
 * reported once and otherwise ignored.
 */
export function emit(sink: EventSink | undefined, event: SimEvent): void {
  if (!sink) return;
  try {
    sink.record(event);
  } catch (err) {
    if (!reportedSinks.has(sink)) {
      reportedSinks.add(sink);
      console.warn(`[events] Sink failed on "${event.kind}" at tick ${event.tick}; further failures suppressed:`, err);
    }
  }
}
