import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { EventSink, SimEvent } from "../shared/types.js";

/**
 * Append-only event log: one JSON object per line, each tagged with the
 * run's start time. A failed write disables the sink with a single warning.
 */
export class JsonlFileSink implements EventSink {
  private ready = false;
  private failed = false;

  constructor(
    readonly path: string,
    readonly runStamp: string = new Date().toISOString(),
  ) {}

  get disabled(): boolean {
    return this.failed;
  }

  record(event: SimEvent): void {
    if (this.failed) return;
    try {
      if (!this.ready) {
        mkdirSync(dirname(this.path), { recursive: true });
        this.ready = true;
      }
      appendFileSync(this.path, JSON.stringify({ run: this.runStamp, ...event }) + "\n", "utf-8");
    } catch (err) {
      this.failed = true;
      console.warn(`[eventLog] Could not write "${this.path}", event log disabled:`, err);
    }
  }
}
