import type { ArenaEvent } from "@arena/shared";
import { EVENT_LOG_BUFFER_SIZE } from "./constants";
import { EventLogBuffer, type EventLogRange } from "./event-log-buffer";

/**
 * Ordered log of arena events for scoring, audio and effects collaborators.
 */
export class EventLog {
  private readonly buffer: EventLogBuffer<ArenaEvent>;

  constructor(bufferSize: number = EVENT_LOG_BUFFER_SIZE) {
    this.buffer = new EventLogBuffer<ArenaEvent>(bufferSize);
  }

  append(entry: ArenaEvent): number {
    return this.buffer.append(entry);
  }

  getSince(afterSeq: number): EventLogRange<ArenaEvent> | undefined {
    return this.buffer.getSince(afterSeq);
  }

  getBuffer(): EventLogBuffer<ArenaEvent> {
    return this.buffer;
  }
}
