export interface EventLogEntry {
  eventId: number;
  category: EventCategory;
  eventType: number;
  serverTick: number;
  serverTimeMs: number;
  contextId?: string;
  actorId?: string;
}

export enum EventCategory {
  Agent = 1,
  Navigation = 2,
  Level = 3,
}

/**
 * A contiguous slice of the arena event log, handed to collaborators that poll
 * for new events (scoring, audio, effects).
 */
export interface EventLogBatch<T extends EventLogEntry = EventLogEntry> {
  fromEventId: number;
  toEventId: number;
  serverTick: number;
  events: T[];
}
