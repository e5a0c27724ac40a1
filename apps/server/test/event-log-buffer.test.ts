import { describe, expect, it } from "vitest";
import type { EventLogEntry } from "@arena/shared";
import { EventCategory } from "@arena/shared";
import { EventLogBuffer } from "../src/eventLog";

const entry = (serverTick: number): EventLogEntry => ({
  eventId: 0,
  category: EventCategory.Agent,
  eventType: 1,
  serverTick,
  serverTimeMs: serverTick * 50,
});

const ticksOf = (entries: EventLogEntry[] | undefined) => entries?.map((e) => e.serverTick);

describe("EventLogBuffer", () => {
  it("rejects a non-positive capacity", () => {
    expect(() => new EventLogBuffer(0)).toThrow("EventLogBuffer capacity must be a positive integer.");
  });

  it("stamps entries with increasing ids", () => {
    const buffer = new EventLogBuffer<EventLogEntry>(4);
    const first = entry(1);

    expect(buffer.append(first)).toBe(1);
    expect(buffer.append(entry(2))).toBe(2);
    expect(first.eventId).toBe(1);
    expect(buffer.oldestSeq).toBe(1);
    expect(buffer.latestSeq).toBe(2);
  });

  it("returns an empty range when nothing is new", () => {
    const buffer = new EventLogBuffer<EventLogEntry>(4);
    expect(buffer.getSince(0)).toEqual({ fromSeq: 1, toSeq: 0, entries: [] });

    buffer.append(entry(1));
    expect(buffer.getSince(1)).toEqual({ fromSeq: 2, toSeq: 1, entries: [] });
  });

  it("returns entries after the given id", () => {
    const buffer = new EventLogBuffer<EventLogEntry>(4);
    for (let tick = 1; tick <= 3; tick += 1) {
      buffer.append(entry(tick));
    }

    const range = buffer.getSince(1);
    expect(range?.fromSeq).toBe(2);
    expect(range?.toSeq).toBe(3);
    expect(ticksOf(range?.entries)).toEqual([2, 3]);
  });

  it("evicts the oldest entries once full", () => {
    const buffer = new EventLogBuffer<EventLogEntry>(3);
    for (let tick = 1; tick <= 5; tick += 1) {
      buffer.append(entry(tick));
    }

    expect(buffer.length).toBe(3);
    expect(buffer.oldestSeq).toBe(3);
    expect(buffer.getSince(1)).toBeUndefined();
    expect(ticksOf(buffer.getSince(2)?.entries)).toEqual([3, 4, 5]);
    expect(ticksOf(buffer.getSince(3)?.entries)).toEqual([4, 5]);
  });
});
