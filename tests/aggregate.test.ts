import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { collectEvents } from "../src/aggregate.js";
import type { EventRecord, EventSource, SourceOptions } from "../src/types.js";

const options: SourceOptions = {
  timeoutMs: 1000,
  userAgent: "test/0.1",
  person: { fullName: "Dan Zigmond", firstName: "Dan", lastName: "Zigmond" },
};

function event(title: string): EventRecord {
  return { title, date: "", location: "Somewhere", url: `https://example.org/${title}` };
}

function source(name: string, events: EventRecord[]): EventSource {
  return { name, fetchEvents: vi.fn(async () => events) };
}

describe("collectEvents", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("concatenates sources in order without deduplicating", async () => {
    const first = source("First", [event("a"), event("b")]);
    const second = source("Second", [event("a")]);

    const events = await collectEvents([first, second], options);

    expect(events.map((e) => e.title)).toEqual(["a", "b", "a"]);
    expect(first.fetchEvents).toHaveBeenCalledWith(options);
    expect(console.log).toHaveBeenNthCalledWith(1, "  First: 2 events");
    expect(console.log).toHaveBeenNthCalledWith(2, "  Second: 1 events");
  });

  it("returns an empty list when every source is empty", async () => {
    await expect(collectEvents([source("Empty", [])], options)).resolves.toEqual([]);
  });
});
