import type { EventRecord, EventSource, SourceOptions } from "./types.js";

/**
 * Runs each source in turn and concatenates the results in source order.
 * Duplicates are kept; nothing is sorted.
 */
export async function collectEvents(sources: readonly EventSource[], options: SourceOptions): Promise<EventRecord[]> {
  const all: EventRecord[] = [];
  for (const source of sources) {
    const events = await source.fetchEvents(options);
    console.log(`  ${source.name}: ${events.length} events`);
    all.push(...events);
  }
  return all;
}
