import { collectEvents } from "./aggregate.js";
import { updatePage } from "./page.js";
import { renderEvents } from "./render.js";
import { DEFAULT_SOURCES } from "./sources/index.js";
import type { EventRecord, EventSource, UpdaterConfig } from "./types.js";

export interface UpdateResult {
  events: EventRecord[];
  changed: boolean;
}

export async function runUpdate(
  config: UpdaterConfig,
  sources: readonly EventSource[] = DEFAULT_SOURCES,
): Promise<UpdateResult> {
  console.log("Fetching events...");
  const events = await collectEvents(sources, config.sources);

  console.log(`\nTotal events found: ${events.length}`);
  for (const event of events) {
    console.log(`  - ${event.title}`);
  }

  const changed = await updatePage(config.page, renderEvents(events, config.render));

  console.log("\nDone! Don't forget to commit and push changes.");
  return { events, changed };
}

export { collectEvents } from "./aggregate.js";
export { ConfigError, loadConfig } from "./config.js";
export { replaceMarkedRegion, updatePage } from "./page.js";
export { renderEvents } from "./render.js";
export { DEFAULT_SOURCES, esalenSource, sfdcSource } from "./sources/index.js";
export type {
  Env,
  EventRecord,
  EventSource,
  PageConfig,
  Person,
  RenderOptions,
  SourceOptions,
  UpdaterConfig,
} from "./types.js";
