import { readFile, writeFile } from "node:fs/promises";
import type { PageConfig } from "./types.js";

type MarkerConfig = Pick<PageConfig, "startMarker" | "endMarker" | "indent">;

/**
 * Replaces the first start-marker..end-marker span with the fragment.
 * Returns null when the page has no such span.
 */
export function replaceMarkedRegion(content: string, config: MarkerConfig, fragment: string): string | null {
  const start = content.indexOf(config.startMarker);
  if (start === -1) {
    return null;
  }
  const end = content.indexOf(config.endMarker, start + config.startMarker.length);
  if (end === -1) {
    return null;
  }

  const region = `${config.startMarker}\n${fragment}\n${config.indent}${config.endMarker}`;
  return content.slice(0, start) + region + content.slice(end + config.endMarker.length);
}

/** Writes the fragment into the page. Resolves to true when the file was rewritten. */
export async function updatePage(config: PageConfig, fragment: string): Promise<boolean> {
  const content = await readFile(config.pagePath, "utf8");
  const updated = replaceMarkedRegion(content, config, fragment);

  if (updated === null) {
    console.warn(`Markers ${config.startMarker} / ${config.endMarker} not found in ${config.pagePath}`);
  }
  if (updated === null || updated === content) {
    console.log("No changes to events page.");
    return false;
  }

  await writeFile(config.pagePath, updated, "utf8");
  console.log("Events page updated with new events.");
  return true;
}
