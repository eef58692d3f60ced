import { parse, type HTMLElement } from "node-html-parser";
import { ESALEN_LOCATION } from "../../constants.js";
import type { EventRecord, Person } from "../../types.js";
import { absoluteUrl, collapseWhitespace } from "../../utils.js";

export interface EsalenParseContext {
  origin: string;
  person: Person;
}

const WORKSHOP_HREF_REGEX = /\/workshops\//;
// "May 1–3, 2025", "June 12-14 2026"
const DATE_RANGE_REGEX = /(\w+ \d+[–-]\d+,? \d{4})/;
const CONTAINER_TAGS = new Set(["div", "li", "article"]);

function findContainer(node: HTMLElement): HTMLElement | null {
  let current: HTMLElement | null = node.parentNode;
  while (current) {
    if (CONTAINER_TAGS.has((current.rawTagName ?? "").toLowerCase())) {
      return current;
    }
    current = current.parentNode;
  }
  return null;
}

function extractDate(link: HTMLElement): string {
  const container = findContainer(link);
  if (!container) {
    return "";
  }
  return DATE_RANGE_REGEX.exec(container.text)?.[1] ?? "";
}

/**
 * Extracts workshops from an Esalen faculty page.
 *
 * Every link into `/workshops/` is a candidate. Links whose text carries the
 * person's first name point back at the faculty profile and are skipped.
 */
export function parseEsalenFaculty(html: string, context: EsalenParseContext): EventRecord[] {
  const root = parse(html);
  const firstName = context.person.firstName.toLowerCase();
  const events: EventRecord[] = [];

  for (const link of root.querySelectorAll("a[href]")) {
    const href = link.getAttribute("href") ?? "";
    if (!WORKSHOP_HREF_REGEX.test(href)) {
      continue;
    }

    const title = collapseWhitespace(link.text);
    if (!title || title.toLowerCase().includes(firstName)) {
      continue;
    }

    events.push({
      title,
      date: extractDate(link),
      location: ESALEN_LOCATION,
      url: absoluteUrl(href, context.origin),
    });
  }

  return events;
}
