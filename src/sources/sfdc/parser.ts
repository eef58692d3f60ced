import { parse, type HTMLElement } from "node-html-parser";
import { SFDC_LOCATION, SFDC_START_TIME } from "../../constants.js";
import type { EventRecord, Person } from "../../types.js";
import { absoluteUrl, collapseWhitespace } from "../../utils.js";
import { connectionSchema, gatsbyNodeSchema, pageDataSchema, type GatsbyNode } from "./schema.js";

export interface SfdcParseContext {
  origin: string;
  /** Used when a listing carries no link of its own */
  listingUrl: string;
  person: Person;
}

const EVENT_CLASS_REGEX = /event/;

function mentions(value: unknown, term: string): boolean {
  return (JSON.stringify(value) ?? "").toLowerCase().includes(term.toLowerCase());
}

function toEvent(node: GatsbyNode, context: SfdcParseContext): EventRecord {
  const title = node.title ?? node.name ?? "";
  const href = node.url ?? node.slug ?? "";
  const day = node.date ?? node.startDate ?? "";

  return {
    title: title || `Event with ${context.person.fullName}`,
    date: day ? `${day}, ${SFDC_START_TIME}` : "",
    location: SFDC_LOCATION,
    url: href ? absoluteUrl(href, context.origin) : context.listingUrl,
  };
}

/**
 * Reads events out of a Gatsby `page-data.json` payload.
 *
 * Every connection under `result.data` is scanned; nodes that mention the
 * person's last name anywhere become events.
 */
export function parseSfdcPageData(payload: unknown, context: SfdcParseContext): EventRecord[] {
  const { firstName, lastName } = context.person;
  if (!mentions(payload, lastName) && !mentions(payload, firstName)) {
    return [];
  }

  const { result } = pageDataSchema.parse(payload);
  const events: EventRecord[] = [];

  for (const value of Object.values(result.data)) {
    const connection = connectionSchema.safeParse(value);
    if (!connection.success) {
      continue;
    }
    for (const { node } of connection.data.edges) {
      if (!mentions(node, lastName)) {
        continue;
      }
      events.push(toEvent(gatsbyNodeSchema.parse(node), context));
    }
  }

  return events;
}

function hasEventClass(element: HTMLElement): boolean {
  const classAttribute = element.getAttribute("class") ?? "";
  return classAttribute.split(/\s+/).some((token) => EVENT_CLASS_REGEX.test(token));
}

/**
 * Scrapes the server-rendered listing page. Only reached when the JSON
 * endpoints produced nothing; dates are not recoverable from this markup.
 */
export function parseSfdcUpcomingEvents(html: string, context: SfdcParseContext): EventRecord[] {
  const root = parse(html);
  const lastName = context.person.lastName.toLowerCase();
  if (!root.text.toLowerCase().includes(lastName)) {
    return [];
  }

  const events: EventRecord[] = [];
  for (const element of root.querySelectorAll("article, div")) {
    if (!hasEventClass(element) || !element.text.toLowerCase().includes(lastName)) {
      continue;
    }

    const heading = element.querySelector("h2, h3, h4, a");
    const link = element.querySelector("a[href]");
    const href = link?.getAttribute("href");

    events.push({
      title: heading ? collapseWhitespace(heading.text) : "Event",
      date: "",
      location: SFDC_LOCATION,
      url: href === undefined ? context.listingUrl : absoluteUrl(href, context.origin),
    });
  }

  return events;
}
