import { SFDC_ORIGIN, SFDC_PAGE_DATA_URLS, SFDC_UPCOMING_URL } from "../../constants.js";
import type { EventRecord, EventSource, SourceOptions } from "../../types.js";
import { errorMessage } from "../../utils.js";
import { fetchText, fetchWithTimeout } from "../http.js";
import { parseSfdcPageData, parseSfdcUpcomingEvents, type SfdcParseContext } from "./parser.js";

async function fetchPageDataEvents(url: string, options: SourceOptions, context: SfdcParseContext): Promise<EventRecord[]> {
    try {
        const response = await fetchWithTimeout(url, options, "application/json");
        if (response.status !== 200) {
            return [];
        }
        const payload: unknown = await response.json();
        return parseSfdcPageData(payload, context);
    } catch (error) {
        console.error(`  Could not fetch ${url}: ${errorMessage(error)}`);
        return [];
    }
}

/**
 * The site is a Gatsby app that renders its listings client-side, so the
 * `page-data.json` endpoints are tried first. The HTML page is only scraped
 * when none of them yields an event.
 */
export async function fetchSfdcEvents(options: SourceOptions): Promise<EventRecord[]> {
    const context: SfdcParseContext = {
        origin: SFDC_ORIGIN,
        listingUrl: SFDC_UPCOMING_URL,
        person: options.person,
    };

    try {
        const events: EventRecord[] = [];
        for (const url of SFDC_PAGE_DATA_URLS) {
            events.push(...(await fetchPageDataEvents(url, options, context)));
        }
        if (events.length > 0) {
            return events;
        }

        const html = await fetchText(SFDC_UPCOMING_URL, options);
        return parseSfdcUpcomingEvents(html, context);
    } catch (error) {
        console.error(`Error fetching SF Dharma Collective events: ${errorMessage(error)}`);
        return [];
    }
}

export const sfdcSource: EventSource = {
    name: "SF Dharma Collective",
    fetchEvents: fetchSfdcEvents,
};
