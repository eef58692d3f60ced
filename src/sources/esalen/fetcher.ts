import { ESALEN_ORIGIN } from "../../constants.js";
import type { EventRecord, EventSource, Person, SourceOptions } from "../../types.js";
import { errorMessage } from "../../utils.js";
import { fetchText } from "../http.js";
import { parseEsalenFaculty } from "./parser.js";

// "Dan Zigmond" -> https://www.esalen.org/faculty/dan-zigmond
export function esalenFacultyUrl(person: Person): string {
    const slug = person.fullName.toLowerCase().split(/\s+/).filter(Boolean).join("-");
    return `${ESALEN_ORIGIN}/faculty/${encodeURIComponent(slug)}`;
}

export async function fetchEsalenEvents(options: SourceOptions): Promise<EventRecord[]> {
    try {
        const html = await fetchText(esalenFacultyUrl(options.person), options);
        return parseEsalenFaculty(html, { origin: ESALEN_ORIGIN, person: options.person });
    } catch (error) {
        console.error(`Error fetching Esalen events: ${errorMessage(error)}`);
        return [];
    }
}

export const esalenSource: EventSource = {
    name: "Esalen",
    fetchEvents: fetchEsalenEvents,
};
