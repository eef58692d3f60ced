export const DEFAULT_PAGE_PATH = "teaching.html";
export const EVENTS_START_MARKER = "<!-- EVENTS_START -->";
export const EVENTS_END_MARKER = "<!-- EVENTS_END -->";
export const DEFAULT_INDENT = "        ";

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = "events-page-updater/1.0";
export const DEFAULT_PERSON_NAME = "Dan Zigmond";
export const DEFAULT_MAILING_LIST_URL = "http://eepurl.com/gOSn91";

export const ESALEN_ORIGIN = "https://www.esalen.org";
export const ESALEN_LOCATION = "Esalen Institute, Big Sur";

export const SFDC_ORIGIN = "https://sfdharmacollective.org";
export const SFDC_UPCOMING_URL = `${SFDC_ORIGIN}/upcoming-events`;
export const SFDC_PAGE_DATA_URLS = [
  `${SFDC_ORIGIN}/page-data/upcoming-events/page-data.json`,
  `${SFDC_ORIGIN}/page-data/events/page-data.json`,
] as const;
export const SFDC_LOCATION = "SF Dharma Collective, San Francisco · Hybrid (in-person and online)";
// Sessions always start at 7pm; the listings only carry the day.
export const SFDC_START_TIME = "7pm";
