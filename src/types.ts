/** Environment variables read at start-up. Every entry is optional. */
export interface Env {
  [name: string]: string | undefined;
  EVENTS_PAGE_PATH?: string;
  FETCH_TIMEOUT_MS?: string;
  USER_AGENT?: string;
  PERSON_NAME?: string;
  MAILING_LIST_URL?: string;
}

export interface EventRecord {
  /** Listing title as shown by the venue */
  title: string;
  /** Free text, possibly empty ("May 1–3, 2025", "2025-05-01, 7pm") */
  date: string;
  /** Fixed per source */
  location: string;
  /** Absolute link to the registration page */
  url: string;
}

export interface Person {
  /** As configured, middle names included */
  fullName: string;
  firstName: string;
  lastName: string;
}

export interface SourceOptions {
  timeoutMs: number;
  userAgent: string;
  person: Person;
}

export interface EventSource {
  name: string;
  fetchEvents(options: SourceOptions): Promise<EventRecord[]>;
}

export interface PageConfig {
  pagePath: string;
  startMarker: string;
  endMarker: string;
  /** Prepended to the end marker when the region is rewritten */
  indent: string;
}

export interface RenderOptions {
  mailingListUrl: string;
}

export interface UpdaterConfig {
  page: PageConfig;
  sources: SourceOptions;
  render: RenderOptions;
}
