import type { EventSource } from "../types.js";
import { esalenSource } from "./esalen/fetcher.js";
import { sfdcSource } from "./sfdc/fetcher.js";

export const DEFAULT_SOURCES: readonly EventSource[] = [esalenSource, sfdcSource];

export { esalenSource, sfdcSource };
