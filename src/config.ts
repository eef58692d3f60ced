import { resolve } from "node:path";
import {
    DEFAULT_INDENT,
    DEFAULT_MAILING_LIST_URL,
    DEFAULT_PAGE_PATH,
    DEFAULT_PERSON_NAME,
    DEFAULT_TIMEOUT_MS,
    DEFAULT_USER_AGENT,
    EVENTS_END_MARKER,
    EVENTS_START_MARKER,
} from "./constants.js";
import type { Env, Person, UpdaterConfig } from "./types.js";

export class ConfigError extends Error {
    constructor(message: string, public variable: string) {
        super(`Configuration error: ${message}`);
    }
}

// Largest delay timers accept.
const MAX_TIMEOUT_MS = 2_147_483_647;

function parseTimeout(value: string | undefined): number {
    if (!value) {
        return DEFAULT_TIMEOUT_MS;
    }
    if (!/^\d+$/.test(value.trim())) {
        throw new ConfigError(`FETCH_TIMEOUT_MS must be a positive integer, got "${value}"`, "FETCH_TIMEOUT_MS");
    }
    const parsed = Number.parseInt(value, 10);
    if (parsed <= 0 || parsed > MAX_TIMEOUT_MS) {
        throw new ConfigError(`FETCH_TIMEOUT_MS must be between 1 and ${MAX_TIMEOUT_MS}, got "${value}"`, "FETCH_TIMEOUT_MS");
    }
    return parsed;
}

function parsePerson(value: string | undefined): Person {
    const parts = (value?.trim() || DEFAULT_PERSON_NAME).split(/\s+/);
    if (parts.length < 2) {
        throw new ConfigError(`PERSON_NAME needs a first and a last name, got "${value}"`, "PERSON_NAME");
    }
    return {
        fullName: parts.join(" "),
        firstName: parts[0],
        lastName: parts[parts.length - 1],
    };
}

export function loadConfig(env: Env, cwd: string = process.cwd()): UpdaterConfig {
    return {
        page: {
            pagePath: resolve(cwd, env.EVENTS_PAGE_PATH?.trim() || DEFAULT_PAGE_PATH),
            startMarker: EVENTS_START_MARKER,
            endMarker: EVENTS_END_MARKER,
            indent: DEFAULT_INDENT,
        },
        sources: {
            timeoutMs: parseTimeout(env.FETCH_TIMEOUT_MS),
            userAgent: env.USER_AGENT?.trim() || DEFAULT_USER_AGENT,
            person: parsePerson(env.PERSON_NAME),
        },
        render: {
            mailingListUrl: env.MAILING_LIST_URL?.trim() || DEFAULT_MAILING_LIST_URL,
        },
    };
}
