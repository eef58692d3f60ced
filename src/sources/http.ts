import type { SourceOptions } from "../types.js";

export class HttpStatusError extends Error {
    constructor(public url: string, public status: number) {
        super(`Request to ${url} failed with status ${status}`);
    }
}

export type FetchOptions = Pick<SourceOptions, "timeoutMs" | "userAgent">;

export async function fetchWithTimeout(url: string, options: FetchOptions, accept: string): Promise<Response> {
    return fetch(url, {
        headers: {
            "User-Agent": options.userAgent,
            Accept: accept,
        },
        signal: AbortSignal.timeout(options.timeoutMs),
    });
}

export async function fetchText(url: string, options: FetchOptions): Promise<string> {
    const response = await fetchWithTimeout(url, options, "text/html,application/xhtml+xml");
    if (!response.ok) {
        throw new HttpStatusError(url, response.status);
    }
    return response.text();
}
