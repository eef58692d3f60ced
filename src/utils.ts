export function collapseWhitespace(value: string): string {
    return value.replace(/\s+/g, " ").trim();
}

export function absoluteUrl(href: string, origin: string): string {
    return href.startsWith("http") ? href : `${origin}${href}`;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

const HTML_ESCAPES: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    '"': "&quot;",
};

export function escapeHtml(value: string): string {
    return value.replace(/[&<>"]/g, (char) => HTML_ESCAPES[char] ?? char);
}
