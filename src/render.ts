import type { EventRecord, RenderOptions } from "./types.js";
import { escapeHtml } from "./utils.js";

const DETAIL_SEPARATOR = " · ";

function renderPlaceholder(mailingListUrl: string): string {
  return `        <p style="color: var(--color-text-light);">No upcoming events scheduled. Check back soon or <a href="${escapeHtml(mailingListUrl)}" target="_blank" rel="noopener">join the mailing list</a> for updates.</p>`;
}

function renderEvent(event: EventRecord): string {
  const details = [event.date, event.location].filter(Boolean).map(escapeHtml).join(DETAIL_SEPARATOR);
  return [
    `          <div style="padding: 1rem 0; border-bottom: 1px solid var(--color-border);">`,
    `            <strong>${escapeHtml(event.title)}</strong><br>`,
    `            <span style="color: var(--color-text-light);">${details}</span><br>`,
    `            <a href="${escapeHtml(event.url)}" target="_blank" rel="noopener">Register →</a>`,
    `          </div>`,
  ].join("\n");
}

/** Renders the fragment placed between the page markers. */
export function renderEvents(events: readonly EventRecord[], options: RenderOptions): string {
  if (events.length === 0) {
    return renderPlaceholder(options.mailingListUrl);
  }
  return [`        <div class="services-list">`, ...events.map(renderEvent), `        </div>`].join("\n");
}
