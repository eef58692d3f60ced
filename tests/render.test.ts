import { describe, expect, it } from "vitest";

import { renderEvents } from "../src/render.js";
import type { EventRecord } from "../src/types.js";

const options = { mailingListUrl: "http://eepurl.com/gOSn91" };

const retreat: EventRecord = {
  title: "Retreat",
  date: "May 1, 2025",
  location: "Esalen Institute, Big Sur",
  url: "https://example.org/r",
};

describe("renderEvents", () => {
  it("renders the placeholder when there are no events", () => {
    expect(renderEvents([], options)).toBe(
      '        <p style="color: var(--color-text-light);">No upcoming events scheduled. Check back soon or <a href="http://eepurl.com/gOSn91" target="_blank" rel="noopener">join the mailing list</a> for updates.</p>',
    );
  });

  it("renders one block per event", () => {
    expect(renderEvents([retreat], options)).toBe(
      [
        '        <div class="services-list">',
        '          <div style="padding: 1rem 0; border-bottom: 1px solid var(--color-border);">',
        "            <strong>Retreat</strong><br>",
        '            <span style="color: var(--color-text-light);">May 1, 2025 · Esalen Institute, Big Sur</span><br>',
        '            <a href="https://example.org/r" target="_blank" rel="noopener">Register →</a>',
        "          </div>",
        "        </div>",
      ].join("\n"),
    );
  });

  it("keeps input order", () => {
    const html = renderEvents([{ ...retreat, title: "Second" }, { ...retreat, title: "First" }], options);

    expect(html.indexOf("<strong>Second</strong>")).toBeLessThan(html.indexOf("<strong>First</strong>"));
    expect(html.match(/<strong>/g)).toHaveLength(2);
  });

  it("joins only the parts that are present", () => {
    const html = renderEvents([{ ...retreat, date: "" }], options);

    expect(html).toContain('<span style="color: var(--color-text-light);">Esalen Institute, Big Sur</span>');
  });

  it("renders an empty detail line when date and location are both missing", () => {
    const html = renderEvents([{ ...retreat, date: "", location: "" }], options);

    expect(html).toContain('<span style="color: var(--color-text-light);"></span>');
  });

  it("escapes markup in scraped text", () => {
    const html = renderEvents([{ ...retreat, title: "Q&A <live>", url: 'https://example.org/?a="b"' }], options);

    expect(html).toContain("<strong>Q&amp;A &lt;live&gt;</strong>");
    expect(html).toContain('<a href="https://example.org/?a=&quot;b&quot;" target="_blank"');
  });
});
