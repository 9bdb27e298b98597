import { Marked } from "marked";
import { escapeHtml } from "@/lib/html";

const ALLOWED_SCHEMES = new Set(["http:", "https:", "mailto:"]);

/** Relative links, or absolute ones on http, https or mailto. */
export function isSafeHref(href: string): boolean {
  // browsers ignore whitespace and control characters inside a scheme
  const compact = href.replace(/[\u0000- \u007f]/g, "").toLowerCase();
  const scheme = compact.match(/^[a-z][a-z0-9+.-]*:/);
  return !scheme || ALLOWED_SCHEMES.has(scheme[0]);
}

const chatMarked = new Marked({
  async: false,
  breaks: true,
  gfm: true,
  renderer: {
    // false keeps marked's own rendering; unsafe links become plain text
    link(href: string, _title: string | null | undefined, text: string) {
      return isSafeHref(href) ? false : text;
    },
    image(href: string, _title: string | null, text: string) {
      return isSafeHref(href) ? false : text;
    },
  },
});

/**
 * Markdown to HTML for chat bubbles. Raw HTML in the text is escaped first, so
 * only markdown formatting reaches the page. Links keep only safe targets.
 */
export function renderMessageHtml(text: string): string {
  const html = chatMarked.parse(escapeHtml(text));
  return typeof html === "string" ? html : escapeHtml(text);
}
