import { JSDOM } from "jsdom";

/** All `<table>` elements of an HTML document, in document order. */
export function parseTables(html: string): HTMLTableElement[] {
  const dom = new JSDOM(html);
  return Array.from(dom.window.document.querySelectorAll("table"));
}

/** Absolute http(s) links inside an element, in document order. */
export function httpLinks(element: Element): string[] {
  return Array.from(element.querySelectorAll("a[href]"))
    .map((a) => a.getAttribute("href")?.trim() ?? "")
    .filter((href) => href.startsWith("http://") || href.startsWith("https://"));
}

/** Text content with whitespace collapsed. */
export function textOf(element: Element | null): string {
  return (element?.textContent ?? "").replace(/\s+/g, " ").trim();
}
