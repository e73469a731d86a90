import { JSDOM } from 'jsdom';

/** Line and column origin for diagnostics and traceability. */
export interface HtmlLocation {
  line: number;
  column: number;
}

/** Minimal immutable element shape consumed by table extraction. */
export interface HtmlNode {
  name: string;
  attributes: Record<string, string>;
  children: HtmlNode[];
  /** Whitespace-collapsed text content of the element and its descendants. */
  text: string;
  location?: HtmlLocation;
  path: string;
}

/** Parse failure wrapper that keeps source coordinates when available. */
export class HtmlParseError extends Error {
  readonly source?: HtmlLocation;

  constructor(message: string, source?: HtmlLocation) {
    super(message);
    this.name = 'HtmlParseError';
    this.source = source;
  }
}

/**
 * Parse report markup into a lightweight element tree with locations and stable XPath-like paths.
 * HTML parsing itself is forgiving; only an empty document is rejected.
 */
export function parseHtmlToAst(html: string): HtmlNode {
  if (html.trim().length === 0) {
    throw new HtmlParseError('No HTML content found');
  }

  const dom = new JSDOM(html, { includeNodeLocations: true });
  try {
    const root = dom.window.document.documentElement;
    return convertElement(root, undefined, dom, new Map<string, number>());
  } finally {
    dom.window.close();
  }
}

/** Convert one DOM element (and its element descendants) into an immutable node. */
function convertElement(
  element: Element,
  parentPath: string | undefined,
  dom: JSDOM,
  siblingNameCount: Map<string, number>
): HtmlNode {
  const name = element.tagName.toLowerCase();
  const path = buildPath(parentPath, name, siblingNameCount);
  const childNameCount = new Map<string, number>();

  return {
    name,
    attributes: toAttributeMap(element),
    children: Array.from(element.children, (child) => convertElement(child, path, dom, childNameCount)),
    text: normalizeText(element.textContent ?? ''),
    location: locate(element, dom),
    path
  };
}

/** Copy element attributes into a plain record with lower-cased names. */
function toAttributeMap(element: Element): Record<string, string> {
  const out: Record<string, string> = {};
  for (const attribute of Array.from(element.attributes)) {
    out[attribute.name.toLowerCase()] = attribute.value;
  }
  return out;
}

/** Source position of an element, when the parser recorded one. */
function locate(element: Element, dom: JSDOM): HtmlLocation | undefined {
  const location = dom.nodeLocation(element);
  if (!location) {
    return undefined;
  }

  return { line: location.startLine, column: location.startCol };
}

/** Build deterministic node paths with sibling indexes (for diagnostics). */
function buildPath(parentPath: string | undefined, name: string, siblingNameCount: Map<string, number>): string {
  const next = (siblingNameCount.get(name) ?? 0) + 1;
  siblingNameCount.set(name, next);
  return `${parentPath ?? ''}/${name}[${next}]`;
}

/** Collapse runs of whitespace (including non-breaking spaces) and trim. */
export function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}
