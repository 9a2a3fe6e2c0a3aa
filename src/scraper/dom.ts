import * as cheerio from "cheerio";
import { hasChildren, isTag, isText } from "domhandler";
import type { AnyNode, Element } from "domhandler";
import { ParseError } from "../errors";
import { normalizeText } from "../utils/normalize";

export interface HtmlNode {
  selectAll(selector: string): HtmlNode[];
  selectOne(selector: string): HtmlNode | null;
  /**
   * Descendant text as textContent gives it, joined with `separator` and
   * whitespace-collapsed. Whitespace between inline siblings stays a space.
   */
  text(separator?: string): string;
  attr(name: string): string | undefined;
  classNames(): string[];
}

export interface HtmlDocument {
  selectAll(selector: string): HtmlNode[];
  selectOne(selector: string): HtmlNode | null;
}

const SKIPPED_TAGS = new Set(["script", "style", "noscript", "template"]);

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    parts.push(node.data);
    return;
  }
  if (isTag(node) && SKIPPED_TAGS.has(node.name)) return;
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
}

class CheerioNode implements HtmlNode {
  constructor(
    private readonly $: cheerio.CheerioAPI,
    private readonly element: Element
  ) {}

  selectAll(selector: string): HtmlNode[] {
    return this.$(this.element)
      .find(selector)
      .toArray()
      .map((el) => new CheerioNode(this.$, el));
  }

  selectOne(selector: string): HtmlNode | null {
    return this.selectAll(selector)[0] ?? null;
  }

  text(separator = ""): string {
    const parts: string[] = [];
    collectText(this.element, parts);
    return normalizeText(parts.join(separator));
  }

  attr(name: string): string | undefined {
    return this.$(this.element).attr(name);
  }

  classNames(): string[] {
    return (this.attr("class") ?? "").split(/\s+/).filter(Boolean);
  }
}

/**
 * Parses an HTML page into a queryable tree.
 *
 * The parser recovers from malformed markup, so only input that yields no
 * elements at all (empty, or bare text) is rejected.
 */
export function parseHtml(html: string): HtmlDocument {
  if (!html.trim()) {
    throw new ParseError("Empty HTML document");
  }

  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (error) {
    throw new ParseError("Failed to parse HTML document", error);
  }

  if ($("head *, body *").length === 0) {
    throw new ParseError("Document contains no HTML elements");
  }

  const root = $.root();
  return {
    selectAll(selector: string): HtmlNode[] {
      return root
        .find(selector)
        .toArray()
        .map((el) => new CheerioNode($, el));
    },
    selectOne(selector: string): HtmlNode | null {
      const el = root.find(selector).toArray()[0];
      return el ? new CheerioNode($, el) : null;
    },
  };
}
