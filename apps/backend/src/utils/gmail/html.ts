import type { ChildNode } from "domhandler";
import { hasChildren, isTag, isText } from "domhandler";
import { parseDocument } from "htmlparser2";

const HIDDEN_ELEMENTS = new Set([
  "head",
  "noscript",
  "script",
  "style",
  "template",
  "title",
]);

/**
 * Extract the visible text of an HTML document, one trimmed text node per
 * line. Returns an empty string if the document cannot be parsed.
 */
export function htmlToText(html: string): string {
  if (!html) {
    return "";
  }

  try {
    const document = parseDocument(html);
    const lines: string[] = [];
    const stack: ChildNode[] = [...document.children].reverse();

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) {
        break;
      }
      if (isText(node)) {
        const text = node.data.trim();
        if (text) {
          lines.push(text);
        }
        continue;
      }
      if (isTag(node) && HIDDEN_ELEMENTS.has(node.name.toLowerCase())) {
        continue;
      }
      if (hasChildren(node)) {
        for (let i = node.children.length - 1; i >= 0; i--) {
          stack.push(node.children[i]);
        }
      }
    }

    return lines.join("\n").trim();
  } catch (error) {
    console.warn("[htmlToText] Failed to parse HTML:", {
      error: error instanceof Error ? error.message : String(error),
    });
    return "";
  }
}
