import { decodePartData } from "./decode";
import { htmlToText } from "./html";
import { gmailMessagePartSchema } from "./schemas";
import type { GmailMessagePart } from "./types";

/**
 * Extract readable plain text from a message's MIME part tree.
 *
 * Parts are visited with an explicit stack, so arbitrarily deep trees are
 * safe. Each child is validated when it is popped; children that are not
 * part objects are skipped. text/plain leaves are decoded as-is and
 * text/html leaves are reduced to their visible text. Only multipart/*
 * containers are descended into; attachments and other leaves are skipped
 * along with anything under them.
 *
 * Texts are collected in the order they are popped and the whole list is
 * reversed before joining. This approximates top-to-bottom reading order but
 * does not guarantee document order when several nested multipart branches
 * all contribute text.
 */
export function extractMessageText(root: GmailMessagePart): string {
  const collected: string[] = [];
  const stack: unknown[] = [root];

  while (stack.length > 0) {
    const parsed = gmailMessagePartSchema.safeParse(stack.pop());
    if (!parsed.success) {
      continue;
    }
    const part = parsed.data;

    const mimeType = part.mimeType ?? "";
    const data = part.body?.data;

    if (mimeType === "text/plain" && data) {
      const text = decodePartData(data);
      if (text) {
        collected.push(text);
      }
    } else if (mimeType === "text/html" && data) {
      const text = htmlToText(decodePartData(data));
      if (text) {
        collected.push(text);
      }
    }

    if (mimeType.startsWith("multipart/")) {
      const children = part.parts ?? [];
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }
  }

  return collected.reverse().join("\n").trim();
}
