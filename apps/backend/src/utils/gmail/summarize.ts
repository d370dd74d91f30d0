import { extractMessageText } from "./mimeText";
import type {
  EssentialEmail,
  GmailMessage,
  GmailMessageHeader,
} from "./types";

/**
 * Field names of an {@link EssentialEmail}, in documentation order
 */
export const GMAIL_FIELDS = [
  "messageId",
  "threadId",
  "messageTimestamp",
  "labelIds",
  "sender",
  "subject",
  "messageText",
] as const satisfies ReadonlyArray<keyof EssentialEmail>;

/**
 * Build a name -> value map of headers. Names are matched exactly and a
 * later duplicate replaces an earlier one.
 */
function extractHeaders(
  headers: GmailMessageHeader[] | undefined
): Map<string, string> {
  const result = new Map<string, string>();
  if (!headers) {
    return result;
  }
  for (const header of headers) {
    result.set(header.name, header.value);
  }
  return result;
}

/**
 * Convert Gmail's internalDate (epoch milliseconds as a string) to whole
 * seconds
 */
function toTimestampSeconds(internalDate: string | undefined): number | null {
  if (!internalDate) {
    return null;
  }
  const millis = Number.parseInt(internalDate, 10);
  if (Number.isNaN(millis)) {
    return null;
  }
  return Math.floor(millis / 1000);
}

/**
 * Reduce a Gmail message resource to its essential fields
 */
export function toEssentialFields(message: GmailMessage): EssentialEmail {
  const payload = message.payload ?? {};
  const headers = extractHeaders(payload.headers);

  return Object.freeze({
    messageId: message.id ?? null,
    threadId: message.threadId ?? null,
    messageTimestamp: toTimestampSeconds(message.internalDate),
    labelIds: Object.freeze([...(message.labelIds ?? [])]),
    sender: headers.get("From") ?? null,
    subject: headers.get("Subject") ?? null,
    messageText: extractMessageText(payload),
  });
}
