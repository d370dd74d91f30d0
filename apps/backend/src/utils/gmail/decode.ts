import * as libqp from "libqp";
import { z } from "zod";

// Unpadded base64url, standard alphabet tolerated
const base64DataSchema = z
  .string()
  .regex(/^[A-Za-z0-9+/_-]*={0,2}$/)
  .refine((value) => value.replace(/=+$/, "").length % 4 !== 1);

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode base64url data after padding it to a multiple of four.
 * Returns null when the input is not valid base64.
 */
function decodeBase64Url(raw: string): Buffer | null {
  const parsed = base64DataSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const padded = parsed.data.padEnd(
    parsed.data.length + ((4 - (parsed.data.length % 4)) % 4),
    "="
  );
  return Buffer.from(padded, "base64");
}

function decodeUtf8Strict(bytes: Buffer): string | null {
  try {
    return strictUtf8.decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Decode the body data of a single MIME part into text.
 *
 * Gmail parts are base64url of either raw UTF-8 or quoted-printable text.
 * Bytes that are not valid UTF-8 are run through a quoted-printable decode
 * and then read leniently, with U+FFFD for invalid sequences. Malformed
 * base64 yields an empty string; this function never throws.
 */
export function decodePartData(raw: string | null | undefined): string {
  if (!raw) {
    return "";
  }

  const bytes = decodeBase64Url(raw);
  if (!bytes) {
    return "";
  }

  const text = decodeUtf8Strict(bytes);
  if (text !== null) {
    return text;
  }

  try {
    return libqp.decode(bytes.toString("latin1")).toString("utf8");
  } catch {
    return bytes.toString("utf8");
  }
}
