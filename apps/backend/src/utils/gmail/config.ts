import { z } from "zod";

export const DEFAULT_GMAIL_API_BASE_URL =
  "https://gmail.googleapis.com/gmail/v1/users/me";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000; // 30 seconds
export const DEFAULT_MAX_RESULTS = 10;
export const MAX_RESULTS_LIMIT = 10;

export const maxResultsSchema = z.coerce
  .number()
  .int()
  .min(1)
  .max(MAX_RESULTS_LIMIT);

const gmailEnvSchema = z.object({
  GMAIL_API_BASE_URL: z.string().url().default(DEFAULT_GMAIL_API_BASE_URL),
  GMAIL_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
  GMAIL_MAX_RESULTS: maxResultsSchema.default(DEFAULT_MAX_RESULTS),
});

export interface GmailConfig {
  baseUrl: string;
  requestTimeoutMs: number;
  maxResults: number;
}

/**
 * Read Gmail settings from the environment, falling back to defaults
 */
export function getGmailConfig(
  env: Record<string, string | undefined> = process.env
): GmailConfig {
  const parsed = gmailEnvSchema.safeParse({
    GMAIL_API_BASE_URL: env.GMAIL_API_BASE_URL || undefined,
    GMAIL_REQUEST_TIMEOUT_MS: env.GMAIL_REQUEST_TIMEOUT_MS || undefined,
    GMAIL_MAX_RESULTS: env.GMAIL_MAX_RESULTS || undefined,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid Gmail configuration: ${issues}`);
  }

  return {
    baseUrl: parsed.data.GMAIL_API_BASE_URL.replace(/\/+$/, ""),
    requestTimeoutMs: parsed.data.GMAIL_REQUEST_TIMEOUT_MS,
    maxResults: parsed.data.GMAIL_MAX_RESULTS,
  };
}
