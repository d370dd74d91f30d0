import { badRequest } from "@hapi/boom";

import { getMessage, getProfile, listLabels, listMessages } from "./client";
import { getGmailConfig, MAX_RESULTS_LIMIT, maxResultsSchema } from "./config";
import { toEssentialFields } from "./summarize";
import type { GmailSummary } from "./types";

export interface FetchGmailSummaryOptions {
  baseUrl?: string;
  maxResults?: number;
  requestTimeoutMs?: number;
}

/**
 * Fetch the user's labels, profile and most recent messages, reducing each
 * message to its essential fields.
 *
 * Labels, profile and the message list are requested concurrently, then every
 * listed message is fetched concurrently. Any failed request rejects the
 * whole fetch. At most ten messages are fetched.
 */
export async function fetchGmailSummary(
  accessToken: string,
  options: FetchGmailSummaryOptions = {}
): Promise<GmailSummary> {
  const defaults = getGmailConfig();
  const maxResults = maxResultsSchema.safeParse(
    options.maxResults ?? defaults.maxResults
  );
  if (!maxResults.success) {
    throw badRequest(
      `maxResults must be an integer between 1 and ${MAX_RESULTS_LIMIT}`
    );
  }
  const requestOptions = {
    baseUrl: options.baseUrl ?? defaults.baseUrl,
    requestTimeoutMs: options.requestTimeoutMs ?? defaults.requestTimeoutMs,
  };

  const [labels, profile, messageList] = await Promise.all([
    listLabels(accessToken, requestOptions),
    getProfile(accessToken, requestOptions),
    listMessages(accessToken, {
      ...requestOptions,
      maxResults: maxResults.data,
      query: "",
    }),
  ]);

  const messageIds = (messageList.messages ?? [])
    .slice(0, maxResults.data)
    .map((message) => message.id);
  const messages = await Promise.all(
    messageIds.map((messageId) =>
      getMessage(accessToken, messageId, requestOptions)
    )
  );

  const emails = messages.map(toEssentialFields);

  console.log("[gmailSummary] Fetched Gmail summary:", {
    labelCount: labels.labels?.length ?? 0,
    emailCount: emails.length,
  });

  return {
    labels: labels.labels ?? [],
    profile,
    emails,
  };
}
