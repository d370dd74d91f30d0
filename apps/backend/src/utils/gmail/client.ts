import { makeGoogleApiRequest } from "../googleApi/request";

import { DEFAULT_GMAIL_API_BASE_URL, DEFAULT_MAX_RESULTS } from "./config";
import {
  gmailLabelListResponseSchema,
  gmailMessageListResponseSchema,
  gmailMessageSchema,
  gmailProfileSchema,
} from "./schemas";
import type {
  GmailLabelListResponse,
  GmailMessage,
  GmailMessageListResponse,
  GmailProfile,
} from "./types";

/**
 * Where and how long to talk to the Gmail API
 */
export interface GmailRequestOptions {
  baseUrl?: string;
  requestTimeoutMs?: number;
}

function gmailUrl(options: GmailRequestOptions, path: string): string {
  return `${options.baseUrl ?? DEFAULT_GMAIL_API_BASE_URL}${path}`;
}

/**
 * List the user's labels
 */
export async function listLabels(
  accessToken: string,
  options: GmailRequestOptions = {}
): Promise<GmailLabelListResponse> {
  return makeGoogleApiRequest({
    accessToken,
    url: gmailUrl(options, "/labels"),
    schema: gmailLabelListResponseSchema,
    requestTimeoutMs: options.requestTimeoutMs,
  });
}

/**
 * Get the user's Gmail profile
 */
export async function getProfile(
  accessToken: string,
  options: GmailRequestOptions = {}
): Promise<GmailProfile> {
  return makeGoogleApiRequest({
    accessToken,
    url: gmailUrl(options, "/profile"),
    schema: gmailProfileSchema,
    requestTimeoutMs: options.requestTimeoutMs,
  });
}

/**
 * List the most recent message ids
 */
export async function listMessages(
  accessToken: string,
  options: GmailRequestOptions & { maxResults?: number; query?: string } = {}
): Promise<GmailMessageListResponse> {
  const params = new URLSearchParams({
    maxResults: String(options.maxResults ?? DEFAULT_MAX_RESULTS),
    q: options.query ?? "",
  });

  return makeGoogleApiRequest({
    accessToken,
    url: gmailUrl(options, `/messages?${params.toString()}`),
    schema: gmailMessageListResponseSchema,
    requestTimeoutMs: options.requestTimeoutMs,
  });
}

/**
 * Get a full message resource
 */
export async function getMessage(
  accessToken: string,
  messageId: string,
  options: GmailRequestOptions = {}
): Promise<GmailMessage> {
  return makeGoogleApiRequest({
    accessToken,
    url: gmailUrl(options, `/messages/${encodeURIComponent(messageId)}`),
    schema: gmailMessageSchema,
    requestTimeoutMs: options.requestTimeoutMs,
  });
}
