/**
 * Gmail API message representation
 */
export interface GmailMessage {
  id?: string;
  threadId?: string;
  labelIds?: string[];
  snippet?: string;
  historyId?: string;
  internalDate?: string;
  payload?: GmailMessagePart;
  sizeEstimate?: number;
}

/**
 * Gmail API message part (for multipart messages). Children are unvalidated
 * JSON until the walker checks them.
 */
export interface GmailMessagePart {
  partId?: string;
  mimeType?: string;
  filename?: string;
  headers?: GmailMessageHeader[];
  body?: GmailMessageBody;
  parts?: unknown[];
}

/**
 * Gmail API message header
 */
export interface GmailMessageHeader {
  name: string;
  value: string;
}

/**
 * Gmail API message body
 */
export interface GmailMessageBody {
  attachmentId?: string;
  size?: number;
  data?: string; // base64url encoded
}

/**
 * Gmail API message list response
 */
export interface GmailMessageListResponse {
  messages?: Array<{
    id: string;
    threadId?: string;
  }>;
  nextPageToken?: string;
  resultSizeEstimate?: number;
}

/**
 * Gmail label, passed through as returned by the API
 */
export interface GmailLabel {
  id: string;
  name: string;
  type?: string;
  [key: string]: unknown;
}

export interface GmailLabelListResponse {
  labels?: GmailLabel[];
}

/**
 * Gmail user profile, passed through as returned by the API
 */
export interface GmailProfile {
  emailAddress?: string;
  messagesTotal?: number;
  threadsTotal?: number;
  historyId?: string;
  [key: string]: unknown;
}

/**
 * The seven fields kept for each message
 */
export interface EssentialEmail {
  readonly messageId: string | null;
  readonly threadId: string | null;
  readonly messageTimestamp: number | null;
  readonly labelIds: readonly string[];
  readonly sender: string | null;
  readonly subject: string | null;
  readonly messageText: string;
}

export interface GmailSummary {
  labels: GmailLabel[];
  profile: GmailProfile;
  emails: EssentialEmail[];
}
