import { z } from "zod";

import type {
  GmailLabelListResponse,
  GmailMessage,
  GmailMessageListResponse,
  GmailMessagePart,
  GmailProfile,
} from "./types";

export const gmailMessageHeaderSchema = z.object({
  name: z.string(),
  value: z.string(),
});

export const gmailMessageBodySchema = z.object({
  attachmentId: z.string().optional(),
  size: z.number().optional(),
  data: z.string().optional(),
});

// Shallow: child parts stay raw and extractMessageText validates each one as
// it is visited.
export const gmailMessagePartSchema: z.ZodType<GmailMessagePart> = z.object({
  partId: z.string().optional(),
  mimeType: z.string().optional(),
  filename: z.string().optional(),
  headers: z.array(gmailMessageHeaderSchema).optional(),
  body: gmailMessageBodySchema.optional(),
  parts: z.array(z.unknown()).optional(),
});

export const gmailMessageSchema: z.ZodType<GmailMessage> = z.object({
  id: z.string().optional(),
  threadId: z.string().optional(),
  labelIds: z.array(z.string()).optional(),
  snippet: z.string().optional(),
  historyId: z.string().optional(),
  internalDate: z.string().optional(),
  payload: gmailMessagePartSchema.optional(),
  sizeEstimate: z.number().optional(),
});

export const gmailMessageListResponseSchema: z.ZodType<GmailMessageListResponse> =
  z.object({
    messages: z
      .array(z.object({ id: z.string(), threadId: z.string().optional() }))
      .optional(),
    nextPageToken: z.string().optional(),
    resultSizeEstimate: z.number().optional(),
  });

export const gmailLabelListResponseSchema: z.ZodType<GmailLabelListResponse> =
  z.object({
    labels: z
      .array(
        z
          .object({
            id: z.string(),
            name: z.string(),
            type: z.string().optional(),
          })
          .passthrough()
      )
      .optional(),
  });

export const gmailProfileSchema: z.ZodType<GmailProfile> = z
  .object({
    emailAddress: z.string().optional(),
    messagesTotal: z.number().optional(),
    threadsTotal: z.number().optional(),
    historyId: z.string().optional(),
  })
  .passthrough();
