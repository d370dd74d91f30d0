import { Boom, badGateway, gatewayTimeout, isBoom } from "@hapi/boom";
import type { z } from "zod";

import { ensureError, isAuthenticationError, readErrorDetails } from "./errors";

export interface GoogleApiRequestConfig<T> {
  accessToken: string;
  url: string;
  schema: z.ZodType<T>;
  options?: RequestInit;
  requestTimeoutMs?: number;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 30000; // 30 seconds

function toErrorStatus(status: number): number {
  return status >= 400 && status <= 599 ? status : 502;
}

/**
 * Make an authenticated request to a Google API and validate the JSON body.
 *
 * Failures are raised as Boom errors carrying the upstream status code
 * (504 when the response or its body takes longer than the timeout, 502 for
 * bodies that are not the expected JSON). There is no retry.
 */
export async function makeGoogleApiRequest<T>(
  config: GoogleApiRequestConfig<T>
): Promise<T> {
  const {
    accessToken,
    url,
    schema,
    options = {},
    requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
  } = config;

  // Create abort signal for timeout
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), requestTimeoutMs);

  try {
    const response = await fetch(url, {
      ...options,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        "Content-Type": "application/json",
        ...options.headers,
      },
      signal: controller.signal,
    });

    if (isAuthenticationError(response.status)) {
      const errorDetails = await readErrorDetails(response);
      throw new Boom(`Authentication failed: ${errorDetails}`, {
        statusCode: response.status,
      });
    }

    if (!response.ok) {
      const errorDetails = await readErrorDetails(response);
      throw new Boom(`Gmail API error: ${errorDetails}`, {
        statusCode: toErrorStatus(response.status),
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (parseError) {
      if (parseError instanceof Error && parseError.name === "AbortError") {
        throw parseError;
      }
      throw badGateway(
        `Gmail API returned malformed JSON: ${ensureError(parseError).message}`
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw badGateway("Gmail API returned an unexpected response", {
        url,
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  } catch (error) {
    if (isBoom(error)) {
      throw error;
    }

    // Handle abort (timeout)
    if (error instanceof Error && error.name === "AbortError") {
      throw gatewayTimeout("Request timeout");
    }

    throw ensureError(error);
  } finally {
    // The timeout covers reading the body as well as the headers
    clearTimeout(timeoutId);
  }
}
