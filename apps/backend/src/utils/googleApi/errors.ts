/**
 * Check if an error is an authentication error
 */
export function isAuthenticationError(status: number): boolean {
  // HTTP 401 (Unauthorized) and 403 (Forbidden)
  return status === 401 || status === 403;
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function ensureError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === "string") {
    return new Error(error);
  }
  return new Error(String(error));
}

/**
 * Read Google's error message from a failed response body, if there is one
 */
export async function readErrorDetails(response: Response): Promise<string> {
  let errorDetails = `${response.status} ${response.statusText}`;
  try {
    const errorData: unknown = await response.json();
    if (
      errorData &&
      typeof errorData === "object" &&
      "error" in errorData &&
      errorData.error &&
      typeof errorData.error === "object" &&
      "message" in errorData.error &&
      typeof errorData.error.message === "string" &&
      errorData.error.message
    ) {
      errorDetails = errorData.error.message;
    }
  } catch {
    // Ignore JSON parse errors
  }
  return errorDetails;
}
