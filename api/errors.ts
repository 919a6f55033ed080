import axios from 'axios';

/**
 * Turn an axios (or any) failure into an Error carrying status and response body
 * e.g. "Crisp API error: 403 - Forbidden ({"error":true,"reason":"not_allowed"})"
 */
export function describeApiError(service: string, error: unknown): Error {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const statusText = error.response?.statusText;
    const errorData: unknown = error.response?.data;
    return new Error(
      `${service} API error: ${status ?? 'no response'} - ${statusText || error.message}${errorData ? ` (${JSON.stringify(errorData)})` : ''}`
    );
  }
  if (error instanceof Error) {
    return error;
  }
  return new Error(`${service} API error: ${String(error)}`);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
