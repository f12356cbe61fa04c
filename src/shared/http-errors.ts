import axios from 'axios';

/**
 * One-line description of a failed HTTP call: status, axios code and message.
 * Request bodies and headers are left out.
 */
export function safeErrorMessage(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return [
      status ? `HTTP ${status}` : null,
      error.code ? `code=${error.code}` : null,
      error.message ? `msg=${error.message}` : null,
    ].filter(Boolean).join(' ');
  }
  return error instanceof Error ? error.message : String(error);
}
