import axios from 'axios';

const MAX_BODY_CHARS = 300;

/** One-line description of a failed HTTP call, including the upstream error body when there is one. */
export function describeHttpError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.response) {
      const body = err.response.data;
      const detail = typeof body === 'string' ? body : JSON.stringify(body);
      return `status ${err.response.status}${detail ? `, details: ${detail.slice(0, MAX_BODY_CHARS)}` : ''}`;
    }
    return err.code ? `${err.code}: ${err.message}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

export function httpStatusOf(err: unknown): number | undefined {
  return axios.isAxiosError(err) ? err.response?.status : undefined;
}
