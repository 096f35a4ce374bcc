import fetch, { RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import { UpstreamService, UpstreamServiceError } from '../../core/errors.js';

/**
 * The subset of fetch the REST clients use. Tests pass a stub.
 */
export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: HttpFetch = (url, init) => fetch(url, init);

/**
 * Send a request and parse the JSON reply with a schema.
 * Transport failures, non-2xx statuses and unexpected bodies all surface as
 * UpstreamServiceError for the given service.
 */
export async function requestJson<T extends z.ZodTypeAny>(
  service: UpstreamService,
  httpFetch: HttpFetch,
  url: string,
  init: RequestInit,
  schema: T
): Promise<z.infer<T>> {
  let res: Response;
  try {
    res = await httpFetch(url, init);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new UpstreamServiceError(service, `request failed: ${reason}`, undefined, { cause: error });
  }

  if (!res.ok) {
    const body = await res.text().catch(() => '');
    throw new UpstreamServiceError(
      service,
      `HTTP error! status: ${res.status}${body ? ` ${body.slice(0, 300)}` : ''}`,
      res.status
    );
  }

  let payload: unknown;
  try {
    payload = await res.json();
  } catch (error) {
    throw new UpstreamServiceError(service, 'response is not valid JSON', res.status, { cause: error });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new UpstreamServiceError(
      service,
      `unexpected response shape: ${parsed.error.errors.map((e) => `${e.path.join('.')} ${e.message}`).join(', ')}`,
      res.status
    );
  }
  return parsed.data;
}
