import type { ZodTypeAny, z } from 'zod';

import { OAuthResolutionError } from './errors';

export type FetchFn = typeof fetch;

const REQUEST_TIMEOUT_MS = 10_000;

/**
 * GETs a provider endpoint and validates the JSON body. Network errors, non-2xx
 * statuses and unexpected shapes all surface as OAuthResolutionError.
 */
export async function fetchProviderJson<T extends ZodTypeAny>(
  fetchFn: FetchFn,
  provider: string,
  url: string,
  init: { headers: Record<string, string> },
  schema: T,
): Promise<z.infer<T>> {
  let response: Response;
  try {
    response = await fetchFn(url, {
      method: 'GET',
      headers: { Accept: 'application/json', ...init.headers },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  } catch (error) {
    throw new OAuthResolutionError(provider, 'provider request failed', { cause: error });
  }

  if (!response.ok) {
    throw new OAuthResolutionError(provider, `provider responded with status ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new OAuthResolutionError(provider, 'provider returned a non-JSON body', { cause: error });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new OAuthResolutionError(provider, 'provider returned an unexpected payload', {
      cause: parsed.error,
    });
  }

  return parsed.data;
}
