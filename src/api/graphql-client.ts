import { z } from 'zod';
import type { AppContext } from '../app-context.js';
import { type ApiErrorEntry, errorMessage, ParseError } from '../errors/custom-errors.js';
import { raiseForStatus, readText } from '../http/http-client.js';
import type { GraphqlOperation } from './queries.js';

/**
 * Error entry as found in `errors` lists (operation-level or top-level)
 */
const ApiErrorSchema = z.looseObject({
  key: z.string().nullish(),
  message: z.string(),
});

/**
 * Headers the web client sends with every API call
 */
export function apiHeaders(siteOrigin: string, token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: '*/*',
    Origin: siteOrigin,
    Referer: `${siteOrigin}/`,
  };
  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }
  return headers;
}

/**
 * Post a GraphQL operation and return the decoded JSON body.
 *
 * @throws TransportError on connection problems, timeouts and non-2xx statuses
 * @throws ParseError if the body is not JSON
 */
export async function postGraphql<V>(
  ctx: Pick<AppContext, 'http' | 'config'>,
  operation: GraphqlOperation<V>,
  token?: string,
): Promise<unknown> {
  const { endpoint, siteOrigin } = ctx.config.api;
  const response = raiseForStatus(
    await ctx.http.postJson(endpoint, operation, apiHeaders(siteOrigin, token)),
    endpoint,
  );
  const text = await readText(response, endpoint);

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ParseError(`Invalid JSON from ${endpoint} (${operation.operationName}): ${errorMessage(error)}`);
  }
}

/**
 * Gather the well-formed entries of any `errors` lists in a response.
 * Entries that do not match the expected shape are skipped.
 */
export function collectApiErrors(...lists: unknown[]): ApiErrorEntry[] {
  const entries: ApiErrorEntry[] = [];
  for (const list of lists) {
    if (!Array.isArray(list)) continue;
    for (const item of list) {
      const entry = ApiErrorSchema.safeParse(item);
      if (entry.success) {
        entries.push(entry.data);
      }
    }
  }
  return entries;
}

/**
 * Join error messages into one line
 */
export function describeApiErrors(errors: ReadonlyArray<ApiErrorEntry>): string {
  return errors.map((entry) => (entry.key ? `${entry.key}: ${entry.message}` : entry.message)).join('; ');
}
