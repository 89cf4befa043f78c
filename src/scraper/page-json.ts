import * as cheerio from 'cheerio';
import type { AppContext } from '../app-context.js';
import { errorMessage, isTransportError, ParseError, type TransportError } from '../errors/custom-errors.js';
import { raiseForStatus, readText } from '../http/http-client.js';
import { err, ok, type Result } from '../types/result.js';

export type PageJsonError = TransportError | ParseError;

/**
 * Find the first element with type="application/json" and parse its text
 */
export function extractEmbeddedJson(html: string): Result<unknown, ParseError> {
  const $ = cheerio.load(html);
  const element = $('[type="application/json"]').first();

  const text = element.text().trim();
  if (element.length === 0 || text === '') {
    return err(new ParseError('No JSON data found'));
  }

  try {
    return ok(JSON.parse(text));
  } catch (error) {
    return err(new ParseError(`Malformed JSON: ${errorMessage(error)}`));
  }
}

/**
 * Fetch a page and return the JSON embedded in it.
 * Every failure is logged; the caller decides whether it is fatal.
 */
export async function fetchPageJson(
  url: string,
  ctx: Pick<AppContext, 'http' | 'logger'>,
): Promise<Result<unknown, PageJsonError>> {
  let html: string;

  try {
    const response = raiseForStatus(
      await ctx.http.get(url, { Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8' }),
      url,
    );
    html = await readText(response, url);
  } catch (error) {
    if (isTransportError(error)) {
      ctx.logger.error(`Network error while retrieving JSON from ${url}: ${error.message}`, { fileOnly: true });
      return err(error);
    }
    throw error;
  }

  const result = extractEmbeddedJson(html);
  if (!result.ok) {
    ctx.logger.error(`${result.error.message} at URL: ${url}`, { fileOnly: true });
  }
  return result;
}
