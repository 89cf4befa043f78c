import { z } from 'zod';
import type { AppContext } from '../app-context.js';
import { AuthError, isTransportError, ParseError, type TransportError } from '../errors/custom-errors.js';
import { err, ok, type Result } from '../types/result.js';
import { collectApiErrors, describeApiErrors, postGraphql } from './graphql-client.js';
import { videoForWatchAuthOperation } from './queries.js';

export type ResolveError = TransportError | ParseError | AuthError;

export const MANIFEST_SUFFIX = '/manifest/video.mpd';

const StreamTokenSchema = z.looseObject({
  data: z.looseObject({
    result: z.looseObject({
      video: z.looseObject({
        token: z.string().min(1),
      }),
    }),
  }),
});

/** Read only to explain a missing stream token */
const ResolveFailureSchema = z.looseObject({
  data: z
    .looseObject({
      result: z.looseObject({ isAuthorized: z.unknown(), errors: z.unknown() }).nullish(),
    })
    .nullish(),
  errors: z.unknown(),
});

/**
 * Build the DASH manifest URL for a stream token
 */
export function buildManifestUrl(streamHost: string, streamToken: string): string {
  return `${streamHost.replace(/\/+$/, '')}/${streamToken}${MANIFEST_SUFFIX}`;
}

/**
 * Exchanges a video id for a playable manifest URL
 */
export class VideoResolver {
  constructor(private readonly ctx: Pick<AppContext, 'http' | 'config'>) {}

  /**
   * Resolve one video. Failures are returned, not thrown or logged; the caller
   * knows which file they belong to.
   */
  async resolve(bearerToken: string, videoId: string): Promise<Result<string, ResolveError>> {
    let body: unknown;

    try {
      body = await postGraphql(this.ctx, videoForWatchAuthOperation(videoId), bearerToken);
    } catch (error) {
      if (isTransportError(error) || error instanceof ParseError) {
        return err(error);
      }
      throw error;
    }

    const stream = StreamTokenSchema.safeParse(body);
    if (stream.success) {
      return ok(buildManifestUrl(this.ctx.config.api.streamHost, stream.data.data.result.video.token));
    }

    const failure = ResolveFailureSchema.safeParse(body);
    const result = failure.success ? failure.data.data?.result : undefined;
    const errors = failure.success ? collectApiErrors(result?.errors, failure.data.errors) : [];
    if (errors.length > 0 || result?.isAuthorized === false) {
      const reason = errors.length > 0 ? describeApiErrors(errors) : 'not authorized';
      return err(new AuthError(`Video ${videoId} unavailable: ${reason}`, errors));
    }

    return err(new ParseError(`Missing stream token for video ${videoId}`, 'data.result.video.token'));
  }
}
