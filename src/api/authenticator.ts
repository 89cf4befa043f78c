import { z } from 'zod';
import type { AppContext } from '../app-context.js';
import { AuthError, isTransportError, ParseError, type TransportError } from '../errors/custom-errors.js';
import { NotificationLevel } from '../notifications/notifier.js';
import type { Credentials } from '../types/course.types.js';
import { err, ok, type Result } from '../types/result.js';
import { collectApiErrors, describeApiErrors, postGraphql } from './graphql-client.js';
import { loginOperation } from './queries.js';

export type LoginError = TransportError | ParseError | AuthError;

/** Only the token decides success */
const LoginTokenSchema = z.looseObject({
  data: z.looseObject({
    login: z.looseObject({
      token: z.string().min(1),
    }),
  }),
});

/** Where failure reasons may appear; read only to explain a missing token */
const LoginFailureSchema = z.looseObject({
  data: z
    .looseObject({
      login: z.looseObject({ errors: z.unknown() }).nullish(),
    })
    .nullish(),
  errors: z.unknown(),
});

/**
 * Exchanges a username/password for a bearer token
 */
export class Authenticator {
  constructor(private readonly ctx: Pick<AppContext, 'http' | 'config' | 'logger' | 'notifier'>) {}

  /**
   * Log in and return the bearer token. Failures are logged, never thrown.
   */
  async login(credentials: Credentials): Promise<Result<string, LoginError>> {
    let body: unknown;

    try {
      body = await postGraphql(this.ctx, loginOperation(credentials.username, credentials.password));
    } catch (error) {
      if (isTransportError(error)) {
        this.ctx.logger.error(`Network error during login: ${error.message}`, { fileOnly: true });
        return err(error);
      }
      if (error instanceof ParseError) {
        this.ctx.logger.error(`Unexpected error during login: ${error.message}`, { fileOnly: true });
        return err(error);
      }
      throw error;
    }

    const login = LoginTokenSchema.safeParse(body);
    if (login.success) {
      this.ctx.logger.info('Login successful!', { fileOnly: true });
      this.ctx.notifier.notify(NotificationLevel.SUCCESS, 'Login successful! Token obtained');
      return ok(login.data.data.login.token);
    }

    this.ctx.logger.error(`Login failed. Response: ${JSON.stringify(body)}`, { fileOnly: true });

    const failure = LoginFailureSchema.safeParse(body);
    const errors = failure.success ? collectApiErrors(failure.data.data?.login?.errors, failure.data.errors) : [];
    const reason = errors.length > 0 ? describeApiErrors(errors) : 'no token in response';
    return err(new AuthError(`Login failed: ${reason}`, errors));
  }
}
