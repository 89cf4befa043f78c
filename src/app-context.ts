/**
 * Application context
 *
 * Shared services built once at startup and passed by reference into every
 * component, so nothing configures itself through module-level state.
 */

import type { Config } from './config/config-schema.js';
import type { HttpClient } from './http/http-client.js';
import type { Notifier } from './notifications/notifier.js';
import type { Logger } from './utils/logger.js';

export type AppContext = {
  readonly config: Config;
  readonly logger: Logger;
  readonly http: HttpClient;
  readonly notifier: Notifier;
};
