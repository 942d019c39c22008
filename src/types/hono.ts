import type { Context } from 'hono';
import type { Logger } from '../utils/logger.js';

/**
 * Per-request context variables
 */
export interface BrokerVariables {
  requestId: string;
  /** Request-scoped logger carrying the request id */
  logger: Logger;
}

export interface BrokerEnv {
  Variables: BrokerVariables;
}

export type BrokerContext = Context<BrokerEnv>;
