import type { Config } from './types.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  engine: 'Bing',
  engines: {},
  transport: {
    timeoutMs: 15000,
    userAgent: 'web-search/1.0.0',
  },
  debug: false,
};
