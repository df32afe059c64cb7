import { serve } from '@hono/node-server';
import { createApplication } from './app.js';
import { loadConfig } from './config/pricing.js';
import { createLogger } from './lib/logger.js';

const config = loadConfig();
const logger = createLogger(config.logLevel, { service: 'cart-pricing' });

const application = createApplication(config, logger);
application.start();

serve(
  {
    fetch: application.app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info('server_started', {
      port: info.port,
      cartTtlMs: config.cartTtlMs,
      shippingQuoteTtlMs: config.shippingQuoteTtlMs,
      taxRateBps: config.taxRateBps,
      currency: config.defaultCurrency,
    });
  }
);
