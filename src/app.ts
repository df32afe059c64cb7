import { Hono } from 'hono';
import { InMemoryCartStore } from './clients/cartStore.js';
import { PROMOTIONS, SEAL_CATALOG, STOCK } from './config/catalog.js';
import type { AppConfig } from './config/pricing.js';
import type { Logger } from './lib/logger.js';
import { CartPricingEngine } from './pricing/engine.js';
import { ShippingQuoteCache } from './pricing/shippingQuoteCache.js';
import { FixedRateTaxCalculator } from './providers/fixedRateTax.js';
import { FlatRateShippingEstimator } from './providers/flatRateShipping.js';
import { QuantityBreakRule } from './providers/quantityBreakRule.js';
import { StaticPromotionValidator } from './providers/staticPromotions.js';
import { StockInventory } from './providers/stockInventory.js';
import { createCartRoutes } from './routes/cart.routes.js';
import { createPricingRoutes } from './routes/pricing.routes.js';
import { CartService } from './services/cart.service.js';

export interface Application {
  app: Hono;
  store: InMemoryCartStore;
  shippingCache: ShippingQuoteCache;
  service: CartService;
  /** Start background sweepers */
  start(): void;
  /** Stop background sweepers */
  stop(): void;
}

/**
 * Wire store, engine, reference collaborators and routes from configuration
 */
export function createApplication(config: AppConfig, logger: Logger): Application {
  const sweep = {
    sweepIntervalMs: config.sweepIntervalMs,
    sweepScanLimit: config.sweepScanLimit,
    sweepBudgetMs: config.sweepBudgetMs,
  };

  const store = new InMemoryCartStore(config.cartTtlMs, sweep);
  const shippingCache = new ShippingQuoteCache({ ttlMs: config.shippingQuoteTtlMs, ...sweep });

  const engine = new CartPricingEngine({
    promotion: new StaticPromotionValidator(PROMOTIONS),
    tax: new FixedRateTaxCalculator(config.taxRateBps, config.taxJurisdiction),
    shipping: new FlatRateShippingEstimator({
      domesticCountry: config.domesticCountry,
      domesticFee: config.domesticShippingFee,
      internationalFee: config.internationalShippingFee,
      freeShippingThreshold: config.freeShippingThreshold,
    }),
    inventory: new StockInventory(STOCK),
    itemRules: [new QuantityBreakRule('bulk', 10, 500)],
    cache: shippingCache,
    logger: logger.child({ component: 'pricing' }),
  });

  const service = new CartService(store, engine, SEAL_CATALOG, config.cartTtlMs, config.defaultCurrency);

  const app = new Hono();

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok' });
  });

  app.route('/cart', createCartRoutes(service, logger));
  app.route('/pricing', createPricingRoutes(service, logger));

  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Route not found',
        },
      },
      404
    );
  });

  return {
    app,
    store,
    shippingCache,
    service,
    start() {
      store.startSweeper();
      shippingCache.startSweeper();
    },
    stop() {
      store.stopSweeper();
      shippingCache.stopSweeper();
    },
  };
}
