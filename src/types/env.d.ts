declare namespace NodeJS {
  interface ProcessEnv {
    PORT?: string;
    LOG_LEVEL?: string;
    CART_TTL_MS?: string;
    SWEEP_INTERVAL_MS?: string;
    SWEEP_SCAN_LIMIT?: string;
    SWEEP_BUDGET_MS?: string;
    SHIPPING_QUOTE_TTL_MS?: string;
    DEFAULT_CURRENCY?: string;
    TAX_RATE_BPS?: string;
    TAX_JURISDICTION?: string;
    DOMESTIC_COUNTRY?: string;
    DOMESTIC_SHIPPING_FEE?: string;
    INTERNATIONAL_SHIPPING_FEE?: string;
    FREE_SHIPPING_THRESHOLD?: string;
  }
}
