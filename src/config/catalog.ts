import type { CatalogEntry } from '../models/types.js';
import type { PromotionDefinition } from '../providers/staticPromotions.js';

/**
 * Demo seal catalog (JPY)
 * In production, this would be loaded from the catalog service
 */
export const SEAL_CATALOG: CatalogEntry[] = [
  {
    sku: 'SEAL-TSUGE-12',
    productId: 'prod_tsuge',
    name: 'Boxwood personal seal 12mm',
    unitPrice: 4000,
    weightGrams: 200,
    requiresShipping: true,
    taxCode: 'standard',
  },
  {
    sku: 'SEAL-KURO-15',
    productId: 'prod_kurosui',
    name: 'Black buffalo horn bank seal 15mm',
    unitPrice: 9800,
    weightGrams: 250,
    requiresShipping: true,
    taxCode: 'standard',
  },
  {
    sku: 'SEAL-TITAN-18',
    productId: 'prod_titanium',
    name: 'Titanium registered seal 18mm',
    unitPrice: 19800,
    weightGrams: 320,
    requiresShipping: true,
    taxCode: 'standard',
  },
  {
    sku: 'CASE-LEATHER',
    productId: 'prod_case',
    name: 'Leather seal case',
    unitPrice: 2000,
    weightGrams: 100,
    requiresShipping: true,
    taxCode: 'standard',
  },
  {
    sku: 'DESIGN-PROOF',
    productId: 'prod_proof',
    name: 'Digital design proof',
    unitPrice: 500,
    weightGrams: 0,
    requiresShipping: false,
    taxCode: 'digital',
  },
];

export const PROMOTIONS: Record<string, PromotionDefinition> = {
  WELCOME500: { discountAmount: 500, description: 'Welcome discount' },
  SPRING1000: { discountAmount: 1000, description: 'Spring campaign' },
};

/**
 * Stock per SKU available to the demo inventory check
 */
export const STOCK: Record<string, number> = {
  'SEAL-TSUGE-12': 50,
  'SEAL-KURO-15': 20,
  'SEAL-TITAN-18': 5,
  'CASE-LEATHER': 100,
  'DESIGN-PROOF': 10_000,
};
