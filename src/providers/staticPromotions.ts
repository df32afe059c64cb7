import type {
  PromotionValidationResult,
  PromotionValidator,
  ValidatePromotionCommand,
} from '../pricing/types.js';

export interface PromotionDefinition {
  discountAmount: number;
  description: string;
  /** Epoch milliseconds after which the code is no longer accepted */
  expiresAt?: number;
}

/**
 * Fixed-amount promotion codes from a static table
 */
export class StaticPromotionValidator implements PromotionValidator {
  private readonly table: Map<string, PromotionDefinition>;

  constructor(
    table: Record<string, PromotionDefinition>,
    private readonly now: () => number = () => Date.now()
  ) {
    this.table = new Map(
      Object.entries(table).map(([code, definition]) => [code.trim().toUpperCase(), definition])
    );
  }

  async validate(command: ValidatePromotionCommand): Promise<PromotionValidationResult> {
    const code = command.code.trim().toUpperCase();
    const definition = this.table.get(code);

    if (!definition) {
      return { code, eligible: false, discountAmount: 0, reason: 'unknown promotion code' };
    }
    if (definition.expiresAt !== undefined && this.now() > definition.expiresAt) {
      return { code, eligible: false, discountAmount: 0, reason: 'promotion expired' };
    }

    return {
      code,
      eligible: true,
      discountAmount: definition.discountAmount,
      reason: definition.description,
    };
  }
}
