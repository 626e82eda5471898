/**
 * errors.ts — Error types thrown by the crafting core.
 *
 * Only programming mistakes and bad static data throw. Ordinary gameplay
 * failures (no active session, not enough gold, unknown skill key) are
 * reported through return values instead.
 */

export class AnvilworksError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Static catalog data failed validation. Lists every problem found. */
export class DataValidationError extends AnvilworksError {
  public readonly source: string;
  public readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(`${source} data validation failed:\n${issues.join('\n')}`);
    this.source = source;
    this.issues = issues;
  }
}

export class InvalidQuantityError extends AnvilworksError {
  public readonly quantity: number;

  constructor(quantity: number) {
    super(`Quantity must be a positive integer, got ${quantity}`);
    this.quantity = quantity;
  }
}

export class RecipeNotUnlockedError extends AnvilworksError {
  public readonly recipeId: number;

  constructor(recipeId: number) {
    super(`Recipe ${recipeId} has not been unlocked`);
    this.recipeId = recipeId;
  }
}
