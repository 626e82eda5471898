// ---------------------------------------------------------------------------
// GuildSystem.ts — The guild merchant that buys crafted goods
// ---------------------------------------------------------------------------
// A sale is verify -> remove one item -> credit the recipe's sellPrice. Gold
// is only credited after the removal succeeded; the order must not change.
// ---------------------------------------------------------------------------

import type { Recipe, RecipeCatalog } from '@/crafting/RecipeCatalog';
import { ItemQuality, type InventoryLedger, type InventoryStack } from '@/rpg/InventorySystem';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** A recipe id or its display name, as shown on the item card. */
export type RecipeRef = number | string;

export type SaleFailureReason = 'unknown_item' | 'no_sell_price' | 'not_in_bag';

export type SaleResult =
  | { success: true; recipe: Recipe; goldEarned: number; remaining: number }
  | { success: false; reason: SaleFailureReason };

export interface SellableStack {
  stack: Readonly<InventoryStack>;
  recipe: Recipe;
  unitPrice: number;
}

// ---------------------------------------------------------------------------
// GuildSystem
// ---------------------------------------------------------------------------

export class GuildSystem {
  private readonly recipes: RecipeCatalog;
  private readonly inventory: InventoryLedger;

  constructor(recipes: RecipeCatalog, inventory: InventoryLedger) {
    this.recipes = recipes;
    this.inventory = inventory;
  }

  // -----------------------------------------------------------------------
  // Prices
  // -----------------------------------------------------------------------

  resolveRecipe(ref: RecipeRef): Recipe | undefined {
    return typeof ref === 'number' ? this.recipes.getById(ref) : this.recipes.getByName(ref);
  }

  /** Unit price, or undefined for items the guild does not buy. */
  getSellPrice(ref: RecipeRef): number | undefined {
    const recipe = this.resolveRecipe(ref);
    if (!recipe || recipe.sellPrice <= 0) return undefined;
    return recipe.sellPrice;
  }

  /** Bag stacks the guild will buy, in bag display order. */
  getSellableStacks(): SellableStack[] {
    const sellable: SellableStack[] = [];
    for (const stack of this.inventory.getContents()) {
      const recipe = this.recipes.getById(stack.recipeId);
      if (recipe && recipe.sellPrice > 0) {
        sellable.push({ stack, recipe, unitPrice: recipe.sellPrice });
      }
    }
    return sellable;
  }

  // -----------------------------------------------------------------------
  // Sell
  // -----------------------------------------------------------------------

  /** Sell one item of the given quality for the recipe's fixed price. */
  sell(ref: RecipeRef, quality: ItemQuality = ItemQuality.NORMAL): SaleResult {
    const recipe = this.resolveRecipe(ref);
    if (!recipe) {
      console.warn(`[Guild] No recipe found for ${String(ref)}`);
      return { success: false, reason: 'unknown_item' };
    }

    if (recipe.sellPrice <= 0) {
      console.warn(`[Guild] No sell price found for ${recipe.name}`);
      return { success: false, reason: 'no_sell_price' };
    }

    // Verify
    if (this.inventory.getItemQuantity(recipe.id, quality) < 1) {
      console.warn(`[Guild] Player doesn't have ${recipe.name} (${quality})`);
      return { success: false, reason: 'not_in_bag' };
    }

    // Remove, then credit
    if (!this.inventory.removeItem(recipe.id, 1, quality)) {
      return { success: false, reason: 'not_in_bag' };
    }
    this.inventory.addGold(recipe.sellPrice);

    console.log(`[Guild] Sold ${recipe.name} for ${recipe.sellPrice} gold`);
    return {
      success: true,
      recipe,
      goldEarned: recipe.sellPrice,
      remaining: this.inventory.getItemQuantity(recipe.id, quality),
    };
  }
}
