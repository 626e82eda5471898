/**
 * InventorySystem.ts — Bag of holding and gold wallet.
 *
 * Crafted items are stacked by (recipeId, quality). A stack disappears as soon
 * as its quantity reaches zero. Gold never goes negative. All state is
 * JSON-serializable for save/load.
 */

import { EventBus } from '@/engine/EventBus';
import { InvalidQuantityError } from '@/engine/errors';
import type { RecipeCatalog } from '@/crafting/RecipeCatalog';

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export enum ItemQuality {
  NORMAL = 'Normal',
  FINE = 'Fine',
  EXCEPTIONAL = 'Exceptional',
  MASTERWORK = 'Masterwork',
}

/** Tier of each quality, lowest first. */
export const QUALITY_TIER: Readonly<Record<ItemQuality, number>> = {
  [ItemQuality.NORMAL]: 1,
  [ItemQuality.FINE]: 2,
  [ItemQuality.EXCEPTIONAL]: 3,
  [ItemQuality.MASTERWORK]: 4,
};

export type BagSortMode = 'name' | 'quantity' | 'date' | 'quality' | 'value';

export const BAG_SORT_MODES: readonly BagSortMode[] = ['name', 'quantity', 'date', 'quality', 'value'];

// ---------------------------------------------------------------------------
// Interfaces (JSON-serializable)
// ---------------------------------------------------------------------------

export interface InventoryStack {
  recipeId: number;
  quantity: number;
  quality: ItemQuality;
  /** Epoch milliseconds. */
  dateAdded: number;
}

export interface InventoryState {
  bag: InventoryStack[];
  gold: number;
  sortMode: BagSortMode;
}

export interface BagStats {
  totalItems: number;
  totalValue: number;
  uniqueStacks: number;
  qualityBreakdown: Record<ItemQuality, number>;
}

export interface InventoryEvents {
  itemAdded: [stack: Readonly<InventoryStack>, quantity: number];
  itemRemoved: [recipeId: number, quantity: number, quality: ItemQuality];
  goldChanged: [balance: number];
}

export interface InventoryOptions {
  /** Clock for `dateAdded`. Defaults to `Date.now`. */
  now?: () => number;
}

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

// ---------------------------------------------------------------------------
// InventoryLedger
// ---------------------------------------------------------------------------

export class InventoryLedger {
  public readonly events = new EventBus<InventoryEvents>('Inventory');

  private readonly recipes: RecipeCatalog;
  private readonly now: () => number;

  /** Display order. Never holds two stacks with the same (recipeId, quality). */
  private bag: InventoryStack[] = [];
  private gold = 0;
  private sortMode: BagSortMode = 'name';
  private statsCache: Readonly<BagStats> | null = null;

  constructor(recipes: RecipeCatalog, options: InventoryOptions = {}) {
    this.recipes = recipes;
    this.now = options.now ?? Date.now;
  }

  // -----------------------------------------------------------------------
  // Bag operations
  // -----------------------------------------------------------------------

  /**
   * Add items, merging into the matching (recipeId, quality) stack.
   * @throws InvalidQuantityError unless quantity is a positive integer.
   */
  addItem(
    recipeId: number,
    quantity: number = 1,
    quality: ItemQuality = ItemQuality.NORMAL,
  ): Readonly<InventoryStack> {
    if (!isPositiveInteger(quantity)) {
      throw new InvalidQuantityError(quantity);
    }

    let stack = this.findMutable(recipeId, quality);
    if (stack) {
      stack.quantity += quantity;
    } else {
      stack = { recipeId, quantity, quality, dateAdded: this.now() };
      this.bag.push(stack);
    }

    this.invalidate();
    console.log(
      `[Inventory] Added ${quantity}x ${this.nameOf(recipeId)} (${quality}) to bag`,
    );
    this.events.emit('itemAdded', stack, quantity);
    return stack;
  }

  /**
   * Remove items from the matching stack.
   * Returns false, changing nothing, if the stack is missing or too small.
   */
  removeItem(
    recipeId: number,
    quantity: number = 1,
    quality: ItemQuality = ItemQuality.NORMAL,
  ): boolean {
    if (!isPositiveInteger(quantity)) return false;

    const index = this.bag.findIndex((s) => s.recipeId === recipeId && s.quality === quality);
    if (index === -1) return false;

    const stack = this.bag[index];
    if (stack.quantity < quantity) return false;

    stack.quantity -= quantity;
    if (stack.quantity === 0) {
      this.bag.splice(index, 1);
    }

    this.invalidate();
    console.log(
      `[Inventory] Removed ${quantity}x ${this.nameOf(recipeId)} (${quality}) from bag`,
    );
    this.events.emit('itemRemoved', recipeId, quantity, quality);
    return true;
  }

  getItemQuantity(recipeId: number, quality: ItemQuality = ItemQuality.NORMAL): number {
    return this.findMutable(recipeId, quality)?.quantity ?? 0;
  }

  /** Quantity across every quality tier. */
  getTotalQuantity(recipeId: number): number {
    return this.bag
      .filter((s) => s.recipeId === recipeId)
      .reduce((sum, s) => sum + s.quantity, 0);
  }

  findStack(recipeId: number, quality: ItemQuality = ItemQuality.NORMAL): Readonly<InventoryStack> | undefined {
    return this.findMutable(recipeId, quality);
  }

  /** Stacks in display order. */
  getContents(): ReadonlyArray<Readonly<InventoryStack>> {
    return this.bag;
  }

  isEmpty(): boolean {
    return this.bag.length === 0;
  }

  get currentSortMode(): BagSortMode {
    return this.sortMode;
  }

  /** Reorder the bag for display. Stacking identity is untouched. */
  sortBag(mode: BagSortMode = this.sortMode): void {
    this.sortMode = mode;

    const byMode: Record<BagSortMode, (a: InventoryStack, b: InventoryStack) => number> = {
      name: (a, b) => this.nameOf(a.recipeId).localeCompare(this.nameOf(b.recipeId)),
      quantity: (a, b) => b.quantity - a.quantity,
      date: (a, b) => b.dateAdded - a.dateAdded,
      quality: (a, b) => QUALITY_TIER[b.quality] - QUALITY_TIER[a.quality],
      value: (a, b) => this.stackValue(b) - this.stackValue(a),
    };

    this.bag.sort(byMode[mode]);
    this.invalidate();
  }

  // -----------------------------------------------------------------------
  // Statistics
  // -----------------------------------------------------------------------

  /** Cached until the next mutation. */
  getBagStats(): Readonly<BagStats> {
    if (this.statsCache) return this.statsCache;

    const stats: BagStats = {
      totalItems: 0,
      totalValue: 0,
      uniqueStacks: this.bag.length,
      qualityBreakdown: {
        [ItemQuality.NORMAL]: 0,
        [ItemQuality.FINE]: 0,
        [ItemQuality.EXCEPTIONAL]: 0,
        [ItemQuality.MASTERWORK]: 0,
      },
    };

    for (const stack of this.bag) {
      stats.totalItems += stack.quantity;
      stats.totalValue += this.stackValue(stack);
      stats.qualityBreakdown[stack.quality] += stack.quantity;
    }

    this.statsCache = Object.freeze(stats);
    return this.statsCache;
  }

  // -----------------------------------------------------------------------
  // Gold
  // -----------------------------------------------------------------------

  getGold(): number {
    return this.gold;
  }

  hasGold(amount: number): boolean {
    return this.gold >= amount;
  }

  /** Credit gold. Anything but a positive integer is ignored. */
  addGold(amount: number): boolean {
    if (!isPositiveInteger(amount)) return false;
    this.gold += amount;
    console.log(`[Inventory] Gained ${amount} gold (total: ${this.gold})`);
    this.events.emit('goldChanged', this.gold);
    return true;
  }

  /** Spend gold. Rejected, not clamped, when the balance is short. */
  removeGold(amount: number): boolean {
    if (!isPositiveInteger(amount)) return false;
    if (this.gold < amount) {
      console.warn(`[Inventory] Not enough gold (have: ${this.gold}, need: ${amount})`);
      return false;
    }
    this.gold -= amount;
    console.log(`[Inventory] Spent ${amount} gold (remaining: ${this.gold})`);
    this.events.emit('goldChanged', this.gold);
    return true;
  }

  // -----------------------------------------------------------------------
  // Serialization
  // -----------------------------------------------------------------------

  getState(): InventoryState {
    return {
      bag: this.bag.map((s) => ({ ...s })),
      gold: this.gold,
      sortMode: this.sortMode,
    };
  }

  /** Replace the whole ledger. The caller validates `state` first. */
  load(state: InventoryState): void {
    this.bag = state.bag.map((s) => ({ ...s }));
    this.gold = state.gold;
    this.sortMode = state.sortMode;
    this.invalidate();
  }

  clear(gold: number = 0): void {
    this.load(createEmptyInventoryState(gold));
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private findMutable(recipeId: number, quality: ItemQuality): InventoryStack | undefined {
    return this.bag.find((s) => s.recipeId === recipeId && s.quality === quality);
  }

  private nameOf(recipeId: number): string {
    return this.recipes.getById(recipeId)?.name ?? 'Unknown Item';
  }

  private stackValue(stack: InventoryStack): number {
    return (this.recipes.getById(stack.recipeId)?.value ?? 0) * stack.quantity;
  }

  private invalidate(): void {
    this.statsCache = null;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createEmptyInventoryState(gold: number = 0): InventoryState {
  return { bag: [], gold, sortMode: 'name' };
}
