// ---------------------------------------------------------------------------
// RecipeBook.ts — Recipes the player has learned at the anvil
// ---------------------------------------------------------------------------
// One entry per unlocked recipe with its completion counter and favorite
// flag. The sorted listing is cached for a short window and rebuilt after
// every mutation.
// ---------------------------------------------------------------------------

import balanceData from '@/data/balance.json';
import { EventBus } from '@/engine/EventBus';
import { RecipeNotUnlockedError } from '@/engine/errors';
import type { Recipe, RecipeCatalog } from '@/crafting/RecipeCatalog';

const CACHE_WINDOW_MS = balanceData.recipeBook.cacheWindowMs; // 1000

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface RecipeBookEntry {
  recipeId: number;
  /** Epoch milliseconds. */
  dateUnlocked: number;
  timesCompleted: number;
  favorite: boolean;
}

export interface RecipeBookStats {
  totalRecipes: number;
  unlockedCount: number;
  completedCount: number;
  /** completedCount / unlockedCount, 0 when nothing is unlocked. */
  completionRate: number;
}

export interface RecipeBookEvents {
  recipeUnlocked: [entry: Readonly<RecipeBookEntry>];
  recipeCompleted: [entry: Readonly<RecipeBookEntry>];
}

export interface RecipeBookOptions {
  now?: () => number;
  /** How long `getUnlockedRecipes()` may serve a cached listing. */
  cacheWindowMs?: number;
}

interface ListingCache {
  entries: ReadonlyArray<Readonly<RecipeBookEntry>>;
  builtAt: number;
}

// ---------------------------------------------------------------------------
// RecipeBook
// ---------------------------------------------------------------------------

export class RecipeBook {
  public readonly events = new EventBus<RecipeBookEvents>('RecipeBook');

  private readonly recipes: RecipeCatalog;
  private readonly now: () => number;
  private readonly cacheWindowMs: number;

  private entries: Map<number, RecipeBookEntry> = new Map();
  private listing: ListingCache | null = null;

  constructor(recipes: RecipeCatalog, options: RecipeBookOptions = {}) {
    this.recipes = recipes;
    this.now = options.now ?? Date.now;
    this.cacheWindowMs = options.cacheWindowMs ?? CACHE_WINDOW_MS;
  }

  // ---- Unlocking ----------------------------------------------------------

  /** Unlock a recipe. Already-unlocked recipes return their existing entry. */
  unlockRecipe(recipeId: number): Readonly<RecipeBookEntry> {
    const existing = this.entries.get(recipeId);
    if (existing) return existing;

    const entry: RecipeBookEntry = {
      recipeId,
      dateUnlocked: this.now(),
      timesCompleted: 0,
      favorite: false,
    };
    this.entries.set(recipeId, entry);
    this.invalidate();

    console.log(`[RecipeBook] Unlocked recipe - ${this.nameOf(recipeId)}`);
    this.events.emit('recipeUnlocked', entry);
    return entry;
  }

  /**
   * Record one finished craft.
   * @throws RecipeNotUnlockedError when the recipe is not in the book.
   */
  completeRecipe(recipeId: number): Readonly<RecipeBookEntry> {
    const entry = this.entries.get(recipeId);
    if (!entry) {
      throw new RecipeNotUnlockedError(recipeId);
    }

    entry.timesCompleted += 1;
    this.invalidate();

    console.log(
      `[RecipeBook] Completed recipe - ${this.nameOf(recipeId)} (total: ${entry.timesCompleted} times)`,
    );
    this.events.emit('recipeCompleted', entry);
    return entry;
  }

  /** Flip the favorite flag. Returns the new state, or false when not unlocked. */
  toggleFavorite(recipeId: number): boolean {
    const entry = this.entries.get(recipeId);
    if (!entry) return false;

    entry.favorite = !entry.favorite;
    this.invalidate();
    return entry.favorite;
  }

  // ---- Queries ------------------------------------------------------------

  isRecipeUnlocked(recipeId: number): boolean {
    return this.entries.has(recipeId);
  }

  getEntry(recipeId: number): Readonly<RecipeBookEntry> | undefined {
    return this.entries.get(recipeId);
  }

  getRecipeCompletionCount(recipeId: number): number {
    return this.entries.get(recipeId)?.timesCompleted ?? 0;
  }

  /** Entries in unlock order. */
  getEntries(): ReadonlyArray<Readonly<RecipeBookEntry>> {
    return [...this.entries.values()];
  }

  /** Favorites first, then by recipe name. Unknown recipes sort last. */
  getUnlockedRecipes(): ReadonlyArray<Readonly<RecipeBookEntry>> {
    const now = this.now();
    if (this.listing && now - this.listing.builtAt < this.cacheWindowMs) {
      return this.listing.entries;
    }

    const sorted = [...this.entries.values()].sort((a, b) => {
      if (a.favorite !== b.favorite) return a.favorite ? -1 : 1;

      const recipeA = this.recipes.getById(a.recipeId);
      const recipeB = this.recipes.getById(b.recipeId);
      if (recipeA && recipeB) return recipeA.name.localeCompare(recipeB.name);
      if (recipeA) return -1;
      if (recipeB) return 1;
      return a.recipeId - b.recipeId;
    });

    this.listing = { entries: Object.freeze(sorted), builtAt: now };
    return this.listing.entries;
  }

  /** Unlocked recipes the anvil can craft, in listing order. */
  getAvailableRecipes(): Recipe[] {
    return this.getUnlockedRecipes()
      .map((entry) => this.recipes.getById(entry.recipeId))
      .filter((recipe): recipe is Recipe => recipe !== undefined);
  }

  getRecipeBookStats(): RecipeBookStats {
    const unlockedCount = this.entries.size;
    let completedCount = 0;
    for (const entry of this.entries.values()) {
      if (entry.timesCompleted > 0) completedCount++;
    }
    return {
      totalRecipes: this.recipes.count,
      unlockedCount,
      completedCount,
      completionRate: unlockedCount > 0 ? completedCount / unlockedCount : 0,
    };
  }

  // ---- Serialization ------------------------------------------------------

  getState(): RecipeBookEntry[] {
    return [...this.entries.values()].map((e) => ({ ...e }));
  }

  /** Replace every entry. The caller validates `entries` first. */
  load(entries: readonly RecipeBookEntry[]): void {
    this.entries = new Map(entries.map((e) => [e.recipeId, { ...e }]));
    this.invalidate();
  }

  clear(): void {
    this.load([]);
  }

  // ---- Private helpers ----------------------------------------------------

  private nameOf(recipeId: number): string {
    return this.recipes.getById(recipeId)?.name ?? 'Unknown Recipe';
  }

  private invalidate(): void {
    this.listing = null;
  }
}
