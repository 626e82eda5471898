// ---------------------------------------------------------------------------
// Workshop.ts — Wires the crafting core together for one player
// ---------------------------------------------------------------------------
// Owns every component instance. A finished craft is deposited in the bag and
// counted in the recipe book through the engine's `craftingComplete` event.
// ---------------------------------------------------------------------------

import balanceData from '@/data/balance.json';
import recipesData from '@/data/recipes.json';
import skillsData from '@/data/skills.json';
import { CraftingEngine } from '@/crafting/CraftingEngine';
import { RecipeCatalog, type Recipe } from '@/crafting/RecipeCatalog';
import { SkillCatalog } from '@/crafting/SkillCatalog';
import {
  SaveManager,
  deserializeInventory,
  serializeInventory,
  validateInventory,
  type InventorySnapshot,
  type SaveStore,
  type ValidationReport,
} from '@/engine/SaveManager';
import { GuildSystem } from '@/rpg/GuildSystem';
import { InventoryLedger, ItemQuality, type BagStats } from '@/rpg/InventorySystem';
import { RecipeBook, type RecipeBookStats } from '@/rpg/RecipeBook';

const STARTER_LEVEL = balanceData.starter.level;
const STARTER_GOLD = balanceData.starter.gold;

// Debug kit
const TEST_UNLOCKS: readonly number[] = [2, 4];
const IRON_SWORD_ID = 1;
const HEALING_POTION_ID = 9;

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface WorkshopOptions {
  /** Raw recipe data. Defaults to the shipped recipes.json. */
  recipes?: unknown;
  /** Raw skill data. Defaults to the shipped skills.json. */
  skills?: unknown;
  now?: () => number;
  cacheWindowMs?: number;
  store?: SaveStore;
}

export interface InventoryStats {
  bag: Readonly<BagStats>;
  recipeBook: RecipeBookStats;
}

// ---------------------------------------------------------------------------
// Workshop
// ---------------------------------------------------------------------------

export class Workshop {
  public readonly recipes: RecipeCatalog;
  public readonly skills: SkillCatalog;
  public readonly engine: CraftingEngine;
  public readonly inventory: InventoryLedger;
  public readonly recipeBook: RecipeBook;
  public readonly guild: GuildSystem;
  public readonly saves: SaveManager;

  /** Quality given to the next finished craft. */
  public craftQuality: ItemQuality = ItemQuality.NORMAL;

  private readonly now: () => number;
  private readonly detach: () => void;

  /** @throws DataValidationError when either catalog is invalid. */
  constructor(options: WorkshopOptions = {}) {
    this.now = options.now ?? Date.now;

    this.recipes = new RecipeCatalog(options.recipes ?? recipesData);
    this.skills = new SkillCatalog(options.skills ?? skillsData);
    this.engine = new CraftingEngine(this.recipes, this.skills);
    this.inventory = new InventoryLedger(this.recipes, { now: this.now });
    this.recipeBook = new RecipeBook(this.recipes, {
      now: this.now,
      cacheWindowMs: options.cacheWindowMs,
    });
    this.guild = new GuildSystem(this.recipes, this.inventory);
    this.saves = new SaveManager(options.store);

    this.detach = this.engine.events.on('craftingComplete', (recipe) => {
      this.depositCraftedItem(recipe);
    });
  }

  private depositCraftedItem(recipe: Recipe): void {
    this.recipeBook.unlockRecipe(recipe.id);
    this.inventory.addItem(recipe.id, 1, this.craftQuality);
    this.recipeBook.completeRecipe(recipe.id);
    console.log(`[Workshop] ${recipe.name} (${this.craftQuality}) added to bag`);
  }

  // ---- Player state -------------------------------------------------------

  /** Empty bag, starter gold, and every recipe a level-1 smith knows. */
  resetToStarter(): void {
    this.engine.stopCrafting();
    this.inventory.clear(STARTER_GOLD);
    this.recipeBook.clear();
    for (const recipe of this.recipes.getByUnlockLevel(STARTER_LEVEL)) {
      this.recipeBook.unlockRecipe(recipe.id);
    }
  }

  grantTestItems(): void {
    for (const id of TEST_UNLOCKS) {
      this.recipeBook.unlockRecipe(id);
    }
    this.inventory.addItem(IRON_SWORD_ID, 3, ItemQuality.NORMAL);
    this.inventory.addItem(IRON_SWORD_ID, 1, ItemQuality.FINE);
    this.inventory.addItem(HEALING_POTION_ID, 5, ItemQuality.NORMAL);
    console.log('[Workshop] Test items granted');
  }

  getInventoryStats(): InventoryStats {
    return {
      bag: this.inventory.getBagStats(),
      recipeBook: this.recipeBook.getRecipeBookStats(),
    };
  }

  // ---- Persistence --------------------------------------------------------

  getSnapshot(): InventorySnapshot {
    const { bag, gold, sortMode } = this.inventory.getState();
    return { bag, recipeBook: this.recipeBook.getState(), gold, sortMode };
  }

  save(): string {
    return serializeInventory(this.getSnapshot(), this.now());
  }

  /**
   * Install a saved blob. Anything unreadable or invalid leaves the starter
   * state in place instead.
   */
  load(blob: string): ValidationReport {
    const snapshot = deserializeInventory(blob);
    if (!snapshot) {
      return this.rejectLoad(['Save data could not be read']);
    }
    return this.install(snapshot);
  }

  async saveToSlot(slot: number): Promise<boolean> {
    return this.saves.save(slot, this.getSnapshot());
  }

  async loadFromSlot(slot: number): Promise<ValidationReport> {
    const snapshot = await this.saves.load(slot);
    if (!snapshot) {
      return this.rejectLoad([`Slot ${slot} holds no readable save`]);
    }
    return this.install(snapshot);
  }

  private install(snapshot: InventorySnapshot): ValidationReport {
    const report = validateInventory(snapshot, this.recipes);
    if (!report.valid) {
      return this.rejectLoad(report.issues);
    }

    this.inventory.load({ bag: snapshot.bag, gold: snapshot.gold, sortMode: snapshot.sortMode });
    this.recipeBook.load(snapshot.recipeBook);
    console.log(
      `[Workshop] Loaded ${snapshot.bag.length} stacks and ${snapshot.recipeBook.length} recipes`,
    );
    return report;
  }

  private rejectLoad(issues: string[]): ValidationReport {
    console.warn(`[Workshop] Rejected save data:\n${issues.join('\n')}`);
    this.resetToStarter();
    return { valid: false, issues };
  }

  /** Detach every listener. The workshop must not be used afterwards. */
  dispose(): void {
    this.detach();
    this.engine.events.clear();
    this.inventory.events.clear();
    this.recipeBook.events.clear();
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** A workshop with the starter state installed. */
export function createWorkshop(options: WorkshopOptions = {}): Workshop {
  const workshop = new Workshop(options);
  workshop.resetToStarter();
  return workshop;
}
