import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createWorkshop, type Workshop } from './Workshop';
import { DataValidationError } from './errors';
import { MemorySaveStore, serializeInventory } from './SaveManager';
import { ItemQuality } from '@/rpg/InventorySystem';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const IRON_SWORD = 1;
const STEEL_LONGSWORD = 2;
const STEEL_CHESTPLATE = 4;
const HEALING_POTION = 9;

/** Forge (+25) until the active session completes. */
function finishCraft(workshop: Workshop, recipeId: number): void {
  workshop.engine.startCrafting(workshop.recipes.getById(recipeId));
  while (workshop.engine.isCurrentlyCrafting()) {
    workshop.engine.useSkill(1);
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Workshop', () => {
  let workshop: Workshop;

  beforeEach(() => {
    workshop = createWorkshop({ now: () => 1000 });
  });

  describe('starter state', () => {
    it('begins with an empty bag, no gold and the level-1 recipes', () => {
      expect(workshop.inventory.isEmpty()).toBe(true);
      expect(workshop.inventory.getGold()).toBe(0);
      expect(workshop.recipeBook.getEntries().map((e) => e.recipeId)).toEqual([IRON_SWORD, HEALING_POTION]);
    });

    it('rejects invalid catalog data', () => {
      expect(() => createWorkshop({ recipes: [{ id: 1 }] })).toThrow(DataValidationError);
    });
  });

  describe('crafting completion', () => {
    it('deposits the item and counts the completion', () => {
      finishCraft(workshop, HEALING_POTION);

      expect(workshop.engine.getProgress()).toBe(80);
      expect(workshop.inventory.getItemQuantity(HEALING_POTION)).toBe(1);
      expect(workshop.recipeBook.getRecipeCompletionCount(HEALING_POTION)).toBe(1);
    });

    it('unlocks a recipe crafted for the first time', () => {
      finishCraft(workshop, STEEL_LONGSWORD);

      expect(workshop.recipeBook.isRecipeUnlocked(STEEL_LONGSWORD)).toBe(true);
      expect(workshop.recipeBook.getRecipeCompletionCount(STEEL_LONGSWORD)).toBe(1);
      expect(workshop.inventory.getItemQuantity(STEEL_LONGSWORD)).toBe(1);
    });

    it('uses the current craft quality', () => {
      workshop.craftQuality = ItemQuality.FINE;
      finishCraft(workshop, IRON_SWORD);

      expect(workshop.inventory.getItemQuantity(IRON_SWORD, ItemQuality.FINE)).toBe(1);
      expect(workshop.inventory.getItemQuantity(IRON_SWORD, ItemQuality.NORMAL)).toBe(0);
    });

    it('leaves room for other listeners', () => {
      const onComplete = vi.fn();
      workshop.engine.events.on('craftingComplete', onComplete);
      finishCraft(workshop, IRON_SWORD);

      expect(onComplete).toHaveBeenCalledTimes(1);
      expect(workshop.inventory.getItemQuantity(IRON_SWORD)).toBe(1);
    });

    it('stops depositing after dispose', () => {
      workshop.dispose();
      finishCraft(workshop, IRON_SWORD);
      expect(workshop.inventory.isEmpty()).toBe(true);
    });
  });

  describe('grantTestItems', () => {
    it('fills the bag with the debug kit', () => {
      workshop.grantTestItems();

      expect(workshop.recipeBook.isRecipeUnlocked(STEEL_LONGSWORD)).toBe(true);
      expect(workshop.recipeBook.isRecipeUnlocked(STEEL_CHESTPLATE)).toBe(true);
      expect(workshop.getInventoryStats()).toEqual({
        bag: {
          totalItems: 9,
          totalValue: 325,
          uniqueStacks: 3,
          qualityBreakdown: {
            [ItemQuality.NORMAL]: 8,
            [ItemQuality.FINE]: 1,
            [ItemQuality.EXCEPTIONAL]: 0,
            [ItemQuality.MASTERWORK]: 0,
          },
        },
        recipeBook: {
          totalRecipes: 10,
          unlockedCount: 4,
          completedCount: 0,
          completionRate: 0,
        },
      });
    });

    it('stocks items the guild buys', () => {
      workshop.grantTestItems();
      const result = workshop.guild.sell('Iron Sword');

      expect(result.success).toBe(true);
      expect(workshop.inventory.getGold()).toBe(30);
      expect(workshop.inventory.getItemQuantity(IRON_SWORD)).toBe(2);
    });
  });

  describe('save and load', () => {
    it('restores a saved workshop', () => {
      workshop.grantTestItems();
      workshop.inventory.addGold(45);
      workshop.recipeBook.toggleFavorite(HEALING_POTION);

      const restored = createWorkshop({ now: () => 9000 });
      expect(restored.load(workshop.save())).toEqual({ valid: true, issues: [] });
      expect(restored.getSnapshot()).toEqual(workshop.getSnapshot());
    });

    it('falls back to the starter state on unreadable data', () => {
      workshop.grantTestItems();

      expect(workshop.load('garbage')).toEqual({ valid: false, issues: ['Save data could not be read'] });
      expect(workshop.inventory.isEmpty()).toBe(true);
      expect(workshop.recipeBook.isRecipeUnlocked(STEEL_LONGSWORD)).toBe(false);
      expect(workshop.recipeBook.isRecipeUnlocked(IRON_SWORD)).toBe(true);
    });

    it('falls back to the starter state on invalid data', () => {
      workshop.inventory.addGold(500);
      const blob = serializeInventory({
        bag: [{ recipeId: 42, quantity: 1, quality: ItemQuality.NORMAL, dateAdded: 0 }],
        recipeBook: [],
        gold: 10,
        sortMode: 'name',
      });

      expect(workshop.load(blob)).toEqual({
        valid: false,
        issues: ['Bag item 1 references unknown recipe 42'],
      });
      expect(workshop.inventory.getGold()).toBe(0);
    });

    it('round-trips through a save slot', async () => {
      const store = new MemorySaveStore();
      const first = createWorkshop({ store });
      first.grantTestItems();
      expect(await first.saveToSlot(1)).toBe(true);

      const second = createWorkshop({ store });
      expect(await second.loadFromSlot(1)).toEqual({ valid: true, issues: [] });
      expect(second.getSnapshot()).toEqual(first.getSnapshot());
    });

    it('reports an empty slot', async () => {
      expect(await workshop.loadFromSlot(2)).toEqual({
        valid: false,
        issues: ['Slot 2 holds no readable save'],
      });
    });
  });
});
