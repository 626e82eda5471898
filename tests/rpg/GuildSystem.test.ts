import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RecipeCatalog } from '@/crafting/RecipeCatalog';
import { GuildSystem } from '@/rpg/GuildSystem';
import { InventoryLedger, ItemQuality } from '@/rpg/InventorySystem';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const SWORD = 1;
const SCRAP = 3;

function makeRecipes(): RecipeCatalog {
  const base = { materials: ['Ore'], maxProgress: 100, difficulty: 'Easy', category: 'Test' };
  return new RecipeCatalog([
    { ...base, id: SWORD, name: 'Iron Sword', value: 80, sellPrice: 50 },
    { ...base, id: SCRAP, name: 'Iron Scrap', value: 1, sellPrice: 0 },
  ]);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('GuildSystem', () => {
  let inventory: InventoryLedger;
  let guild: GuildSystem;

  beforeEach(() => {
    const recipes = makeRecipes();
    inventory = new InventoryLedger(recipes);
    guild = new GuildSystem(recipes, inventory);
  });

  describe('sell', () => {
    it('trades one item for its sell price', () => {
      inventory.addItem(SWORD, 3);

      const result = guild.sell('Iron Sword');

      expect(result).toEqual({
        success: true,
        recipe: makeRecipes().getById(SWORD),
        goldEarned: 50,
        remaining: 2,
      });
      expect(inventory.getItemQuantity(SWORD)).toBe(2);
      expect(inventory.getGold()).toBe(50);
    });

    it('accepts a recipe id', () => {
      inventory.addItem(SWORD, 1);
      const result = guild.sell(SWORD);
      expect(result.success).toBe(true);
      expect(inventory.isEmpty()).toBe(true);
      expect(inventory.getGold()).toBe(50);
    });

    it('removes the item before crediting gold', () => {
      const order: string[] = [];
      inventory.events.on('itemRemoved', () => order.push('removed'));
      inventory.events.on('goldChanged', () => order.push('credited'));
      inventory.addItem(SWORD, 1);

      guild.sell(SWORD);
      expect(order).toEqual(['removed', 'credited']);
    });

    it('fails for an unknown item', () => {
      expect(guild.sell('Mithril Crown')).toEqual({ success: false, reason: 'unknown_item' });
    });

    it('fails for an item the guild does not buy', () => {
      inventory.addItem(SCRAP, 1);
      expect(guild.sell(SCRAP)).toEqual({ success: false, reason: 'no_sell_price' });
      expect(inventory.getItemQuantity(SCRAP)).toBe(1);
      expect(inventory.getGold()).toBe(0);
    });

    it('fails when the bag has none of that quality', () => {
      inventory.addItem(SWORD, 1, ItemQuality.NORMAL);
      expect(guild.sell(SWORD, ItemQuality.FINE)).toEqual({ success: false, reason: 'not_in_bag' });
      expect(guild.sell('Iron Sword', ItemQuality.NORMAL).success).toBe(true);
    });

    it('never credits gold when the removal fails', () => {
      inventory.addItem(SWORD, 2);
      vi.spyOn(inventory, 'removeItem').mockReturnValue(false);

      expect(guild.sell(SWORD)).toEqual({ success: false, reason: 'not_in_bag' });
      expect(inventory.getGold()).toBe(0);
      expect(inventory.getItemQuantity(SWORD)).toBe(2);
    });
  });

  describe('prices', () => {
    it('returns undefined for items the guild does not buy', () => {
      expect(guild.getSellPrice('Iron Sword')).toBe(50);
      expect(guild.getSellPrice(SCRAP)).toBeUndefined();
      expect(guild.getSellPrice(404)).toBeUndefined();
    });

    it('lists sellable stacks only', () => {
      inventory.addItem(SWORD, 2);
      inventory.addItem(SCRAP, 4);

      const sellable = guild.getSellableStacks();
      expect(sellable).toHaveLength(1);
      expect(sellable[0].recipe.name).toBe('Iron Sword');
      expect(sellable[0].unitPrice).toBe(50);
      expect(sellable[0].stack.quantity).toBe(2);
    });
  });
});
