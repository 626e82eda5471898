/**
 * Player-side systems — barrel export.
 *
 * Re-exports the bag, recipe book and guild for single-import access.
 */

// Inventory
export {
  ItemQuality,
  QUALITY_TIER,
  BAG_SORT_MODES,
  InventoryLedger,
  createEmptyInventoryState,
} from '@/rpg/InventorySystem';
export type {
  BagSortMode,
  InventoryStack,
  InventoryState,
  BagStats,
  InventoryEvents,
  InventoryOptions,
} from '@/rpg/InventorySystem';

// Recipe Book
export { RecipeBook } from '@/rpg/RecipeBook';
export type {
  RecipeBookEntry,
  RecipeBookStats,
  RecipeBookEvents,
  RecipeBookOptions,
} from '@/rpg/RecipeBook';

// Guild
export { GuildSystem } from '@/rpg/GuildSystem';
export type {
  RecipeRef,
  SaleFailureReason,
  SaleResult,
  SellableStack,
} from '@/rpg/GuildSystem';
