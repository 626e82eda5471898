/**
 * Crafting core — barrel export.
 */

export {
  RecipeDifficulty,
  RecipeCatalog,
  loadDefaultRecipeCatalog,
} from '@/crafting/RecipeCatalog';
export type { Recipe } from '@/crafting/RecipeCatalog';

export {
  SkillCatalog,
  loadDefaultSkillCatalog,
} from '@/crafting/SkillCatalog';
export type { Skill, SkillColor } from '@/crafting/SkillCatalog';

export { CraftingEngine } from '@/crafting/CraftingEngine';
export type { CraftingEngineEvents, CraftingState } from '@/crafting/CraftingEngine';
