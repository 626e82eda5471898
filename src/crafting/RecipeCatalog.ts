/**
 * RecipeCatalog.ts — Read-only recipe table for the anvil.
 *
 * Built once from recipes.json (or caller-supplied raw data). Every entry is
 * validated at construction; a bad catalog never becomes usable.
 */

import { z } from 'zod';

import recipesData from '@/data/recipes.json';
import { parseCatalog } from '@/crafting/catalogValidation';

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export enum RecipeDifficulty {
  EASY = 'Easy',
  MEDIUM = 'Medium',
  HARD = 'Hard',
  MASTER = 'Master',
}

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface Recipe {
  readonly id: number;
  readonly name: string;
  readonly materials: readonly string[];
  readonly description: string;
  /** Progress needed to finish one item. Always > 0. */
  readonly maxProgress: number;
  readonly difficulty: RecipeDifficulty;
  readonly category: string;
  readonly unlockLevel: number;
  /** Seconds. Carried for the UI; no logic reads it. */
  readonly craftTime: number;
  readonly value: number;
  /** Fixed price the guild pays for one Normal item. */
  readonly sellPrice: number;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const RecipeSchema = z.object({
  id: z.number({ required_error: 'missing id' }).int('id must be an integer'),
  name: z.string({ required_error: 'missing name' }).min(1, 'missing name'),
  materials: z
    .array(z.string().min(1, 'empty material entry'), { required_error: 'missing materials' })
    .min(1, 'missing materials'),
  description: z.string().default(''),
  maxProgress: z
    .number({ required_error: 'missing maxProgress' })
    .int('maxProgress must be an integer')
    .positive('invalid maxProgress'),
  difficulty: z.nativeEnum(RecipeDifficulty, {
    errorMap: () => ({ message: 'invalid difficulty' }),
  }),
  category: z.string({ required_error: 'missing category' }).min(1, 'missing category'),
  unlockLevel: z.number().int().min(0).default(1),
  craftTime: z.number().min(0).default(0),
  value: z.number({ required_error: 'missing value' }).int().min(0, 'negative value'),
  sellPrice: z.number({ required_error: 'missing sellPrice' }).int().min(0, 'negative sellPrice'),
});

function freezeRecipe(parsed: z.infer<typeof RecipeSchema>): Recipe {
  return Object.freeze({ ...parsed, materials: Object.freeze([...parsed.materials]) });
}

// ---------------------------------------------------------------------------
// RecipeCatalog
// ---------------------------------------------------------------------------

export class RecipeCatalog {
  private readonly recipes: readonly Recipe[];
  private readonly byId: Map<number, Recipe>;

  /** @throws DataValidationError listing every invalid entry. */
  constructor(raw: unknown) {
    const parsed = parseCatalog('Recipe', 'Recipe', raw, RecipeSchema, [
      { label: 'recipe id', pick: (r) => r.id },
    ]);
    this.recipes = Object.freeze(parsed.map(freezeRecipe));
    this.byId = new Map(this.recipes.map((r) => [r.id, r]));
  }

  get count(): number {
    return this.recipes.length;
  }

  getAll(): readonly Recipe[] {
    return this.recipes;
  }

  getById(id: number): Recipe | undefined {
    return this.byId.get(id);
  }

  getByName(name: string): Recipe | undefined {
    return this.recipes.find((r) => r.name === name);
  }

  getByCategory(category: string): Recipe[] {
    return this.recipes.filter((r) => r.category === category);
  }

  getByDifficulty(difficulty: RecipeDifficulty): Recipe[] {
    return this.recipes.filter((r) => r.difficulty === difficulty);
  }

  /** Recipes a crafter of `maxLevel` may know. */
  getByUnlockLevel(maxLevel: number): Recipe[] {
    return this.recipes.filter((r) => r.unlockLevel <= maxLevel);
  }

  /** Distinct categories in first-seen order. */
  getCategories(): string[] {
    return [...new Set(this.recipes.map((r) => r.category))];
  }

  getDifficulties(): RecipeDifficulty[] {
    return Object.values(RecipeDifficulty);
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function loadDefaultRecipeCatalog(): RecipeCatalog {
  return new RecipeCatalog(recipesData);
}
