// ---------------------------------------------------------------------------
// CraftingEngine.ts — The anvil minigame: one crafting session at a time
// ---------------------------------------------------------------------------
// Skill presses add a fixed bonus to the active session's progress. Progress
// is clamped at the recipe's maxProgress; overflow is discarded, never carried
// into the next item. Reaching maxProgress completes the session once.
// ---------------------------------------------------------------------------

import balanceData from '@/data/balance.json';
import { EventBus } from '@/engine/EventBus';
import type { Recipe, RecipeCatalog } from '@/crafting/RecipeCatalog';
import type { Skill, SkillCatalog } from '@/crafting/SkillCatalog';

const DEFAULT_MAX_PROGRESS = balanceData.crafting.defaultMaxProgress; // 100

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface CraftingEngineEvents {
  craftingComplete: [recipe: Recipe];
  progressChanged: [progress: number, maxProgress: number, delta: number];
  sessionStarted: [recipe: Recipe];
  sessionStopped: [recipe: Recipe, completed: boolean];
}

/** Read-only snapshot of the session for the presentation layer. */
export interface CraftingState {
  isActive: boolean;
  isCompleted: boolean;
  activeRecipe: Recipe | null;
  progress: number;
  maxProgress: number;
  /** 0-100. */
  progressPercentage: number;
}

interface CraftingSession {
  recipe: Recipe;
  progress: number;
  isCompleted: boolean;
}

// ---------------------------------------------------------------------------
// CraftingEngine
// ---------------------------------------------------------------------------

export class CraftingEngine {
  public readonly events = new EventBus<CraftingEngineEvents>('CraftingEngine');

  private readonly recipes: RecipeCatalog;
  private readonly skills: SkillCatalog;

  /** `null` when no session exists. */
  private session: CraftingSession | null = null;

  /** 1-based cursor into the recipe catalog for the selection screen. */
  private selectedRecipeIndex = 1;

  constructor(recipes: RecipeCatalog, skills: SkillCatalog) {
    this.recipes = recipes;
    this.skills = skills;
    console.log(
      `[CraftingEngine] Loaded ${recipes.count} recipes and ${skills.count} skills`,
    );
  }

  // -----------------------------------------------------------------------
  // Recipe browsing
  // -----------------------------------------------------------------------

  getRecipes(): readonly Recipe[] {
    return this.recipes.getAll();
  }

  getRecipe(id: number): Recipe | undefined {
    return this.recipes.getById(id);
  }

  get selectedIndex(): number {
    return this.selectedRecipeIndex;
  }

  getSelectedRecipe(): Recipe | undefined {
    return this.recipes.getAll()[this.selectedRecipeIndex - 1];
  }

  /** Move the cursor, clamped to [1, count]. Does not touch the session. */
  selectRecipe(index: number): void {
    if (!Number.isFinite(index)) {
      console.warn(`[CraftingEngine] Ignoring invalid recipe index: ${index}`);
      return;
    }
    const count = this.recipes.count;
    this.selectedRecipeIndex = Math.max(1, Math.min(count, Math.trunc(index)));
  }

  selectNext(): void {
    this.selectRecipe(this.selectedRecipeIndex + 1);
  }

  selectPrevious(): void {
    this.selectRecipe(this.selectedRecipeIndex - 1);
  }

  // -----------------------------------------------------------------------
  // Session lifecycle
  // -----------------------------------------------------------------------

  /**
   * Begin crafting `recipe`, discarding any unfinished session.
   * Returns false (and changes nothing) when no recipe is given.
   */
  startCrafting(recipe: Recipe | null | undefined): boolean {
    if (!recipe) {
      console.warn('[CraftingEngine] Cannot start crafting - no recipe provided');
      return false;
    }

    this.session = { recipe, progress: 0, isCompleted: false };
    console.log(`[CraftingEngine] Started crafting ${recipe.name}`);
    this.events.emit('sessionStarted', recipe);
    return true;
  }

  /** Clear the session. Safe to call when nothing is being crafted. */
  stopCrafting(): void {
    const ended = this.session;
    this.session = null;
    if (!ended) return;

    console.log(`[CraftingEngine] Stopped crafting ${ended.recipe.name}`);
    this.events.emit('sessionStopped', ended.recipe, ended.isCompleted);
  }

  isCurrentlyCrafting(): boolean {
    return this.session !== null && !this.session.isCompleted;
  }

  isCraftingCompleted(): boolean {
    return this.session?.isCompleted ?? false;
  }

  // -----------------------------------------------------------------------
  // Skills
  // -----------------------------------------------------------------------

  /** Skills shown on the skill bar. */
  getSkills(): Skill[] {
    return this.skills.getActive();
  }

  getAllSkills(): readonly Skill[] {
    return this.skills.getAll();
  }

  getSkill(id: number): Skill | undefined {
    return this.skills.getById(id);
  }

  getSkillByKey(key: string): Skill | undefined {
    return this.skills.getByKey(key);
  }

  /**
   * Apply a skill to the active session.
   *
   * Fails without changing state when nothing is being crafted, the session
   * is already complete, or the skill id is unknown.
   */
  useSkill(skillId: number): boolean {
    const session = this.session;
    if (!session || session.isCompleted) {
      console.warn('[CraftingEngine] Cannot use skill - not currently crafting');
      return false;
    }

    const skill = this.skills.getById(skillId);
    if (!skill) {
      console.warn(`[CraftingEngine] Invalid skill ID: ${skillId}`);
      return false;
    }

    const { maxProgress } = session.recipe;
    const before = session.progress;
    session.progress = Math.min(maxProgress, before + skill.progressBonus);
    const delta = session.progress - before;

    console.log(
      `[CraftingEngine] Used ${skill.name} - Progress: ${session.progress}/${maxProgress}`,
    );

    if (session.progress >= maxProgress) {
      session.isCompleted = true;
      console.log(`[CraftingEngine] Crafting completed: ${session.recipe.name}`);
      this.events.emit('craftingComplete', session.recipe);
    }

    // A completion listener may have started the next session already.
    if (delta > 0 && this.session === session) {
      this.events.emit('progressChanged', session.progress, maxProgress, delta);
    }

    return true;
  }

  useSkillByKey(key: string): boolean {
    const skill = this.skills.getByKey(key);
    if (!skill) return false;
    return this.useSkill(skill.id);
  }

  // -----------------------------------------------------------------------
  // Progress queries
  // -----------------------------------------------------------------------

  getProgress(): number {
    return this.session?.progress ?? 0;
  }

  /** The active recipe's target, or the default target when idle. */
  getMaxProgress(): number {
    return this.session?.recipe.maxProgress ?? DEFAULT_MAX_PROGRESS;
  }

  getProgressPercentage(): number {
    const max = this.getMaxProgress();
    if (max <= 0) return 0;
    return (this.getProgress() / max) * 100;
  }

  getActiveRecipe(): Recipe | null {
    return this.session?.recipe ?? null;
  }

  getCraftingState(): CraftingState {
    return {
      isActive: this.session !== null,
      isCompleted: this.isCraftingCompleted(),
      activeRecipe: this.getActiveRecipe(),
      progress: this.getProgress(),
      maxProgress: this.getMaxProgress(),
      progressPercentage: this.getProgressPercentage(),
    };
  }
}
