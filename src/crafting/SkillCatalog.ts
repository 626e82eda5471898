/**
 * SkillCatalog.ts — Crafting skills bound to the number keys.
 *
 * Loads skills.json. Only `progressBonus` drives gameplay; cooldown, mana,
 * crit and effect fields are carried as data for the presentation layer.
 */

import { z } from 'zod';

import skillsData from '@/data/skills.json';
import balanceData from '@/data/balance.json';
import { parseCatalog } from '@/crafting/catalogValidation';

const ACTIVE_SKILL_SLOTS = balanceData.crafting.activeSkillSlots; // 5

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** RGBA, each channel in 0..1. */
export type SkillColor = readonly [number, number, number, number];

export interface Skill {
  readonly id: number;
  /** Single character that triggers the skill. Unique across the catalog. */
  readonly key: string;
  readonly name: string;
  readonly description: string;
  readonly progressBonus: number;
  readonly color: SkillColor;
  readonly category: string;
  readonly unlockLevel: number;
  readonly cooldown: number;
  readonly manaCost: number;
  readonly critChance: number;
  readonly critMultiplier: number;
  readonly soundEffect?: string;
  readonly visualEffect?: string;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const COLOR_MESSAGE = 'invalid color (should be [r, g, b, a])';

const SkillSchema = z.object({
  id: z.number({ required_error: 'missing id' }).int('id must be an integer'),
  key: z.string({ required_error: 'missing key' }).length(1, 'key must be a single character'),
  name: z.string({ required_error: 'missing name' }).min(1, 'missing name'),
  description: z.string().default(''),
  progressBonus: z
    .number({ required_error: 'missing progressBonus' })
    .int('progressBonus must be an integer')
    .positive('invalid progressBonus'),
  color: z
    .array(z.number().min(0, COLOR_MESSAGE).max(1, COLOR_MESSAGE), { required_error: COLOR_MESSAGE })
    .length(4, COLOR_MESSAGE)
    .transform((c): SkillColor => [c[0], c[1], c[2], c[3]]),
  category: z.string({ required_error: 'missing category' }).min(1, 'missing category'),
  unlockLevel: z.number().int().min(0).default(1),
  cooldown: z.number().min(0).default(0),
  manaCost: z.number().min(0).default(0),
  critChance: z.number().min(0).max(1).default(0),
  critMultiplier: z.number().min(1).default(1),
  soundEffect: z.string().optional(),
  visualEffect: z.string().optional(),
});

// ---------------------------------------------------------------------------
// SkillCatalog
// ---------------------------------------------------------------------------

export class SkillCatalog {
  private readonly skills: readonly Skill[];
  private readonly byId: Map<number, Skill>;
  private readonly byKey: Map<string, Skill>;

  /** @throws DataValidationError listing every invalid entry. */
  constructor(raw: unknown) {
    const parsed = parseCatalog('Skill', 'Skill', raw, SkillSchema, [
      { label: 'skill id', pick: (s) => s.id },
      { label: 'skill key', pick: (s) => s.key },
    ]);
    this.skills = Object.freeze(parsed.map((s): Skill => Object.freeze(s)));
    this.byId = new Map(this.skills.map((s) => [s.id, s]));
    this.byKey = new Map(this.skills.map((s) => [s.key, s]));
  }

  get count(): number {
    return this.skills.length;
  }

  getAll(): readonly Skill[] {
    return this.skills;
  }

  /** The first `maxSkills` skills, shown on the skill bar. */
  getActive(maxSkills: number = ACTIVE_SKILL_SLOTS): Skill[] {
    return this.skills.slice(0, Math.max(0, maxSkills));
  }

  getById(id: number): Skill | undefined {
    return this.byId.get(id);
  }

  getByKey(key: string): Skill | undefined {
    return this.byKey.get(key);
  }

  getByCategory(category: string): Skill[] {
    return this.skills.filter((s) => s.category === category);
  }

  getByUnlockLevel(maxLevel: number): Skill[] {
    return this.skills.filter((s) => s.unlockLevel <= maxLevel);
  }

  getCategories(): string[] {
    return [...new Set(this.skills.map((s) => s.category))];
  }

  /** Sum of progress bonuses available at `playerLevel` (every skill when omitted). */
  getTotalProgressPotential(playerLevel: number = Infinity): number {
    return this.getByUnlockLevel(playerLevel).reduce((sum, s) => sum + s.progressBonus, 0);
  }

  getKeyboardLayout(): ReadonlyMap<string, Skill> {
    return this.byKey;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function loadDefaultSkillCatalog(): SkillCatalog {
  return new SkillCatalog(skillsData);
}
