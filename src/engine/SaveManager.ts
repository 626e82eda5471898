import { z } from 'zod';

import balanceData from '@/data/balance.json';
import type { RecipeCatalog } from '@/crafting/RecipeCatalog';
import { ItemQuality, type BagSortMode, type InventoryStack } from '@/rpg/InventorySystem';
import type { RecipeBookEntry } from '@/rpg/RecipeBook';

const CURRENT_SAVE_VERSION = balanceData.save.version;
const AUTOSAVE_SLOT = 0;
const MAX_MANUAL_SLOT = balanceData.save.maxSlot;

// ── Zod Schemas ──────────────────────────────────────────────────────────────
// Structure only. Game rules (known recipes, positive quantities, no
// duplicate stacks) are checked by validateInventory().

const InventoryStackSchema = z.object({
  recipeId: z.number().int(),
  quantity: z.number().int(),
  quality: z.nativeEnum(ItemQuality),
  dateAdded: z.number(),
});

const RecipeBookEntrySchema = z.object({
  recipeId: z.number().int(),
  dateUnlocked: z.number(),
  timesCompleted: z.number().int(),
  favorite: z.boolean(),
});

const BagSortModeSchema = z.enum(['name', 'quantity', 'date', 'quality', 'value']);

const InventorySnapshotSchema = z.object({
  bag: z.array(InventoryStackSchema),
  recipeBook: z.array(RecipeBookEntrySchema),
  gold: z.number().int(),
  sortMode: BagSortModeSchema.default('name'),
});

const SaveDataSchema = z.object({
  version: z.string(),
  timestamp: z.number(),
  inventory: InventorySnapshotSchema,
});

// ── Exported Types ───────────────────────────────────────────────────────────

/** Everything persisted for one player: bag, recipe book and wallet. */
export interface InventorySnapshot {
  bag: InventoryStack[];
  recipeBook: RecipeBookEntry[];
  gold: number;
  sortMode: BagSortMode;
}

export type SaveData = z.infer<typeof SaveDataSchema>;

export interface ValidationReport {
  valid: boolean;
  issues: string[];
}

export interface SaveSlotInfo {
  slot: number;
  exists: boolean;
  timestamp?: number;
  itemCount?: number;
  recipeCount?: number;
  gold?: number;
}

/** Async key/value store with the getItem/setItem/removeItem shape of localforage. */
export interface SaveStore {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
}

// ── Serialization ────────────────────────────────────────────────────────────

export function serializeInventory(
  snapshot: InventorySnapshot,
  timestamp: number = Date.now(),
): string {
  const data: SaveData = {
    version: CURRENT_SAVE_VERSION,
    timestamp,
    inventory: snapshot,
  };
  return JSON.stringify(data);
}

function parseSaveData(blob: string): SaveData | null {
  let raw: unknown;
  try {
    raw = JSON.parse(blob);
  } catch (err: unknown) {
    console.error('[SaveManager] Save data is not valid JSON:', err);
    return null;
  }

  const result = SaveDataSchema.safeParse(raw);
  if (!result.success) {
    console.error('[SaveManager] Corrupted save data:', result.error.issues);
    return null;
  }
  return migrateIfNeeded(result.data);
}

function migrateIfNeeded(data: SaveData): SaveData {
  if (data.version !== CURRENT_SAVE_VERSION) {
    console.warn(
      `[SaveManager] Save version mismatch: found "${data.version}", expected "${CURRENT_SAVE_VERSION}".`,
    );
  }
  return data;
}

/** Structural decode of a blob. Returns null when it cannot be read at all. */
export function deserializeInventory(blob: string): InventorySnapshot | null {
  return parseSaveData(blob)?.inventory ?? null;
}

/**
 * Check a decoded snapshot against the game rules before it is installed.
 * Collects every problem rather than stopping at the first.
 */
export function validateInventory(
  snapshot: InventorySnapshot,
  recipes: RecipeCatalog,
): ValidationReport {
  const issues: string[] = [];

  const stackKeys = new Set<string>();
  snapshot.bag.forEach((stack, i) => {
    if (!recipes.getById(stack.recipeId)) {
      issues.push(`Bag item ${i + 1} references unknown recipe ${stack.recipeId}`);
    }
    if (stack.quantity <= 0) {
      issues.push(`Bag item ${i + 1} has invalid quantity ${stack.quantity}`);
    }
    const key = `${stack.recipeId}:${stack.quality}`;
    if (stackKeys.has(key)) {
      issues.push(`Duplicate bag stack for recipe ${stack.recipeId} (${stack.quality})`);
    }
    stackKeys.add(key);
  });

  const bookIds = new Set<number>();
  snapshot.recipeBook.forEach((entry, i) => {
    if (!recipes.getById(entry.recipeId)) {
      issues.push(`Recipe book entry ${i + 1} references unknown recipe ${entry.recipeId}`);
    }
    if (entry.timesCompleted < 0) {
      issues.push(`Recipe book entry ${i + 1} has negative completion count`);
    }
    if (bookIds.has(entry.recipeId)) {
      issues.push(`Duplicate recipe book entry for recipe ${entry.recipeId}`);
    }
    bookIds.add(entry.recipeId);
  });

  if (snapshot.gold < 0) {
    issues.push(`Gold balance is negative (${snapshot.gold})`);
  }

  return { valid: issues.length === 0, issues };
}

// ── MemorySaveStore ──────────────────────────────────────────────────────────

/** In-process store, used by default and in tests. */
export class MemorySaveStore implements SaveStore {
  private readonly items = new Map<string, string>();

  async getItem(key: string): Promise<string | null> {
    return this.items.get(key) ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    this.items.set(key, value);
  }

  async removeItem(key: string): Promise<void> {
    this.items.delete(key);
  }
}

// ── SaveManager ──────────────────────────────────────────────────────────────

export class SaveManager {
  private readonly store: SaveStore;

  constructor(store: SaveStore = new MemorySaveStore()) {
    this.store = store;
  }

  // ── Helpers ──────────────────────────────────────────────────────────────

  private slotKey(slot: number): string {
    return `save_slot_${slot}`;
  }

  /** Raw blob of a slot, or null when empty or the store fails. */
  private async readSlot(slot: number): Promise<string | null> {
    try {
      return await this.store.getItem(this.slotKey(slot));
    } catch (err: unknown) {
      console.error(`[SaveManager] Failed to read slot ${slot}:`, err);
      return null;
    }
  }

  isValidSlot(slot: number): boolean {
    return Number.isInteger(slot) && slot >= AUTOSAVE_SLOT && slot <= MAX_MANUAL_SLOT;
  }

  // ── Save ─────────────────────────────────────────────────────────────────

  async save(slot: number, snapshot: InventorySnapshot): Promise<boolean> {
    if (!this.isValidSlot(slot)) {
      console.error(`[SaveManager] Invalid save slot: ${slot}. Must be ${AUTOSAVE_SLOT}-${MAX_MANUAL_SLOT}.`);
      return false;
    }

    try {
      await this.store.setItem(this.slotKey(slot), serializeInventory(snapshot));
      console.log(`[SaveManager] Saved to slot ${slot}.`);
      return true;
    } catch (err: unknown) {
      console.error(`[SaveManager] Failed to save slot ${slot}:`, err);
      return false;
    }
  }

  async autosave(snapshot: InventorySnapshot): Promise<boolean> {
    console.log('[SaveManager] Autosaving...');
    return this.save(AUTOSAVE_SLOT, snapshot);
  }

  // ── Load ─────────────────────────────────────────────────────────────────

  /** Decoded snapshot of a slot, or null when empty or unreadable. */
  async load(slot: number): Promise<InventorySnapshot | null> {
    if (!this.isValidSlot(slot)) {
      console.error(`[SaveManager] Invalid load slot: ${slot}.`);
      return null;
    }

    try {
      const blob = await this.store.getItem(this.slotKey(slot));
      if (blob === null) {
        console.log(`[SaveManager] Slot ${slot} is empty.`);
        return null;
      }
      return deserializeInventory(blob);
    } catch (err: unknown) {
      console.error(`[SaveManager] Failed to load slot ${slot}:`, err);
      return null;
    }
  }

  // ── Delete ───────────────────────────────────────────────────────────────

  async delete(slot: number): Promise<boolean> {
    if (!this.isValidSlot(slot)) {
      console.error(`[SaveManager] Invalid delete slot: ${slot}.`);
      return false;
    }

    try {
      await this.store.removeItem(this.slotKey(slot));
      console.log(`[SaveManager] Deleted slot ${slot}.`);
      return true;
    } catch (err: unknown) {
      console.error(`[SaveManager] Failed to delete slot ${slot}:`, err);
      return false;
    }
  }

  // ── Slot Info ────────────────────────────────────────────────────────────

  async getSlotInfo(): Promise<SaveSlotInfo[]> {
    const slots: SaveSlotInfo[] = [];

    for (let slot = AUTOSAVE_SLOT; slot <= MAX_MANUAL_SLOT; slot++) {
      const blob = await this.readSlot(slot);
      const data = blob === null ? null : parseSaveData(blob);
      if (!data) {
        slots.push({ slot, exists: false });
        continue;
      }

      slots.push({
        slot,
        exists: true,
        timestamp: data.timestamp,
        itemCount: data.inventory.bag.reduce((sum, s) => sum + s.quantity, 0),
        recipeCount: data.inventory.recipeBook.length,
        gold: data.inventory.gold,
      });
    }

    return slots;
  }

  async hasSaveData(): Promise<boolean> {
    for (let slot = AUTOSAVE_SLOT; slot <= MAX_MANUAL_SLOT; slot++) {
      if ((await this.readSlot(slot)) !== null) {
        return true;
      }
    }
    return false;
  }
}
