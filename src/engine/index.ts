export * from './errors';
export { EventBus } from './EventBus';
export type { EventArgsMap, EventListener } from './EventBus';
export {
  type InventorySnapshot,
  type SaveData,
  type SaveSlotInfo,
  type SaveStore,
  type ValidationReport,
  MemorySaveStore,
  SaveManager,
  serializeInventory,
  deserializeInventory,
  validateInventory,
} from './SaveManager';
export { Workshop, createWorkshop } from './Workshop';
export type { WorkshopOptions, InventoryStats } from './Workshop';
