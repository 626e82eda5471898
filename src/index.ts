export * from '@/crafting';
export * from '@/rpg';
export * from '@/engine';
