// src/lib/docking/persistence/layout-persistence.ts

import type { DockingManager } from '../manager/DockingManager';

export const LAYOUT_STORAGE_KEY = 'panedock:layout';

export function saveLayoutToStorage(
  manager: DockingManager,
  key: string = LAYOUT_STORAGE_KEY,
  storage: Storage = localStorage,
): boolean {
  try {
    const bytes = manager.save();
    storage.setItem(key, new TextDecoder().decode(bytes));
    return true;
  } catch (e) {
    console.warn('[Docking] Failed to save layout:', e);
    return false;
  }
}

/** Returns false when nothing was stored or the stored layout could not be loaded. */
export function loadLayoutFromStorage(
  manager: DockingManager,
  key: string = LAYOUT_STORAGE_KEY,
  storage: Storage = localStorage,
): boolean {
  try {
    const stored = storage.getItem(key);
    if (stored === null) {
      return false;
    }
    manager.load(stored);
    return true;
  } catch (e) {
    console.warn('[Docking] Failed to load layout:', e);
    return false;
  }
}
