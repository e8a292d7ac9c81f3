// src/lib/docking/config/options.ts

import { z } from 'zod';
import { identityClassName } from '../core/Types';
import type { ClassNameMapper } from '../core/Types';

export interface Size {
  width: number;
  height: number;
}

/** How a tab dragged out of its tab bar behaves */
export type TabDragMode = 'tear' | 'native';

/** Geometry of the drop affordances shown during a drag */
export interface OverlayOptions {
  /** Edge length of each directional icon */
  iconSize: number;
  /** Gap between the center icon and its neighbours in the cluster arrangement */
  clusterSpacing: number;
  /** Distance of each icon from the target edge in the spread arrangement */
  spreadMargin: number;
}

/** Where windows without an explicit position are placed */
export interface CascadeOptions {
  origin: number;
  step: number;
  steps: number;
}

export interface DockingOptions {
  titleBarHeight: number;
  defaultFloatSize: Size;
  tearFloatSize: Size;
  /** Horizontal cursor offset inside the title bar of a freshly torn window */
  tearGrabOffset: number;
  /** Vertical distance outside the tab bar before a tab tears off */
  tearThreshold: number;
  dragStartDistance: number;
  resizeMargin: number;
  minWindowSize: Size;
  maxWindowExtent: number;
  overlay: OverlayOptions;
  cascade: CascadeOptions;
  tabDragMode: TabDragMode;
  containerTitle: string;
  debug: boolean;
}

export interface ResolvedDockingOptions extends DockingOptions {
  getClassName: ClassNameMapper;
}

export type DockingOptionsInput = Partial<
  Omit<DockingOptions, 'overlay' | 'cascade' | 'defaultFloatSize' | 'tearFloatSize' | 'minWindowSize'>
> & {
  defaultFloatSize?: Partial<Size>;
  tearFloatSize?: Partial<Size>;
  minWindowSize?: Partial<Size>;
  overlay?: Partial<OverlayOptions>;
  cascade?: Partial<CascadeOptions>;
  getClassName?: ClassNameMapper;
};

export const defaultDockingOptions: DockingOptions = {
  titleBarHeight: 30,
  defaultFloatSize: { width: 350, height: 250 },
  tearFloatSize: { width: 300, height: 200 },
  tearGrabOffset: 50,
  tearThreshold: 30,
  dragStartDistance: 8,
  resizeMargin: 5,
  minWindowSize: { width: 100, height: 100 },
  maxWindowExtent: 5000,
  overlay: {
    iconSize: 40,
    clusterSpacing: 5,
    spreadMargin: 10,
  },
  cascade: {
    origin: 150,
    step: 40,
    steps: 7,
  },
  tabDragMode: 'tear',
  containerTitle: 'Docked Widgets',
  debug: false,
};

/** localStorage key for persisted docking options */
export const OPTIONS_STORAGE_KEY = 'panedock:options';

/**
 * Merge a partial over the defaults. Nested groups are merged field by field.
 */
export function resolveDockingOptions(input: DockingOptionsInput = {}): ResolvedDockingOptions {
  return {
    ...defaultDockingOptions,
    ...input,
    defaultFloatSize: { ...defaultDockingOptions.defaultFloatSize, ...input.defaultFloatSize },
    tearFloatSize: { ...defaultDockingOptions.tearFloatSize, ...input.tearFloatSize },
    minWindowSize: { ...defaultDockingOptions.minWindowSize, ...input.minWindowSize },
    overlay: { ...defaultDockingOptions.overlay, ...input.overlay },
    cascade: { ...defaultDockingOptions.cascade, ...input.cascade },
    getClassName: input.getClassName ?? identityClassName,
  };
}

const partialSize = z.object({ width: z.number(), height: z.number() }).partial();

const storedOptionsSchema = z
  .object({
    titleBarHeight: z.number(),
    defaultFloatSize: partialSize,
    tearFloatSize: partialSize,
    tearGrabOffset: z.number(),
    tearThreshold: z.number(),
    dragStartDistance: z.number(),
    resizeMargin: z.number(),
    minWindowSize: partialSize,
    maxWindowExtent: z.number(),
    overlay: z
      .object({ iconSize: z.number(), clusterSpacing: z.number(), spreadMargin: z.number() })
      .partial(),
    cascade: z.object({ origin: z.number(), step: z.number(), steps: z.number().int() }).partial(),
    tabDragMode: z.enum(['tear', 'native']),
    containerTitle: z.string(),
    debug: z.boolean(),
  })
  .partial();

/**
 * Load docking options from localStorage, merging with defaults for any missing keys.
 * Returns the defaults if nothing is stored or the stored value is invalid.
 */
export function loadDockingOptions(storage: Storage = localStorage): ResolvedDockingOptions {
  try {
    const stored = storage.getItem(OPTIONS_STORAGE_KEY);
    if (stored) {
      const parsed = storedOptionsSchema.safeParse(JSON.parse(stored));
      if (parsed.success) {
        return resolveDockingOptions(parsed.data);
      }
      console.warn('[Docking] Ignoring invalid docking options:', parsed.error.issues);
    }
  } catch (e) {
    console.warn('[Docking] Failed to load docking options:', e);
  }
  return resolveDockingOptions();
}

/**
 * Save docking options to localStorage. The class-name mapper is not persisted.
 */
export function saveDockingOptions(options: DockingOptionsInput, storage: Storage = localStorage): void {
  const { getClassName: _getClassName, ...persisted } = options;
  void _getClassName;
  try {
    storage.setItem(OPTIONS_STORAGE_KEY, JSON.stringify(persisted));
  } catch (e) {
    console.error('[Docking] Failed to save docking options:', e);
  }
}
