export * from './core';

export {
  defaultDockingOptions,
  resolveDockingOptions,
  loadDockingOptions,
  saveDockingOptions,
  OPTIONS_STORAGE_KEY,
} from './config/options';
export type {
  CascadeOptions,
  DockingOptions,
  DockingOptionsInput,
  OverlayOptions,
  ResolvedDockingOptions,
  Size,
  TabDragMode,
} from './config/options';

export { DEFAULT_PANEL_MARGIN, DockPanel } from './dock/DockPanel';
export type { DockPanelInit, PanelContent } from './dock/DockPanel';
export { DockWindow, RESIZE_EDGES } from './dock/DockWindow';
export type { DockWindowKind, ResizeEdge } from './dock/DockWindow';

export { Emitter } from './model/Event';
export type { Event, IDisposable } from './model/Event';
export { LayoutModel } from './model/LayoutModel';
export type { HostInfo, SimplifyOutcome } from './model/LayoutModel';
export * from './model/Node';

export { HitTestCache, computeTabInsertIndex } from './hittest/HitTestCache';
export type { DropTarget, TabBarHit } from './hittest/HitTestCache';
export { DockingOverlay, computeIconRects } from './overlay/DockingOverlay';
export type { OverlayStyle } from './overlay/DockingOverlay';

export { LayoutRenderer, isTabBarVisible, measureElement, resizeSplitterPanes } from './rendering/LayoutRenderer';
export type { Measure, RoutingTable } from './rendering/LayoutRenderer';
export type { IContentRenderer, IRenderParams, IStatefulContent } from './rendering/IContentRenderer';
export { SolidContentRenderer } from './rendering/solid/SolidContentRenderer';
export type { SolidPanelProps } from './rendering/solid/SolidContentRenderer';

export { DockingManager } from './manager/DockingManager';
export type { DockingManagerOptions, FloatingOptions, WidgetDockedEvent } from './manager/DockingManager';
export { DockingState, DockingStateMachine } from './manager/DockingState';
export { computeResizedRect } from './manager/DragDropController';
export type { DragSource, PendingDrop } from './manager/DragDropController';

export { PointerDragDriver } from './input/NativeDragDriver';
export type { NativeDragDriver, NativeDragResult, NativeDragSession } from './input/NativeDragDriver';

export { WidgetRegistry } from './registry/WidgetRegistry';
export type { PanelContentClass, PanelContentFactory, WidgetDefinition } from './registry/WidgetRegistry';

export { LayoutSerializer } from './persistence/LayoutSerializer';
export type { StateProvider, StateRestorer, WidgetFactory } from './persistence/LayoutSerializer';
export { LAYOUT_FORMAT_VERSION } from './persistence/schema';
export type { LayoutDocument, PaneRecord, WidgetRecord, WindowRecord } from './persistence/schema';
export { LAYOUT_STORAGE_KEY, loadLayoutFromStorage, saveLayoutToStorage } from './persistence/layout-persistence';
