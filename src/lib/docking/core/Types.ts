export enum CLASSES {
  DOCK__WINDOW = "dock__window",
  DOCK__WINDOW_MAIN = "dock__window--main",
  DOCK__WINDOW_FLOATING = "dock__window--floating",
  DOCK__WINDOW_HIDDEN = "dock__window--hidden",
  DOCK__TITLEBAR = "dock__titlebar",
  DOCK__TITLEBAR_TITLE = "dock__titlebar-title",
  DOCK__TITLEBAR_BUTTONS = "dock__titlebar-buttons",
  DOCK__TITLEBAR_BUTTON = "dock__titlebar-button",
  DOCK__WINDOW_BODY = "dock__window-body",
  DOCK__RESIZE_HANDLE = "dock__resize-handle",
  DOCK__RESIZE_HANDLE_ = "dock__resize-handle--",

  DOCK__SPLITTER = "dock__splitter",
  DOCK__SPLITTER_ = "dock__splitter--",
  DOCK__SPLITTER_PANE = "dock__splitter-pane",
  DOCK__SPLITTER_HANDLE = "dock__splitter-handle",

  DOCK__TABGROUP = "dock__tabgroup",
  DOCK__TABGROUP_HEADER = "dock__tabgroup-header",
  DOCK__TABGROUP_HEADER_HIDDEN = "dock__tabgroup-header--hidden",
  DOCK__TABBAR = "dock__tabbar",
  DOCK__TAB = "dock__tab",
  DOCK__TAB_SELECTED = "dock__tab--selected",
  DOCK__TAB_DRAGGING = "dock__tab--dragging",
  DOCK__TAB_TITLE = "dock__tab-title",
  DOCK__TAB_CLOSE = "dock__tab-close",
  DOCK__TABGROUP_CORNER = "dock__tabgroup-corner",
  DOCK__TABGROUP_BUTTON = "dock__tabgroup-button",
  DOCK__TABGROUP_CONTENT = "dock__tabgroup-content",
  DOCK__PANEL = "dock__panel",

  DOCK__OVERLAY = "dock__overlay",
  DOCK__OVERLAY_ICON = "dock__overlay-icon",
  DOCK__OVERLAY_ICON_ = "dock__overlay-icon--",
  DOCK__OVERLAY_ICON_ACTIVE = "dock__overlay-icon--active",
  DOCK__OVERLAY_PREVIEW = "dock__overlay-preview",
  DOCK__INSERT_INDICATOR = "dock__insert-indicator",
  DOCK__RESIZE_PREVIEW = "dock__resize-preview",
}

export type ClassNameMapper = (defaultClassName: string) => string;

export const identityClassName: ClassNameMapper = (defaultClassName) => defaultClassName;
