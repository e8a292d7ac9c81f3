import type { DockPanel } from "../dock/DockPanel";
import type { Orientation } from "../core/Orientation";
import { randomUUID } from "./Utils";

/** Leaf wrapping one content panel. */
export interface WidgetNode {
  readonly type: "widget";
  readonly id: string;
  readonly widget: DockPanel;
}

/** Flat list of tabs; children are always widgets. */
export interface TabGroupNode {
  readonly type: "tabgroup";
  readonly id: string;
  children: WidgetNode[];
  /** Index of the visible tab, -1 when empty. */
  selected: number;
}

export interface SplitterNode {
  readonly type: "splitter";
  readonly id: string;
  orientation: Orientation;
  children: PaneNode[];
  /** Last known pixel sizes of the children, empty when the split is even. */
  sizes: number[];
}

/** Nodes that can sit in a splitter or at a window root. */
export type PaneNode = TabGroupNode | SplitterNode;

export type LayoutNode = WidgetNode | PaneNode;

export function createWidgetNode(widget: DockPanel): WidgetNode {
  return { type: "widget", id: randomUUID(), widget };
}

export function createTabGroup(children: WidgetNode[] = [], selected = children.length > 0 ? 0 : -1): TabGroupNode {
  return { type: "tabgroup", id: randomUUID(), children, selected };
}

export function createSplitter(orientation: Orientation, children: PaneNode[], sizes: number[] = []): SplitterNode {
  return { type: "splitter", id: randomUUID(), orientation, children, sizes };
}

export function isTabGroup(node: LayoutNode): node is TabGroupNode {
  return node.type === "tabgroup";
}

export function isSplitter(node: LayoutNode): node is SplitterNode {
  return node.type === "splitter";
}

export function getSelectedWidget(group: TabGroupNode): WidgetNode | undefined {
  return group.children[group.selected];
}

/** First tab group in depth-first order. */
export function firstTabGroup(node: PaneNode): TabGroupNode | undefined {
  if (node.type === "tabgroup") {
    return node;
  }
  for (const child of node.children) {
    const found = firstTabGroup(child);
    if (found) {
      return found;
    }
  }
  return undefined;
}

export function collectTabGroups(node: PaneNode, into: TabGroupNode[] = []): TabGroupNode[] {
  if (node.type === "tabgroup") {
    into.push(node);
  } else {
    node.children.forEach((child) => collectTabGroups(child, into));
  }
  return into;
}
