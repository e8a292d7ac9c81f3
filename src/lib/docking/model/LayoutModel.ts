import type { DockPanel } from "../dock/DockPanel";
import { LayoutConsistencyError } from "../core/errors";
import {
  createTabGroup,
  createWidgetNode,
  type LayoutNode,
  type PaneNode,
  type SplitterNode,
  type TabGroupNode,
  type WidgetNode,
} from "./Node";
import { adjustSelectedIndex } from "./Utils";

/** What the model needs to know about a top-level window. */
export interface RootHandle {
  readonly persistent: boolean;
  readonly title: string;
}

export interface HostInfo<W extends RootHandle> {
  group: TabGroupNode;
  /** Splitter holding `group`, null when the group is the root. */
  parent: SplitterNode | null;
  root: W;
  /** Position of the widget inside `group`. */
  index: number;
}

/**
 * - `kept`: the root still has content.
 * - `removed`: the root became empty and was unregistered.
 * - `placeholder`: a persistent root became empty and holds an empty tab group.
 */
export type SimplifyOutcome = "kept" | "removed" | "placeholder";

/**
 * Root registry: top-level window handle to layout tree.
 * The rendered DOM is a disposable projection of this.
 */
export class LayoutModel<W extends RootHandle> {
  private readonly roots = new Map<W, PaneNode>();

  register(window: W, widget?: DockPanel): TabGroupNode {
    const group = createTabGroup(widget ? [createWidgetNode(widget)] : []);
    this.roots.set(window, group);
    return group;
  }

  setRoot(window: W, node: PaneNode): void {
    this.roots.set(window, node);
  }

  getRoot(window: W): PaneNode | undefined {
    return this.roots.get(window);
  }

  has(window: W): boolean {
    return this.roots.has(window);
  }

  unregister(window: W): boolean {
    return this.roots.delete(window);
  }

  windows(): W[] {
    return Array.from(this.roots.keys());
  }

  entries(): Array<[W, PaneNode]> {
    return Array.from(this.roots.entries());
  }

  clear(): void {
    this.roots.clear();
  }

  findHost(widget: DockPanel): HostInfo<W> | undefined {
    for (const [window, root] of this.roots) {
      const found = this.findHostIn(root, null, widget);
      if (found) {
        return { ...found, root: window };
      }
    }
    return undefined;
  }

  private findHostIn(
    node: PaneNode,
    parent: SplitterNode | null,
    widget: DockPanel,
  ): Omit<HostInfo<W>, "root"> | undefined {
    if (node.type === "tabgroup") {
      const index = node.children.findIndex((child) => child.widget === widget);
      return index >= 0 ? { group: node, parent, index } : undefined;
    }
    for (const child of node.children) {
      const found = this.findHostIn(child, node, widget);
      if (found) {
        return found;
      }
    }
    return undefined;
  }

  /** Window whose tree contains `node`. */
  findWindowOf(node: PaneNode): W | undefined {
    for (const [window, root] of this.roots) {
      if (root === node || this.findParent(root, node) !== undefined) {
        return window;
      }
    }
    return undefined;
  }

  /**
   * Splitter directly holding `node`: null when `node` is `tree` itself,
   * undefined when `node` is not part of `tree`.
   */
  findParent(tree: PaneNode, node: PaneNode): SplitterNode | null | undefined {
    if (tree === node) {
      return null;
    }
    if (tree.type === "tabgroup") {
      return undefined;
    }
    for (const child of tree.children) {
      if (child === node) {
        return tree;
      }
      const found = this.findParent(child, node);
      if (found) {
        return found;
      }
    }
    return undefined;
  }

  /** Depth-first flatten: splitter children in visual order, tabs in tab order. */
  allWidgets(node: LayoutNode): WidgetNode[] {
    switch (node.type) {
      case "widget":
        return [node];
      case "tabgroup":
        return [...node.children];
      case "splitter":
        return node.children.flatMap((child) => this.allWidgets(child));
    }
  }

  allWidgetsInModel(): WidgetNode[] {
    return Array.from(this.roots.values()).flatMap((root) => this.allWidgets(root));
  }

  /**
   * Swap `oldNode` for `newNode` inside `tree`, keeping sibling order.
   * @throws LayoutConsistencyError when `oldNode` has no parent splitter in `tree`
   */
  replaceInParent(tree: PaneNode, oldNode: PaneNode, newNode: PaneNode): void {
    const parent = this.findParent(tree, oldNode);
    if (!parent) {
      throw new LayoutConsistencyError(
        `Node ${oldNode.id} is not a child of any splitter in tree ${tree.id}`,
      );
    }
    const index = parent.children.indexOf(oldNode);
    parent.children.splice(index, 1, newNode);
  }

  /**
   * Take `node` out of its parent splitter along with its recorded size.
   * @throws LayoutConsistencyError when `node` has no parent splitter in `tree`
   */
  removeFromParent(tree: PaneNode, node: PaneNode): SplitterNode {
    const parent = this.findParent(tree, node);
    if (!parent) {
      throw new LayoutConsistencyError(
        `Node ${node.id} is not a child of any splitter in tree ${tree.id}`,
      );
    }
    const index = parent.children.indexOf(node);
    parent.children.splice(index, 1);
    if (parent.sizes.length > index) {
      parent.sizes.splice(index, 1);
    }
    return parent;
  }

  /** Detach a widget from its tab group. Leaves the group in place even if it becomes empty. */
  removeWidget(widget: DockPanel): HostInfo<W> | undefined {
    const host = this.findHost(widget);
    if (!host) {
      return undefined;
    }
    host.group.children.splice(host.index, 1);
    adjustSelectedIndex(host.group, host.index);
    return host;
  }

  /**
   * Collapse degenerate structure under `window` until nothing changes.
   * `onChange` runs after every structural change so the caller can re-render
   * before the next pass.
   */
  simplify(window: W, onChange: () => void = () => {}): SimplifyOutcome {
    if (!this.roots.has(window)) {
      return "removed";
    }
    while (this.simplifyOnce(window)) {
      onChange();
    }

    const root = this.roots.get(window);
    if (!root || root.children.length > 0) {
      return root ? "kept" : "removed";
    }
    if (!window.persistent) {
      this.roots.delete(window);
      return "removed";
    }
    if (root.type !== "tabgroup") {
      this.roots.set(window, createTabGroup());
      onChange();
    }
    return "placeholder";
  }

  private simplifyOnce(window: W): boolean {
    const root = this.roots.get(window);
    if (!root) {
      return false;
    }
    const queue: PaneNode[] = [root];
    while (queue.length > 0) {
      const node = queue.shift();
      if (!node || node.type !== "splitter") {
        continue;
      }

      const kept = node.children.filter((child) => child.children.length > 0);
      if (kept.length !== node.children.length) {
        const sizesTracked = node.sizes.length === node.children.length;
        node.sizes = sizesTracked ? node.sizes.filter((_, i) => node.children[i].children.length > 0) : [];
        node.children = kept;
        return true;
      }

      if (node.children.length === 1) {
        const onlyChild = node.children[0];
        if (node === root) {
          this.roots.set(window, onlyChild);
        } else {
          this.replaceInParent(root, node, onlyChild);
        }
        return true;
      }

      queue.push(...node.children);
    }
    return false;
  }

  /** Broken invariants across all roots, empty when the model is valid. */
  findInvariantViolations(): string[] {
    const problems: string[] = [];
    const seen = new Set<DockPanel>();
    for (const [window, root] of this.roots) {
      const visit = (node: PaneNode) => {
        if (node.type === "splitter") {
          if (node.children.length < 2) {
            problems.push(`splitter ${node.id} in "${window.title}" has ${node.children.length} children`);
          }
          node.children.forEach(visit);
          return;
        }
        const placeholder = node === root && window.persistent;
        if (node.children.length === 0 && !placeholder) {
          problems.push(`tab group ${node.id} in "${window.title}" is empty`);
        }
        if (node.children.length > 0 && (node.selected < 0 || node.selected >= node.children.length)) {
          problems.push(`tab group ${node.id} in "${window.title}" selects missing tab ${node.selected}`);
        }
        for (const child of node.children) {
          if (seen.has(child.widget)) {
            problems.push(`widget ${child.widget.persistentId} appears more than once`);
          }
          seen.add(child.widget);
        }
      };
      visit(root);
    }
    return problems;
  }

  prettyPrint(): string {
    const lines: string[] = [];
    const print = (node: PaneNode, depth: number) => {
      const indent = "  ".repeat(depth);
      if (node.type === "splitter") {
        const sizes = node.sizes.length > 0 ? ` sizes=[${node.sizes.join(", ")}]` : "";
        lines.push(`${indent}splitter ${node.orientation.getName()}${sizes}`);
        node.children.forEach((child) => print(child, depth + 1));
        return;
      }
      lines.push(`${indent}tabgroup selected=${node.selected}`);
      node.children.forEach((child) => {
        lines.push(`${indent}  widget ${child.widget.persistentId} "${child.widget.title}"`);
      });
    };
    for (const [window, root] of this.roots) {
      lines.push(`root "${window.title}"${window.persistent ? " (persistent)" : ""}`);
      print(root, 1);
    }
    return lines.join("\n");
  }
}
