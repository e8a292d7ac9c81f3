import { Rect } from "../core/Rect";
import { CLASSES } from "../core/Types";
import type { ClassNameMapper } from "../core/Types";
import { Orientation } from "../core/Orientation";
import type { DockPanel } from "../dock/DockPanel";
import type { DockWindow } from "../dock/DockWindow";
import type { PaneNode, SplitterNode, TabGroupNode } from "../model/Node";

export type Measure = (element: HTMLElement) => Rect;

export const measureElement: Measure = (element) => Rect.fromDomRect(element.getBoundingClientRect());

export interface TabBarRoute {
    element: HTMLElement;
    /** One element per tab, in tab order. */
    tabs: HTMLElement[];
    group: TabGroupNode;
}

export interface GroupRoute {
    element: HTMLElement;
    content: HTMLElement;
    tabBar: TabBarRoute;
    group: TabGroupNode;
    parent: SplitterNode | null;
}

/**
 * Event routing for one rendered window, rebuilt on every render.
 * Only tab bars that are visible are listed.
 */
export interface RoutingTable {
    window: DockWindow;
    container: HTMLElement;
    tabBars: TabBarRoute[];
    groups: GroupRoute[];
}

export interface LayoutRendererCallbacks {
    acceptsInput(): boolean;
    onSelectTab(group: TabGroupNode, index: number, window: DockWindow): void;
    onCloseTab(panel: DockPanel): void;
    onTabPointerDown(event: PointerEvent, panel: DockPanel, group: TabGroupNode, window: DockWindow): void;
    onCloseGroup(group: TabGroupNode, window: DockWindow): void;
    onUndockGroup(group: TabGroupNode, window: DockWindow): void;
    onSplitterResized(splitter: SplitterNode, window: DockWindow): void;
}

export interface LayoutRendererOptions {
    getClassName: ClassNameMapper;
    measure: Measure;
    callbacks: LayoutRendererCallbacks;
    splitterSize?: number;
    minPaneSize?: number;
}

/**
 * Tab bar and corner controls are hidden only for a lone widget at the root
 * of a non-persistent window, which then looks like a plain window.
 */
export function isTabBarVisible(
    group: TabGroupNode,
    parent: SplitterNode | null,
    window: { readonly persistent: boolean },
): boolean {
    if (parent !== null) {
        return true;
    }
    if (group.children.length === 1 && !window.persistent) {
        return false;
    }
    return true;
}

/**
 * Sizes after moving the handle in front of pane `index` by `delta` pixels.
 * Both neighbours keep at least `minPaneSize`.
 */
export function resizeSplitterPanes(startSizes: number[], index: number, delta: number, minPaneSize: number): number[] {
    const before = startSizes[index - 1];
    const after = startSizes[index];
    const lower = Math.min(0, -(before - minPaneSize));
    const upper = Math.max(0, after - minPaneSize);
    const clamped = Math.max(lower, Math.min(upper, delta));
    const sizes = [...startSizes];
    sizes[index - 1] = before + clamped;
    sizes[index] = after - clamped;
    return sizes;
}

/**
 * Materializes layout trees into DOM. Every render replaces the window body
 * wholesale; panel elements are moved, not recreated, so content survives.
 */
export class LayoutRenderer {
    private readonly routes = new Map<DockWindow, RoutingTable>();
    private readonly splitterSize: number;
    private readonly minPaneSize: number;

    constructor(private readonly options: LayoutRendererOptions) {
        this.splitterSize = options.splitterSize ?? 4;
        this.minPaneSize = options.minPaneSize ?? 40;
    }

    render(window: DockWindow, root: PaneNode): RoutingTable {
        const table: RoutingTable = { window, container: window.body, tabBars: [], groups: [] };
        const tree = this.renderNode(root, null, window, table);
        window.body.replaceChildren(tree);
        this.routes.set(window, table);
        return table;
    }

    getRoutes(window: DockWindow): RoutingTable | undefined {
        return this.routes.get(window);
    }

    invalidate(window: DockWindow): void {
        this.routes.delete(window);
    }

    /** Apply `group.selected` to an already rendered group. Returns false when a render is needed. */
    updateSelection(window: DockWindow, group: TabGroupNode): boolean {
        const route = this.routes.get(window)?.groups.find((entry) => entry.group === group);
        if (!route || route.content.children.length !== group.children.length) {
            return false;
        }
        const selectedClass = this.options.getClassName(CLASSES.DOCK__TAB_SELECTED);
        route.tabBar.tabs.forEach((tab, i) => {
            tab.classList.toggle(selectedClass, i === group.selected);
            tab.setAttribute("aria-selected", String(i === group.selected));
        });
        group.children.forEach((child, i) => {
            const selected = i === group.selected;
            child.widget.element.style.display = selected ? "" : "none";
            child.widget.show(window.id, selected);
        });
        return true;
    }

    private renderNode(node: PaneNode, parent: SplitterNode | null, window: DockWindow, table: RoutingTable): HTMLElement {
        return node.type === "splitter"
            ? this.renderSplitter(node, window, table)
            : this.renderTabGroup(node, parent, window, table);
    }

    private renderSplitter(node: SplitterNode, window: DockWindow, table: RoutingTable): HTMLElement {
        const cls = this.options.getClassName;
        const horizontal = node.orientation === Orientation.HORZ;
        const element = document.createElement("div");
        element.className = `${cls(CLASSES.DOCK__SPLITTER)} ${cls(CLASSES.DOCK__SPLITTER_ + node.orientation.getName())}`;
        element.dataset.nodeId = node.id;
        element.style.display = "flex";
        element.style.flexDirection = horizontal ? "row" : "column";
        element.style.width = "100%";
        element.style.height = "100%";

        const tracked = node.sizes.length === node.children.length;
        const panes: HTMLElement[] = [];
        node.children.forEach((child, index) => {
            if (index > 0) {
                element.appendChild(this.renderSplitterHandle(node, index, horizontal, panes, window));
            }
            const pane = document.createElement("div");
            pane.className = cls(CLASSES.DOCK__SPLITTER_PANE);
            pane.style.flex = `${tracked ? node.sizes[index] : 1} 1 0px`;
            pane.style.minWidth = "0";
            pane.style.minHeight = "0";
            pane.style.display = "flex";
            pane.appendChild(this.renderNode(child, node, window, table));
            panes.push(pane);
            element.appendChild(pane);
        });
        return element;
    }

    private renderSplitterHandle(
        node: SplitterNode,
        index: number,
        horizontal: boolean,
        panes: HTMLElement[],
        window: DockWindow,
    ): HTMLElement {
        const handle = document.createElement("div");
        handle.className = this.options.getClassName(CLASSES.DOCK__SPLITTER_HANDLE);
        handle.dataset.handleIndex = String(index);
        handle.style.cursor = horizontal ? "ew-resize" : "ns-resize";
        handle.style.flex = `0 0 ${this.splitterSize}px`;

        handle.addEventListener("pointerdown", (event) => {
            if (!this.options.callbacks.acceptsInput()) {
                return;
            }
            event.stopPropagation();
            event.preventDefault();

            const startSizes = panes.map((pane) => {
                const rect = this.options.measure(pane);
                return horizontal ? rect.width : rect.height;
            });
            const start = horizontal ? event.clientX : event.clientY;

            const onMove = (moveEvent: PointerEvent): void => {
                const delta = (horizontal ? moveEvent.clientX : moveEvent.clientY) - start;
                const sizes = resizeSplitterPanes(startSizes, index, delta, this.minPaneSize);
                node.sizes = sizes;
                panes.forEach((pane, i) => {
                    pane.style.flex = `${sizes[i]} 1 0px`;
                });
            };

            const onUp = (): void => {
                document.removeEventListener("pointermove", onMove);
                document.removeEventListener("pointerup", onUp);
                this.options.callbacks.onSplitterResized(node, window);
            };

            document.addEventListener("pointermove", onMove);
            document.addEventListener("pointerup", onUp);
        });
        return handle;
    }

    private renderTabGroup(
        group: TabGroupNode,
        parent: SplitterNode | null,
        window: DockWindow,
        table: RoutingTable,
    ): HTMLElement {
        const cls = this.options.getClassName;
        const element = document.createElement("div");
        element.className = cls(CLASSES.DOCK__TABGROUP);
        element.dataset.nodeId = group.id;
        element.style.position = "relative";
        element.style.display = "flex";
        element.style.flexDirection = "column";
        element.style.width = "100%";
        element.style.height = "100%";

        const header = document.createElement("div");
        header.className = cls(CLASSES.DOCK__TABGROUP_HEADER);
        const visible = isTabBarVisible(group, parent, window);
        if (!visible) {
            header.classList.add(cls(CLASSES.DOCK__TABGROUP_HEADER_HIDDEN));
            header.style.display = "none";
        }

        const bar = document.createElement("div");
        bar.className = cls(CLASSES.DOCK__TABBAR);
        bar.setAttribute("role", "tablist");
        const tabs = group.children.map((child, index) => this.renderTab(child.widget, index, group, window));
        bar.append(...tabs);

        const corner = document.createElement("div");
        corner.className = cls(CLASSES.DOCK__TABGROUP_CORNER);
        corner.append(
            this.renderCornerButton("⧉", "Float group", "undock", () => this.options.callbacks.onUndockGroup(group, window)),
            this.renderCornerButton("×", "Close group", "close", () => this.options.callbacks.onCloseGroup(group, window)),
        );
        header.append(bar, corner);

        const content = document.createElement("div");
        content.className = cls(CLASSES.DOCK__TABGROUP_CONTENT);
        content.style.position = "relative";
        content.style.flex = "1 1 0px";
        content.style.minHeight = "0";
        group.children.forEach((child, index) => {
            const selected = index === group.selected;
            child.widget.element.style.display = selected ? "" : "none";
            content.appendChild(child.widget.element);
            child.widget.show(window.id, selected);
        });

        element.append(header, content);

        const tabBar: TabBarRoute = { element: bar, tabs, group };
        if (visible) {
            table.tabBars.push(tabBar);
        }
        table.groups.push({ element, content, tabBar, group, parent });
        return element;
    }

    private renderTab(panel: DockPanel, index: number, group: TabGroupNode, window: DockWindow): HTMLElement {
        const cls = this.options.getClassName;
        const selected = index === group.selected;
        const tab = document.createElement("div");
        tab.className = cls(CLASSES.DOCK__TAB);
        if (selected) {
            tab.classList.add(cls(CLASSES.DOCK__TAB_SELECTED));
        }
        tab.setAttribute("role", "tab");
        tab.setAttribute("aria-selected", String(selected));
        tab.dataset.panelId = panel.persistentId;

        const title = document.createElement("span");
        title.className = cls(CLASSES.DOCK__TAB_TITLE);
        title.textContent = panel.dragging ? `[Dragging] ${panel.title}` : panel.title;
        tab.appendChild(title);

        if (panel.dragging) {
            tab.classList.add(cls(CLASSES.DOCK__TAB_DRAGGING));
            tab.setAttribute("aria-disabled", "true");
        }

        if (panel.closable) {
            const close = document.createElement("button");
            close.type = "button";
            close.className = cls(CLASSES.DOCK__TAB_CLOSE);
            close.textContent = "×";
            close.title = "Close";
            close.addEventListener("pointerdown", (event) => event.stopPropagation());
            close.addEventListener("click", (event) => {
                event.stopPropagation();
                if (this.options.callbacks.acceptsInput()) {
                    this.options.callbacks.onCloseTab(panel);
                }
            });
            tab.appendChild(close);
        }

        tab.addEventListener("pointerdown", (event) => {
            if (event.button !== 0 || panel.dragging || !this.options.callbacks.acceptsInput()) {
                return;
            }
            if (index !== group.selected) {
                this.options.callbacks.onSelectTab(group, index, window);
            }
            this.options.callbacks.onTabPointerDown(event, panel, group, window);
        });
        return tab;
    }

    private renderCornerButton(label: string, title: string, action: string, onClick: () => void): HTMLButtonElement {
        const button = document.createElement("button");
        button.type = "button";
        button.className = this.options.getClassName(CLASSES.DOCK__TABGROUP_BUTTON);
        button.dataset.action = action;
        button.textContent = label;
        button.title = title;
        button.addEventListener("click", (event) => {
            event.stopPropagation();
            if (this.options.callbacks.acceptsInput()) {
                onClick();
            }
        });
        return button;
    }
}
