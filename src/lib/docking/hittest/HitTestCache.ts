import type { Point, Rect } from '../core/Rect';
import type { DockPanel } from '../dock/DockPanel';
import type { DockWindow } from '../dock/DockWindow';
import type { TabGroupNode } from '../model/Node';
import { getSelectedWidget } from '../model/Node';
import type { Measure, RoutingTable } from '../rendering/LayoutRenderer';

export interface WidgetDropTarget {
    kind: 'widget';
    panel: DockPanel;
    group: TabGroupNode;
    window: DockWindow;
    element: HTMLElement;
    rect: Rect;
}

export interface ContainerDropTarget {
    kind: 'container';
    window: DockWindow;
    element: HTMLElement;
    rect: Rect;
}

export type DropTarget = WidgetDropTarget | ContainerDropTarget;

export interface TabBarTarget {
    kind: 'tabbar';
    group: TabGroupNode;
    window: DockWindow;
    element: HTMLElement;
    rect: Rect;
    tabRects: Rect[];
}

export interface TabBarHit {
    target: TabBarTarget;
    /** Insertion index, -1 when the point is outside the bar. */
    index: number;
}

interface WindowEntry {
    window: DockWindow;
    rect: Rect;
    container: ContainerDropTarget;
    tabBars: TabBarTarget[];
    /** Smallest area first. */
    widgets: WidgetDropTarget[];
}

/**
 * Tab index a drop at `point` inserts before. Left half of a tab inserts
 * before it, right half after it, empty bar space appends.
 */
export function computeTabInsertIndex(barRect: Rect, tabRects: Rect[], point: Point): number {
    if (!barRect.containsPoint(point)) {
        return -1;
    }
    for (let i = 0; i < tabRects.length; i++) {
        const tab = tabRects[i];
        if (tab.containsPoint(point)) {
            return point.x < tab.getCenter().x ? i : i + 1;
        }
    }
    return tabRects.length;
}

/**
 * Point-in-time spatial index of drop candidates, built at drag start.
 * Must be invalidated whenever the rendered tree changes.
 */
export class HitTestCache {
    private entries: WindowEntry[] = [];
    private valid = false;

    get isValid(): boolean {
        return this.valid;
    }

    /**
     * @param windows candidate windows, topmost first
     * @param exclude the window being dragged
     */
    build(
        windows: DockWindow[],
        routesOf: (window: DockWindow) => RoutingTable | undefined,
        measure: Measure,
        exclude?: DockWindow,
    ): void {
        this.entries = [];
        for (const window of windows) {
            if (window === exclude || window.destroyed || !window.visible) {
                continue;
            }
            const routes = routesOf(window);
            if (!routes) {
                continue;
            }
            const rect = measure(window.element);
            const tabBars: TabBarTarget[] = routes.tabBars.map((bar) => ({
                kind: 'tabbar',
                group: bar.group,
                window,
                element: bar.element,
                rect: measure(bar.element),
                tabRects: bar.tabs.map((tab) => measure(tab)),
            }));
            const widgets: WidgetDropTarget[] = [];
            for (const route of routes.groups) {
                const selected = getSelectedWidget(route.group);
                if (selected) {
                    widgets.push({
                        kind: 'widget',
                        panel: selected.widget,
                        group: route.group,
                        window,
                        element: route.element,
                        rect: measure(route.element),
                    });
                }
            }
            widgets.sort((a, b) => a.rect.area() - b.rect.area());
            this.entries.push({
                window,
                rect,
                container: { kind: 'container', window, element: routes.container, rect: measure(routes.container) },
                tabBars,
                widgets,
            });
        }
        this.valid = true;
    }

    invalidate(): void {
        this.entries = [];
        this.valid = false;
    }

    /** Topmost window under `point`; windows below it are covered. */
    private windowAt(point: Point, exclude?: DockWindow): WindowEntry | undefined {
        return this.entries.find((entry) => entry.window !== exclude && entry.rect.containsPoint(point));
    }

    findTabBarAt(point: Point, exclude?: DockWindow): TabBarHit | undefined {
        const entry = this.windowAt(point, exclude);
        const bar = entry?.tabBars.find((candidate) => candidate.rect.containsPoint(point));
        if (!bar) {
            return undefined;
        }
        return { target: bar, index: computeTabInsertIndex(bar.rect, bar.tabRects, point) };
    }

    findDropTargetAt(point: Point, exclude?: DockWindow): DropTarget | undefined {
        const entry = this.windowAt(point, exclude);
        if (!entry) {
            return undefined;
        }
        const widget = entry.widgets.find((candidate) => candidate.rect.containsPoint(point));
        return widget ?? entry.container;
    }

    containerOf(window: DockWindow): ContainerDropTarget | undefined {
        return this.entries.find((entry) => entry.window === window)?.container;
    }

    /** Windows in the snapshot, topmost first. */
    windows(): DockWindow[] {
        return this.entries.map((entry) => entry.window);
    }
}
