import type { DockLocation, DockLocationName } from "../core/DockLocation";
import { Rect } from "../core/Rect";
import type { Point } from "../core/Rect";
import type { Size } from "../config/options";
import type { DockPanel } from "../dock/DockPanel";
import type { DockWindow, ResizeEdge } from "../dock/DockWindow";
import { HitTestCache } from "../hittest/HitTestCache";
import type { ContainerDropTarget } from "../hittest/HitTestCache";
import type { NativeDragDriver } from "../input/NativeDragDriver";
import type { TabGroupNode } from "../model/Node";
import { ALL_ICONS, DockingOverlay, EDGE_ICONS } from "../overlay/DockingOverlay";
import type { OverlayStyle } from "../overlay/DockingOverlay";
import { InsertIndicator, ResizePreview } from "../overlay/DragIndicators";
import type { DockingManager } from "./DockingManager";
import { DockingState } from "./DockingState";

export type DragSource =
    | { kind: "window"; window: DockWindow }
    | { kind: "panel"; panel: DockPanel; window: DockWindow };

export type DropTargetHandle = DockPanel | DockWindow | TabGroupNode;

export type PendingDrop =
    | { kind: "insert"; group: TabGroupNode; window: DockWindow; index: number }
    | { kind: "dock"; target: DropTargetHandle; location: DockLocation };

interface OverlaySpec {
    owner: HTMLElement;
    rect: Rect;
    icons: readonly DockLocationName[];
    style: OverlayStyle;
    target: DropTargetHandle;
}

interface MoveGesture {
    window: DockWindow;
    pointer: Point;
    geometry: Rect;
}

interface ResizeGesture {
    window: DockWindow;
    edge: ResizeEdge;
    pointer: Point;
    geometry: Rect;
    preview: ResizePreview;
}

/**
 * Geometry for a window resized from `edge` by (dx, dy). The opposite edge
 * stays put; width and height stay within [min, maxExtent].
 */
export function computeResizedRect(
    start: Rect,
    edge: ResizeEdge,
    dx: number,
    dy: number,
    min: Size,
    maxExtent: number,
): Rect {
    const resizesLeft = edge === "w" || edge === "nw" || edge === "sw";
    const resizesRight = edge === "e" || edge === "ne" || edge === "se";
    const resizesTop = edge === "n" || edge === "nw" || edge === "ne";
    const resizesBottom = edge === "s" || edge === "sw" || edge === "se";
    const clampWidth = (width: number) => Math.min(maxExtent, Math.max(min.width, width));
    const clampHeight = (height: number) => Math.min(maxExtent, Math.max(min.height, height));

    let x = start.x;
    let y = start.y;
    let width = start.width;
    let height = start.height;

    if (resizesRight) {
        width = clampWidth(start.width + dx);
    }
    if (resizesBottom) {
        height = clampHeight(start.height + dy);
    }
    if (resizesLeft) {
        width = clampWidth(start.width - dx);
        x = start.getRight() - width;
    }
    if (resizesTop) {
        height = clampHeight(start.height - dy);
        y = start.getBottom() - height;
    }
    return new Rect(x, y, width, height);
}

/**
 * Drives drag gestures: window moves, native tab drags and window resizes.
 * Owns the hit-test cache, the overlays and the pending drop while a drag is
 * in flight, and tears all of them down when it ends.
 */
export class DragDropController {
    private readonly cache = new HitTestCache();
    private readonly overlays = new Map<HTMLElement, DockingOverlay>();
    private readonly indicator: InsertIndicator;
    private source: DragSource | undefined;
    private pending: PendingDrop | undefined;
    private move: MoveGesture | undefined;
    private resize: ResizeGesture | undefined;

    constructor(private readonly manager: DockingManager) {
        this.indicator = new InsertIndicator(manager.options.getClassName);
    }

    get pendingDrop(): PendingDrop | undefined {
        return this.pending;
    }

    get activeOverlays(): DockingOverlay[] {
        return Array.from(this.overlays.values());
    }

    get dragSource(): DragSource | undefined {
        return this.source;
    }

    // --- window move -------------------------------------------------------

    beginWindowMove(window: DockWindow, pointer: Point): void {
        this.manager.state.begin(DockingState.DraggingWindow);
        this.source = { kind: "window", window };
        this.move = { window, pointer, geometry: window.geometry };
        this.manager.bringToFront(window);
        if (!window.persistent) {
            this.buildCache();
        }
        this.manager.logger.debug(`Moving window "${window.title}"`);
    }

    updateWindowMove(pointer: Point): void {
        const move = this.move;
        if (!move || this.manager.state.state !== DockingState.DraggingWindow) {
            return;
        }
        move.window.setGeometry(move.geometry.offset(pointer.x - move.pointer.x, pointer.y - move.pointer.y));
        if (!move.window.persistent) {
            this.handleLiveMove(pointer);
        }
    }

    /** Release: dock into the pending target, or leave the window where it was moved. */
    endWindowMove(): void {
        const source = this.source;
        const pending = this.pending;
        try {
            if (source && pending && !source.window.persistent) {
                this.manager.commitDrop(source, pending);
            }
        } finally {
            this.cleanup();
            this.move = undefined;
            this.manager.state.end(DockingState.DraggingWindow);
        }
    }

    // --- native tab drag ---------------------------------------------------

    /**
     * Drag a tab through a blocking driver session. Cleanup runs in `finally`
     * so overlays never outlive the session, even when the drop fails.
     */
    async startTabDrag(panel: DockPanel, driver: NativeDragDriver): Promise<void> {
        const window = this.manager.requireWindowOf(panel);
        this.manager.state.begin(DockingState.DraggingTab);
        const source: DragSource = { kind: "panel", panel, window };
        this.source = source;
        let lastPoint: Point | undefined;
        try {
            this.manager.setPanelDragging(panel, true);
            this.buildCache();
            const result = await driver.run({
                panel,
                onMove: (point) => {
                    lastPoint = point;
                    this.handleLiveMove(point);
                },
            });
            lastPoint = result.point ?? lastPoint;
            this.manager.setPanelDragging(panel, false);

            if (result.dropped && this.pending) {
                this.manager.commitDrop(source, this.pending);
            } else if (lastPoint) {
                this.manager.floatPanelAt(panel, lastPoint);
            }
        } finally {
            if (panel.dragging && !panel.destroyed) {
                this.manager.setPanelDragging(panel, false);
            }
            this.cleanup();
            this.manager.state.end(DockingState.DraggingTab);
        }
    }

    // --- live move ---------------------------------------------------------

    /**
     * Re-evaluate the drop under `point`: tab-bar insertion first, then widget
     * and container overlays. Runs on every move tick of a drag.
     */
    handleLiveMove(point: Point): PendingDrop | undefined {
        const source = this.source;
        if (!source) {
            return undefined;
        }
        if (!this.cache.isValid) {
            this.buildCache();
        }
        const exclude = this.excludedWindow(source);

        const tabHit = this.cache.findTabBarAt(point, exclude);
        if (tabHit && tabHit.index >= 0) {
            this.syncOverlays(new Map());
            const bar = tabHit.target;
            const offset = this.insertOffset(bar.rect, bar.tabRects, tabHit.index);
            this.indicator.show(bar.element, offset, bar.rect.height);
            this.pending = { kind: "insert", group: bar.group, window: bar.window, index: tabHit.index };
            return this.pending;
        }
        this.indicator.hide();

        const target = this.cache.findDropTargetAt(point, exclude);
        if (!target) {
            this.syncOverlays(new Map());
            this.pending = undefined;
            return undefined;
        }

        const required = new Map<HTMLElement, OverlaySpec>();
        const container = target.kind === "container" ? target : this.cache.containerOf(target.window);
        if (target.kind === "widget" && !this.isOnlySourceWidget(target.group, source)) {
            required.set(target.element, {
                owner: target.element,
                rect: target.rect,
                icons: ALL_ICONS,
                style: "cluster",
                target: target.group,
            });
        }
        // A single widget over a one-widget window gets no container edges.
        const redundant = this.isSimpleSource(source) && this.holdsOneWidget(target.window);
        if (container && !redundant) {
            required.set(container.element, this.containerSpec(container));
        }
        this.syncOverlays(required);

        let resolved: { overlay: DockingOverlay; location: DockLocation; target: DropTargetHandle } | undefined;
        for (const [owner, wanted] of required) {
            const overlay = this.overlays.get(owner);
            const location = overlay?.getLocationAt(point);
            if (overlay && location) {
                resolved = { overlay, location, target: wanted.target };
                break;
            }
        }
        for (const overlay of this.overlays.values()) {
            overlay.showPreview(overlay === resolved?.overlay ? resolved.location : undefined);
        }

        this.pending = resolved ? { kind: "dock", target: resolved.target, location: resolved.location } : undefined;
        return this.pending;
    }

    // --- resize ------------------------------------------------------------

    beginResize(window: DockWindow, edge: ResizeEdge, pointer: Point): void {
        this.manager.state.begin(DockingState.Resizing);
        const geometry = window.geometry;
        const preview = new ResizePreview(this.manager.host, geometry, this.manager.options.getClassName);
        this.resize = { window, edge, pointer, geometry, preview };
        this.manager.bringToFront(window);
    }

    updateResize(pointer: Point): void {
        const resize = this.resize;
        if (!resize) {
            return;
        }
        const { minWindowSize, maxWindowExtent } = this.manager.options;
        resize.preview.update(
            computeResizedRect(
                resize.geometry,
                resize.edge,
                pointer.x - resize.pointer.x,
                pointer.y - resize.pointer.y,
                minWindowSize,
                maxWindowExtent,
            ),
        );
    }

    /** Apply the previewed geometry to the real window, once. */
    commitResize(): void {
        const resize = this.resize;
        if (!resize) {
            return;
        }
        this.resize = undefined;
        try {
            if (!resize.window.destroyed) {
                resize.window.setGeometry(resize.preview.rect);
                this.manager.notifyLayoutChanged();
            }
        } finally {
            resize.preview.destroy();
            this.manager.state.end(DockingState.Resizing);
        }
    }

    // --- ownership hooks ---------------------------------------------------

    /** A re-render replaced `window`'s DOM: its overlays and the cache are stale. */
    onWindowRendered(window: DockWindow): void {
        for (const [owner, overlay] of this.overlays) {
            if (!owner.isConnected || window.element.contains(owner)) {
                overlay.destroy();
                this.overlays.delete(owner);
            }
        }
        this.cache.invalidate();
    }

    /** Abort whatever gesture is running without committing it. */
    cancel(): void {
        if (this.resize) {
            this.resize.preview.destroy();
            this.resize = undefined;
            this.manager.state.end(DockingState.Resizing);
        }
        this.cleanup();
        this.move = undefined;
        this.manager.state.end(DockingState.DraggingWindow);
    }

    private cleanup(): void {
        for (const overlay of this.overlays.values()) {
            overlay.destroy();
        }
        this.overlays.clear();
        this.indicator.hide();
        this.pending = undefined;
        this.source = undefined;
        this.cache.invalidate();
    }

    private buildCache(): void {
        const source = this.source;
        this.cache.build(
            this.manager.windowsTopToBottom(),
            (window) => this.manager.routesOf(window),
            this.manager.measure,
            source ? this.excludedWindow(source) : undefined,
        );
    }

    /** The dragged window itself, or a window that would vanish with the dragged tab. */
    private excludedWindow(source: DragSource): DockWindow | undefined {
        if (source.kind === "window") {
            return source.window;
        }
        return this.isSimpleWindow(source.window) && !source.window.persistent ? source.window : undefined;
    }

    private isSimpleSource(source: DragSource): boolean {
        if (source.kind === "panel") {
            return true;
        }
        const root = this.manager.model.getRoot(source.window);
        return root !== undefined && this.manager.model.allWidgets(root).length === 1;
    }

    private isSimpleWindow(window: DockWindow): boolean {
        const root = this.manager.model.getRoot(window);
        return root?.type === "tabgroup" && root.children.length <= 1;
    }

    private holdsOneWidget(window: DockWindow): boolean {
        const root = this.manager.model.getRoot(window);
        return root?.type === "tabgroup" && root.children.length === 1;
    }

    private isOnlySourceWidget(group: TabGroupNode, source: DragSource): boolean {
        return source.kind === "panel" && group.children.length === 1 && group.children[0].widget === source.panel;
    }

    private containerSpec(container: ContainerDropTarget): OverlaySpec {
        const root = this.manager.model.getRoot(container.window);
        const empty = root !== undefined && root.children.length === 0;
        return {
            owner: container.element,
            rect: container.rect,
            icons: empty ? ALL_ICONS : EDGE_ICONS,
            style: empty ? "cluster" : "spread",
            target: container.window,
        };
    }

    /** Show exactly the overlays in `required`, reusing those already shown. */
    private syncOverlays(required: Map<HTMLElement, OverlaySpec>): void {
        for (const [owner, overlay] of this.overlays) {
            if (!required.has(owner)) {
                overlay.destroy();
                this.overlays.delete(owner);
            }
        }
        for (const [owner, wanted] of required) {
            const existing = this.overlays.get(owner);
            if (existing) {
                existing.setTargetRect(wanted.rect);
                continue;
            }
            this.overlays.set(
                owner,
                new DockingOverlay({
                    owner,
                    targetRect: wanted.rect,
                    icons: wanted.icons,
                    style: wanted.style,
                    options: this.manager.options.overlay,
                    getClassName: this.manager.options.getClassName,
                }),
            );
        }
    }

    private insertOffset(barRect: Rect, tabRects: Rect[], index: number): number {
        if (tabRects.length === 0) {
            return 0;
        }
        const edge = index < tabRects.length ? tabRects[index].x : tabRects[tabRects.length - 1].getRight();
        return edge - barRect.x;
    }
}
