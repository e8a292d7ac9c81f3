import type { Point } from '../core/Rect';
import type { DockPanel } from '../dock/DockPanel';
import type { DockWindow, ResizeEdge } from '../dock/DockWindow';
import { computeTabInsertIndex } from '../hittest/HitTestCache';
import type { TabGroupNode } from '../model/Node';
import type { DockingManager } from '../manager/DockingManager';

const pointOf = (event: PointerEvent): Point => ({ x: event.clientX, y: event.clientY });

/**
 * Translates raw pointer input on window chrome and tabs into engine calls.
 * Gestures follow the pointer through document-level listeners that are
 * removed as soon as the gesture ends.
 */
export class WindowInputController {
    private readonly windows = new Map<DockWindow, AbortController>();
    private endGesture: (() => void) | undefined;

    constructor(private readonly manager: DockingManager) {}

    attachWindow(window: DockWindow): void {
        this.detachWindow(window);
        const controller = new AbortController();
        const { signal } = controller;
        this.windows.set(window, controller);

        window.element.addEventListener(
            'pointerdown',
            () => {
                if (this.manager.state.acceptsInput()) {
                    this.manager.bringToFront(window);
                }
            },
            { signal },
        );
        window.titleBar.addEventListener('pointerdown', (event) => this.onTitleBarPointerDown(event, window), { signal });
        window.closeButton.addEventListener(
            'click',
            () => this.whenAccepting(() => this.manager.closeWindowFromChrome(window)),
            { signal },
        );
        window.maximizeButton.addEventListener(
            'click',
            () => this.whenAccepting(() => this.manager.toggleMaximize(window)),
            { signal },
        );
        for (const [edge, handle] of window.resizeHandles) {
            handle.addEventListener('pointerdown', (event) => this.onResizePointerDown(event, window, edge), { signal });
        }
    }

    detachWindow(window: DockWindow): void {
        this.windows.get(window)?.abort();
        this.windows.delete(window);
    }

    /**
     * Press on a tab. The gesture stays a click until the pointer travels far
     * enough; then it becomes a native drag, or a tear-off once the pointer
     * leaves the tab bar vertically.
     */
    onTabPointerDown(event: PointerEvent, panel: DockPanel, group: TabGroupNode, window: DockWindow): void {
        if (event.button !== 0 || !this.manager.state.isIdle) {
            return;
        }
        const start = pointOf(event);
        const bar = this.manager.routesOf(window)?.tabBars.find((route) => route.group === group);
        const barRect = bar ? this.manager.measure(bar.element) : undefined;
        const tabRects = bar ? bar.tabs.map((tab) => this.manager.measure(tab)) : [];
        const { tabDragMode, dragStartDistance, tearThreshold } = this.manager.options;

        const onMove = (moveEvent: PointerEvent) => {
            const point = pointOf(moveEvent);
            if (tabDragMode === 'native') {
                if (Math.hypot(point.x - start.x, point.y - start.y) < dragStartDistance) {
                    return;
                }
                this.finishGesture();
                this.manager.startNativeTabDrag(panel).catch((error: unknown) => {
                    this.manager.logger.error('Tab drag failed', error);
                });
                return;
            }
            const leftBar = barRect
                ? point.y < barRect.y - tearThreshold || point.y > barRect.getBottom() + tearThreshold
                : Math.abs(point.y - start.y) > tearThreshold;
            if (!leftBar) {
                return;
            }
            this.finishGesture();
            this.whenAccepting(() => {
                this.manager.undockByTear(panel, point);
                this.followWindowMove();
            });
        };

        const onUp = (upEvent: PointerEvent) => {
            this.finishGesture();
            if (!barRect) {
                return;
            }
            const index = computeTabInsertIndex(barRect, tabRects, pointOf(upEvent));
            const from = group.children.findIndex((child) => child.widget === panel);
            if (index < 0 || from < 0) {
                return;
            }
            const to = index > from ? index - 1 : index;
            if (to !== from) {
                this.whenAccepting(() => this.manager.moveTab(group, from, to));
            }
        };

        this.startGesture(onMove, onUp);
    }

    dispose(): void {
        this.finishGesture();
        for (const controller of this.windows.values()) {
            controller.abort();
        }
        this.windows.clear();
    }

    private onTitleBarPointerDown(event: PointerEvent, window: DockWindow): void {
        if (event.button !== 0 || !this.manager.state.isIdle) {
            return;
        }
        if (event.target instanceof Element && event.target.closest('button')) {
            return;
        }
        event.preventDefault();
        this.whenAccepting(() => {
            this.manager.dnd.beginWindowMove(window, pointOf(event));
            this.followWindowMove();
        });
    }

    private followWindowMove(): void {
        this.startGesture(
            (event) => this.whenAccepting(() => this.manager.dnd.updateWindowMove(pointOf(event))),
            () => {
                this.finishGesture();
                this.manager.guard(() => this.manager.dnd.endWindowMove());
            },
        );
    }

    private onResizePointerDown(event: PointerEvent, window: DockWindow, edge: ResizeEdge): void {
        if (event.button !== 0 || !this.manager.state.isIdle) {
            return;
        }
        event.preventDefault();
        event.stopPropagation();
        this.whenAccepting(() => {
            this.manager.dnd.beginResize(window, edge, pointOf(event));
            this.startGesture(
                (moveEvent) => this.manager.dnd.updateResize(pointOf(moveEvent)),
                () => {
                    this.finishGesture();
                    this.manager.guard(() => this.manager.dnd.commitResize());
                },
            );
        });
    }

    private startGesture(onMove: (event: PointerEvent) => void, onUp: (event: PointerEvent) => void): void {
        this.finishGesture();
        const doc = this.manager.host.ownerDocument;
        doc.addEventListener('pointermove', onMove);
        doc.addEventListener('pointerup', onUp);
        this.endGesture = () => {
            doc.removeEventListener('pointermove', onMove);
            doc.removeEventListener('pointerup', onUp);
        };
    }

    private finishGesture(): void {
        const end = this.endGesture;
        this.endGesture = undefined;
        end?.();
    }

    /** Input that arrives while a mutation is rendering is dropped. */
    private whenAccepting(action: () => void): void {
        if (!this.manager.state.acceptsInput()) {
            return;
        }
        this.manager.guard(action);
    }
}
