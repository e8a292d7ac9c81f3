import { DockLocation } from '../core/DockLocation';
import type { DockLocationName } from '../core/DockLocation';
import { Rect } from '../core/Rect';
import type { Point } from '../core/Rect';
import { CLASSES } from '../core/Types';
import type { ClassNameMapper } from '../core/Types';
import type { OverlayOptions } from '../config/options';

/** `cluster` groups the icons around the center, `spread` pins them to the edges. */
export type OverlayStyle = 'cluster' | 'spread';

export const ALL_ICONS: readonly DockLocationName[] = ['top', 'left', 'bottom', 'right', 'center'];
export const EDGE_ICONS: readonly DockLocationName[] = ['top', 'left', 'bottom', 'right'];

export interface DockingOverlayInit {
    /** Element the overlay is parented to. */
    owner: HTMLElement;
    /** Area covered by the overlay, in the same coordinates as pointer events. */
    targetRect: Rect;
    icons: readonly DockLocationName[];
    style: OverlayStyle;
    options: OverlayOptions;
    getClassName: ClassNameMapper;
}

/**
 * Icon positions for a target area. Pure geometry so drop resolution needs no layout.
 */
export function computeIconRects(
    target: Rect,
    icons: readonly DockLocationName[],
    style: OverlayStyle,
    options: OverlayOptions,
): Map<DockLocationName, Rect> {
    const size = options.iconSize;
    const center = target.getCenter();
    const cx = center.x - size / 2;
    const cy = center.y - size / 2;
    const rects = new Map<DockLocationName, Rect>();

    for (const icon of icons) {
        let x = cx;
        let y = cy;
        if (style === 'cluster') {
            const step = size + options.clusterSpacing;
            if (icon === 'top') y = cy - step;
            if (icon === 'bottom') y = cy + step;
            if (icon === 'left') x = cx - step;
            if (icon === 'right') x = cx + step;
        } else {
            const margin = options.spreadMargin;
            if (icon === 'top') y = target.y + margin;
            if (icon === 'bottom') y = target.getBottom() - margin - size;
            if (icon === 'left') x = target.x + margin;
            if (icon === 'right') x = target.getRight() - margin - size;
        }
        rects.set(icon, new Rect(x, y, size, size));
    }
    return rects;
}

/**
 * Transient drop affordance over one candidate target. Input-transparent and
 * advisory only; the drag controller owns it and destroys it when the drag ends.
 */
export class DockingOverlay {
    readonly element: HTMLDivElement;
    private readonly preview: HTMLDivElement;
    private readonly iconElements = new Map<DockLocationName, HTMLDivElement>();
    private iconRects: Map<DockLocationName, Rect>;
    private targetRect: Rect;
    private previewLocation: DockLocation | undefined;
    private _destroyed = false;

    constructor(private readonly init: DockingOverlayInit) {
        const cls = init.getClassName;
        this.targetRect = init.targetRect.clone();
        this.iconRects = computeIconRects(this.targetRect, init.icons, init.style, init.options);

        this.element = document.createElement('div');
        this.element.className = cls(CLASSES.DOCK__OVERLAY);
        this.element.dataset.overlayStyle = init.style;
        this.element.style.position = 'absolute';
        this.element.style.inset = '0';
        this.element.style.pointerEvents = 'none';
        this.element.style.zIndex = '10000';

        this.preview = document.createElement('div');
        this.preview.className = cls(CLASSES.DOCK__OVERLAY_PREVIEW);
        this.preview.style.display = 'none';
        this.element.appendChild(this.preview);

        for (const icon of init.icons) {
            const element = document.createElement('div');
            element.className = `${cls(CLASSES.DOCK__OVERLAY_ICON)} ${cls(CLASSES.DOCK__OVERLAY_ICON_ + icon)}`;
            element.dataset.location = icon;
            this.iconElements.set(icon, element);
            this.element.appendChild(element);
        }
        this.layout();
        init.owner.appendChild(this.element);
    }

    get destroyed(): boolean {
        return this._destroyed;
    }

    get owner(): HTMLElement {
        return this.init.owner;
    }

    get location(): DockLocation | undefined {
        return this.previewLocation;
    }

    setTargetRect(rect: Rect): void {
        if (rect.equals(this.targetRect)) {
            return;
        }
        this.targetRect = rect.clone();
        this.iconRects = computeIconRects(this.targetRect, this.init.icons, this.init.style, this.init.options);
        this.layout();
    }

    /** Directional key under `point`, if any. */
    getLocationAt(point: Point): DockLocation | undefined {
        for (const [name, rect] of this.iconRects) {
            if (rect.containsPoint(point)) {
                return DockLocation.getByName(name);
            }
        }
        return undefined;
    }

    showPreview(location: DockLocation | undefined): void {
        this.previewLocation = location;
        const activeClass = this.init.getClassName(CLASSES.DOCK__OVERLAY_ICON_ACTIVE);
        for (const [name, element] of this.iconElements) {
            element.classList.toggle(activeClass, name === location?.getName());
        }
        if (!location) {
            this.preview.style.display = 'none';
            return;
        }
        location.getDockRect(this.targetRect).relativeTo(this.targetRect).positionElement(this.preview);
        this.preview.style.display = '';
    }

    destroy(): void {
        if (this._destroyed) {
            return;
        }
        this._destroyed = true;
        this.iconElements.clear();
        this.element.remove();
    }

    private layout(): void {
        for (const [name, rect] of this.iconRects) {
            const element = this.iconElements.get(name);
            if (element) {
                rect.relativeTo(this.targetRect).positionElement(element);
            }
        }
        if (this.previewLocation) {
            this.showPreview(this.previewLocation);
        }
    }
}
