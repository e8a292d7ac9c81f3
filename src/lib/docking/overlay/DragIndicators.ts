import { Rect } from '../core/Rect';
import { CLASSES } from '../core/Types';
import type { ClassNameMapper } from '../core/Types';

/**
 * Outline shown while a floating window is being resized. The real window
 * only receives the final geometry on release.
 */
export class ResizePreview {
    private readonly element: HTMLDivElement;
    private _rect: Rect;

    constructor(parent: HTMLElement, rect: Rect, getClassName: ClassNameMapper) {
        this.element = document.createElement('div');
        this.element.className = getClassName(CLASSES.DOCK__RESIZE_PREVIEW);
        this.element.style.pointerEvents = 'none';
        this.element.style.zIndex = '10001';
        this._rect = rect.clone();
        this._rect.positionElement(this.element);
        parent.appendChild(this.element);
    }

    get rect(): Rect {
        return this._rect.clone();
    }

    update(rect: Rect): void {
        this._rect = rect.clone();
        this._rect.positionElement(this.element);
    }

    destroy(): void {
        this.element.remove();
    }
}

/** Vertical bar marking where a dropped tab would be inserted. */
export class InsertIndicator {
    private readonly element: HTMLDivElement;

    constructor(getClassName: ClassNameMapper) {
        this.element = document.createElement('div');
        this.element.className = getClassName(CLASSES.DOCK__INSERT_INDICATOR);
        this.element.style.pointerEvents = 'none';
        this.element.style.zIndex = '10000';
    }

    get attached(): boolean {
        return this.element.isConnected;
    }

    /**
     * @param bar the tab bar element, which becomes the indicator's parent
     * @param offset x of the insertion point relative to the bar
     */
    show(bar: HTMLElement, offset: number, height: number): void {
        if (this.element.parentElement !== bar) {
            bar.appendChild(this.element);
        }
        new Rect(offset - 1, 0, 2, height).positionElement(this.element);
    }

    hide(): void {
        this.element.remove();
    }
}
