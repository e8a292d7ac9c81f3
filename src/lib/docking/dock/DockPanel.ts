import { CLASSES } from "../core/Types";
import type { ClassNameMapper } from "../core/Types";
import { identityClassName } from "../core/Types";
import { randomUUID } from "../model/Utils";
import { isContentRenderer, isStatefulContent } from "../rendering/IContentRenderer";
import type { IContentRenderer, IStatefulContent } from "../rendering/IContentRenderer";

/** Content of a panel: a ready element, or a renderer mounted on first show. */
export type PanelContent = HTMLElement | IContentRenderer;

export const DEFAULT_PANEL_MARGIN = 5;

export interface DockPanelInit {
    title?: string;
    content?: PanelContent;
    /** Shows a close button on the tab. Defaults to true. */
    closable?: boolean;
    /** Padding around the content, in pixels. Saved with the layout. */
    margin?: number;
}

/**
 * A dockable content widget. Identity across save/load is `persistentId`;
 * `uid` is unique per instance.
 */
export class DockPanel {
    readonly uid = randomUUID();
    readonly persistentId: string;
    readonly element: HTMLDivElement;
    readonly closable: boolean;
    readonly margin: number;
    private _title: string;
    private renderer: IContentRenderer | undefined;
    private mounted = false;
    private _destroyed = false;
    private _dragging = false;

    constructor(persistentId: string, init: DockPanelInit = {}, getClassName: ClassNameMapper = identityClassName) {
        this.persistentId = persistentId;
        this._title = init.title ?? persistentId;
        this.closable = init.closable ?? true;
        this.margin = Math.max(0, init.margin ?? DEFAULT_PANEL_MARGIN);
        this.element = document.createElement("div");
        this.element.className = getClassName(CLASSES.DOCK__PANEL);
        this.element.style.padding = `${this.margin}px`;
        this.element.dataset.panelId = persistentId;

        if (isContentRenderer(init.content)) {
            this.renderer = init.content;
        } else if (init.content) {
            this.element.appendChild(init.content);
        }
    }

    get title(): string {
        return this._title;
    }

    setTitle(title: string): void {
        this._title = title;
    }

    get destroyed(): boolean {
        return this._destroyed;
    }

    /** Set while the panel's tab is the source of a native drag session. */
    get dragging(): boolean {
        return this._dragging;
    }

    setDragging(dragging: boolean): void {
        this._dragging = dragging;
    }

    /** Mount the renderer the first time the panel is selected, then forward changes. */
    show(windowId: string, selected: boolean): void {
        if (!this.renderer || (!this.mounted && !selected)) {
            return;
        }
        if (!this.mounted) {
            this.renderer.init(this.element, { panel: this, selected, windowId });
            this.mounted = true;
        } else {
            this.renderer.update({ selected, windowId });
        }
    }

    /** The content's own state capability, if it has one. */
    getStatefulContent(): IStatefulContent | undefined {
        return isStatefulContent(this.renderer) ? this.renderer : undefined;
    }

    destroy(): void {
        if (this._destroyed) {
            return;
        }
        this._destroyed = true;
        if (this.mounted) {
            this.renderer?.dispose();
        }
        this.renderer = undefined;
        this.element.remove();
    }
}
