import { Rect } from "../core/Rect";
import { CLASSES } from "../core/Types";
import type { ClassNameMapper } from "../core/Types";
import { identityClassName } from "../core/Types";
import { randomUUID } from "../model/Utils";

/**
 * - `main`: the application's embedded dock area.
 * - `root`: a pinned floating root that survives becoming empty.
 * - `container`: floating window holding any layout.
 * - `panel`: floating window holding a single widget.
 */
export type DockWindowKind = "main" | "root" | "container" | "panel";

export type ResizeEdge = "n" | "s" | "e" | "w" | "nw" | "ne" | "sw" | "se";

export const RESIZE_EDGES: readonly ResizeEdge[] = ["n", "s", "e", "w", "nw", "ne", "sw", "se"];

export interface DockWindowInit {
    kind: DockWindowKind;
    title: string;
    geometry?: Rect;
    titleBarHeight: number;
    resizeMargin: number;
    getClassName?: ClassNameMapper;
}

export class DockWindow {
    readonly id = randomUUID();
    readonly kind: DockWindowKind;
    readonly element: HTMLDivElement;
    readonly titleBar: HTMLDivElement;
    readonly body: HTMLDivElement;
    readonly closeButton: HTMLButtonElement;
    readonly maximizeButton: HTMLButtonElement;
    readonly resizeHandles = new Map<ResizeEdge, HTMLDivElement>();

    private readonly titleLabel: HTMLSpanElement;
    private readonly getClassName: ClassNameMapper;

    private _title: string;
    private _geometry: Rect;
    private _normalGeometry: Rect | undefined;
    private _visible = true;
    private _destroyed = false;

    constructor(init: DockWindowInit) {
        this.kind = init.kind;
        this._title = init.title;
        this._geometry = init.geometry?.clone() ?? Rect.empty();
        this.getClassName = init.getClassName ?? identityClassName;

        this.element = document.createElement("div");
        this.element.className = this.getClassName(CLASSES.DOCK__WINDOW);
        this.element.classList.add(
            this.getClassName(this.isFloating ? CLASSES.DOCK__WINDOW_FLOATING : CLASSES.DOCK__WINDOW_MAIN),
        );
        this.element.dataset.windowKind = this.kind;
        this.element.dataset.windowId = this.id;

        this.titleBar = document.createElement("div");
        this.titleBar.className = this.getClassName(CLASSES.DOCK__TITLEBAR);
        this.titleBar.style.height = `${init.titleBarHeight}px`;
        this.titleLabel = document.createElement("span");
        this.titleLabel.className = this.getClassName(CLASSES.DOCK__TITLEBAR_TITLE);
        this.titleLabel.textContent = this._title;

        const buttons = document.createElement("div");
        buttons.className = this.getClassName(CLASSES.DOCK__TITLEBAR_BUTTONS);
        this.maximizeButton = this.createButton("□", "Maximize");
        this.closeButton = this.createButton("×", "Close");
        buttons.append(this.maximizeButton, this.closeButton);
        this.titleBar.append(this.titleLabel, buttons);

        this.body = document.createElement("div");
        this.body.className = this.getClassName(CLASSES.DOCK__WINDOW_BODY);

        if (this.isFloating) {
            this.element.append(this.titleBar, this.body);
            for (const edge of RESIZE_EDGES) {
                const handle = document.createElement("div");
                handle.className = `${this.getClassName(CLASSES.DOCK__RESIZE_HANDLE)} ${this.getClassName(CLASSES.DOCK__RESIZE_HANDLE_ + edge)}`;
                handle.dataset.edge = edge;
                this.layoutHandle(handle, edge, init.resizeMargin);
                this.resizeHandles.set(edge, handle);
                this.element.appendChild(handle);
            }
            this._geometry.positionElement(this.element);
        } else {
            this.element.appendChild(this.body);
        }
    }

    /** Main dock areas and pinned roots survive becoming empty. */
    get persistent(): boolean {
        return this.kind === "main" || this.kind === "root";
    }

    get isFloating(): boolean {
        return this.kind !== "main";
    }

    get title(): string {
        return this._title;
    }

    setTitle(title: string): void {
        this._title = title;
        this.titleLabel.textContent = title;
    }

    get geometry(): Rect {
        return this._geometry.clone();
    }

    setGeometry(rect: Rect): void {
        this._geometry = rect.clone();
        if (this.isFloating) {
            this._geometry.positionElement(this.element);
        }
    }

    get maximized(): boolean {
        return this._normalGeometry !== undefined;
    }

    /** Geometry to return to when un-maximized, undefined when not maximized. */
    get normalGeometry(): Rect | undefined {
        return this._normalGeometry?.clone();
    }

    maximize(bounds: Rect, normalGeometry: Rect = this._geometry): void {
        if (!this.maximized) {
            this._normalGeometry = normalGeometry.clone();
        }
        this.setGeometry(bounds);
    }

    restore(): void {
        if (this._normalGeometry) {
            const normal = this._normalGeometry;
            this._normalGeometry = undefined;
            this.setGeometry(normal);
        }
    }

    get visible(): boolean {
        return this._visible;
    }

    setVisible(visible: boolean): void {
        this._visible = visible;
        this.element.classList.toggle(this.getClassName(CLASSES.DOCK__WINDOW_HIDDEN), !visible);
        this.element.style.display = visible ? "" : "none";
    }

    get destroyed(): boolean {
        return this._destroyed;
    }

    destroy(): void {
        if (this._destroyed) {
            return;
        }
        this._destroyed = true;
        this.element.remove();
    }

    private createButton(label: string, title: string): HTMLButtonElement {
        const button = document.createElement("button");
        button.type = "button";
        button.className = this.getClassName(CLASSES.DOCK__TITLEBAR_BUTTON);
        button.textContent = label;
        button.title = title;
        return button;
    }

    private layoutHandle(handle: HTMLDivElement, edge: ResizeEdge, margin: number): void {
        const size = `${margin}px`;
        const style = handle.style;
        style.position = "absolute";
        style.cursor = `${edge}-resize`;
        if (edge.includes("n")) {
            style.top = `-${margin}px`;
            style.height = size;
        }
        if (edge.includes("s")) {
            style.bottom = `-${margin}px`;
            style.height = size;
        }
        if (edge.includes("w")) {
            style.left = `-${margin}px`;
            style.width = size;
        }
        if (edge.includes("e")) {
            style.right = `-${margin}px`;
            style.width = size;
        }
        if (edge === "n" || edge === "s") {
            style.left = "0";
            style.right = "0";
        }
        if (edge === "e" || edge === "w") {
            style.top = "0";
            style.bottom = "0";
        }
    }
}
