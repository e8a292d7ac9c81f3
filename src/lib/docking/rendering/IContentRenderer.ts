/**
 * Content renderer lifecycle contract.
 *
 * Framework-agnostic lifecycle for rendering content into a container
 * DOM element. Implementations mount their framework (SolidJS, plain DOM, etc.)
 * inside `init`, update on parameter changes, and clean up in `dispose`.
 *
 * Renderers that can persist their own state implement `captureState` and
 * `restoreState`; the layout serializer prefers those over registered handlers.
 * `restoreState` may run before `init` when a layout is being loaded.
 */

import type { DockPanel } from "../dock/DockPanel";

export interface IRenderParams {
    panel: DockPanel;
    selected: boolean;
    windowId: string;
}

export interface IContentRenderer {
    init(container: HTMLElement, params: IRenderParams): void;
    update(params: Partial<IRenderParams>): void;
    dispose(): void;
    captureState?(): unknown;
    restoreState?(state: unknown): void;
}

export interface IStatefulContent {
    captureState(): unknown;
    restoreState(state: unknown): void;
}

export function isContentRenderer(value: unknown): value is IContentRenderer {
    return (
        typeof value === "object" &&
        value !== null &&
        "init" in value &&
        typeof value.init === "function" &&
        "dispose" in value &&
        typeof value.dispose === "function"
    );
}

export function isStatefulContent(value: IContentRenderer | undefined): value is IContentRenderer & IStatefulContent {
    return typeof value?.captureState === "function" && typeof value.restoreState === "function";
}
