import type { Point } from '../core/Rect';
import type { DockPanel } from '../dock/DockPanel';

export interface NativeDragSession {
    panel: DockPanel;
    /** Called for every cursor move, in client coordinates. */
    onMove(point: Point): void;
}

export interface NativeDragResult {
    /** False when the user cancelled. */
    dropped: boolean;
    point?: Point;
}

/**
 * Runs a blocking drag session: the returned promise settles only when the
 * user drops or cancels.
 */
export interface NativeDragDriver {
    run(session: NativeDragSession): Promise<NativeDragResult>;
}

/** Follows document pointer events; Escape cancels. */
export class PointerDragDriver implements NativeDragDriver {
    constructor(private readonly doc: Document = document) {}

    run(session: NativeDragSession): Promise<NativeDragResult> {
        return new Promise((resolve) => {
            let last: Point | undefined;

            const finish = (result: NativeDragResult): void => {
                this.doc.removeEventListener('pointermove', onMove);
                this.doc.removeEventListener('pointerup', onUp);
                this.doc.removeEventListener('keydown', onKey);
                resolve(result);
            };

            const onMove = (event: PointerEvent): void => {
                last = { x: event.clientX, y: event.clientY };
                session.onMove(last);
            };

            const onUp = (event: PointerEvent): void => {
                finish({ dropped: true, point: { x: event.clientX, y: event.clientY } });
            };

            const onKey = (event: KeyboardEvent): void => {
                if (event.key === 'Escape') {
                    finish({ dropped: false, point: last });
                }
            };

            this.doc.addEventListener('pointermove', onMove);
            this.doc.addEventListener('pointerup', onUp);
            this.doc.addEventListener('keydown', onKey);
        });
    }
}
