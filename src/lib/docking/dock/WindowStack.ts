import type { DockWindow } from './DockWindow';

const BASE_Z_INDEX = 1000;

/**
 * Z-order of floating windows. The last entry is the topmost window.
 * The main dock area is never part of the stack; it always sits below.
 */
export class WindowStack {
    private orderedList: DockWindow[] = [];

    push(window: DockWindow): void {
        this.orderedList = [
            ...this.orderedList.filter((item) => item !== window),
            window,
        ];
        this.update();
    }

    remove(window: DockWindow): void {
        this.orderedList = this.orderedList.filter((item) => item !== window);
        this.update();
    }

    has(window: DockWindow): boolean {
        return this.orderedList.includes(window);
    }

    /** Topmost first. */
    topToBottom(): DockWindow[] {
        return [...this.orderedList].reverse();
    }

    clear(): void {
        this.orderedList = [];
    }

    private update(): void {
        for (let i = 0; i < this.orderedList.length; i++) {
            this.orderedList[i].element.setAttribute('aria-level', `${i}`);
            this.orderedList[i].element.style.zIndex = `${BASE_Z_INDEX + i}`;
        }
    }
}
