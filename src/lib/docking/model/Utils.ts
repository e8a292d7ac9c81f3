import type { TabGroupNode } from "./Node";

/** Keep a tab group's selection pointing at a live tab after `removedIndex` was spliced out. */
export function adjustSelectedIndex(group: TabGroupNode, removedIndex: number) {
    const selectedIndex = group.selected;
    if (group.children.length === 0) {
        group.selected = -1;
    } else if (selectedIndex === -1) {
        group.selected = 0;
    } else if (removedIndex === selectedIndex) {
        if (removedIndex >= group.children.length) {
            group.selected = group.children.length - 1;
        }
    } else if (removedIndex < selectedIndex) {
        group.selected = selectedIndex - 1;
    }
}

/** Select the first of the tabs just inserted at `index`. */
export function adjustSelectedIndexAfterInsert(group: TabGroupNode, index: number) {
    group.selected = Math.max(0, Math.min(index, group.children.length - 1));
}

export function randomUUID(): string {
    const template = "xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx";
    return template.replace(/[xy]/g, (c) => {
        const r = (Math.random() * 16) | 0;
        const v = c === "x" ? r : (r & 0x3) | 0x8;
        return v.toString(16);
    });
}
