import { Orientation } from '../core/Orientation';
import { Rect } from '../core/Rect';
import { LayoutDeserializationError, describeError } from '../core/errors';
import type { DockPanel, DockPanelInit } from '../dock/DockPanel';
import type { DockWindow } from '../dock/DockWindow';
import { createSplitter, createTabGroup, createWidgetNode } from '../model/Node';
import type { PaneNode, WidgetNode } from '../model/Node';
import type { DockingManager } from '../manager/DockingManager';
import {
    LAYOUT_FORMAT_VERSION,
    layoutDocumentSchema,
    windowRecordSchema,
} from './schema';
import type { LayoutDocument, PaneRecord, WidgetRecord, WindowRecord } from './schema';

/** Rebuilds content for a persistent id during a load. Undefined means the widget is skipped. */
export type WidgetFactory = (persistentId: string) => DockPanelInit | undefined;
export type StateProvider = () => unknown;
export type StateRestorer = (state: unknown) => void;

interface StateHandlers {
    provider: StateProvider;
    restorer: StateRestorer;
}

/** Per-load bookkeeping: each persistent id is constructed at most once. */
class LoadPass {
    readonly created = new Map<string, DockPanel | null>();
    readonly placed = new Set<string>();
}

/**
 * Converts the layout model to and from a versioned JSON document.
 * State capture and restore are contained per widget: a failing handler
 * loses that widget's state, never the rest of the layout.
 */
export class LayoutSerializer {
    widgetFactory: WidgetFactory | undefined;
    private readonly handlers = new Map<string, StateHandlers>();
    private readonly encoder = new TextEncoder();
    private readonly decoder = new TextDecoder();

    constructor(private readonly manager: DockingManager) {}

    registerStateHandlers(persistentId: string, provider: StateProvider, restorer: StateRestorer): void {
        this.handlers.set(persistentId, { provider, restorer });
    }

    save(): Uint8Array {
        return this.encoder.encode(JSON.stringify(this.toDocument()));
    }

    toDocument(): LayoutDocument {
        const windows = this.manager.model.entries().map(([window, root]) => this.windowToRecord(window, root));
        return { version: LAYOUT_FORMAT_VERSION, windows };
    }

    /**
     * Replace the current layout with saved data.
     * @throws LayoutDeserializationError when the data cannot be read at all; nothing is changed then
     */
    load(data: Uint8Array | string): void {
        const document = this.parse(data);
        this.manager.clearLayout();

        const pass = new LoadPass();
        for (const [i, raw] of document.windows.entries()) {
            const parsed = windowRecordSchema.safeParse(raw);
            if (!parsed.success) {
                this.manager.logger.warn(`Skipping saved window ${i}: ${parsed.error.message}`);
                continue;
            }
            try {
                this.restoreWindow(parsed.data, pass);
            } catch (error) {
                this.manager.logger.warn(`Skipping saved window ${i}: ${describeError(error)}`, error);
            }
        }
        this.manager.logger.info(`Loaded layout with ${this.manager.model.windows().length} window(s)`);
        this.manager.notifyLayoutChanged();
    }

    private parse(data: Uint8Array | string): { version: number; windows: unknown[] } {
        let json: unknown;
        try {
            json = JSON.parse(typeof data === 'string' ? data : this.decoder.decode(data));
        } catch (error) {
            throw new LayoutDeserializationError('Saved layout is not valid JSON', { cause: error });
        }
        const parsed = layoutDocumentSchema.safeParse(json);
        if (!parsed.success) {
            throw new LayoutDeserializationError(`Saved layout has an invalid shape: ${parsed.error.message}`, {
                cause: parsed.error,
            });
        }
        if (parsed.data.version !== LAYOUT_FORMAT_VERSION) {
            throw new LayoutDeserializationError(`Unsupported layout version ${parsed.data.version}`);
        }
        return parsed.data;
    }

    // --- save ----------------------------------------------------------------

    private windowToRecord(window: DockWindow, root: PaneNode): WindowRecord {
        const normal = window.normalGeometry;
        return {
            kind: window.kind,
            title: window.title,
            geometry: window.geometry.toJson(),
            maximized: window.maximized,
            normalGeometry: normal ? normal.toJson() : null,
            isMainWindow: window.kind === 'main',
            isPersistentRoot: window.kind === 'root',
            content: this.nodeToRecord(root),
        };
    }

    private nodeToRecord(node: PaneNode): PaneRecord {
        if (node.type === 'splitter') {
            return {
                type: 'splitter',
                orientation: node.orientation.getName(),
                sizes: [...node.sizes],
                children: node.children.map((child) => this.nodeToRecord(child)),
            };
        }
        return {
            type: 'tabgroup',
            selected: node.selected,
            children: node.children.map((child) => this.widgetToRecord(child)),
        };
    }

    private widgetToRecord(node: WidgetNode): WidgetRecord {
        const panel = node.widget;
        const record: WidgetRecord = {
            type: 'widget',
            id: panel.persistentId,
            title: panel.title,
            margin: panel.margin,
        };
        const state = this.captureState(panel);
        if (state !== undefined) {
            record.internalState = state;
        }
        return record;
    }

    private captureState(panel: DockPanel): unknown {
        try {
            const intrinsic = panel.getStatefulContent();
            if (intrinsic) {
                return intrinsic.captureState();
            }
            return this.handlers.get(panel.persistentId)?.provider();
        } catch (error) {
            this.manager.logger.warn(`Could not capture state of "${panel.persistentId}": ${describeError(error)}`, error);
            return undefined;
        }
    }

    // --- load ----------------------------------------------------------------

    private restoreWindow(record: WindowRecord, pass: LoadPass): void {
        const root = this.recordToNode(record.content, pass);
        const kind = record.isMainWindow ? 'main' : record.isPersistentRoot ? 'root' : record.kind;
        const title = record.title ?? (kind === 'container' ? this.manager.options.containerTitle : kind);
        const geometry = Rect.fromJson(record.geometry);
        const window = this.manager.restoreWindow(kind, title, geometry);

        if (record.maximized && window.isFloating) {
            window.maximize(geometry, record.normalGeometry ? Rect.fromJson(record.normalGeometry) : geometry);
        }
        const outcome = this.manager.installRoot(window, root);
        if (outcome === 'removed') {
            this.manager.logger.warn(`Saved window "${title}" had no restorable widgets`);
        }
    }

    private recordToNode(record: PaneRecord, pass: LoadPass): PaneNode {
        if (record.type === 'splitter') {
            const children = record.children.map((child) => this.recordToNode(child, pass));
            const sizes = record.sizes.length === children.length ? [...record.sizes] : [];
            return createSplitter(Orientation.fromName(record.orientation), children, sizes);
        }
        const widgets: WidgetNode[] = [];
        for (const child of record.children) {
            const panel = this.restoreWidget(child, pass);
            if (panel) {
                widgets.push(createWidgetNode(panel));
            }
        }
        const selected = record.selected ?? 0;
        return createTabGroup(widgets, widgets.length === 0 ? -1 : Math.max(0, Math.min(selected, widgets.length - 1)));
    }

    private restoreWidget(record: WidgetRecord, pass: LoadPass): DockPanel | undefined {
        if (pass.placed.has(record.id)) {
            this.manager.logger.warn(`Widget "${record.id}" appears more than once in the saved layout; keeping the first`);
            return undefined;
        }
        let panel = pass.created.get(record.id);
        if (panel === undefined) {
            panel = this.createWidget(record);
            pass.created.set(record.id, panel);
        }
        if (!panel) {
            return undefined;
        }
        pass.placed.add(record.id);
        if (record.internalState !== undefined) {
            this.restoreState(panel, record.internalState);
        }
        return panel;
    }

    private createWidget(record: WidgetRecord): DockPanel | null {
        try {
            const init = { title: record.title, margin: record.margin };
            if (this.manager.registry.has(record.id)) {
                return this.manager.createPanelFromRegistry(record.id, record.id, init);
            }
            const created = this.widgetFactory?.(record.id);
            if (!created) {
                this.manager.logger.warn(`No widget factory result for "${record.id}"; widget skipped`);
                return null;
            }
            return this.manager.createPanel(record.id, { ...created, title: created.title ?? record.title, margin: record.margin });
        } catch (error) {
            this.manager.logger.warn(`Could not create widget "${record.id}": ${describeError(error)}`, error);
            return null;
        }
    }

    private restoreState(panel: DockPanel, state: unknown): void {
        try {
            const intrinsic = panel.getStatefulContent();
            if (intrinsic) {
                intrinsic.restoreState(state);
                return;
            }
            const handlers = this.handlers.get(panel.persistentId);
            if (handlers) {
                handlers.restorer(state);
            } else {
                this.manager.logger.debug(`No state handler for "${panel.persistentId}"; saved state ignored`);
            }
        } catch (error) {
            this.manager.logger.warn(`Could not restore state of "${panel.persistentId}": ${describeError(error)}`, error);
        }
    }
}
