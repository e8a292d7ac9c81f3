import { DockLocation } from "../core/DockLocation";
import type { DockLocationName } from "../core/DockLocation";
import { Rect } from "../core/Rect";
import type { Point } from "../core/Rect";
import { DockOperationError, DockReferenceError, LayoutConsistencyError, describeError } from "../core/errors";
import { createConsoleLogger } from "../core/logger";
import type { DockLogger } from "../core/logger";
import { resolveDockingOptions } from "../config/options";
import type { DockingOptionsInput, ResolvedDockingOptions, Size } from "../config/options";
import { DockPanel } from "../dock/DockPanel";
import type { DockPanelInit } from "../dock/DockPanel";
import { DockWindow } from "../dock/DockWindow";
import type { DockWindowKind } from "../dock/DockWindow";
import { WindowStack } from "../dock/WindowStack";
import { PointerDragDriver } from "../input/NativeDragDriver";
import type { NativeDragDriver } from "../input/NativeDragDriver";
import { WindowInputController } from "../input/WindowInputController";
import { Emitter } from "../model/Event";
import type { Event } from "../model/Event";
import { LayoutModel } from "../model/LayoutModel";
import type { HostInfo, SimplifyOutcome } from "../model/LayoutModel";
import { createTabGroup, createSplitter, createWidgetNode, firstTabGroup } from "../model/Node";
import type { PaneNode, SplitterNode, TabGroupNode } from "../model/Node";
import { adjustSelectedIndexAfterInsert } from "../model/Utils";
import { LayoutSerializer } from "../persistence/LayoutSerializer";
import type { StateProvider, StateRestorer, WidgetFactory } from "../persistence/LayoutSerializer";
import { LayoutRenderer, measureElement } from "../rendering/LayoutRenderer";
import type { Measure, RoutingTable } from "../rendering/LayoutRenderer";
import { WidgetRegistry } from "../registry/WidgetRegistry";
import { DockingStateMachine } from "./DockingState";
import { DragDropController } from "./DragDropController";
import type { DragSource, DropTargetHandle, PendingDrop } from "./DragDropController";

export interface DockingManagerOptions extends DockingOptionsInput {
    /** Element hosting the dock area and all floating windows. */
    host: HTMLElement;
    logger?: DockLogger;
    /** Element geometry in pointer-event coordinates. Defaults to getBoundingClientRect. */
    measure?: Measure;
    registry?: WidgetRegistry;
    nativeDragDriver?: NativeDragDriver;
}

export interface WidgetDockedEvent {
    panel: DockPanel;
    container: DockWindow;
}

export interface FloatingOptions {
    title?: string;
    /** Top-left corner in host coordinates. */
    position?: Point;
    /** Content size; the title bar is added on top. */
    size?: Size;
}

type DockSourceHandle = DockPanel | DockWindow;

interface ResolvedSource {
    node: PaneNode;
    panels: DockPanel[];
    /** Window the content came from, undefined for a panel not yet in the layout. */
    window: DockWindow | undefined;
    /** True when the whole source window is being merged away. */
    wholeWindow: boolean;
    /** Tab group and index the widget was detached from, when it was detached. */
    detachedFrom?: { group: TabGroupNode; index: number };
}

interface ResolvedTarget {
    window: DockWindow;
    /** Node to split against for directional docks. */
    node: PaneNode;
    /** Tab group receiving center and insert drops. */
    group: TabGroupNode | undefined;
}

function toLocation(location: DockLocation | DockLocationName): DockLocation {
    if (location instanceof DockLocation) {
        return location;
    }
    const found = DockLocation.getByName(location);
    if (!found) {
        throw new DockOperationError(`Unknown dock location "${location}"`);
    }
    return found;
}

/**
 * Orchestrates docking: owns the layout model, renders it into windows,
 * performs dock/undock/close mutations and emits notifications.
 *
 * Every mutation runs inside the Rendering guard so input arriving while the
 * DOM is being rebuilt is ignored.
 */
export class DockingManager {
    readonly options: ResolvedDockingOptions;
    readonly host: HTMLElement;
    readonly logger: DockLogger;
    readonly measure: Measure;
    readonly registry: WidgetRegistry;
    readonly model = new LayoutModel<DockWindow>();
    readonly state = new DockingStateMachine();
    readonly dnd: DragDropController;

    private readonly stack = new WindowStack();
    private readonly renderer: LayoutRenderer;
    private readonly input: WindowInputController;
    private readonly serializer: LayoutSerializer;
    private readonly nativeDragDriver: NativeDragDriver;
    private readonly panels = new Map<string, DockPanel>();
    private _mainWindow: DockWindow | undefined;
    /** Pinned roots emptied by the last `clearLayout`, waiting for saved root records. */
    private reusableRoots: DockWindow[] = [];

    private readonly _onDidDock = new Emitter<WidgetDockedEvent>();
    readonly onDidDock: Event<WidgetDockedEvent> = this._onDidDock.event;
    private readonly _onDidUndock = new Emitter<DockPanel>();
    readonly onDidUndock: Event<DockPanel> = this._onDidUndock.event;
    private readonly _onDidClose = new Emitter<string>();
    /** Fires with the persistent id before the widget is removed. */
    readonly onDidClose: Event<string> = this._onDidClose.event;
    private readonly _onDidLayoutChange = new Emitter<void>();
    readonly onDidLayoutChange: Event<void> = this._onDidLayoutChange.event;

    constructor(options: DockingManagerOptions) {
        const { host, logger, measure, registry, nativeDragDriver, ...rest } = options;
        this.options = resolveDockingOptions(rest);
        this.host = host;
        this.logger = logger ?? createConsoleLogger({ debug: this.options.debug });
        this.measure = measure ?? measureElement;
        this.registry = registry ?? new WidgetRegistry();
        this.nativeDragDriver = nativeDragDriver ?? new PointerDragDriver(host.ownerDocument);
        if (!this.host.style.position) {
            this.host.style.position = "relative";
        }

        this.dnd = new DragDropController(this);
        this.input = new WindowInputController(this);
        this.serializer = new LayoutSerializer(this);
        this.renderer = new LayoutRenderer({
            getClassName: this.options.getClassName,
            measure: this.measure,
            callbacks: {
                acceptsInput: () => this.state.acceptsInput(),
                onSelectTab: (group, index, window) => this.guard(() => this.selectTab(group, index, window)),
                onCloseTab: (panel) => this.guard(() => this.requestCloseWidget(panel)),
                onTabPointerDown: (event, panel, group, window) => this.input.onTabPointerDown(event, panel, group, window),
                onCloseGroup: (group) => this.guard(() => this.closeTabGroup(group)),
                onUndockGroup: (group) => this.guard(() => this.undockTabGroup(group)),
                onSplitterResized: () => this.notifyLayoutChanged(),
            },
        });
    }

    get mainWindow(): DockWindow | undefined {
        return this._mainWindow;
    }

    // --- registration --------------------------------------------------------

    /** Create the application's persistent dock area. */
    registerDockArea(title = "Main"): DockWindow {
        if (this._mainWindow && !this._mainWindow.destroyed) {
            throw new DockOperationError("A main dock area is already registered");
        }
        const window = this.createWindow("main", title);
        this._mainWindow = window;
        return this.state.runRendering(() => {
            this.model.register(window);
            this.renderWindow(window);
            return window;
        });
    }

    /** A pinned floating root: stays registered even when emptied. */
    createFloatingRoot(title = "Dock Root", geometry?: Rect): DockWindow {
        const window = this.createWindow("root", title, geometry ?? this.defaultGeometry(this.options.defaultFloatSize));
        this.state.runRendering(() => {
            this.model.register(window);
            this.renderWindow(window);
        });
        this.notifyLayoutChanged();
        return window;
    }

    createPanel(persistentId: string, init: DockPanelInit = {}): DockPanel {
        const existing = this.panels.get(persistentId);
        if (existing && !existing.destroyed) {
            throw new DockOperationError(`A panel with id "${persistentId}" already exists`);
        }
        const panel = new DockPanel(persistentId, init, this.options.getClassName);
        this.panels.set(persistentId, panel);
        return panel;
    }

    /** Build a panel from content registered under `key`. */
    createPanelFromRegistry(key: string, persistentId: string = key, init: Omit<DockPanelInit, "content"> = {}): DockPanel {
        const created = this.registry.create(key);
        return this.createPanel(persistentId, { ...init, title: init.title ?? created.title, content: created.content });
    }

    /** Put a panel that is not in the layout yet into its own floating window. */
    createFloating(panel: DockPanel, options: FloatingOptions = {}): DockWindow {
        this.requireDetachedPanel(panel);
        if (options.title !== undefined) {
            panel.setTitle(options.title);
        }
        const size = options.size ?? this.options.defaultFloatSize;
        const origin = options.position ?? this.cascadePosition();
        const geometry = Rect.at(origin, size.width, size.height + this.options.titleBarHeight);
        const window = this.createWindow("panel", panel.title, geometry);
        this.state.runRendering(() => {
            this.model.register(window, panel);
            this.renderWindow(window);
        });
        this.notifyLayoutChanged();
        return window;
    }

    /** A floating container holding `panels` as tabs of one group. */
    createFloatingWindow(panels: DockPanel[], geometry?: Rect): DockWindow {
        if (panels.length === 0) {
            throw new DockOperationError("A floating window needs at least one panel");
        }
        panels.forEach((panel) => this.requireDetachedPanel(panel));
        const kind: DockWindowKind = panels.length === 1 ? "panel" : "container";
        const title = kind === "panel" ? panels[0].title : this.options.containerTitle;
        const window = this.createWindow(kind, title, geometry ?? this.defaultGeometry(this.options.defaultFloatSize));
        this.state.runRendering(() => {
            this.model.setRoot(window, createTabGroup(panels.map((panel) => createWidgetNode(panel))));
            this.renderWindow(window);
        });
        this.notifyLayoutChanged();
        return window;
    }

    /** Add a panel that is not in the layout yet next to, or into, `target`. */
    addPanel(panel: DockPanel, target: DockPanel | DockWindow, location: DockLocation | DockLocationName = "center"): void {
        this.requireDetachedPanel(panel);
        this.dockInternal(panel, target, toLocation(location));
    }

    /** Remove a window from the layout, destroying its panels without close notifications. */
    unregister(window: DockWindow): void {
        this.requireWindow(window);
        const panels = this.panelsOf(window);
        this.state.runRendering(() => this.destroyWindow(window));
        panels.forEach((panel) => this.forgetPanel(panel));
        this.notifyLayoutChanged();
    }

    // --- docking ---------------------------------------------------------------

    dock(source: DockSourceHandle, target: DockPanel | DockWindow, location: DockLocation | DockLocationName): void {
        this.dockInternal(source, target, toLocation(location));
    }

    /** Insert the source's widgets into `group` as tabs starting at `index`. */
    dockAt(source: DockSourceHandle, group: TabGroupNode, index: number): void {
        this.dockInternal(source, group, "insert", index);
    }

    /** @internal Commit the pending drop of a finished drag. */
    commitDrop(source: DragSource, drop: PendingDrop): void {
        const handle = source.kind === "window" ? source.window : source.panel;
        if (drop.kind === "insert") {
            this.dockInternal(handle, drop.group, "insert", drop.index);
        } else {
            this.dockInternal(handle, drop.target, drop.location);
        }
    }

    private dockInternal(
        sourceHandle: DockSourceHandle,
        targetHandle: DropTargetHandle,
        location: DockLocation | "insert",
        index = 0,
    ): void {
        this.validateDock(sourceHandle, targetHandle);

        const docked = this.runMutation(() => {
            const source = this.detachSource(sourceHandle);
            const target = this.prepareTarget(this.resolveTarget(targetHandle));
            let insertAt = index;
            if (location === "insert" && source.detachedFrom !== undefined && source.detachedFrom.group === target.group && source.detachedFrom.index < index) {
                insertAt -= 1;
            }
            this.merge(source, target, location, insertAt);

            if (source.window && source.wholeWindow) {
                this.model.unregister(source.window);
            }
            this.renderWindow(target.window);
            if (source.window && source.wholeWindow) {
                this.destroyWindow(source.window);
            } else if (source.window && source.window !== target.window) {
                this.simplifyAndRender(source.window);
            }
            this.simplifyAndRender(target.window);
            return { panels: source.panels, container: target.window };
        });

        this.logger.debug(
            `Docked ${docked.panels.map((panel) => panel.persistentId).join(", ")} into "${docked.container.title}"`,
        );
        for (const panel of docked.panels) {
            this.emit(this._onDidDock, { panel, container: docked.container });
        }
        this.notifyLayoutChanged();
    }

    /** Check every handle before anything is mutated. */
    private validateDock(sourceHandle: DockSourceHandle, targetHandle: DropTargetHandle): void {
        const newPanel = sourceHandle instanceof DockPanel && !this.model.findHost(sourceHandle);
        if (newPanel) {
            this.requireDetachedPanel(sourceHandle);
        } else if (sourceHandle instanceof DockPanel) {
            this.requireHost(sourceHandle);
        } else {
            this.requireWindow(sourceHandle);
            if (sourceHandle.persistent) {
                throw new DockOperationError(`Persistent window "${sourceHandle.title}" cannot be docked elsewhere`);
            }
        }

        const target = this.resolveTarget(targetHandle);
        if (sourceHandle === targetHandle) {
            throw new DockOperationError("Cannot dock a widget onto itself");
        }
        if (sourceHandle instanceof DockWindow && target.window === sourceHandle) {
            throw new DockOperationError(`Cannot dock window "${sourceHandle.title}" into itself`);
        }
        if (sourceHandle instanceof DockPanel && !newPanel) {
            const host = this.requireHost(sourceHandle);
            const mergesWholeWindow = this.isSoleWidgetOf(host) && !host.root.persistent;
            if (mergesWholeWindow && target.window === host.root) {
                throw new DockOperationError(`Cannot dock "${sourceHandle.persistentId}" into its own window`);
            }
            if (target.group === host.group && host.group.children.length === 1) {
                throw new DockOperationError("Cannot dock a widget onto itself");
            }
        }
    }

    private isSoleWidgetOf(host: HostInfo<DockWindow>): boolean {
        const root = this.model.getRoot(host.root);
        return root === host.group && host.group.children.length === 1;
    }

    private detachSource(handle: DockSourceHandle): ResolvedSource {
        if (handle instanceof DockWindow) {
            const node = this.requireRoot(handle);
            return { node, panels: this.panelsOfNode(node), window: handle, wholeWindow: true };
        }
        const host = this.model.findHost(handle);
        if (!host) {
            return { node: createTabGroup([createWidgetNode(handle)]), panels: [handle], window: undefined, wholeWindow: false };
        }
        if (this.isSoleWidgetOf(host) && !host.root.persistent) {
            return { node: host.group, panels: [handle], window: host.root, wholeWindow: true };
        }
        this.model.removeWidget(handle);
        return {
            node: createTabGroup([createWidgetNode(handle)]),
            panels: [handle],
            window: host.root,
            wholeWindow: false,
            detachedFrom: { group: host.group, index: host.index },
        };
    }

    private resolveTarget(handle: DropTargetHandle): ResolvedTarget {
        if (handle instanceof DockPanel) {
            const host = this.requireHost(handle);
            return { window: host.root, node: host.group, group: host.group };
        }
        if (handle instanceof DockWindow) {
            const root = this.requireRoot(handle);
            return { window: handle, node: root, group: firstTabGroup(root) };
        }
        const window = this.model.findWindowOf(handle);
        if (!window) {
            throw new DockReferenceError(`Tab group ${handle.id} is not part of any window`);
        }
        return { window, node: handle, group: handle };
    }

    /**
     * A single-widget window cannot hold a layout, so docking into one moves
     * its tree into a fresh container at the same place.
     */
    private prepareTarget(target: ResolvedTarget): ResolvedTarget {
        if (target.window.kind !== "panel") {
            return target;
        }
        const root = this.requireRoot(target.window);
        const container = this.createWindow("container", this.options.containerTitle, target.window.geometry);
        this.model.setRoot(container, root);
        this.model.unregister(target.window);
        this.destroyWindow(target.window);
        return { ...target, window: container };
    }

    private merge(source: ResolvedSource, target: ResolvedTarget, location: DockLocation | "insert", index: number): void {
        const root = this.requireRoot(target.window);
        if (root.type === "tabgroup" && root.children.length === 0) {
            this.model.setRoot(target.window, source.node);
            return;
        }

        if (location === "insert" || location.isCenter()) {
            const group = target.group ?? firstTabGroup(root);
            if (!group) {
                throw new LayoutConsistencyError(`Window "${target.window.title}" has no tab group to dock into`);
            }
            const widgets = this.model.allWidgets(source.node);
            const at = location === "insert" ? Math.max(0, Math.min(index, group.children.length)) : group.children.length;
            group.children.splice(at, 0, ...widgets);
            adjustSelectedIndexAfterInsert(group, at);
            return;
        }

        const children = location.indexPlus === 0 ? [source.node, target.node] : [target.node, source.node];
        const splitter = createSplitter(location.getOrientation(), children);
        const parent = this.model.findParent(root, target.node);
        if (parent === undefined) {
            throw new LayoutConsistencyError(`Dock target ${target.node.id} is not in window "${target.window.title}"`);
        }
        if (parent === null) {
            this.model.setRoot(target.window, splitter);
        } else {
            this.inheritSize(parent, target.node, splitter);
            this.model.replaceInParent(root, target.node, splitter);
        }
    }

    /** The new splitter takes over the slot size of the node it replaces. */
    private inheritSize(parent: SplitterNode, replaced: PaneNode, splitter: SplitterNode): void {
        const slot = parent.children.indexOf(replaced);
        if (parent.sizes.length === parent.children.length && slot >= 0) {
            const size = parent.sizes[slot];
            splitter.sizes = [size / 2, size / 2];
        }
    }

    moveToContainer(panel: DockPanel, container: DockWindow): boolean {
        const host = this.requireHost(panel);
        this.requireWindow(container);
        if (host.root === container) {
            return true;
        }
        this.dockInternal(panel, container, DockLocation.CENTER);
        return true;
    }

    /** Reorder a tab inside its group. */
    moveTab(group: TabGroupNode, from: number, to: number): void {
        const window = this.model.findWindowOf(group);
        if (!window) {
            throw new DockReferenceError(`Tab group ${group.id} is not part of any window`);
        }
        if (from < 0 || from >= group.children.length) {
            throw new DockOperationError(`Tab index ${from} is out of range`);
        }
        const target = Math.max(0, Math.min(to, group.children.length - 1));
        if (target === from) {
            return;
        }
        this.state.runRendering(() => {
            const [moved] = group.children.splice(from, 1);
            group.children.splice(target, 0, moved);
            group.selected = target;
            this.renderWindow(window);
        });
        this.notifyLayoutChanged();
    }

    // --- undocking -------------------------------------------------------------

    /**
     * Float a docked widget in its own window. Without a position the window
     * cascades from the dock area's corner.
     */
    undock(panel: DockPanel, position?: Point): DockWindow {
        const host = this.requireHost(panel);
        if (host.root.kind === "panel") {
            return host.root;
        }
        const size = this.floatSizeFor(panel, this.options.defaultFloatSize);
        return this.undockInternal(panel, host, position ?? this.cascadePosition(), size);
    }

    /**
     * Tear a tab off mid-gesture: the new window is placed under the cursor
     * and immediately starts moving with it.
     */
    undockByTear(panel: DockPanel, cursor: Point): DockWindow {
        const host = this.requireHost(panel);
        let window = host.root;
        if (host.root.kind !== "panel") {
            const size = this.floatSizeFor(panel, this.options.tearFloatSize);
            const local = this.toHostPoint(cursor);
            const position = {
                x: local.x - this.options.tearGrabOffset,
                y: local.y - this.options.titleBarHeight / 2,
            };
            window = this.undockInternal(panel, host, position, size);
        }
        this.dnd.beginWindowMove(window, cursor);
        return window;
    }

    /** @internal Float a widget whose drag ended over nothing, centered under the cursor. */
    floatPanelAt(panel: DockPanel, cursor: Point): DockWindow {
        const host = this.requireHost(panel);
        const local = this.toHostPoint(cursor);
        if (host.root.kind === "panel") {
            const geometry = host.root.geometry;
            host.root.setGeometry(
                new Rect(local.x - geometry.width / 2, local.y - this.options.titleBarHeight / 2, geometry.width, geometry.height),
            );
            this.notifyLayoutChanged();
            return host.root;
        }
        const size = this.floatSizeFor(panel, this.options.defaultFloatSize);
        const position = { x: local.x - size.width / 2, y: local.y - this.options.titleBarHeight / 2 };
        return this.undockInternal(panel, host, position, size);
    }

    private undockInternal(panel: DockPanel, host: HostInfo<DockWindow>, position: Point, size: Size): DockWindow {
        const window = this.runMutation(() => {
            this.model.removeWidget(panel);
            const floating = this.createWindow("panel", panel.title, Rect.at(position, size.width, size.height));
            this.model.register(floating, panel);
            this.renderWindow(floating);
            this.simplifyAndRender(host.root);
            return floating;
        });
        this.logger.debug(`Undocked ${panel.persistentId}`);
        this.emit(this._onDidUndock, panel);
        this.notifyLayoutChanged();
        return window;
    }

    /** Move a whole tab group into a new floating window at its current screen position. */
    undockTabGroup(group: TabGroupNode): DockWindow {
        const window = this.model.findWindowOf(group);
        if (!window) {
            throw new DockReferenceError(`Tab group ${group.id} is not part of any window`);
        }
        if (group.children.length === 0) {
            throw new DockOperationError("Cannot float an empty tab group");
        }
        const root = this.requireRoot(window);
        if (root === group && !window.persistent) {
            return window;
        }

        const route = this.renderer.getRoutes(window)?.groups.find((entry) => entry.group === group);
        const measured = route ? this.measure(route.element) : Rect.empty();
        const hostRect = this.measure(this.host);
        const geometry = measured.isEmpty()
            ? this.defaultGeometry(this.options.defaultFloatSize)
            : new Rect(
                  measured.x - hostRect.x,
                  measured.y - hostRect.y,
                  measured.width,
                  measured.height + this.options.titleBarHeight,
              );
        const panels = group.children.map((child) => child.widget);

        const floating = this.state.runRendering(() => {
            if (root === group) {
                this.model.setRoot(window, createTabGroup());
            } else {
                this.model.removeFromParent(root, group);
            }
            const kind: DockWindowKind = panels.length === 1 ? "panel" : "container";
            const title = kind === "panel" ? panels[0].title : this.options.containerTitle;
            const created = this.createWindow(kind, title, geometry);
            this.model.setRoot(created, group);
            this.renderWindow(created);
            this.simplifyAndRender(window);
            return created;
        });
        panels.forEach((panel) => this.emit(this._onDidUndock, panel));
        this.notifyLayoutChanged();
        return floating;
    }

    // --- closing ---------------------------------------------------------------

    requestCloseWidget(panel: DockPanel): void {
        const host = this.requireHost(panel);
        this.emit(this._onDidClose, panel.persistentId);
        this.state.runRendering(() => {
            this.model.removeWidget(panel);
            this.simplifyAndRender(host.root);
        });
        this.forgetPanel(panel);
        this.notifyLayoutChanged();
    }

    requestCloseContainer(window: DockWindow): void {
        this.requireWindow(window);
        if (window.kind === "main") {
            throw new DockOperationError("The main dock area cannot be closed");
        }
        const panels = this.panelsOf(window);
        panels.forEach((panel) => this.emit(this._onDidClose, panel.persistentId));
        this.state.runRendering(() => this.destroyWindow(window));
        panels.forEach((panel) => this.forgetPanel(panel));
        this.notifyLayoutChanged();
    }

    closeTabGroup(group: TabGroupNode): void {
        if (!this.model.findWindowOf(group)) {
            throw new DockReferenceError(`Tab group ${group.id} is not part of any window`);
        }
        for (const child of [...group.children]) {
            this.requestCloseWidget(child.widget);
        }
    }

    /** @internal Title bar close button: a single-widget window closes its widget. */
    closeWindowFromChrome(window: DockWindow): void {
        const panels = this.panelsOf(window);
        if (window.kind === "panel" && panels.length === 1) {
            this.requestCloseWidget(panels[0]);
        } else {
            this.requestCloseContainer(window);
        }
    }

    // --- activation and queries --------------------------------------------------

    activateWidget(panel: DockPanel): void {
        const host = this.requireHost(panel);
        this.selectTab(host.group, host.index, host.root);
        if (host.root.isFloating) {
            host.root.setVisible(true);
            this.bringToFront(host.root);
        }
    }

    private selectTab(group: TabGroupNode, index: number, window: DockWindow): void {
        group.selected = index;
        this.state.runRendering(() => {
            if (!this.renderer.updateSelection(window, group)) {
                this.renderWindow(window);
            }
        });
    }

    findWidgetById(persistentId: string): DockPanel | undefined {
        const panel = this.panels.get(persistentId);
        return panel && !panel.destroyed ? panel : undefined;
    }

    listAllWidgets(): DockPanel[] {
        return this.model.allWidgetsInModel().map((node) => node.widget);
    }

    /** Widgets living alone in their own floating window. */
    listFloatingWidgets(): DockPanel[] {
        return this.model
            .entries()
            .filter(([window]) => window.kind === "panel")
            .flatMap(([, root]) => this.panelsOfNode(root));
    }

    listWindows(): DockWindow[] {
        return this.model.windows();
    }

    getWindowOf(panel: DockPanel): DockWindow | undefined {
        return this.model.findHost(panel)?.root;
    }

    isWidgetDocked(panel: DockPanel): boolean {
        const host = this.model.findHost(panel);
        return host !== undefined && host.root.kind !== "panel";
    }

    bringToFront(window: DockWindow): void {
        if (window.isFloating && !window.destroyed) {
            this.stack.push(window);
        }
    }

    toggleMaximize(window: DockWindow): void {
        this.requireWindow(window);
        if (!window.isFloating) {
            return;
        }
        if (window.maximized) {
            window.restore();
        } else {
            const hostRect = this.measure(this.host);
            window.maximize(new Rect(0, 0, hostRect.width, hostRect.height));
        }
        this.notifyLayoutChanged();
    }

    /** Floating windows topmost first, then the main dock area. */
    windowsTopToBottom(): DockWindow[] {
        const windows = this.stack.topToBottom().filter((window) => this.model.has(window));
        if (this._mainWindow && this.model.has(this._mainWindow)) {
            windows.push(this._mainWindow);
        }
        return windows;
    }

    routesOf(window: DockWindow): RoutingTable | undefined {
        return this.renderer.getRoutes(window);
    }

    // --- drag entry points -----------------------------------------------------------

    /**
     * Drag a tab through the native drag driver. Resolves when the drag is
     * over and every overlay is gone.
     */
    startNativeTabDrag(panel: DockPanel, driver: NativeDragDriver = this.nativeDragDriver): Promise<void> {
        return this.dnd.startTabDrag(panel, driver);
    }

    /** @internal Mark the tab of a panel being dragged and re-render its window. */
    setPanelDragging(panel: DockPanel, dragging: boolean): void {
        panel.setDragging(dragging);
        const window = this.model.findHost(panel)?.root;
        if (window) {
            this.state.runRendering(() => this.renderWindow(window));
        }
    }

    // --- persistence -----------------------------------------------------------------

    save(): Uint8Array {
        return this.serializer.save();
    }

    load(data: Uint8Array | string): void {
        this.serializer.load(data);
    }

    setWidgetFactory(factory: WidgetFactory | undefined): void {
        this.serializer.widgetFactory = factory;
    }

    registerStateHandlers(persistentId: string, provider: StateProvider, restorer: StateRestorer): void {
        this.serializer.registerStateHandlers(persistentId, provider, restorer);
    }

    /** @internal Drop every window and panel before a load. Persistent windows stay registered, emptied. */
    clearLayout(): void {
        this.dnd.cancel();
        this.reusableRoots = [];
        this.state.runRendering(() => {
            for (const window of this.model.windows()) {
                const panels = this.panelsOf(window);
                if (window.persistent) {
                    this.model.setRoot(window, createTabGroup());
                    this.renderWindow(window);
                    if (window.kind === "root") {
                        this.reusableRoots.push(window);
                    }
                } else {
                    this.destroyWindow(window);
                }
                panels.forEach((panel) => this.forgetPanel(panel));
            }
        });
    }

    /**
     * @internal Window for a saved record. The main record reuses the dock area,
     * root records reuse the pinned roots reset by `clearLayout` in order.
     */
    restoreWindow(kind: DockWindowKind, title: string, geometry: Rect): DockWindow {
        if (kind === "main") {
            if (!this._mainWindow) {
                return this.registerDockArea(title);
            }
            this._mainWindow.setTitle(title);
            return this._mainWindow;
        }
        const reused = kind === "root" ? this.reusableRoots.shift() : undefined;
        if (reused) {
            reused.restore();
            reused.setTitle(title);
            reused.setGeometry(geometry);
            return reused;
        }
        return this.createWindow(kind, title, geometry);
    }

    /** @internal Install a loaded tree and render it; empty non-persistent windows are dropped. */
    installRoot(window: DockWindow, root: PaneNode): SimplifyOutcome {
        return this.state.runRendering(() => {
            this.model.setRoot(window, root);
            this.renderWindow(window);
            return this.simplifyAndRender(window);
        });
    }

    // --- notifications ---------------------------------------------------------------

    notifyLayoutChanged(): void {
        this.emit(this._onDidLayoutChange, undefined);
    }

    /** Log every root tree at debug level. */
    debugDump(): void {
        this.logger.debug(`Layout:\n${this.model.prettyPrint()}`);
    }

    dispose(): void {
        this.dnd.cancel();
        for (const window of this.model.windows()) {
            this.panelsOf(window).forEach((panel) => this.forgetPanel(panel));
            this.destroyWindow(window);
        }
        this.panels.clear();
        this.stack.clear();
        this.input.dispose();
        this._onDidDock.dispose();
        this._onDidUndock.dispose();
        this._onDidClose.dispose();
        this._onDidLayoutChange.dispose();
    }

    // --- internals -------------------------------------------------------------------

    private emit<T>(emitter: Emitter<T>, event: T): void {
        try {
            emitter.fire(event);
        } catch (error) {
            this.logger.warn(`Listener failed: ${describeError(error)}`, error);
        }
    }

    /** A broken tree is logged before it propagates; the model may be partly mutated by then. */
    private runMutation<T>(mutation: () => T): T {
        try {
            return this.state.runRendering(mutation);
        } catch (error) {
            if (error instanceof LayoutConsistencyError) {
                this.logger.error(`Layout is inconsistent: ${error.message}`, this.model.findInvariantViolations());
            }
            throw error;
        }
    }

    /** Run a UI-triggered operation; failures are logged instead of escaping into the event loop. */
    guard(action: () => void): void {
        try {
            action();
        } catch (error) {
            this.logger.error(`Operation failed: ${describeError(error)}`, error);
        }
    }

    private createWindow(kind: DockWindowKind, title: string, geometry?: Rect): DockWindow {
        const window = new DockWindow({
            kind,
            title,
            geometry,
            titleBarHeight: this.options.titleBarHeight,
            resizeMargin: this.options.resizeMargin,
            getClassName: this.options.getClassName,
        });
        if (kind === "main") {
            window.element.style.position = "absolute";
            window.element.style.inset = "0";
        } else {
            window.body.style.position = "relative";
        }
        this.host.appendChild(window.element);
        if (window.isFloating) {
            this.stack.push(window);
            this.input.attachWindow(window);
        }
        return window;
    }

    private destroyWindow(window: DockWindow): void {
        this.model.unregister(window);
        this.renderer.invalidate(window);
        this.stack.remove(window);
        this.input.detachWindow(window);
        this.dnd.onWindowRendered(window);
        window.destroy();
        if (window === this._mainWindow) {
            this._mainWindow = undefined;
        }
    }

    private renderWindow(window: DockWindow): void {
        const root = this.model.getRoot(window);
        if (!root) {
            return;
        }
        this.renderer.render(window, root);
        this.dnd.onWindowRendered(window);
    }

    private simplifyAndRender(window: DockWindow): SimplifyOutcome {
        const outcome = this.model.simplify(window, () => this.renderWindow(window));
        if (outcome === "removed") {
            this.destroyWindow(window);
        } else {
            this.renderWindow(window);
        }
        return outcome;
    }

    private forgetPanel(panel: DockPanel): void {
        if (this.panels.get(panel.persistentId) === panel) {
            this.panels.delete(panel.persistentId);
        }
        panel.destroy();
    }

    private panelsOf(window: DockWindow): DockPanel[] {
        const root = this.model.getRoot(window);
        return root ? this.panelsOfNode(root) : [];
    }

    private panelsOfNode(node: PaneNode): DockPanel[] {
        return this.model.allWidgets(node).map((child) => child.widget);
    }

    private floatSizeFor(panel: DockPanel, fallback: Size): Size {
        const rect = panel.element.isConnected && panel.element.style.display !== "none"
            ? this.measure(panel.element)
            : Rect.empty();
        const content = rect.isEmpty() ? fallback : { width: rect.width, height: rect.height };
        return { width: content.width, height: content.height + this.options.titleBarHeight };
    }

    private cascadePosition(): Point {
        const base = this._mainWindow?.geometry ?? Rect.empty();
        const { origin, step, steps } = this.options.cascade;
        const offset = origin + (this.stack.topToBottom().length % steps) * step;
        return { x: base.x + offset, y: base.y + offset };
    }

    private defaultGeometry(size: Size): Rect {
        const origin = this.cascadePosition();
        return Rect.at(origin, size.width, size.height + this.options.titleBarHeight);
    }

    toHostPoint(client: Point): Point {
        const hostRect = this.measure(this.host);
        return { x: client.x - hostRect.x, y: client.y - hostRect.y };
    }

    // --- validation ------------------------------------------------------------------

    private requireWindow(window: DockWindow): void {
        if (window.destroyed || !this.model.has(window)) {
            throw new DockReferenceError(`Window "${window.title}" is not tracked by the layout`);
        }
    }

    private requireRoot(window: DockWindow): PaneNode {
        const root = this.model.getRoot(window);
        if (!root || window.destroyed) {
            throw new DockReferenceError(`Window "${window.title}" is not tracked by the layout`);
        }
        return root;
    }

    /** @internal */
    requireHost(panel: DockPanel): HostInfo<DockWindow> {
        const host = panel.destroyed ? undefined : this.model.findHost(panel);
        if (!host) {
            throw new DockReferenceError(`Widget "${panel.persistentId}" is not docked in any window`);
        }
        return host;
    }

    /** @internal */
    requireWindowOf(panel: DockPanel): DockWindow {
        return this.requireHost(panel).root;
    }

    private requireDetachedPanel(panel: DockPanel): void {
        if (panel.destroyed) {
            throw new DockReferenceError(`Widget "${panel.persistentId}" has been destroyed`);
        }
        if (this.model.findHost(panel)) {
            throw new DockOperationError(`Widget "${panel.persistentId}" is already part of the layout`);
        }
        if (!this.panels.has(panel.persistentId)) {
            this.panels.set(panel.persistentId, panel);
        }
    }
}
