import { describe, it, expect, beforeEach, vi } from "vitest";
import { LayoutDeserializationError } from "../core/errors";
import type { DockWindow } from "../dock/DockWindow";
import type { DockingManager } from "../manager/DockingManager";
import type { IContentRenderer } from "../rendering/IContentRenderer";
import { createHarness, shapeOf, textPanel } from "./fixtures";
import type { TestHarness } from "./fixtures";

function decode(bytes: Uint8Array): unknown {
  return JSON.parse(new TextDecoder().decode(bytes));
}

function contentFactory(id: string) {
  const content = document.createElement("p");
  content.textContent = `${id} content`;
  return { content };
}

function mainRecord(children: Array<{ type: "widget"; id: string; title?: string; internalState?: unknown }>) {
  return {
    kind: "main",
    title: "Main",
    geometry: { x: 0, y: 0, width: 0, height: 0 },
    isMainWindow: true,
    content: { type: "tabgroup", children },
  };
}

function floatingOf(manager: DockingManager): DockWindow[] {
  return manager.listWindows().filter((window) => window.isFloating);
}

describe("LayoutSerializer", () => {
  let harness: TestHarness;
  let manager: DockingManager;
  let main: DockWindow;

  beforeEach(() => {
    document.body.innerHTML = "";
    harness = createHarness();
    manager = harness.manager;
    main = manager.registerDockArea();
    manager.setWidgetFactory(contentFactory);
  });

  describe("save", () => {
    it("should write a versioned document with every window", () => {
      const a = textPanel("a");
      manager.addPanel(a, main);
      manager.addPanel(textPanel("b"), a, "right");
      manager.createFloating(textPanel("x"));

      const document = decode(manager.save());

      expect(document).toMatchObject({
        version: 1,
        windows: [
          {
            kind: "main",
            title: "Main",
            maximized: false,
            normalGeometry: null,
            isMainWindow: true,
            isPersistentRoot: false,
            content: {
              type: "splitter",
              orientation: "horizontal",
              sizes: [],
              children: [
                { type: "tabgroup", selected: 0, children: [{ type: "widget", id: "a", title: "a", margin: 5 }] },
                { type: "tabgroup", selected: 0, children: [{ type: "widget", id: "b", title: "b", margin: 5 }] },
              ],
            },
          },
          {
            kind: "panel",
            title: "x",
            geometry: { x: 150, y: 150, width: 350, height: 280 },
            isMainWindow: false,
            content: { type: "tabgroup", selected: 0, children: [{ type: "widget", id: "x", title: "x", margin: 5 }] },
          },
        ],
      });
    });
  });

  describe("load", () => {
    it("should restore a saved layout into a fresh manager", () => {
      const a = textPanel("a");
      manager.addPanel(a, main);
      manager.addPanel(textPanel("b"), a, "bottom");
      manager.createFloating(textPanel("x"));
      const saved = manager.save();

      const other = createHarness();
      other.manager.setWidgetFactory(contentFactory);
      const onLayoutChange = vi.fn();
      other.manager.onDidLayoutChange(onLayoutChange);

      other.manager.load(saved);

      const restoredMain = other.manager.mainWindow;
      expect(restoredMain?.title).toBe("Main");
      expect(shapeOf(restoredMain && other.manager.model.getRoot(restoredMain))).toEqual({
        split: "vertical",
        children: [["a"], ["b"]],
      });
      const [floating] = floatingOf(other.manager);
      expect(floating.kind).toBe("panel");
      expect(floating.geometry.toJson()).toEqual({ x: 150, y: 150, width: 350, height: 280 });
      expect(other.manager.listAllWidgets().map((panel) => panel.persistentId)).toEqual(["a", "b", "x"]);
      expect(other.logger.info).toHaveBeenCalledWith("Loaded layout with 2 window(s)");
      expect(onLayoutChange).toHaveBeenCalledTimes(1);
    });

    it("should replace the current layout and keep the dock area", () => {
      manager.addPanel(textPanel("a"), main);
      const saved = manager.save();
      manager.createFloating(textPanel("x"));

      manager.load(saved);

      expect(manager.mainWindow).toBe(main);
      expect(shapeOf(manager.model.getRoot(main))).toEqual(["a"]);
      expect(floatingOf(manager)).toHaveLength(0);
      expect(manager.findWidgetById("x")).toBeUndefined();
    });

    it("should keep pinned roots registered and refill them from their records", () => {
      const pinned = manager.createFloatingRoot("Pinned");
      manager.addPanel(textPanel("p"), pinned);
      const geometry = pinned.geometry.toJson();

      manager.load(manager.save());

      expect(manager.model.has(pinned)).toBe(true);
      expect(pinned.destroyed).toBe(false);
      expect(floatingOf(manager)).toEqual([pinned]);
      expect(pinned.title).toBe("Pinned");
      expect(pinned.geometry.toJson()).toEqual(geometry);
      expect(shapeOf(manager.model.getRoot(pinned))).toEqual(["p"]);
    });

    it("should leave a pinned root empty when the saved layout has no record for it", () => {
      const saved = manager.save();
      const pinned = manager.createFloatingRoot("Pinned");
      manager.addPanel(textPanel("p"), pinned);

      manager.load(saved);

      expect(manager.model.has(pinned)).toBe(true);
      expect(shapeOf(manager.model.getRoot(pinned))).toEqual([]);
      expect(manager.findWidgetById("p")).toBeUndefined();
    });

    it("should reject unreadable data without touching the layout", () => {
      manager.addPanel(textPanel("a"), main);

      expect(() => manager.load("not json")).toThrow(LayoutDeserializationError);
      expect(() => manager.load(JSON.stringify({ windows: [] }))).toThrow(LayoutDeserializationError);
      expect(() => manager.load(JSON.stringify({ version: 2, windows: [] }))).toThrow(
        "Unsupported layout version 2",
      );
      expect(shapeOf(manager.model.getRoot(main))).toEqual(["a"]);
    });

    it("should skip a malformed window and load the rest", () => {
      manager.load(JSON.stringify({ version: 1, windows: [{ kind: "bogus" }, mainRecord([{ type: "widget", id: "a" }])] }));

      expect(shapeOf(manager.model.getRoot(main))).toEqual(["a"]);
      expect(harness.logger.warn).toHaveBeenCalledWith(expect.stringContaining("Skipping saved window 0:"));
    });

    it("should place a widget only once when it is saved twice", () => {
      manager.load(
        JSON.stringify({
          version: 1,
          windows: [mainRecord([{ type: "widget", id: "a" }, { type: "widget", id: "a" }])],
        }),
      );

      expect(shapeOf(manager.model.getRoot(main))).toEqual(["a"]);
      expect(harness.logger.warn).toHaveBeenCalledWith(
        'Widget "a" appears more than once in the saved layout; keeping the first',
      );
    });

    it("should drop widgets the factory cannot build and windows left empty", () => {
      manager.setWidgetFactory((id) => (id === "ghost" ? undefined : contentFactory(id)));
      manager.load(
        JSON.stringify({
          version: 1,
          windows: [
            mainRecord([{ type: "widget", id: "a" }, { type: "widget", id: "ghost" }]),
            {
              kind: "panel",
              title: "Ghost",
              geometry: { x: 10, y: 10, width: 200, height: 200 },
              content: { type: "tabgroup", children: [{ type: "widget", id: "ghost" }] },
            },
          ],
        }),
      );

      expect(shapeOf(manager.model.getRoot(main))).toEqual(["a"]);
      expect(floatingOf(manager)).toHaveLength(0);
      expect(harness.logger.warn).toHaveBeenCalledWith('No widget factory result for "ghost"; widget skipped');
      expect(harness.logger.warn).toHaveBeenCalledWith('Saved window "Ghost" had no restorable widgets');
    });

    it("should prefer registered content over the widget factory", () => {
      const factory = vi.fn(contentFactory);
      manager.setWidgetFactory(factory);
      manager.registry.registerFactory("notes", () => document.createElement("textarea"), "Notes");

      manager.load(JSON.stringify({ version: 1, windows: [mainRecord([{ type: "widget", id: "notes", title: "My notes" }])] }));

      const notes = manager.findWidgetById("notes");
      expect(notes?.title).toBe("My notes");
      expect(notes?.element.querySelector("textarea")).not.toBeNull();
      expect(factory).not.toHaveBeenCalled();
    });

    it("should restore maximized windows with their normal geometry", () => {
      manager.load(
        JSON.stringify({
          version: 1,
          windows: [
            {
              kind: "container",
              geometry: { x: 0, y: 0, width: 1200, height: 800 },
              maximized: true,
              normalGeometry: { x: 100, y: 100, width: 300, height: 200 },
              content: {
                type: "splitter",
                orientation: "horizontal",
                sizes: [1],
                children: [
                  { type: "tabgroup", children: [{ type: "widget", id: "a" }] },
                  { type: "tabgroup", selected: 5, children: [{ type: "widget", id: "b" }] },
                ],
              },
            },
          ],
        }),
      );

      const [container] = floatingOf(manager);
      expect(container.title).toBe("Docked Widgets");
      expect(container.maximized).toBe(true);
      expect(container.geometry.toJson()).toEqual({ x: 0, y: 0, width: 1200, height: 800 });
      expect(container.normalGeometry?.toJson()).toEqual({ x: 100, y: 100, width: 300, height: 200 });

      const root = manager.model.getRoot(container);
      expect(root?.type === "splitter" && root.sizes).toEqual([]);
      const second = root?.type === "splitter" ? root.children[1] : undefined;
      expect(second?.type === "tabgroup" && second.selected).toBe(0);
    });
  });

  describe("widget margin", () => {
    it("should save each widget's margin and restore it", () => {
      manager.addPanel(manager.createPanel("wide", { margin: 12 }), main);

      const saved = manager.save();
      expect(decode(saved)).toMatchObject({
        windows: [{ content: { children: [{ id: "wide", margin: 12 }] } }],
      });

      manager.load(saved);
      const restored = manager.findWidgetById("wide");
      expect(restored?.margin).toBe(12);
      expect(restored?.element.style.padding).toBe("12px");
    });
  });

  describe("widget state", () => {
    it("should save and restore state through registered handlers", () => {
      manager.addPanel(textPanel("a"), main);
      const restorer = vi.fn();
      manager.registerStateHandlers("a", () => ({ count: 3 }), restorer);

      const saved = manager.save();
      expect(decode(saved)).toMatchObject({
        windows: [{ content: { children: [{ id: "a", internalState: { count: 3 } }] } }],
      });

      manager.load(saved);
      expect(restorer).toHaveBeenCalledWith({ count: 3 });
    });

    it("should prefer the content's own state over registered handlers", () => {
      const captured: unknown[] = [];
      const statefulContent = (): IContentRenderer => ({
        init: vi.fn(),
        update: vi.fn(),
        dispose: vi.fn(),
        captureState: () => "cursor:12",
        restoreState: (state) => captured.push(state),
      });
      manager.setWidgetFactory(() => ({ content: statefulContent() }));
      manager.addPanel(manager.createPanel("editor", { content: statefulContent() }), main);
      const provider = vi.fn(() => "from handler");
      manager.registerStateHandlers("editor", provider, vi.fn());

      manager.load(manager.save());

      expect(provider).not.toHaveBeenCalled();
      expect(captured).toEqual(["cursor:12"]);
    });

    it("should lose only the state of a widget whose handler fails", () => {
      const a = textPanel("a");
      manager.addPanel(a, main);
      manager.addPanel(textPanel("b"), a);
      manager.registerStateHandlers(
        "a",
        () => {
          throw new Error("boom");
        },
        vi.fn(),
      );
      const restoreB = vi.fn(() => {
        throw new Error("bad state");
      });
      manager.registerStateHandlers("b", () => "b-state", restoreB);

      const saved = manager.save();
      expect(harness.logger.warn).toHaveBeenCalledWith('Could not capture state of "a": Error: boom', expect.any(Error));

      manager.load(saved);

      expect(restoreB).toHaveBeenCalledWith("b-state");
      expect(harness.logger.warn).toHaveBeenCalledWith(
        'Could not restore state of "b": Error: bad state',
        expect.any(Error),
      );
      expect(shapeOf(manager.model.getRoot(main))).toEqual(["a", "b"]);
    });
  });
});
