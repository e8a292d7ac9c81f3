import { describe, it, expect, beforeEach, vi } from "vitest";
import { DockLocation } from "../core/DockLocation";
import { Rect } from "../core/Rect";
import { DockOperationError } from "../core/errors";
import type { DockPanel } from "../dock/DockPanel";
import type { DockWindow } from "../dock/DockWindow";
import type { NativeDragDriver } from "../input/NativeDragDriver";
import type { DockingManager } from "../manager/DockingManager";
import { DockingState } from "../manager/DockingState";
import { computeResizedRect } from "../manager/DragDropController";
import { createHarness, shapeOf, textPanel } from "./fixtures";
import type { TestHarness } from "./fixtures";

const minSize = { width: 100, height: 100 };

describe("computeResizedRect", () => {
  const start = new Rect(100, 100, 300, 200);

  it("should grow from the bottom-right corner", () => {
    expect(computeResizedRect(start, "se", 50, 30, minSize, 5000).toJson()).toEqual({
      x: 100,
      y: 100,
      width: 350,
      height: 230,
    });
  });

  it("should keep the opposite edges fixed when resizing from the top-left", () => {
    expect(computeResizedRect(start, "nw", 30, 20, minSize, 5000).toJson()).toEqual({
      x: 130,
      y: 120,
      width: 270,
      height: 180,
    });
  });

  it("should clamp to the minimum and maximum extents", () => {
    expect(computeResizedRect(start, "w", 250, 0, minSize, 5000).toJson()).toEqual({
      x: 300,
      y: 100,
      width: 100,
      height: 200,
    });
    expect(computeResizedRect(start, "e", 10000, 0, minSize, 5000).width).toBe(5000);
  });
});

describe("DragDropController", () => {
  let harness: TestHarness;
  let manager: DockingManager;
  let main: DockWindow;
  let a: DockPanel;

  beforeEach(() => {
    document.body.innerHTML = "";
    harness = createHarness();
    manager = harness.manager;
    main = manager.registerDockArea();
    a = textPanel("a");
    manager.addPanel(a, main);

    const { geometry } = harness;
    const inMain = (className: string) => (element: HTMLElement) =>
      element.classList.contains(className) && main.element.contains(element);
    geometry.set(main.element, 0, 0, 1200, 800);
    geometry.set(main.body, 0, 0, 1200, 800);
    geometry.when(inMain("dock__tabgroup"), 0, 0, 1200, 800);
    geometry.when(inMain("dock__tabbar"), 0, 0, 1200, 24);
    geometry.when(inMain("dock__tab"), 0, 0, 80, 24);
  });

  function overlaysInDocument(): number {
    return document.querySelectorAll(".dock__overlay").length;
  }

  describe("window move", () => {
    let floating: DockWindow;

    beforeEach(() => {
      floating = manager.createFloating(textPanel("x"));
    });

    it("should move the window with the pointer and offer the widget under it", () => {
      manager.dnd.beginWindowMove(floating, { x: 200, y: 160 });
      expect(manager.state.state).toBe(DockingState.DraggingWindow);

      manager.dnd.updateWindowMove({ x: 600, y: 400 });

      expect(floating.geometry.toJson()).toEqual({ x: 550, y: 390, width: 350, height: 280 });
      expect(manager.dnd.activeOverlays).toHaveLength(1);
      expect(overlaysInDocument()).toBe(1);
      expect(manager.dnd.pendingDrop).toMatchObject({ kind: "dock", location: DockLocation.CENTER });
    });

    it("should dock the window into the pending target on release", () => {
      manager.dnd.beginWindowMove(floating, { x: 200, y: 160 });
      manager.dnd.updateWindowMove({ x: 600, y: 400 });
      manager.dnd.endWindowMove();

      expect(shapeOf(manager.model.getRoot(main))).toEqual(["a", "x"]);
      expect(floating.destroyed).toBe(true);
      expect(manager.state.state).toBe(DockingState.Idle);
      expect(manager.dnd.activeOverlays).toHaveLength(0);
      expect(overlaysInDocument()).toBe(0);
    });

    it("should keep the same overlay while the pointer stays over one target", () => {
      manager.dnd.beginWindowMove(floating, { x: 200, y: 160 });
      manager.dnd.updateWindowMove({ x: 600, y: 400 });
      const [first] = manager.dnd.activeOverlays;

      manager.dnd.updateWindowMove({ x: 640, y: 420 });

      expect(manager.dnd.activeOverlays).toHaveLength(1);
      expect(manager.dnd.activeOverlays[0]).toBe(first);
      expect(overlaysInDocument()).toBe(1);
    });

    it("should insert into a tab bar at the hovered position", () => {
      manager.dnd.beginWindowMove(floating, { x: 200, y: 160 });
      manager.dnd.updateWindowMove({ x: 100, y: 10 });

      expect(manager.dnd.pendingDrop).toMatchObject({ kind: "insert", window: main, index: 1 });
      expect(manager.dnd.activeOverlays).toHaveLength(0);
      expect(document.querySelector<HTMLElement>(".dock__insert-indicator")?.style.left).toBe("79px");

      manager.dnd.endWindowMove();
      expect(shapeOf(manager.model.getRoot(main))).toEqual(["a", "x"]);
      expect(document.querySelector(".dock__insert-indicator")).toBeNull();
    });

    it("should leave the window where it was dropped over nothing", () => {
      manager.dnd.beginWindowMove(floating, { x: 200, y: 160 });
      manager.dnd.updateWindowMove({ x: 1300, y: 900 });
      expect(manager.dnd.pendingDrop).toBeUndefined();

      manager.dnd.endWindowMove();

      expect(floating.destroyed).toBe(false);
      expect(floating.geometry.toJson()).toEqual({ x: 1250, y: 890, width: 350, height: 280 });
      expect(shapeOf(manager.model.getRoot(main))).toEqual(["a"]);
    });

    it("should refuse to start a second gesture", () => {
      manager.dnd.beginWindowMove(floating, { x: 200, y: 160 });
      expect(() => manager.dnd.beginResize(floating, "se", { x: 0, y: 0 })).toThrow(DockOperationError);
      manager.dnd.cancel();
      expect(manager.state.state).toBe(DockingState.Idle);
    });
  });

  describe("native drag of a lone tab", () => {
    it("should offer no overlay over its own window and float the widget on release", async () => {
      const seen: string[] = [];
      const driver: NativeDragDriver = {
        run: async (session) => {
          session.onMove({ x: 30, y: 400 });
          seen.push(`overlays=${manager.dnd.activeOverlays.length}`);
          seen.push(`pending=${manager.dnd.pendingDrop === undefined ? "none" : "set"}`);
          return { dropped: true, point: { x: 30, y: 400 } };
        },
      };

      await manager.startNativeTabDrag(a, driver);

      expect(seen).toEqual(["overlays=0", "pending=none"]);
      expect(manager.getWindowOf(a)?.kind).toBe("panel");
      expect(manager.model.has(main)).toBe(true);
      expect(shapeOf(manager.model.getRoot(main))).toEqual([]);
      expect(manager.state.state).toBe(DockingState.Idle);
    });
  });

  describe("native tab drag", () => {
    let b: DockPanel;

    beforeEach(() => {
      b = textPanel("b");
      manager.addPanel(b, a);
    });

    function driverMovingTo(point: { x: number; y: number }, dropped: boolean, seen: string[] = []): NativeDragDriver {
      return {
        run: async (session) => {
          const title = document.querySelector('.dock__tab[data-panel-id="b"] .dock__tab-title');
          seen.push(title?.textContent ?? "");
          session.onMove(point);
          seen.push(`overlays=${manager.dnd.activeOverlays.length}`);
          return { dropped, point };
        },
      };
    }

    it("should split the group when dropped on an edge icon", async () => {
      const seen: string[] = [];
      await manager.startNativeTabDrag(b, driverMovingTo({ x: 550, y: 400 }, true, seen));

      expect(seen).toEqual(["[Dragging] b", "overlays=2"]);
      expect(shapeOf(manager.model.getRoot(main))).toEqual({ split: "horizontal", children: [["b"], ["a"]] });
      expect(b.dragging).toBe(false);
      expect(manager.state.state).toBe(DockingState.Idle);
      expect(overlaysInDocument()).toBe(0);
    });

    it("should float the widget at the cursor when the drag is cancelled", async () => {
      await manager.startNativeTabDrag(b, driverMovingTo({ x: 600, y: 400 }, false));

      const window = manager.getWindowOf(b);
      expect(window?.kind).toBe("panel");
      expect(window?.geometry.toJson()).toEqual({ x: 425, y: 385, width: 350, height: 280 });
      expect(shapeOf(manager.model.getRoot(main))).toEqual(["a"]);
    });

    it("should clean up when the driver fails", async () => {
      const driver: NativeDragDriver = { run: () => Promise.reject(new Error("driver failed")) };

      await expect(manager.startNativeTabDrag(b, driver)).rejects.toThrow("driver failed");

      expect(b.dragging).toBe(false);
      expect(manager.state.state).toBe(DockingState.Idle);
      expect(manager.dnd.dragSource).toBeUndefined();
      expect(shapeOf(manager.model.getRoot(main))).toEqual(["a", "b"]);
    });
  });

  describe("resize", () => {
    it("should preview the new geometry and apply it on commit", () => {
      const floating = manager.createFloating(textPanel("x"));
      const onLayoutChange = vi.fn();
      manager.onDidLayoutChange(onLayoutChange);

      manager.dnd.beginResize(floating, "se", { x: 500, y: 430 });
      manager.dnd.updateResize({ x: 550, y: 480 });

      expect(floating.geometry.toJson()).toEqual({ x: 150, y: 150, width: 350, height: 280 });
      expect(harness.host.querySelector<HTMLElement>(".dock__resize-preview")?.style.width).toBe("400px");

      manager.dnd.commitResize();

      expect(floating.geometry.toJson()).toEqual({ x: 150, y: 150, width: 400, height: 330 });
      expect(harness.host.querySelector(".dock__resize-preview")).toBeNull();
      expect(manager.state.state).toBe(DockingState.Idle);
      expect(onLayoutChange).toHaveBeenCalledTimes(1);
    });
  });
});
