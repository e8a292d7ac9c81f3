import { describe, it, expect } from "vitest";
import { DockLocation } from "../core/DockLocation";
import type { DockLocationName } from "../core/DockLocation";
import { Rect } from "../core/Rect";
import { identityClassName } from "../core/Types";
import { defaultDockingOptions } from "../config/options";
import { ALL_ICONS, DockingOverlay, EDGE_ICONS, computeIconRects } from "../overlay/DockingOverlay";
import { InsertIndicator, ResizePreview } from "../overlay/DragIndicators";

const overlayOptions = defaultDockingOptions.overlay;

function iconJson(rects: Map<DockLocationName, Rect>, name: DockLocationName) {
  return rects.get(name)?.toJson();
}

describe("computeIconRects", () => {
  it("should cluster icons around the center", () => {
    const rects = computeIconRects(new Rect(0, 0, 200, 100), ALL_ICONS, "cluster", overlayOptions);
    expect(iconJson(rects, "center")).toEqual({ x: 80, y: 30, width: 40, height: 40 });
    expect(iconJson(rects, "top")).toEqual({ x: 80, y: -15, width: 40, height: 40 });
    expect(iconJson(rects, "bottom")).toEqual({ x: 80, y: 75, width: 40, height: 40 });
    expect(iconJson(rects, "left")).toEqual({ x: 35, y: 30, width: 40, height: 40 });
    expect(iconJson(rects, "right")).toEqual({ x: 125, y: 30, width: 40, height: 40 });
  });

  it("should spread edge icons to the target edges", () => {
    const rects = computeIconRects(new Rect(0, 0, 200, 100), EDGE_ICONS, "spread", overlayOptions);
    expect(rects.has("center")).toBe(false);
    expect(iconJson(rects, "top")).toEqual({ x: 80, y: 10, width: 40, height: 40 });
    expect(iconJson(rects, "bottom")).toEqual({ x: 80, y: 50, width: 40, height: 40 });
    expect(iconJson(rects, "left")).toEqual({ x: 10, y: 30, width: 40, height: 40 });
    expect(iconJson(rects, "right")).toEqual({ x: 150, y: 30, width: 40, height: 40 });
  });
});

describe("DockingOverlay", () => {
  function createOverlay(icons = ALL_ICONS) {
    const owner = document.createElement("div");
    document.body.appendChild(owner);
    const overlay = new DockingOverlay({
      owner,
      targetRect: new Rect(100, 100, 200, 100),
      icons,
      style: "cluster",
      options: overlayOptions,
      getClassName: identityClassName,
    });
    return { owner, overlay };
  }

  it("should attach an input-transparent layer to its owner", () => {
    const { owner, overlay } = createOverlay();
    expect(overlay.element.parentElement).toBe(owner);
    expect(overlay.element.style.pointerEvents).toBe("none");
    expect(overlay.element.querySelectorAll(".dock__overlay-icon")).toHaveLength(5);
  });

  it("should position icons relative to the target", () => {
    const { overlay } = createOverlay();
    const center = overlay.element.querySelector<HTMLElement>('[data-location="center"]');
    expect(center?.style.left).toBe("80px");
    expect(center?.style.top).toBe("30px");
  });

  it("should resolve the icon under a point", () => {
    const { overlay } = createOverlay();
    expect(overlay.getLocationAt({ x: 200, y: 150 })).toBe(DockLocation.CENTER);
    expect(overlay.getLocationAt({ x: 150, y: 150 })).toBe(DockLocation.LEFT);
    expect(overlay.getLocationAt({ x: 105, y: 105 })).toBeUndefined();
  });

  it("should preview the region a location would take", () => {
    const { overlay } = createOverlay();
    overlay.showPreview(DockLocation.LEFT);
    const preview = overlay.element.querySelector<HTMLElement>(".dock__overlay-preview");
    expect(preview?.style.display).toBe("");
    expect(preview?.style.left).toBe("0px");
    expect(preview?.style.width).toBe("100px");
    expect(preview?.style.height).toBe("100px");
    expect(overlay.location).toBe(DockLocation.LEFT);
    const left = overlay.element.querySelector('[data-location="left"]');
    expect(left?.classList.contains("dock__overlay-icon--active")).toBe(true);

    overlay.showPreview(undefined);
    expect(preview?.style.display).toBe("none");
    expect(left?.classList.contains("dock__overlay-icon--active")).toBe(false);
  });

  it("should follow a moved target", () => {
    const { overlay } = createOverlay();
    overlay.setTargetRect(new Rect(0, 0, 200, 100));
    expect(overlay.getLocationAt({ x: 100, y: 50 })).toBe(DockLocation.CENTER);
    expect(overlay.getLocationAt({ x: 200, y: 150 })).toBeUndefined();
  });

  it("should detach itself on destroy", () => {
    const { owner, overlay } = createOverlay(EDGE_ICONS);
    overlay.destroy();
    overlay.destroy();
    expect(overlay.destroyed).toBe(true);
    expect(owner.children).toHaveLength(0);
  });
});

describe("drag indicators", () => {
  it("should draw the insert indicator inside the tab bar", () => {
    const bar = document.createElement("div");
    document.body.appendChild(bar);
    const indicator = new InsertIndicator(identityClassName);
    indicator.show(bar, 60, 24);
    expect(indicator.attached).toBe(true);
    const element = bar.querySelector<HTMLElement>(".dock__insert-indicator");
    expect(element?.style.left).toBe("59px");
    expect(element?.style.width).toBe("2px");
    expect(element?.style.height).toBe("24px");
    indicator.hide();
    expect(indicator.attached).toBe(false);
  });

  it("should outline a resize until destroyed", () => {
    const parent = document.createElement("div");
    const preview = new ResizePreview(parent, new Rect(10, 10, 100, 100), identityClassName);
    preview.update(new Rect(10, 10, 150, 120));
    expect(preview.rect.toJson()).toEqual({ x: 10, y: 10, width: 150, height: 120 });
    expect(parent.querySelector<HTMLElement>(".dock__resize-preview")?.style.width).toBe("150px");
    preview.destroy();
    expect(parent.children).toHaveLength(0);
  });
});
