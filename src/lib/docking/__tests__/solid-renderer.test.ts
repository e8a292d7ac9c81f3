import { describe, it, expect } from "vitest";
import { createRenderEffect } from "solid-js";
import type { Component } from "solid-js";
import { DockPanel } from "../dock/DockPanel";
import { SolidContentRenderer } from "../rendering/solid/SolidContentRenderer";
import type { SolidPanelProps } from "../rendering/solid/SolidContentRenderer";

const StatusLabel: Component<SolidPanelProps> = (props) => {
  const label = document.createElement("span");
  createRenderEffect(() => {
    label.textContent = `${props.title}:${props.selected() ? "shown" : "hidden"}`;
  });
  return label;
};

describe("SolidContentRenderer", () => {
  it("should mount the component with the panel's identity", () => {
    const renderer = new SolidContentRenderer(StatusLabel);
    const container = document.createElement("div");
    const panel = new DockPanel("log", { title: "Log" });

    renderer.init(container, { panel, selected: true, windowId: "w1" });

    expect(container.textContent).toBe("Log:shown");
  });

  it("should react to selection changes without remounting", () => {
    const renderer = new SolidContentRenderer(StatusLabel);
    const container = document.createElement("div");
    renderer.init(container, { panel: new DockPanel("log", { title: "Log" }), selected: true, windowId: "w1" });
    const label = container.firstChild;

    renderer.update({ selected: false });

    expect(container.firstChild).toBe(label);
    expect(container.textContent).toBe("Log:hidden");
  });

  it("should unmount on dispose", () => {
    const renderer = new SolidContentRenderer(StatusLabel);
    const container = document.createElement("div");
    renderer.init(container, { panel: new DockPanel("log"), selected: false, windowId: "w1" });

    renderer.dispose();
    renderer.dispose();

    expect(container.childNodes).toHaveLength(0);
  });

  it("should mount through a panel the first time it is shown", () => {
    const panel = new DockPanel("log", { title: "Log", content: new SolidContentRenderer(StatusLabel) });

    panel.show("w1", false);
    expect(panel.element.textContent).toBe("");

    panel.show("w1", true);
    expect(panel.element.textContent).toBe("Log:shown");

    panel.destroy();
    expect(panel.element.textContent).toBe("");
  });
});
