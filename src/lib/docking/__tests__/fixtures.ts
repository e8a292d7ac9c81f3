import { vi } from "vitest";
import { Rect } from "../core/Rect";
import type { DockLogger } from "../core/logger";
import { DockPanel } from "../dock/DockPanel";
import { DockingManager } from "../manager/DockingManager";
import type { DockingManagerOptions } from "../manager/DockingManager";
import type { PaneNode } from "../model/Node";
import type { Measure } from "../rendering/LayoutRenderer";

/**
 * Layout-free geometry for jsdom: rects are assigned per element,
 * anything unassigned measures as empty.
 */
export class FakeMeasure {
  readonly rects = new Map<HTMLElement, Rect>();
  private readonly rules: Array<{ matches: (element: HTMLElement) => boolean; rect: Rect }> = [];

  readonly measure: Measure = (element) => {
    const exact = this.rects.get(element);
    if (exact) {
      return exact.clone();
    }
    const rule = this.rules.find((candidate) => candidate.matches(element));
    return rule ? rule.rect.clone() : Rect.empty();
  };

  set(element: HTMLElement, x: number, y: number, width: number, height: number): void {
    this.rects.set(element, new Rect(x, y, width, height));
  }

  /** Geometry for elements that do not exist yet, such as those of a later render. */
  when(matches: (element: HTMLElement) => boolean, x: number, y: number, width: number, height: number): void {
    this.rules.push({ matches, rect: new Rect(x, y, width, height) });
  }
}

export interface RecordingLogger extends DockLogger {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
}

export function createRecordingLogger(): RecordingLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export interface TestHarness {
  manager: DockingManager;
  host: HTMLElement;
  geometry: FakeMeasure;
  logger: RecordingLogger;
}

export function createHarness(options: Partial<Omit<DockingManagerOptions, "host">> = {}): TestHarness {
  const host = document.createElement("div");
  document.body.appendChild(host);
  const geometry = new FakeMeasure();
  geometry.set(host, 0, 0, 1200, 800);
  const logger = createRecordingLogger();
  const manager = new DockingManager({ host, measure: geometry.measure, logger, ...options });
  return { manager, host, geometry, logger };
}

export function textPanel(id: string, title = id): DockPanel {
  const content = document.createElement("p");
  content.textContent = `${title} content`;
  return new DockPanel(id, { title, content });
}

/** Persistent ids of a tree, splitters as nested arrays and tab groups as arrays of ids. */
export type TreeShape = string[] | { split: "horizontal" | "vertical"; children: TreeShape[] };

export function shapeOf(node: PaneNode | undefined): TreeShape | undefined {
  if (!node) {
    return undefined;
  }
  if (node.type === "tabgroup") {
    return node.children.map((child) => child.widget.persistentId);
  }
  return {
    split: node.orientation.getName(),
    children: node.children.map((child) => shapeOf(child) ?? []),
  };
}
