import { Orientation } from "./Orientation";
import { Rect } from "./Rect";

export type DockLocationName = "top" | "bottom" | "left" | "right" | "center";

/**
 * Where dropped content lands relative to a target. Edge locations split the
 * target along `orientation`; CENTER adds the content as tabs.
 */
export class DockLocation {
  private static readonly byName = new Map<string, DockLocation>();

  static readonly TOP = new DockLocation("top", Orientation.VERT, 0);
  static readonly BOTTOM = new DockLocation("bottom", Orientation.VERT, 1);
  static readonly LEFT = new DockLocation("left", Orientation.HORZ, 0);
  static readonly RIGHT = new DockLocation("right", Orientation.HORZ, 1);
  static readonly CENTER = new DockLocation("center", Orientation.VERT, 0);

  static getByName(name: string): DockLocation | undefined {
    return DockLocation.byName.get(name);
  }

  static all(): DockLocation[] {
    return [...DockLocation.byName.values()];
  }

  private constructor(
    readonly name: DockLocationName,
    readonly orientation: Orientation,
    /** 0 when the dropped content goes before the target, 1 when after. */
    readonly indexPlus: 0 | 1,
  ) {
    DockLocation.byName.set(name, this);
  }

  getName(): DockLocationName {
    return this.name;
  }

  getOrientation(): Orientation {
    return this.orientation;
  }

  isCenter(): boolean {
    return this === DockLocation.CENTER;
  }

  /** Half of `target` the docked content would take, or all of it for CENTER. */
  getDockRect(target: Rect): Rect {
    if (this.isCenter()) {
      return target.clone();
    }
    const half = this.indexPlus * 0.5;
    if (this.orientation === Orientation.HORZ) {
      return new Rect(target.x + target.width * half, target.y, target.width / 2, target.height);
    }
    return new Rect(target.x, target.y + target.height * half, target.width, target.height / 2);
  }
}
