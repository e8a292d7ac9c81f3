export type OrientationName = "horizontal" | "vertical";

/**
 * Splitter axis. HORZ lays children out left to right, VERT top to bottom.
 */
export class Orientation {
  static HORZ = new Orientation("horizontal");
  static VERT = new Orientation("vertical");

  static flip(from: Orientation) {
    return from === Orientation.HORZ ? Orientation.VERT : Orientation.HORZ;
  }

  static fromName(name: OrientationName): Orientation {
    return name === "horizontal" ? Orientation.HORZ : Orientation.VERT;
  }

  private readonly _name: OrientationName;

  private constructor(name: OrientationName) {
    this._name = name;
  }

  getName(): OrientationName {
    return this._name;
  }

  toString() {
    return this._name;
  }
}
