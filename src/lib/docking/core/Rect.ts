export interface Point {
  x: number;
  y: number;
}

/** Plain form of a rectangle, as stored in saved layouts. */
export interface IJsonRect extends Point {
  width: number;
  height: number;
}

type RectLike = Pick<IJsonRect, "x" | "y">;

/**
 * Axis-aligned rectangle. Window geometry is kept in host-local pixels,
 * measured DOM boxes in client pixels; the rect itself does not care which.
 */
export class Rect implements IJsonRect {
  constructor(
    public x: number,
    public y: number,
    public width: number,
    public height: number,
  ) {}

  static empty(): Rect {
    return new Rect(0, 0, 0, 0);
  }

  static at(origin: Point, width: number, height: number): Rect {
    return new Rect(origin.x, origin.y, width, height);
  }

  static fromJson({ x, y, width, height }: IJsonRect): Rect {
    return new Rect(x, y, width, height);
  }

  static fromDomRect(box: DOMRect): Rect {
    return new Rect(box.left, box.top, box.width, box.height);
  }

  getRight(): number {
    return this.x + this.width;
  }

  getBottom(): number {
    return this.y + this.height;
  }

  getCenter(): Point {
    return { x: this.x + this.width / 2, y: this.y + this.height / 2 };
  }

  /** Zero for degenerate rects. */
  area(): number {
    return this.isEmpty() ? 0 : this.width * this.height;
  }

  isEmpty(): boolean {
    return this.width <= 0 || this.height <= 0;
  }

  /** Edges are inclusive. */
  contains(x: number, y: number): boolean {
    return x >= this.x && y >= this.y && x <= this.getRight() && y <= this.getBottom();
  }

  containsPoint({ x, y }: Point): boolean {
    return this.contains(x, y);
  }

  offset(dx: number, dy: number): Rect {
    return new Rect(this.x + dx, this.y + dy, this.width, this.height);
  }

  /** Same rect expressed with `origin` as (0, 0). */
  relativeTo(origin: RectLike): Rect {
    return this.offset(-origin.x, -origin.y);
  }

  clone(): Rect {
    return Rect.fromJson(this);
  }

  equals(other: IJsonRect | null | undefined): boolean {
    if (!other) {
      return false;
    }
    return other.x === this.x && other.y === this.y && other.width === this.width && other.height === this.height;
  }

  toJson(): IJsonRect {
    const { x, y, width, height } = this;
    return { x, y, width, height };
  }

  positionElement(element: HTMLElement, position = "absolute"): void {
    const { style } = element;
    style.position = position;
    style.left = `${this.x}px`;
    style.top = `${this.y}px`;
    style.width = `${Math.max(0, this.width)}px`;
    style.height = `${Math.max(0, this.height)}px`;
  }
}
