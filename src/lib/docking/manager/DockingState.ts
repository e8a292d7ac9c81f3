import { DockOperationError } from "../core/errors";

export enum DockingState {
  Idle = "idle",
  DraggingWindow = "dragging-window",
  DraggingTab = "dragging-tab",
  Resizing = "resizing",
  /** Transient guard while the model is mutated and re-rendered. */
  Rendering = "rendering",
}

type GestureState = DockingState.DraggingWindow | DockingState.DraggingTab | DockingState.Resizing;

/**
 * At most one gesture is active at a time. Rendering nests inside any state
 * and hands the previous state back when it finishes.
 */
export class DockingStateMachine {
  private _state: DockingState = DockingState.Idle;

  get state(): DockingState {
    return this._state;
  }

  get isIdle(): boolean {
    return this._state === DockingState.Idle;
  }

  get isRendering(): boolean {
    return this._state === DockingState.Rendering;
  }

  /** Input handlers drop events while a mutation is being rendered. */
  acceptsInput(): boolean {
    return this._state !== DockingState.Rendering;
  }

  begin(gesture: GestureState): void {
    if (this._state !== DockingState.Idle) {
      throw new DockOperationError(`Cannot start ${gesture} while ${this._state}`);
    }
    this._state = gesture;
  }

  /** Return to Idle from `gesture`. A no-op if that gesture is not the active one. */
  end(gesture: GestureState): void {
    if (this._state === gesture) {
      this._state = DockingState.Idle;
    }
  }

  runRendering<T>(mutation: () => T): T {
    if (this._state === DockingState.Rendering) {
      return mutation();
    }
    const previous = this._state;
    this._state = DockingState.Rendering;
    try {
      return mutation();
    } finally {
      this._state = previous;
    }
  }

  reset(): void {
    this._state = DockingState.Idle;
  }
}
