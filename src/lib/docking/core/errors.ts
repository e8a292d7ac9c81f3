/**
 * Structured errors raised by the docking engine.
 *
 * @example
 * ```typescript
 * try {
 *   manager.dock(panel, otherWindow, 'left');
 * } catch (error) {
 *   if (error instanceof DockingError && error.code === 'INVALID_REFERENCE') {
 *     console.warn('Panel was closed before the drop landed');
 *   }
 * }
 * ```
 */
export type DockingErrorCode =
  | 'INVALID_REFERENCE'
  | 'INVALID_OPERATION'
  | 'LAYOUT_CONSISTENCY'
  | 'LAYOUT_DESERIALIZATION'
  | 'REGISTRY_CONFLICT';

export class DockingError extends Error {
  public readonly code: DockingErrorCode;

  constructor(message: string, code: DockingErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DockingError';
    this.code = code;
  }
}

/** A widget or window handle that is destroyed or not tracked by the model. */
export class DockReferenceError extends DockingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INVALID_REFERENCE', options);
    this.name = 'DockReferenceError';
  }
}

/** A tracked handle used in an operation it cannot take part in. */
export class DockOperationError extends DockingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INVALID_OPERATION', options);
    this.name = 'DockOperationError';
  }
}

/**
 * The layout tree no longer has the shape the caller expected.
 * Always a programming error: the model and the rendered tree have diverged.
 */
export class LayoutConsistencyError extends DockingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'LAYOUT_CONSISTENCY', options);
    this.name = 'LayoutConsistencyError';
  }
}

export class LayoutDeserializationError extends DockingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'LAYOUT_DESERIALIZATION', options);
    this.name = 'LayoutDeserializationError';
  }
}

export class RegistryError extends DockingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'REGISTRY_CONFLICT', options);
    this.name = 'RegistryError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
