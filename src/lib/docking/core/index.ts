export { Rect } from './Rect';
export type { IJsonRect, Point } from './Rect';
export { DockLocation } from './DockLocation';
export type { DockLocationName } from './DockLocation';
export { Orientation } from './Orientation';
export type { OrientationName } from './Orientation';
export * from './Types';
export * from './errors';
export * from './logger';
