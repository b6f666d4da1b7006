export type Point = { x: number; y: number };
export type Bounds = { x: number; y: number; w: number; h: number };
export type Size = { width: number; height: number };

export class CoordinateService {
  /**
   * World cell → screen cell for a given camera offset. Content panned off the top or left
   * edge sticks to the edge instead of going negative.
   */
  static toScreenFromWorld(worldPos: Point, camera: Point): Point {
    return {
      x: Math.max(0, worldPos.x - camera.x),
      y: Math.max(0, worldPos.y - camera.y),
    };
  }

  /** Screen cell → world cell. World coordinates never go below zero. */
  static toWorldFromScreen(screenPos: Point, camera: Point): Point {
    return {
      x: Math.max(0, screenPos.x + camera.x),
      y: Math.max(0, screenPos.y + camera.y),
    };
  }

  static toRelative(point: Point, origin: Point): Point {
    return {
      x: point.x - origin.x,
      y: point.y - origin.y,
    };
  }

  static clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), Math.max(min, max));
  }
}
