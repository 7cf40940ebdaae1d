// Geometry utilities for bounds, points, and clipping
// Shared by the render pipeline, hit-testing and the scrollbar

import type { Bounds, Position } from './types.ts';

export type Point = Position;
export type { Bounds, Position };

/**
 * Clamp a number to a range [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/**
 * Check if a point is within bounds
 */
export function pointInBounds(x: number, y: number, bounds: Bounds): boolean {
  return x >= bounds.x && x < bounds.x + bounds.width &&
         y >= bounds.y && y < bounds.y + bounds.height;
}

/**
 * Shrink bounds by the given number of cells on every side.
 * Width and height never go negative.
 */
export function insetBounds(bounds: Bounds, inset: number): Bounds {
  return {
    x: bounds.x + inset,
    y: bounds.y + inset,
    width: Math.max(0, bounds.width - inset * 2),
    height: Math.max(0, bounds.height - inset * 2),
  };
}

/**
 * Clip bounds to a rectangle (intersection of two bounds)
 */
export function clipBounds(bounds: Bounds, clipRect: Bounds): Bounds {
  const x1 = Math.max(bounds.x, clipRect.x);
  const y1 = Math.max(bounds.y, clipRect.y);
  const x2 = Math.min(bounds.x + bounds.width, clipRect.x + clipRect.width);
  const y2 = Math.min(bounds.y + bounds.height, clipRect.y + clipRect.height);

  return {
    x: x1,
    y: y1,
    width: Math.max(0, x2 - x1),
    height: Math.max(0, y2 - y1),
  };
}
