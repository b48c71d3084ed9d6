import { clamp } from "../env";
import type { BoundingBox } from "../types/detector";

export type Point = { x: number; y: number };

export const boxArea = (box: BoundingBox): number => {
  return Math.max(0, box.width) * Math.max(0, box.height);
};

export const intersectionArea = (a: BoundingBox, b: BoundingBox): number => {
  const left = Math.max(a.x, b.x);
  const top = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.width, b.x + b.width);
  const bottom = Math.min(a.y + a.height, b.y + b.height);
  return Math.max(0, right - left) * Math.max(0, bottom - top);
};

/** Intersection-over-Union in [0, 1]; 0 when either box is empty. */
export const iou = (a: BoundingBox, b: BoundingBox): number => {
  const intersection = intersectionArea(a, b);
  if (intersection <= 0) {
    return 0;
  }
  const union = boxArea(a) + boxArea(b) - intersection;
  return union > 0 ? intersection / union : 0;
};

export const centroid = (box: BoundingBox): Point => {
  return {
    x: box.x + box.width / 2,
    y: box.y + box.height / 2,
  };
};

export const distance = (a: Point, b: Point): number => {
  return Math.hypot(a.x - b.x, a.y - b.y);
};

/**
 * True when `point` lies inside `box` grown on each side by `margin` times
 * the box's own width/height.
 */
export const containsPoint = (
  box: BoundingBox,
  point: Point,
  margin = 0,
): boolean => {
  const padX = box.width * margin;
  const padY = box.height * margin;
  return (
    point.x >= box.x - padX &&
    point.x <= box.x + box.width + padX &&
    point.y >= box.y - padY &&
    point.y <= box.y + box.height + padY
  );
};

/** Converts a pixel `xyxy` box to a normalised, clamped `BoundingBox`. */
export const normalisePixelBox = (
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  width: number,
  height: number,
): BoundingBox | null => {
  if (!(width > 0) || !(height > 0)) {
    return null;
  }
  const left = clamp(Math.min(x1, x2) / width, 0, 1);
  const top = clamp(Math.min(y1, y2) / height, 0, 1);
  const right = clamp(Math.max(x1, x2) / width, 0, 1);
  const bottom = clamp(Math.max(y1, y2) / height, 0, 1);
  if (right <= left || bottom <= top) {
    return null;
  }
  return {
    x: left,
    y: top,
    width: right - left,
    height: bottom - top,
  };
};
