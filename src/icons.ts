import type { SKRSContext2D } from '@napi-rs/canvas';
import type { IconKind } from './types.js';

export interface Point {
  x: number;
  y: number;
}

/** Primitive shapes an icon is built from. Coordinates are canvas px. */
export type IconShape =
  | { kind: 'ellipse'; cx: number; cy: number; rx: number; ry: number }
  | { kind: 'ring'; cx: number; cy: number; r: number; lineWidth: number }
  | { kind: 'line'; from: Point; to: Point; lineWidth: number }
  | { kind: 'polygon'; points: Point[] };

const STROKE = 2;
const DOT_RADIUS = 2;

/** Ellipse filling the box (x0, y0)-(x1, y1) */
function boxEllipse(x0: number, y0: number, x1: number, y1: number): IconShape {
  return {
    kind: 'ellipse',
    cx: (x0 + x1) / 2,
    cy: (y0 + y1) / 2,
    rx: (x1 - x0) / 2,
    ry: (y1 - y0) / 2,
  };
}

function dot(cx: number, cy: number, r = DOT_RADIUS): IconShape {
  return { kind: 'ellipse', cx, cy, rx: r, ry: r };
}

/** Two people side by side: round head over an oval body, each half the box wide. */
function contributorShapes(x: number, y: number, size: number): IconShape[] {
  const s = size;
  return [
    boxEllipse(x + s * 0.1, y + s * 0.1, x + s * 0.4, y + s * 0.4),
    boxEllipse(x, y + s * 0.5, x + s * 0.5, y + s),
    boxEllipse(x + s * 0.6, y + s * 0.1, x + s * 0.9, y + s * 0.4),
    boxEllipse(x + s * 0.5, y + s * 0.5, x + s, y + s),
  ];
}

/** Open ring with a dot in the middle; the stroke sits inside the box. */
function issueShapes(x: number, y: number, size: number): IconShape[] {
  const cx = x + Math.floor(size / 2);
  const cy = y + Math.floor(size / 2);
  return [
    { kind: 'ring', cx: x + size / 2, cy: y + size / 2, r: size / 2 - STROKE / 2, lineWidth: STROKE },
    dot(cx, cy),
  ];
}

/**
 * Ten vertices of a five-pointed star, alternating outer (size/2) and
 * inner (size/4) radius every 36 degrees, starting straight up.
 */
export function starVertices(x: number, y: number, size: number): Point[] {
  const cx = x + size / 2;
  const cy = y + size / 2;
  const points: Point[] = [];
  for (let i = 0; i < 10; i++) {
    const angle = (Math.PI * 2 * i) / 10 - Math.PI / 2;
    const r = i % 2 === 0 ? size / 2 : size / 4;
    points.push({ x: cx + r * Math.cos(angle), y: cy + r * Math.sin(angle) });
  }
  return points;
}

function forkShapes(x: number, y: number, size: number): IconShape[] {
  const mid = x + size / 2;
  const branchTop = y + size / 3;
  const branchEnd = y + (size * 2) / 3;
  const left = x + size / 4;
  const right = x + (size * 3) / 4;
  return [
    { kind: 'line', from: { x: mid, y: y + 2 }, to: { x: mid, y: y + size - 2 }, lineWidth: STROKE },
    { kind: 'line', from: { x: mid, y: branchTop }, to: { x: left, y: branchEnd }, lineWidth: STROKE },
    dot(left, branchEnd),
    { kind: 'line', from: { x: mid, y: branchTop }, to: { x: right, y: branchEnd }, lineWidth: STROKE },
    dot(right, branchEnd),
    dot(mid, y + DOT_RADIUS),
  ];
}

/** Geometry for one stat icon in the `size` x `size` box at (x, y). */
export function iconShapes(kind: IconKind, x: number, y: number, size: number): IconShape[] {
  switch (kind) {
    case 'contributors':
      return contributorShapes(x, y, size);
    case 'issues':
      return issueShapes(x, y, size);
    case 'star':
      return [{ kind: 'polygon', points: starVertices(x, y, size) }];
    case 'fork':
      return forkShapes(x, y, size);
  }
}

export function drawShapes(ctx: SKRSContext2D, shapes: IconShape[], color: string): void {
  ctx.save();
  ctx.fillStyle = color;
  ctx.strokeStyle = color;
  for (const shape of shapes) {
    ctx.beginPath();
    switch (shape.kind) {
      case 'ellipse':
        ctx.ellipse(shape.cx, shape.cy, shape.rx, shape.ry, 0, 0, Math.PI * 2);
        ctx.fill();
        break;
      case 'ring':
        ctx.lineWidth = shape.lineWidth;
        ctx.arc(shape.cx, shape.cy, shape.r, 0, Math.PI * 2);
        ctx.stroke();
        break;
      case 'line':
        ctx.lineWidth = shape.lineWidth;
        ctx.moveTo(shape.from.x, shape.from.y);
        ctx.lineTo(shape.to.x, shape.to.y);
        ctx.stroke();
        break;
      case 'polygon': {
        const [first, ...rest] = shape.points;
        if (!first) break;
        ctx.moveTo(first.x, first.y);
        for (const p of rest) ctx.lineTo(p.x, p.y);
        ctx.closePath();
        ctx.fill();
        break;
      }
    }
  }
  ctx.restore();
}

export function drawIcon(
  ctx: SKRSContext2D,
  kind: IconKind,
  x: number,
  y: number,
  size: number,
  color: string,
): void {
  drawShapes(ctx, iconShapes(kind, x, y, size), color);
}
