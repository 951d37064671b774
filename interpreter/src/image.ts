/**
 * Line drawing surface behind the turtle, with SVG and PNG encoders.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PNG } from 'pngjs';
import { LogoDrawError, LogoImageSaveError } from './errors';
import { isInt32 } from './values';

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/** Pen colors, indexed by SETPENCOLOR code. */
export const COLORS: readonly Rgb[] = [
  { r: 0, g: 0, b: 0 }, // black
  { r: 0, g: 0, b: 255 }, // blue
  { r: 0, g: 255, b: 255 }, // cyan
  { r: 0, g: 255, b: 0 }, // green
  { r: 255, g: 0, b: 0 }, // red
  { r: 255, g: 0, b: 255 }, // magenta
  { r: 255, g: 255, b: 0 }, // yellow
  { r: 255, g: 255, b: 255 }, // white
  { r: 165, g: 42, b: 42 }, // brown
  { r: 210, g: 180, b: 140 }, // tan
  { r: 34, g: 139, b: 34 }, // forest
  { r: 127, g: 255, b: 212 }, // aqua
  { r: 250, g: 128, b: 114 }, // salmon
  { r: 128, g: 0, b: 128 }, // purple
  { r: 255, g: 165, b: 0 }, // orange
  { r: 128, g: 128, b: 128 }, // grey
];

export interface LineSegment {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  color: Rgb;
}

function roundHalfAwayFromZero(n: number): number {
  return Math.sign(n) * Math.round(Math.abs(n)) + 0;
}

/**
 * End point of a move of `length` pixels from (x, y). Direction is in
 * degrees clockwise from straight up; y grows downward.
 */
export function endCoordinates(x: number, y: number, direction: number, length: number): [number, number] {
  const radians = ((direction - 90) * Math.PI) / 180;
  const endX = roundHalfAwayFromZero(x + Math.cos(radians) * length);
  const endY = roundHalfAwayFromZero(y + Math.sin(radians) * length);
  if (!isInt32(endX) || !isInt32(endY)) {
    throw new LogoDrawError(`line end (${endX}, ${endY}) is outside the drawable coordinate range`);
  }
  return [endX, endY];
}

/**
 * Liang-Barsky clipping of a segment to the rectangle (0, 0)..(maxX, maxY).
 * Returns the rounded end points of the visible part, or null if none is.
 */
export function clipSegment(
  line: LineSegment,
  maxX: number,
  maxY: number,
): [number, number, number, number] | null {
  const dx = line.x2 - line.x1;
  const dy = line.y2 - line.y1;
  let t0 = 0;
  let t1 = 1;
  const edges: [number, number][] = [
    [-dx, line.x1],
    [dx, maxX - line.x1],
    [-dy, line.y1],
    [dy, maxY - line.y1],
  ];
  for (const [p, q] of edges) {
    if (p === 0) {
      if (q < 0) return null;
      continue;
    }
    const t = q / p;
    if (p < 0) {
      if (t > t1) return null;
      if (t > t0) t0 = t;
    } else {
      if (t < t0) return null;
      if (t < t1) t1 = t;
    }
  }
  const at = (start: number, delta: number, t: number) => Math.round(start + t * delta) + 0;
  return [at(line.x1, dx, t0), at(line.y1, dy, t0), at(line.x1, dx, t1), at(line.y1, dy, t1)];
}

export class Image {
  public readonly width: number;
  public readonly height: number;
  private lines: LineSegment[] = [];

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
  }

  get segments(): readonly LineSegment[] {
    return this.lines;
  }

  /**
   * Draw a line from (x, y) and return where it ends.
   */
  drawLine(x: number, y: number, direction: number, length: number, color: Rgb): [number, number] {
    const [x2, y2] = endCoordinates(x, y, direction, length);
    this.lines.push({ x1: x, y1: y, x2, y2, color });
    return [x2, y2];
  }

  toSvg(): string {
    const out: string[] = [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${this.width}" height="${this.height}" viewBox="0 0 ${this.width} ${this.height}">`,
      '<rect width="100%" height="100%" fill="black"/>',
    ];
    for (const l of this.lines) {
      const { r, g, b } = l.color;
      out.push(
        `<line x1="${l.x1}" y1="${l.y1}" x2="${l.x2}" y2="${l.y2}" stroke="rgb(${r}, ${g}, ${b})" stroke-width="1"/>`,
      );
    }
    out.push('</svg>');
    return out.join('\n') + '\n';
  }

  toPng(): Buffer {
    const png = new PNG({ width: this.width, height: this.height });
    for (let i = 0; i < png.data.length; i += 4) {
      png.data[i] = 0;
      png.data[i + 1] = 0;
      png.data[i + 2] = 0;
      png.data[i + 3] = 255;
    }
    for (const line of this.lines) {
      this.rasterize(png, line);
    }
    return PNG.sync.write(png);
  }

  /**
   * Write the image; the format follows the file extension.
   */
  save(filePath: string): void {
    const ext = path.extname(filePath).slice(1);
    let data: string | Buffer;
    if (ext === 'svg') {
      data = this.toSvg();
    } else if (ext === 'png') {
      data = this.toPng();
    } else {
      throw new LogoImageSaveError('File extension not supported');
    }
    try {
      fs.writeFileSync(filePath, data);
    } catch (e) {
      throw new LogoImageSaveError(e instanceof Error ? e.message : String(e));
    }
  }

  // Bresenham over the part of the segment that lies on the canvas.
  private rasterize(png: PNG, line: LineSegment): void {
    const clipped = clipSegment(line, this.width - 1, this.height - 1);
    if (clipped === null) return;
    let [x, y] = clipped;
    const [, , x2, y2] = clipped;
    const dx = Math.abs(x2 - x);
    const dy = -Math.abs(y2 - y);
    const sx = x < x2 ? 1 : -1;
    const sy = y < y2 ? 1 : -1;
    let err = dx + dy;
    for (;;) {
      if (x >= 0 && x < this.width && y >= 0 && y < this.height) {
        const idx = (y * this.width + x) * 4;
        png.data[idx] = line.color.r;
        png.data[idx + 1] = line.color.g;
        png.data[idx + 2] = line.color.b;
        png.data[idx + 3] = 255;
      }
      if (x === x2 && y === y2) break;
      const e2 = 2 * err;
      if (e2 >= dy) {
        err += dy;
        x += sx;
      }
      if (e2 <= dx) {
        err += dx;
        y += sy;
      }
    }
  }
}
