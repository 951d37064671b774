/**
 * The turtle: the cursor the interpreter drives.
 *
 * The interpreter only talks to the Turtle interface, so tests can swap in
 * a recording implementation.
 */

import { COLORS, Image, endCoordinates } from './image';
import { LogoInvalidArgumentError } from './errors';
import { checkedAdd } from './values';

export interface Turtle {
  penUp(): void;
  penDown(): void;
  forward(pixels: number): void;
  back(pixels: number): void;
  left(pixels: number): void;
  right(pixels: number): void;
  /** Codes outside 0 to 15 are a LogoInvalidArgumentError. */
  setPenColor(code: number): void;
  turn(degrees: number): void;
  setHeading(degrees: number): void;
  setX(position: number): void;
  setY(position: number): void;
  getX(): number;
  getY(): number;
  getHeading(): number;
  getPenColor(): number;
  saveImage(filePath: string): void;
}

const DEFAULT_COLOR = 7; // white

/**
 * Turtle drawing onto an Image. It starts centred, facing up, pen up.
 */
export class CanvasTurtle implements Turtle {
  public readonly image: Image;
  private x: number;
  private y: number;
  private heading = 0;
  private penIsDown = false;
  private color = DEFAULT_COLOR;

  constructor(width: number, height: number) {
    this.image = new Image(width, height);
    this.x = Math.floor(width / 2);
    this.y = Math.floor(height / 2);
  }

  get isPenDown(): boolean {
    return this.penIsDown;
  }

  penUp(): void {
    this.penIsDown = false;
  }

  penDown(): void {
    this.penIsDown = true;
  }

  forward(pixels: number): void {
    if (pixels < 0) return this.back(-pixels);
    this.move(pixels, this.heading);
  }

  back(pixels: number): void {
    if (pixels < 0) return this.forward(-pixels);
    this.move(pixels, this.heading + 180);
  }

  left(pixels: number): void {
    if (pixels < 0) return this.right(-pixels);
    this.move(pixels, this.heading - 90);
  }

  right(pixels: number): void {
    // The magnitude keeps its sign here, unlike the other three moves.
    if (pixels < 0) return this.left(pixels);
    this.move(pixels, this.heading + 90);
  }

  setPenColor(code: number): void {
    if (!Number.isInteger(code) || code < 0 || code >= COLORS.length) {
      throw new LogoInvalidArgumentError('SETPENCOLOR', String(code), `an integer between 0 and ${COLORS.length - 1}`);
    }
    this.color = code;
  }

  turn(degrees: number): void {
    this.heading = checkedAdd(this.heading, degrees);
  }

  setHeading(degrees: number): void {
    this.heading = degrees;
  }

  setX(position: number): void {
    this.x = position;
  }

  setY(position: number): void {
    this.y = position;
  }

  getX(): number {
    return this.x;
  }

  getY(): number {
    return this.y;
  }

  getHeading(): number {
    return this.heading;
  }

  getPenColor(): number {
    return this.color;
  }

  saveImage(filePath: string): void {
    this.image.save(filePath);
  }

  private move(pixels: number, direction: number): void {
    const [x, y] = this.penIsDown
      ? this.image.drawLine(this.x, this.y, direction, pixels, COLORS[this.color])
      : endCoordinates(this.x, this.y, direction, pixels);
    this.x = x;
    this.y = y;
  }
}
