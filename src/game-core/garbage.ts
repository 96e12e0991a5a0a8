import type { Coord } from "./tile";

/**
 * A multi-cell attack block. The anchor is the bottom-left covered cell;
 * every other covered cell holds a {@link GarbageReference} back to it.
 */
export class GarbageBlock {
  readonly kind = "garbage" as const;
  readonly id: number;
  readonly width: number;
  readonly height: number;
  x: number;
  y: number;
  visualX: number;
  visualY: number;
  version = 0;
  falling = false;
  converting = false;

  constructor(id: number, x: number, y: number, width: number, height: number) {
    this.id = id;
    this.x = x;
    this.y = y;
    this.visualX = x;
    this.visualY = y;
    this.width = width;
    this.height = height;
  }

  cells(): Coord[] {
    const out: Coord[] = [];
    for (let dy = 0; dy < this.height; dy++) {
      for (let dx = 0; dx < this.width; dx++) {
        out.push({ x: this.x + dx, y: this.y + dy });
      }
    }
    return out;
  }

  covers(x: number, y: number) {
    return (
      x >= this.x &&
      x < this.x + this.width &&
      y >= this.y &&
      y < this.y + this.height
    );
  }

  /** True when the two blocks share an edge. */
  touches(other: GarbageBlock) {
    const overlapX =
      this.x < other.x + other.width && other.x < this.x + this.width;
    const overlapY =
      this.y < other.y + other.height && other.y < this.y + this.height;
    const adjacentX =
      this.x + this.width === other.x || other.x + other.width === this.x;
    const adjacentY =
      this.y + this.height === other.y || other.y + other.height === this.y;
    return (overlapX && adjacentY) || (overlapY && adjacentX);
  }
}

export class GarbageReference {
  readonly kind = "garbage-ref" as const;
  readonly owner: GarbageBlock;
  readonly dx: number;
  readonly dy: number;

  constructor(owner: GarbageBlock, dx: number, dy: number) {
    this.owner = owner;
    this.dx = dx;
    this.dy = dy;
  }
}
