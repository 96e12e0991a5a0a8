import { GarbageBlock, GarbageReference } from "./garbage";
import type { Coord } from "./tile";
import { Tile } from "./tile";

export type Occupant = Tile | GarbageBlock | GarbageReference;

/**
 * The logical cell array of one grid, indexed `cells[y][x]` with row 0 at
 * the bottom. This array, not animation progress, is authoritative for
 * matching, gravity and input.
 */
export class GridCells {
  readonly width: number;
  readonly height: number;
  private cells: (Occupant | null)[][];

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.cells = Array.from({ length: height }, () =>
      Array.from({ length: width }, (): Occupant | null => null)
    );
  }

  inBounds(x: number, y: number) {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  get(x: number, y: number): Occupant | null {
    if (!this.inBounds(x, y)) return null;
    return this.cells[y][x];
  }

  set(x: number, y: number, occupant: Occupant | null) {
    if (!this.inBounds(x, y)) return;
    this.cells[y][x] = occupant;
  }

  clear(x: number, y: number) {
    this.set(x, y, null);
  }

  isEmpty(x: number, y: number) {
    return this.inBounds(x, y) && this.cells[y][x] === null;
  }

  tileAt(x: number, y: number): Tile | null {
    const o = this.get(x, y);
    return o instanceof Tile ? o : null;
  }

  garbageAt(x: number, y: number): GarbageBlock | null {
    const o = this.get(x, y);
    if (o instanceof GarbageBlock) return o;
    if (o instanceof GarbageReference) return o.owner;
    return null;
  }

  isGarbage(x: number, y: number) {
    return this.garbageAt(x, y) !== null;
  }

  /** Writes the anchor and its references into every covered cell. */
  placeGarbage(block: GarbageBlock) {
    for (let dy = 0; dy < block.height; dy++) {
      for (let dx = 0; dx < block.width; dx++) {
        this.set(
          block.x + dx,
          block.y + dy,
          dx === 0 && dy === 0 ? block : new GarbageReference(block, dx, dy)
        );
      }
    }
  }

  removeGarbage(block: GarbageBlock) {
    for (const c of block.cells()) {
      if (this.garbageAt(c.x, c.y) === block) this.clear(c.x, c.y);
    }
  }

  tiles(): Tile[] {
    const out: Tile[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const o = this.cells[y][x];
        if (o instanceof Tile) out.push(o);
      }
    }
    return out;
  }

  garbageBlocks(): GarbageBlock[] {
    const out: GarbageBlock[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const o = this.cells[y][x];
        if (o instanceof GarbageBlock) out.push(o);
      }
    }
    return out;
  }

  rowOccupied(y: number) {
    for (let x = 0; x < this.width; x++) {
      if (this.get(x, y) !== null) return true;
    }
    return false;
  }

  /** Highest occupied row across all columns, or -1 for an empty grid. */
  stackHeight() {
    for (let y = this.height - 1; y >= 0; y--) {
      if (this.rowOccupied(y)) return y;
    }
    return -1;
  }

  /**
   * Moves every row up by one and writes `bottom` into row 0. The top row
   * must be empty; its contents are returned so the caller can report them.
   */
  shiftUp(bottom: (Occupant | null)[]): Occupant[] {
    const lost = this.cells[this.height - 1].filter(
      (o): o is Occupant => o !== null
    );
    for (let y = this.height - 1; y > 0; y--) {
      this.cells[y] = this.cells[y - 1];
    }
    this.cells[0] = Array.from(
      { length: this.width },
      (_, x) => bottom[x] ?? null
    );
    return lost;
  }

  /**
   * Reports every broken invariant: an occupant stored under a cell that
   * does not match its own coordinate, a tile stored twice, or a garbage
   * reference that its anchor does not cover.
   */
  validate(): string[] {
    const problems: string[] = [];
    const seen = new Map<number, Coord>();
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const o = this.cells[y][x];
        if (o === null) continue;
        if (o instanceof Tile) {
          if (o.x !== x || o.y !== y) {
            problems.push(`tile ${o.id} stored at (${x},${y}) claims (${o.x},${o.y})`);
          }
          const prev = seen.get(o.id);
          if (prev) {
            problems.push(`tile ${o.id} stored at (${prev.x},${prev.y}) and (${x},${y})`);
          }
          seen.set(o.id, { x, y });
        } else if (o instanceof GarbageBlock) {
          if (o.x !== x || o.y !== y) {
            problems.push(`garbage ${o.id} anchored at (${x},${y}) claims (${o.x},${o.y})`);
          }
        } else if (o.owner.x + o.dx !== x || o.owner.y + o.dy !== y) {
          problems.push(`garbage reference at (${x},${y}) does not match block ${o.owner.id}`);
        }
      }
    }
    return problems;
  }
}
