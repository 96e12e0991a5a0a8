export type Coord = { x: number; y: number };

export type MovementState =
  | { kind: "idle" }
  | { kind: "swapping"; target: Coord }
  | { kind: "falling"; target: Coord };

const IDLE: MovementState = { kind: "idle" };

/**
 * A single grid occupant. `x`/`y` are the logical cell and always match the
 * cell array; while a move is in flight they already hold the target and
 * `visualX`/`visualY` carry the interpolated position in grid units
 * (row 0 is the bottom row).
 *
 * `version` increases on every committed move so a cancelled animation can
 * recognise that its completion is stale.
 */
export class Tile {
  readonly kind = "tile" as const;
  readonly id: number;
  readonly type: number;
  x: number;
  y: number;
  visualX: number;
  visualY: number;
  state: MovementState = IDLE;
  version = 0;
  // Matched and waiting to pop; excluded from gravity, swaps and detection
  processing = false;
  // Landed during a cascade settle; a match using it extends the chain
  chainSource = false;
  // Capability flags owned by an external status-effect system
  canMatch = true;
  canSwap = true;
  momentum = false;

  constructor(id: number, type: number, x: number, y: number) {
    this.id = id;
    this.type = type;
    this.x = x;
    this.y = y;
    this.visualX = x;
    this.visualY = y;
  }

  get isIdle() {
    return this.state.kind === "idle";
  }

  get isSwapping() {
    return this.state.kind === "swapping";
  }

  get isFalling() {
    return this.state.kind === "falling";
  }

  get isMatchable() {
    return this.canMatch && this.isIdle && !this.processing;
  }

  startSwapping(target: Coord) {
    this.x = target.x;
    this.y = target.y;
    this.state = { kind: "swapping", target: { ...target } };
    this.version++;
  }

  startFalling(target: Coord) {
    this.x = target.x;
    this.y = target.y;
    this.state = { kind: "falling", target: { ...target } };
    this.version++;
  }

  finishMovement() {
    this.state = IDLE;
    this.visualX = this.x;
    this.visualY = this.y;
  }

  /** Moves the tile by whole rows without touching its animation state. */
  shiftRows(dy: number) {
    this.y += dy;
    this.visualY += dy;
    if (this.state.kind !== "idle") {
      this.state = {
        kind: this.state.kind,
        target: { x: this.state.target.x, y: this.state.target.y + dy },
      };
    }
  }
}
