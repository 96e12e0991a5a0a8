/**
 * The command surface of a grid. Keyboard input, touch gestures and
 * automated opponents all drive a grid through these same calls.
 */
export interface CursorCommands {
  moveLeft(): void;
  moveRight(): void;
  moveUp(): void;
  moveDown(): void;
  swap(): void;
  fastRise(held?: boolean): void;
}

export const commandNames = [
  "moveLeft",
  "moveRight",
  "moveUp",
  "moveDown",
  "swap",
  "fastRise",
] as const;

export type CommandName = (typeof commandNames)[number];

export function isCommandName(v: string): v is CommandName {
  return commandNames.some((c) => c === v);
}

export function applyCommand(target: CursorCommands, name: CommandName) {
  switch (name) {
    case "moveLeft":
      target.moveLeft();
      break;
    case "moveRight":
      target.moveRight();
      break;
    case "moveUp":
      target.moveUp();
      break;
    case "moveDown":
      target.moveDown();
      break;
    case "swap":
      target.swap();
      break;
    case "fastRise":
      target.fastRise(true);
      break;
  }
}

// Default keyboard bindings
const keyBindings: Record<string, CommandName> = {
  ArrowLeft: "moveLeft",
  ArrowRight: "moveRight",
  ArrowUp: "moveUp",
  ArrowDown: "moveDown",
  z: "swap",
  Z: "swap",
  " ": "swap",
  Space: "swap",
  x: "fastRise",
  X: "fastRise",
};

export function commandForKey(key: string): CommandName | null {
  return keyBindings[key] ?? null;
}

/**
 * Routes a key event to `target`. Fast rise lasts while its key is held, so
 * releases matter for it only. Returns whether the key was bound.
 */
export function handleKey(
  target: CursorCommands,
  key: string,
  phase: "down" | "up" = "down"
) {
  const name = commandForKey(key);
  if (!name) return false;
  if (name === "fastRise") {
    target.fastRise(phase === "down");
    return true;
  }
  if (phase === "down") applyCommand(target, name);
  return true;
}
