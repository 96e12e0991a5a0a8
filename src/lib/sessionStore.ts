import { createStore } from "zustand/vanilla";
import type { SessionConfig } from "../presets/schema";
import { VersusSession, type SessionState } from "../versus/session";
import { applyCommand, type CommandName } from "./commands";

export interface SessionStoreState {
  session: VersusSession | null;
  snapshot: SessionState | null;
  start: (config: SessionConfig, players?: number) => VersusSession;
  stop: () => void;
  tick: (dtMs: number) => void;
  command: (player: number, name: CommandName) => void;
  // Fast rise is held, so it has its own setter
  setFastRise: (player: number, held: boolean) => void;
}

export type SessionStore = ReturnType<typeof createSessionStore>;

/**
 * Owns the running session and republishes its snapshot after every tick,
 * so a renderer only has to subscribe to the store.
 */
export function createSessionStore() {
  return createStore<SessionStoreState>()((set, get) => ({
    session: null,
    snapshot: null,

    start: (config, players = 2) => {
      get().session?.dispose();
      const session = new VersusSession(config, players);
      set({ session, snapshot: session.getState() });
      return session;
    },

    stop: () => {
      get().session?.dispose();
      set({ session: null, snapshot: null });
    },

    tick: (dtMs) => {
      const { session } = get();
      if (!session) return;
      session.update(dtMs);
      set({ snapshot: session.getState() });
    },

    command: (player, name) => {
      const engine = get().session?.engine(player);
      if (engine) applyCommand(engine, name);
    },

    setFastRise: (player, held) => {
      get().session?.engine(player)?.fastRise(held);
    },
  }));
}
