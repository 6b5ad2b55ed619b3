/**
 * state.ts — Last known value per logical control
 *
 * Copy-on-write: every effective write builds a new frozen record and
 * swaps it in with one assignment. A snapshot handed out earlier is never
 * touched again, so readers need no lock and can never see half a write.
 */

export type ControllerSnapshot = Readonly<Record<string, number>>;

export interface ControllerState {
  /** Overwrites one control. Returns false when the value was already stored. */
  apply(name: string, value: number): boolean;
  /** The current immutable snapshot. Never copies, never waits. */
  snapshot(): ControllerSnapshot;
  /** Number of effective writes so far. */
  readonly version: number;
}

/** Creates a state with every named control at rest (0). */
export function createControllerState(names: readonly string[]): ControllerState {
  let current: ControllerSnapshot = Object.freeze(
    Object.fromEntries(names.map((name) => [name, 0]))
  );
  let version = 0;

  return {
    apply(name: string, value: number): boolean {
      if (current[name] === value) return false;
      current = Object.freeze({ ...current, [name]: value });
      version++;
      return true;
    },

    snapshot(): ControllerSnapshot {
      return current;
    },

    get version() {
      return version;
    },
  };
}
