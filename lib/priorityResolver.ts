export const PRIORITY_LEVELS = 16;

/** Slot the simulator writes for commandable points. */
export const SIMULATION_PRIORITY = 16;

export type PrioritySlots<T> = ReadonlyArray<T | null>;

export interface ResolvedValue<T> {
  value: T;
  /** 1-based slot supplying the value, or null when the relinquish default applies. */
  priority: number | null;
}

export function createPriorityArray<T>(): Array<T | null> {
  return new Array<T | null>(PRIORITY_LEVELS).fill(null);
}

export function isValidPriority(priority: number): boolean {
  return Number.isInteger(priority) && priority >= 1 && priority <= PRIORITY_LEVELS;
}

export function activePriority<T>(slots: PrioritySlots<T>): number | null {
  for (let index = 0; index < PRIORITY_LEVELS; index += 1) {
    const slot = slots[index];
    if (slot !== null && slot !== undefined) return index + 1;
  }
  return null;
}

export function resolvePriorityArray<T>(slots: PrioritySlots<T>, relinquishDefault: T): ResolvedValue<T> {
  const priority = activePriority(slots);
  if (priority === null) return { value: relinquishDefault, priority: null };
  const value = slots[priority - 1];
  return value === null || value === undefined
    ? { value: relinquishDefault, priority: null }
    : { value, priority };
}

/**
 * Whether the simulator may drive a point this tick. Points without a priority
 * array (inputs) are always driven; commandable points only while slots 1-15 are empty.
 * `priorityAware = false` is the legacy mode that ignores external commands.
 */
export function isSimulationPermitted<T>(slots: PrioritySlots<T> | null, priorityAware: boolean): boolean {
  if (!slots || !priorityAware) return true;
  for (let index = 0; index < SIMULATION_PRIORITY - 1; index += 1) {
    const slot = slots[index];
    if (slot !== null && slot !== undefined) return false;
  }
  return true;
}
