/**
 * A registered building card
 */
export interface BuildingCard {
  /** Card UID as uppercase hex */
  uid: string;
  /** Building type read from the card (0-255) */
  buildingType: number;
  /** Monotonic timestamp (ms) of the first registration; never changes */
  firstSeen: number;
  /** Monotonic timestamp (ms) of the latest observation */
  lastSeen: number;
}

/**
 * Listener for registry changes. Receives the building type first to match
 * the order the scan hardware reports it.
 */
export type BuildingEventCallback = (buildingType: number, uid: string) => void;

/** Source of monotonic milliseconds */
export type Clock = () => number;

export const REGISTRY_CLOCK = Symbol('REGISTRY_CLOCK');
