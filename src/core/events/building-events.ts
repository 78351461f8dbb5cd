/**
 * Events emitted on the application event bus for registry changes
 */
export const BUILDING_EVENTS = {
  ADDED: 'building.added',
  REMOVED: 'building.removed',
} as const;

export interface BuildingEventData {
  uid: string;
  buildingType: number;
  timestamp: Date;
}
