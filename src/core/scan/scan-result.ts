export type ScanAction = 'added' | 'refreshed' | 'removed' | 'not-registered' | 'failed';

/**
 * Where the building type of a scan came from:
 * - `ndef`: the 'B' record on the card
 * - `default`: the card was readable but holds no 'B' record
 * - `uid`: the card could not be read; first UID byte
 */
export type BuildingTypeSource = 'ndef' | 'default' | 'uid';

export interface ScanResult {
  action: ScanAction;
  uid?: string;
  buildingType?: number;
  source?: BuildingTypeSource;
  error?: string;
}
