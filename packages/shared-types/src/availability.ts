export interface AvailabilityRecord {
  quality: string;
  type?: string;
  size: string;
  sizeBytes: number;
  seeds: number;
  peers: number;
  url: string;
  hash?: string;
}

export interface AvailabilitySummary {
  itemId: number;
  records: AvailabilityRecord[];
  cachedAt: string | null;
  fresh: boolean;
  hasAvailableEntries: boolean;
}
