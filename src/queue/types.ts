export interface LaneTask {
  label: string;
  run: () => Promise<void>;
}

export interface LaneStats {
  timestamp: string;
  depth: number;
  processing: boolean;
  current: string | null;
  consecutiveFailures: number;
}
