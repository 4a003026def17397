export interface InstallOptions {
  groups: string[];
  dryRun: boolean;
}

export interface GroupTally {
  group: string;
  succeeded: number;
  skipped: number;
  failed: number;
  total: number;
}
