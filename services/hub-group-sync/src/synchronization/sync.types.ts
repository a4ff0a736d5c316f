export type SyncCycleResult =
  | {
      status: 'reconciled';
      groupName: string;
      fetchedUsers: number;
      members: number;
      durationMs: number;
    }
  | {
      status: 'skipped';
      reason: string;
      durationMs: number;
    };
