export const DEFAULT_HUB_CONCURRENCY = 10 as const;
export const DEFAULT_HUB_PAGE_SIZE = 0 as const;
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 60 as const;
export const DEFAULT_SYNC_INTERVAL_SECONDS = 3600 as const;
export const DEFAULT_EXCLUDED_NAMESPACES = 'staging' as const;

export const SYNC_INTERVAL_NAME = 'hub-group-sync' as const;
