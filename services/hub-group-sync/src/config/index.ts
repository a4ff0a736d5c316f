export { type AppConfig, type AppConfigNamespaced, appConfig } from './app.config';
export {
  type DirectoryConfig,
  type DirectoryConfigNamespaced,
  directoryConfig,
} from './directory.config';
export { type HubConfig, type HubConfigNamespaced, hubConfig } from './hub.config';
export {
  MembershipStrategyName,
  type SyncConfig,
  type SyncConfigNamespaced,
  syncConfig,
} from './sync.config';

import type { AppConfigNamespaced } from './app.config';
import type { DirectoryConfigNamespaced } from './directory.config';
import type { HubConfigNamespaced } from './hub.config';
import type { SyncConfigNamespaced } from './sync.config';

export type Config = AppConfigNamespaced &
  HubConfigNamespaced &
  DirectoryConfigNamespaced &
  SyncConfigNamespaced;
