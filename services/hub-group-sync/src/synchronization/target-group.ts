import assert from 'node:assert';
import type { DirectoryConfig } from '../config';

export type TargetGroup = { kind: 'sync'; groupName: string } | { kind: 'skip'; reason: string };

/**
 * Picks the directory group a hub feeds. An explicit group name always wins. Otherwise the
 * first label of the hub host names the group (`datahub.example.edu` → `<stem>:datahub-users`),
 * unless that label contains one of the excluded namespaces.
 */
export function resolveTargetGroup(
  hubApiUrl: string,
  directory: Pick<DirectoryConfig, 'groupName' | 'groupStem' | 'excludedNamespaces'>,
): TargetGroup {
  if (directory.groupName) {
    return { kind: 'sync', groupName: directory.groupName };
  }

  const [namespace = ''] = new URL(hubApiUrl).hostname.split('.');
  const excluded = directory.excludedNamespaces.find((pattern) => namespace.includes(pattern));
  if (excluded) {
    return {
      kind: 'skip',
      reason: `hub namespace '${namespace}' matches excluded namespace '${excluded}'`,
    };
  }

  assert.ok(
    directory.groupStem,
    'DIRECTORY_GROUP_STEM is required when DIRECTORY_GROUP_NAME is not set',
  );
  return { kind: 'sync', groupName: `${directory.groupStem}:${namespace}-users` };
}
