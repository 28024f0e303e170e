// packages/server/src/gateway/status/snapshot.ts
import type {
  PlayerList,
  PlayerListData,
  SnapshotSource,
  StatusData,
  StatusSnapshot,
} from '@blockbridge/types';
import { createTimestamp } from '@blockbridge/types';

/** Snapshots are copied from the input, then frozen all the way down */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  for (const key of Reflect.ownKeys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  return Object.freeze(value);
}

export function statusSnapshot(
  serverId: string,
  source: SnapshotSource,
  data: StatusData,
  now: number = Date.now(),
): StatusSnapshot {
  return deepFreeze({ ...structuredClone(data), serverId, source, capturedAt: createTimestamp(now) });
}

export function playerList(
  serverId: string,
  source: SnapshotSource,
  data: PlayerListData,
  now: number = Date.now(),
): PlayerList {
  return deepFreeze({ ...structuredClone(data), serverId, source, capturedAt: createTimestamp(now) });
}
