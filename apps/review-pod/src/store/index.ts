import { MemoryPostStore } from './memory';
import { RedisPostStore } from './redis';
import type { PostStore } from './types';

export type { PostRecord, PostStore, PostVersion, TransitionChanges } from './types';
export { MemoryPostStore } from './memory';
export { RedisPostStore } from './redis';

export type StoreDriver = 'memory' | 'redis';

export function createStore(driver: StoreDriver, redisUrl: string): PostStore {
    return driver === 'redis' ? RedisPostStore.fromUrl(redisUrl) : new MemoryPostStore();
}
