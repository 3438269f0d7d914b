import { config } from '../../config.js';
import { InMemoryFamilyStore } from './memory.js';
import { PostgresFamilyStore } from './postgres.js';
import { ResilientFamilyStore } from './resilient.js';
import type { FamilyStore, StoreLogger } from './types.js';

export type { FamilyStore, StoreLogger } from './types.js';
export { InMemoryFamilyStore } from './memory.js';
export { PostgresFamilyStore } from './postgres.js';
export { ResilientFamilyStore } from './resilient.js';

/** Store selected by DATA_SOURCE; the record store always degrades to sample data. */
export function createFamilyStore(log: StoreLogger): FamilyStore {
  const sample = InMemoryFamilyStore.fromSample();
  if (config.dataSource === 'sample') return sample;
  return new ResilientFamilyStore(new PostgresFamilyStore(), sample, log);
}
