// Builds the API against the sample store with a recording publisher.

import { buildApp, type App } from '../app.js';
import { InMemoryFamilyStore } from '../services/store/memory.js';
import { ALEX_ID, FAMILY_ID, RecordingPublisher } from './fixtures.js';

export interface TestApp {
  app: App;
  store: InMemoryFamilyStore;
  events: RecordingPublisher;
  /** Bearer header for a token scoped to `familyId`. */
  auth(familyId?: string): { authorization: string };
}

export async function buildTestApp(): Promise<TestApp> {
  const store = InMemoryFamilyStore.fromSample();
  const events = new RecordingPublisher();
  const app = await buildApp({ store, events, realtime: false, jobs: [] });
  await app.ready();

  return {
    app,
    store,
    events,
    auth(familyId = FAMILY_ID) {
      return { authorization: `Bearer ${app.jwt.sign({ sub: ALEX_ID, family_id: familyId })}` };
    },
  };
}
