export { FakeTransport, FakeSession } from './fake-transport.js';
export type { OpenBehavior } from './fake-transport.js';

/** Drain pending promise callbacks without advancing timers. */
export async function flushMicrotasks(rounds = 100): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
