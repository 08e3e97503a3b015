import { vi } from 'vitest';
import type { Notifier } from '../notifications/notifier';

/**
 * Notifier whose methods are spies
 */
export function createFakeNotifier() {
  return {
    notify: vi.fn<Notifier['notify']>(),
    progress: vi.fn<Notifier['progress']>(),
    endProgress: vi.fn<Notifier['endProgress']>(),
  } satisfies Notifier;
}

export type FakeNotifier = ReturnType<typeof createFakeNotifier>;
