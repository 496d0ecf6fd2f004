import type { QuillConfig } from '../config.js';
import type { SessionRegistry } from '../registry/sessionRegistry.js';

interface CleanupDependencies {
  config: Pick<QuillConfig, 'sessionTtlMs' | 'cleanupIntervalMs'>;
  registry: SessionRegistry;
}

export interface CleanupController {
  stop: () => void;
  runNow: () => Promise<void>;
}

export const INTERRUPTED_REASON = 'Generation was interrupted by a restart';

/** Must finish before the first submission is accepted. */
export async function recoverInterruptedSessions(registry: SessionRegistry): Promise<number> {
  const recovered = await registry.failInterrupted(INTERRUPTED_REASON);
  if (recovered > 0) {
    console.warn(`[cleanup] marked ${recovered} interrupted session(s) as failed`);
  }
  return recovered;
}

export function startSessionCleanup(input: CleanupDependencies): CleanupController {
  let running = false;
  let stopped = false;

  const runNow = async (): Promise<void> => {
    if (running || stopped) return;
    running = true;
    try {
      const removed = await input.registry.deleteExpired(input.config.sessionTtlMs);
      if (removed > 0) {
        console.log(`[cleanup] evicted ${removed} session(s) older than ${input.config.sessionTtlMs}ms`);
      }
    } catch (error) {
      console.error('[cleanup] unhandled cycle error:', error);
    } finally {
      running = false;
    }
  };

  void runNow();
  const timer = setInterval(() => {
    void runNow();
  }, input.config.cleanupIntervalMs);

  const stop = () => {
    if (stopped) return;
    stopped = true;
    clearInterval(timer);
    console.log('[cleanup] stopped');
  };

  return { stop, runNow };
}
