/**
 * @fileoverview Trash sweeper lifecycle.
 *
 * Purges expired trash on a fixed interval using the shared interval poller.
 */

export { TrashLifecycle, DEFAULT_RETENTION_DAYS } from '../service/lifecycle.js';

import type { TrashLifecycle } from '../service/lifecycle.js';
import { createIntervalPoller, type Poller } from '../../../utils/poller.js';
import { createRunId, withLogContext } from '../../../utils/observability/index.js';

export interface TrashSweeperOptions {
  intervalMs: number;
  retentionDays: number;
}

/** Create and start the sweeper. Stop it with the returned poller. */
export function startTrashSweeper(lifecycle: TrashLifecycle, options: TrashSweeperOptions): Poller {
  const poller = createIntervalPoller(
    () => withLogContext({ runId: createRunId('sweep') }, async () => {
      await lifecycle.sweepExpired(options.retentionDays);
    }),
    { name: 'trash-sweeper', intervalMs: options.intervalMs }
  );
  poller.start();
  return poller;
}
