import type pino from "pino";
import type { BatchLock } from "./batchLock.js";
import { topLevelNames, type ObjectStore } from "./remote/storeClient.js";

/**
 * A batch prefix left under the working root means an earlier process stopped between
 * upload and reset. Submissions stay blocked until an operator resets the working area.
 */
export async function reconcileWorkingArea(
  store: ObjectStore,
  lock: BatchLock,
  workingRoot: string,
  logger: pino.Logger
): Promise<string[]> {
  const leftovers = topLevelNames(workingRoot, await store.list(workingRoot, true), true);
  if (leftovers.length === 0) {
    logger.info({ workingRoot }, "Working area clean");
    return [];
  }

  lock.markDirty(leftovers[0]);
  logger.warn(
    { workingRoot, leftovers },
    "Working area holds unreset batch data; POST /api/batches/reset before submitting new batches"
  );
  return leftovers;
}
