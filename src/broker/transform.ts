/**
 * Broker transformations - pure decisions used by the coordinator.
 */
import type { Repository } from "../repository/index.js";

/**
 * Whether a new subscription should be replayed to.
 */
export const shouldReplay = (lastEventId: string, replayAll: boolean): boolean =>
  replayAll || lastEventId.length > 0;

/**
 * Repository bound to a channel, falling back to the default.
 */
export const resolveRepository = (
  channel: string,
  repositories: ReadonlyMap<string, Repository>,
  fallback: Repository | null,
): Repository | null => repositories.get(channel) ?? fallback;
