import { getConfiguration } from "../config";

/**
 * Destroys the value still held by a collected container
 * @returns true if there was a value to destroy
 */
export type Release = () => boolean;

/**
 * Finalization handler for containers that were garbage collected without being disposed
 * @param release
 */
export function reclaim(release: Release) {
  const { logger } = getConfiguration();
  try {
    if (release()) {
      logger.warn("Optional was garbage collected while holding a value, its value has been destroyed");
    }
  } catch (error) {
    logger.warn("Failed to destroy the value of a garbage collected optional: ", error);
  }
}

const registry = new FinalizationRegistry<Release>(reclaim);

/**
 * Watches the owner for collection while leak detection is enabled. The release callback must not
 * reference the owner, otherwise it is never collected
 * @param owner
 * @param release
 */
export function track(owner: object, release: Release) {
  if (!getConfiguration().leakDetection) return;
  registry.register(owner, release, owner);
}

export function untrack(owner: object) {
  registry.unregister(owner);
}
