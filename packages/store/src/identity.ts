import { ulid } from 'ulidx';

/**
 * Generate a process-unique node identity.
 *
 * Made once at boot and stamped on every outgoing invalidation so a process
 * can recognize its own echoes. Never persisted.
 */
export function createNodeId(): string {
  return ulid();
}
