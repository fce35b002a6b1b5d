/**
 * The per-attempt state machine shared by container-based probes:
 *
 *   provision → wait_ready → discover → teardown
 *
 * teardown runs whenever provisioning reported a resource, whatever
 * happened afterwards (not ready, discovery threw, deadline fired). A
 * resource reported after the deadline already fired is torn down on the
 * spot, since the attempt that asked for it is gone.
 */

import { ResourceProvisionError, TimeoutError, toError } from '@toolscout/shared';
import type {
  DiscoveryResult,
  ProbeBackend,
  ServerTransport,
} from '@toolscout/shared';
import { withTimeout } from '../timing.js';

export interface ImageProbeOptions {
  /** Arguments passed to the server (replace the image's CMD). */
  serverArgs?: string[];
  envVars?: Record<string, string>;
  /** Deadline for the whole attempt (default: 60s). */
  timeoutMs?: number;
  /** How the server speaks MCP (default: stdio). */
  transport?: ServerTransport;
}

/** A backend that can discover tools from a container image. */
export interface ContainerProbe {
  readonly backend: ProbeBackend;
  discoverFromImage(image: string, options?: ImageProbeOptions): Promise<DiscoveryResult | null>;
}

export interface AttemptStages<R> {
  /**
   * Allocate the resource. Must call track() as soon as anything exists
   * that needs removing, even if later provisioning steps fail. track()
   * returns false once the attempt has ended; provisioning should stop.
   */
  provision(track: (resource: R) => boolean): Promise<R>;
  waitReady(resource: R): Promise<boolean>;
  discover(resource: R, remainingMs: number): Promise<DiscoveryResult | null>;
  /** Must not reject. */
  teardown(resource: R): Promise<void>;
  describe(resource: R): string;
}

export async function runProbeAttempt<R>(
  tag: string,
  subject: string,
  stages: AttemptStages<R>,
  timeoutMs: number,
): Promise<DiscoveryResult | null> {
  const attempt: { resource: R | null; finished: boolean } = { resource: null, finished: false };
  const deadline = Date.now() + timeoutMs;

  const track = (resource: R): boolean => {
    if (!attempt.finished) {
      attempt.resource = resource;
      return true;
    }
    console.warn(`${tag} ${stages.describe(resource)} appeared after the attempt ended; tearing down`);
    stages.teardown(resource).catch((err: unknown) => {
      console.error(`${tag} Teardown of ${stages.describe(resource)} failed: ${toError(err).message}`);
    });
    return false;
  };

  const run = async (): Promise<DiscoveryResult | null> => {
    const resource = await stages.provision(track);
    const label = stages.describe(resource);

    if (!(await stages.waitReady(resource))) {
      console.warn(`${tag} ${label} did not become ready`);
      return null;
    }
    console.log(`${tag} ${label} is ready`);

    return stages.discover(resource, Math.max(deadline - Date.now(), 1));
  };

  try {
    return await withTimeout(run(), timeoutMs, `Discovery from ${subject}`);
  } catch (err) {
    if (err instanceof ResourceProvisionError) {
      const detail = err.reason === 'forbidden' ? 'access denied' : err.reason;
      console.warn(`${tag} Provisioning ${subject} failed (${detail}): ${err.message}`);
    } else if (err instanceof TimeoutError) {
      console.warn(`${tag} ${err.message}`);
    } else {
      console.error(`${tag} Discovery from ${subject} failed: ${toError(err).message}`);
    }
    return null;
  } finally {
    attempt.finished = true;
    const resource = attempt.resource;
    attempt.resource = null;
    if (resource !== null) {
      await stages.teardown(resource);
    }
  }
}
