/**
 * ToolDiscovery — dispatches a probe target to the right probe and owns
 * the retry policy. Individual probes make exactly one attempt.
 */

import type { DiscoveryResult, ProbeBackend, ProbeTarget } from '@toolscout/shared';
import { BackgroundCleaner } from './cleanup.js';
import { CommandProbe } from './command-probe.js';
import type { ToolscoutConfig } from './config.js';
import { HttpProbe } from './http-probe.js';
import type { ContainerProbe } from './probes/attempt.js';
import { DockerProbe } from './probes/docker.js';
import { KubernetesProbe } from './probes/kubernetes.js';
import { sleep as defaultSleep } from './timing.js';
import type { Sleep } from './timing.js';

export interface ToolDiscoveryOptions {
  commandProbe: CommandProbe;
  containerProbes: Partial<Record<ProbeBackend, ContainerProbe>>;
  cleaner?: BackgroundCleaner;
  retries?: number;
  retrySleepMs?: number;
  sleep?: Sleep;
}

function describeTarget(target: ProbeTarget): string {
  return target.kind === 'command'
    ? [...target.command, ...(target.args ?? [])].join(' ')
    : `${target.image} (${target.backend})`;
}

export class ToolDiscovery {
  readonly retries: number;
  readonly retrySleepMs: number;
  private commandProbe: CommandProbe;
  private containerProbes: Partial<Record<ProbeBackend, ContainerProbe>>;
  private cleaner: BackgroundCleaner | null;
  private sleep: Sleep;

  constructor(options: ToolDiscoveryOptions) {
    this.commandProbe = options.commandProbe;
    this.containerProbes = options.containerProbes;
    this.cleaner = options.cleaner ?? null;
    this.retries = Math.max(1, options.retries ?? 3);
    this.retrySleepMs = options.retrySleepMs ?? 5000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Discover tools from a target, retrying failed attempts.
   * Resolves null once every attempt has failed.
   */
  async discover(target: ProbeTarget): Promise<DiscoveryResult | null> {
    const label = describeTarget(target);

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      const result = await this.attempt(target);
      if (result) {
        return { ...result, timestamp: result.timestamp ?? new Date().toISOString() };
      }

      if (attempt < this.retries) {
        console.warn(
          `[discovery] Attempt ${attempt}/${this.retries} for ${label} failed; ` +
          `retrying in ${this.retrySleepMs / 1000}s`,
        );
        await this.sleep(this.retrySleepMs);
      }
    }

    console.error(`[discovery] Giving up on ${label} after ${this.retries} attempt(s)`);
    return null;
  }

  /** Wait for background cleanups to finish. */
  async shutdown(): Promise<void> {
    if (!this.cleaner) return;
    const pending = this.cleaner.pending;
    if (pending > 0) {
      console.log(`[discovery] Waiting for ${pending} background cleanup(s)...`);
    }
    await this.cleaner.drain();
  }

  private attempt(target: ProbeTarget): Promise<DiscoveryResult | null> {
    if (target.kind === 'command') {
      return this.commandProbe.discoverFromCommand(target.command, {
        args: target.args,
        env: target.env,
        workingDir: target.workingDir,
        timeoutMs: target.timeoutMs,
      });
    }

    const probe = this.containerProbes[target.backend];
    if (!probe) {
      console.error(`[discovery] No probe configured for backend: ${target.backend}`);
      return Promise.resolve(null);
    }
    return probe.discoverFromImage(target.image, {
      serverArgs: target.serverArgs,
      envVars: target.envVars,
      transport: target.transport,
      timeoutMs: target.timeoutMs,
    });
  }
}

/**
 * Wire the default dockerode and Kubernetes adapters from configuration.
 * Neither daemon is contacted until a target needs it.
 */
export function createToolDiscovery(config: ToolscoutConfig): ToolDiscovery {
  const cleaner = new BackgroundCleaner({
    maxRetries: config.cleanup.maxRetries,
    baseDelayMs: config.cleanup.baseDelayMs,
    removeTimeoutMs: config.cleanup.removeTimeoutMs,
  });
  const commandProbe = new CommandProbe({
    timeoutMs: config.discovery.commandTimeoutMs,
    requestTimeoutMs: Math.min(config.discovery.connectionTimeoutMs, config.discovery.commandTimeoutMs),
  });
  const httpProbe = new HttpProbe({ timeoutMs: config.discovery.connectionTimeoutMs });

  return new ToolDiscovery({
    commandProbe,
    containerProbes: {
      docker: new DockerProbe({
        config: config.docker,
        timeoutMs: config.discovery.timeoutMs,
        commandProbe,
        httpProbe,
        cleaner,
      }),
      kubernetes: new KubernetesProbe({
        config: config.kubernetes,
        timeoutMs: config.discovery.timeoutMs,
        httpProbe,
        cleaner,
      }),
    },
    cleaner,
    retries: config.discovery.retries,
    retrySleepMs: config.discovery.retrySleepMs,
  });
}
