/**
 * DockerProbe — discover tools from a container image on a local Docker
 * daemon.
 *
 * stdio servers are attached before start and spoken to over the attach
 * stream, exactly like a local process. http servers get a free host port
 * bound to 127.0.0.1 and are reached through HttpProbe. Every container
 * carries the discovery role label and is force-removed when the attempt
 * ends; removal failures go to the background cleaner.
 */

import type { Readable, Writable } from 'node:stream';
import { ResourceProvisionError, TimeoutError } from '@toolscout/shared';
import type { DiscoveryResult, ProbeBackend, ServerTransport } from '@toolscout/shared';
import { BackgroundCleaner } from '../cleanup.js';
import { CommandProbe } from '../command-probe.js';
import { defaultConfig } from '../config.js';
import type { DockerProbeConfig, PortRange } from '../config.js';
import { HttpProbe } from '../http-probe.js';
import { canConnect, findFreePort } from '../ports.js';
import type { ProcessHandle } from '../process.js';
import { pollUntil } from '../timing.js';
import type { Sleep } from '../timing.js';
import { runProbeAttempt } from './attempt.js';
import type { AttemptStages, ContainerProbe, ImageProbeOptions } from './attempt.js';
import { DockerodeRuntime } from './docker-runtime.js';
import type { AttachedStdio, ContainerRuntime } from './docker-runtime.js';

export const DISCOVERY_ROLE_LABEL = 'toolscout.role';

const DEFAULT_TIMEOUT_MS = 60_000;
const STOP_GRACE_SECONDS = 2;

export interface DockerProbeOptions {
  runtime?: ContainerRuntime;
  config?: DockerProbeConfig;
  /** Deadline for one attempt when the caller gives none (default: 60s). */
  timeoutMs?: number;
  commandProbe?: CommandProbe;
  httpProbe?: HttpProbe;
  cleaner?: BackgroundCleaner;
  /** Whether something accepts connections on a host port. */
  portReady?: (port: number) => Promise<boolean>;
  findPort?: (range: PortRange) => Promise<number | null>;
  pollIntervalMs?: number;
  sleep?: Sleep;
}

interface ProbeContainer {
  id: string;
  shortId: string;
  transport: ServerTransport;
  hostPort: number | null;
  stdio: AttachedStdio | null;
}

// ---------------------------------------------------------------------------
// Attached container as a process
// ---------------------------------------------------------------------------

/** Lets ProtocolConnection drive an attached container like a child process. */
class ContainerProcessHandle implements ProcessHandle {
  readonly label: string;
  readonly stdin: Writable;
  readonly stdout: Readable;
  private exited = false;
  private exitWaiters: Array<() => void> = [];

  constructor(
    private runtime: ContainerRuntime,
    private container: ProbeContainer,
    stdio: AttachedStdio,
  ) {
    this.label = `container ${container.shortId}`;
    this.stdin = stdio.stdin;
    this.stdout = stdio.stdout;

    const onExit = (): void => {
      if (this.exited) return;
      this.exited = true;
      for (const resolve of this.exitWaiters.splice(0)) resolve();
    };
    this.stdout.once('end', onExit);
    this.stdout.once('close', onExit);
  }

  isAlive(): boolean {
    return !this.exited;
  }

  async terminate(): Promise<void> {
    this.stdin.end();
    await this.runtime.stopContainer(this.container.id, STOP_GRACE_SECONDS);
  }

  async kill(): Promise<void> {
    await this.runtime.killContainer(this.container.id);
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exited) return Promise.resolve(true);

    return new Promise((resolve) => {
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.exitWaiters = this.exitWaiters.filter((waiter) => waiter !== onExit);
        resolve(false);
      }, timeoutMs);
      this.exitWaiters.push(onExit);
    });
  }
}

// ---------------------------------------------------------------------------
// DockerProbe
// ---------------------------------------------------------------------------

export class DockerProbe implements ContainerProbe {
  readonly backend: ProbeBackend = 'docker';
  readonly timeoutMs: number;
  private runtime: ContainerRuntime;
  private config: DockerProbeConfig;
  private commandProbe: CommandProbe;
  private httpProbe: HttpProbe;
  private cleaner: BackgroundCleaner;
  private portReady: (port: number) => Promise<boolean>;
  private findPort: (range: PortRange) => Promise<number | null>;
  private pollIntervalMs: number;
  private sleep: Sleep | undefined;

  constructor(options: DockerProbeOptions = {}) {
    this.config = options.config ?? defaultConfig().docker;
    this.runtime = options.runtime ?? new DockerodeRuntime({ socketPath: this.config.socketPath });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.commandProbe = options.commandProbe ?? new CommandProbe();
    this.httpProbe = options.httpProbe ?? new HttpProbe();
    this.cleaner = options.cleaner ?? new BackgroundCleaner();
    this.portReady = options.portReady ?? ((port) => canConnect(port));
    this.findPort = options.findPort ?? ((range) => findFreePort(range, '127.0.0.1'));
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.sleep = options.sleep;
  }

  async discoverFromImage(
    image: string,
    options: ImageProbeOptions = {},
  ): Promise<DiscoveryResult | null> {
    const transport = options.transport ?? 'stdio';
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    console.log(`[docker-probe] Discovering tools from ${image} (${transport})`);

    const stages: AttemptStages<ProbeContainer> = {
      provision: (track) => this.provision(image, transport, options, timeoutMs, track),
      waitReady: (container) => this.waitReady(container),
      discover: (container, remainingMs) => this.discover(container, remainingMs),
      teardown: (container) => this.teardown(container),
      describe: (container) => `container ${container.shortId}`,
    };

    return runProbeAttempt('[docker-probe]', image, stages, timeoutMs);
  }

  // -------------------------------------------------------------------------
  // Stages
  // -------------------------------------------------------------------------

  private async provision(
    image: string,
    transport: ServerTransport,
    options: ImageProbeOptions,
    timeoutMs: number,
    track: (container: ProbeContainer) => boolean,
  ): Promise<ProbeContainer> {
    let hostPort: number | null = null;
    const env: Record<string, string> = { ...(options.envVars ?? {}) };

    if (transport === 'http') {
      hostPort = await this.findPort(this.config.portRange);
      if (hostPort === null) {
        const { start, end } = this.config.portRange;
        throw new ResourceProvisionError('unavailable', `No free host port in [${start}, ${end})`);
      }
      env['MCP_TRANSPORT'] = 'http';
      env['MCP_PORT'] = String(this.config.containerPort);
    }

    const id = await this.runtime.createContainer({
      image,
      args: options.serverArgs ?? [],
      env,
      labels: { [DISCOVERY_ROLE_LABEL]: 'discovery', 'toolscout.image': image },
      interactive: transport === 'stdio',
      ...(hostPort !== null
        ? { portBinding: { containerPort: this.config.containerPort, hostPort } }
        : {}),
    });

    const container: ProbeContainer = {
      id,
      shortId: id.slice(0, 12),
      transport,
      hostPort,
      stdio: null,
    };
    if (!track(container)) {
      throw new TimeoutError(`Container ${container.shortId} created after the attempt ended`, timeoutMs);
    }
    console.log(`[docker-probe] Created container ${container.shortId} from ${image}`);

    // Attach BEFORE starting so no early output is lost
    if (transport === 'stdio') {
      container.stdio = await this.runtime.attach(id);
    }

    await this.runtime.startContainer(id);
    console.log(`[docker-probe] Started container ${container.shortId}`);
    return container;
  }

  private waitReady(container: ProbeContainer): Promise<boolean> {
    const hostPort = container.hostPort;

    return pollUntil(
      async () => {
        const status = await this.runtime.inspectContainer(container.id);
        if (status.exited) {
          console.warn(
            `[docker-probe] Container ${container.shortId} exited (code ${status.exitCode ?? '?'})`,
          );
          return 'failed';
        }
        if (!status.running) return 'pending';
        if (hostPort === null) return 'ready';
        return (await this.portReady(hostPort)) ? 'ready' : 'pending';
      },
      {
        timeoutMs: this.config.healthCheckTimeoutMs,
        intervalMs: this.pollIntervalMs,
        sleep: this.sleep,
      },
    );
  }

  private discover(container: ProbeContainer, remainingMs: number): Promise<DiscoveryResult | null> {
    if (container.transport === 'http' && container.hostPort !== null) {
      const url = `http://127.0.0.1:${container.hostPort}${this.config.httpPath}`;
      return this.httpProbe.discoverFromUrl(url, 'docker-http', remainingMs);
    }

    if (!container.stdio) {
      throw new ResourceProvisionError('unknown', `Container ${container.shortId} has no attached stdio`);
    }
    const handle = new ContainerProcessHandle(this.runtime, container, container.stdio);
    return this.commandProbe.discoverFromProcess(handle, 'docker-stdio', remainingMs);
  }

  private async teardown(container: ProbeContainer): Promise<void> {
    await this.cleaner.remove(`container ${container.shortId}`, () =>
      this.runtime.removeContainer(container.id),
    );
  }
}
