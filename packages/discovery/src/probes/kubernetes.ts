/**
 * KubernetesProbe — discover tools by running an image as a short-lived
 * Deployment + Service and speaking MCP over HTTP to the Service's
 * cluster DNS name.
 *
 * Servers are always started in http mode here; there is no attach path.
 * The Deployment is tracked for teardown as soon as it exists, so a failed
 * Service create or a pod that never turns ready still gets cleaned up.
 */

import { randomUUID } from 'node:crypto';
import { ResourceProvisionError, TimeoutError, toError } from '@toolscout/shared';
import type { DiscoveryResult, ProbeBackend } from '@toolscout/shared';
import { BackgroundCleaner } from '../cleanup.js';
import { defaultConfig } from '../config.js';
import type { KubernetesProbeConfig } from '../config.js';
import { HttpProbe } from '../http-probe.js';
import { pollUntil } from '../timing.js';
import type { Sleep } from '../timing.js';
import { runProbeAttempt } from './attempt.js';
import type { AttemptStages, ContainerProbe, ImageProbeOptions } from './attempt.js';
import { KubernetesClusterApi } from './cluster-api.js';
import type { ClusterApi, PodReadiness, WorkloadSpec } from './cluster-api.js';
import { toProvisionError } from './provision-errors.js';

const DEFAULT_TIMEOUT_MS = 60_000;
const NAME_PREFIX = 'mcp-probe';
const MAX_NAME_LENGTH = 63;

export interface KubernetesProbeOptions {
  /** A client, or a factory called on first use (credentials load lazily). */
  api?: ClusterApi | (() => ClusterApi);
  config?: KubernetesProbeConfig;
  timeoutMs?: number;
  httpProbe?: HttpProbe;
  cleaner?: BackgroundCleaner;
  pollIntervalMs?: number;
  sleep?: Sleep;
  random?: () => number;
}

interface ProbeWorkload {
  name: string;
  namespace: string;
  port: number;
}

/**
 * DNS-1123 label for a probe workload:
 * `mcp-probe-<image slug>-<8 hex chars>`, at most 63 characters.
 */
export function workloadName(image: string, suffix: string = randomUUID().slice(0, 8)): string {
  const repository = image.split('@')[0] ?? image;
  const lastSegment = repository.split('/').pop() ?? repository;
  const withoutTag = lastSegment.split(':')[0] ?? lastSegment;

  const budget = MAX_NAME_LENGTH - NAME_PREFIX.length - suffix.length - 2;
  const slug = withoutTag
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, '-')
    .slice(0, budget)
    .replace(/^-+|-+$/g, '');

  return slug ? `${NAME_PREFIX}-${slug}-${suffix}` : `${NAME_PREFIX}-${suffix}`;
}

export class KubernetesProbe implements ContainerProbe {
  readonly backend: ProbeBackend = 'kubernetes';
  readonly timeoutMs: number;
  private apiSource: ClusterApi | (() => ClusterApi);
  private api: ClusterApi | null = null;
  private config: KubernetesProbeConfig;
  private httpProbe: HttpProbe;
  private cleaner: BackgroundCleaner;
  private pollIntervalMs: number;
  private sleep: Sleep | undefined;
  private random: () => number;

  constructor(options: KubernetesProbeOptions = {}) {
    this.apiSource = options.api ?? (() => new KubernetesClusterApi());
    this.config = options.config ?? defaultConfig().kubernetes;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.httpProbe = options.httpProbe ?? new HttpProbe();
    this.cleaner = options.cleaner ?? new BackgroundCleaner();
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.sleep = options.sleep;
    this.random = options.random ?? Math.random;
  }

  async discoverFromImage(
    image: string,
    options: ImageProbeOptions = {},
  ): Promise<DiscoveryResult | null> {
    if (options.transport === 'stdio') {
      console.warn('[kubernetes-probe] stdio transport is not supported on Kubernetes; using http');
    }
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    console.log(`[kubernetes-probe] Discovering tools from ${image} in namespace ${this.config.namespace}`);

    const stages: AttemptStages<ProbeWorkload> = {
      provision: (track) => this.provision(image, options, timeoutMs, track),
      waitReady: (workload) => this.waitReady(workload),
      discover: (workload, remainingMs) =>
        this.httpProbe.discoverFromUrl(this.serviceUrl(workload), 'kubernetes-http', remainingMs),
      teardown: (workload) => this.teardown(workload),
      describe: (workload) => `workload ${workload.namespace}/${workload.name}`,
    };

    return runProbeAttempt('[kubernetes-probe]', image, stages, timeoutMs);
  }

  private serviceUrl(workload: ProbeWorkload): string {
    const host = `${workload.name}.${workload.namespace}.${this.config.clusterDomain}`;
    return `http://${host}:${workload.port}${this.config.httpPath}`;
  }

  // -------------------------------------------------------------------------
  // Stages
  // -------------------------------------------------------------------------

  private async provision(
    image: string,
    options: ImageProbeOptions,
    timeoutMs: number,
    track: (workload: ProbeWorkload) => boolean,
  ): Promise<ProbeWorkload> {
    const api = this.client();
    const { start, end } = this.config.servicePortRange;
    const port = start + Math.floor(this.random() * (end - start));

    const workload: ProbeWorkload = {
      name: workloadName(image),
      namespace: this.config.namespace,
      port,
    };
    const spec: WorkloadSpec = {
      ...workload,
      image,
      args: options.serverArgs ?? [],
      env: {
        ...(options.envVars ?? {}),
        MCP_TRANSPORT: 'http',
        MCP_PORT: String(port),
      },
      labels: {
        'app.kubernetes.io/name': 'mcp-probe',
        'app.kubernetes.io/instance': workload.name,
        'app.kubernetes.io/managed-by': 'toolscout',
        'toolscout.role': 'discovery',
      },
      port,
    };

    await api.createDeployment(spec);
    if (!track(workload)) {
      throw new TimeoutError(`Deployment ${workload.name} created after the attempt ended`, timeoutMs);
    }
    console.log(`[kubernetes-probe] Created deployment ${workload.namespace}/${workload.name}`);

    await api.createService(spec);
    console.log(`[kubernetes-probe] Created service ${workload.namespace}/${workload.name} on port ${port}`);
    return workload;
  }

  private waitReady(workload: ProbeWorkload): Promise<boolean> {
    const api = this.client();
    const check = async (): Promise<PodReadiness> => {
      try {
        return await api.podReadiness(workload.namespace, workload.name);
      } catch (err) {
        // Denied access will not fix itself while we poll
        if (toProvisionError(err, 'Listing pods').reason !== 'forbidden') throw err;
        console.warn(`[kubernetes-probe] Cannot read pods in ${workload.namespace}: ${toError(err).message}`);
        return 'failed';
      }
    };
    return pollUntil(check, {
      timeoutMs: this.config.podReadyTimeoutMs,
      intervalMs: this.pollIntervalMs,
      sleep: this.sleep,
    });
  }

  private async teardown(workload: ProbeWorkload): Promise<void> {
    const api = this.client();
    const { namespace, name } = workload;
    await this.cleaner.remove(`service ${namespace}/${name}`, () => api.deleteService(namespace, name));
    await this.cleaner.remove(`deployment ${namespace}/${name}`, () => api.deleteDeployment(namespace, name));
  }

  private client(): ClusterApi {
    if (this.api) return this.api;
    if (typeof this.apiSource !== 'function') {
      this.api = this.apiSource;
      return this.api;
    }

    try {
      this.api = this.apiSource();
    } catch (err) {
      throw new ResourceProvisionError(
        'unavailable',
        `Kubernetes client unavailable: ${toError(err).message}`,
        { cause: err },
      );
    }
    return this.api;
  }
}
