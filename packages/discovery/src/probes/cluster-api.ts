/**
 * Cluster API port and its @kubernetes/client-node adapter.
 *
 * A probe workload is one Deployment (one replica) plus one ClusterIP
 * Service selecting it. Deletes treat "not found" as success, so teardown
 * can be retried freely.
 */

import * as k8s from '@kubernetes/client-node';
import { toProvisionError, statusCodeOf } from './provision-errors.js';

export interface WorkloadSpec {
  name: string;
  namespace: string;
  image: string;
  /** Replaces the image CMD when non-empty. */
  args: string[];
  env: Record<string, string>;
  labels: Record<string, string>;
  /** Container port, also used as the Service port. */
  port: number;
}

export type PodReadiness = 'ready' | 'pending' | 'failed';

export interface ClusterApi {
  createDeployment(spec: WorkloadSpec): Promise<void>;
  createService(spec: WorkloadSpec): Promise<void>;
  podReadiness(namespace: string, name: string): Promise<PodReadiness>;
  deleteDeployment(namespace: string, name: string): Promise<void>;
  deleteService(namespace: string, name: string): Promise<void>;
}

/** Waiting reasons after which a pod will not become ready on its own. */
const FATAL_WAITING_REASONS = new Set([
  'ErrImagePull',
  'ImagePullBackOff',
  'InvalidImageName',
  'CrashLoopBackOff',
  'CreateContainerConfigError',
]);

/**
 * Load cluster credentials: in-cluster service account when running in a
 * pod, otherwise the default kubeconfig.
 */
export function loadKubeConfig(env: NodeJS.ProcessEnv = process.env): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  if (env['KUBERNETES_SERVICE_HOST']) {
    console.log('[cluster-api] Using in-cluster configuration');
    kc.loadFromCluster();
  } else {
    kc.loadFromDefault();
  }

  if (!kc.getCurrentCluster()) {
    throw new Error('No Kubernetes cluster configured (no in-cluster credentials or kubeconfig)');
  }
  return kc;
}

export class KubernetesClusterApi implements ClusterApi {
  private apps: k8s.AppsV1Api;
  private core: k8s.CoreV1Api;

  constructor(kc: k8s.KubeConfig = loadKubeConfig()) {
    this.apps = kc.makeApiClient(k8s.AppsV1Api);
    this.core = kc.makeApiClient(k8s.CoreV1Api);
  }

  async createDeployment(spec: WorkloadSpec): Promise<void> {
    const body: k8s.V1Deployment = {
      apiVersion: 'apps/v1',
      kind: 'Deployment',
      metadata: { name: spec.name, namespace: spec.namespace, labels: spec.labels },
      spec: {
        replicas: 1,
        selector: { matchLabels: { 'app.kubernetes.io/instance': spec.name } },
        template: {
          metadata: { labels: spec.labels },
          spec: {
            restartPolicy: 'Always',
            containers: [
              {
                name: 'mcp-server',
                image: spec.image,
                ...(spec.args.length > 0 ? { args: spec.args } : {}),
                env: Object.entries(spec.env).map(([name, value]) => ({ name, value })),
                ports: [{ containerPort: spec.port, protocol: 'TCP' }],
                readinessProbe: {
                  tcpSocket: { port: spec.port },
                  periodSeconds: 2,
                  failureThreshold: 30,
                },
              },
            ],
          },
        },
      },
    };

    try {
      await this.apps.createNamespacedDeployment({ namespace: spec.namespace, body });
    } catch (err) {
      throw toProvisionError(err, `Creating deployment ${spec.namespace}/${spec.name}`);
    }
  }

  async createService(spec: WorkloadSpec): Promise<void> {
    const body: k8s.V1Service = {
      apiVersion: 'v1',
      kind: 'Service',
      metadata: { name: spec.name, namespace: spec.namespace, labels: spec.labels },
      spec: {
        type: 'ClusterIP',
        selector: { 'app.kubernetes.io/instance': spec.name },
        ports: [{ port: spec.port, targetPort: spec.port, protocol: 'TCP' }],
      },
    };

    try {
      await this.core.createNamespacedService({ namespace: spec.namespace, body });
    } catch (err) {
      throw toProvisionError(err, `Creating service ${spec.namespace}/${spec.name}`);
    }
  }

  async podReadiness(namespace: string, name: string): Promise<PodReadiness> {
    const pods = await this.core.listNamespacedPod({
      namespace,
      labelSelector: `app.kubernetes.io/instance=${name}`,
    });

    for (const pod of pods.items) {
      const status = pod.status;
      if (!status) continue;
      if (status.phase === 'Failed') return 'failed';

      for (const container of status.containerStatuses ?? []) {
        const reason = container.state?.waiting?.reason;
        if (reason && FATAL_WAITING_REASONS.has(reason)) {
          console.warn(`[cluster-api] Pod ${pod.metadata?.name ?? name} is stuck: ${reason}`);
          return 'failed';
        }
      }

      const ready = (status.conditions ?? []).some(
        (condition) => condition.type === 'Ready' && condition.status === 'True',
      );
      if (ready) return 'ready';
    }
    return 'pending';
  }

  async deleteDeployment(namespace: string, name: string): Promise<void> {
    try {
      await this.apps.deleteNamespacedDeployment({ name, namespace, propagationPolicy: 'Foreground' });
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw err;
    }
  }

  async deleteService(namespace: string, name: string): Promise<void> {
    try {
      await this.core.deleteNamespacedService({ name, namespace });
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw err;
    }
  }
}
