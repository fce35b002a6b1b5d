export { ProtocolConnection } from './connection.js';
export type { ConnectionState, ConnectionOptions, ClientInfo } from './connection.js';

export { spawnProcess, stopProcess } from './process.js';
export type { ProcessHandle, ProcessLauncher, LaunchOptions } from './process.js';

export { CommandProbe } from './command-probe.js';
export type { CommandProbeOptions, CommandDiscoveryOptions } from './command-probe.js';

export { HttpProbe } from './http-probe.js';
export type { HttpProbeOptions } from './http-probe.js';

export type { ContainerProbe, ImageProbeOptions } from './probes/attempt.js';
export { DockerProbe, DISCOVERY_ROLE_LABEL } from './probes/docker.js';
export type { DockerProbeOptions } from './probes/docker.js';
export { DockerodeRuntime } from './probes/docker-runtime.js';
export type { ContainerRuntime, ContainerSpec, ContainerStatus, AttachedStdio } from './probes/docker-runtime.js';
export { KubernetesProbe, workloadName } from './probes/kubernetes.js';
export type { KubernetesProbeOptions } from './probes/kubernetes.js';
export { KubernetesClusterApi, loadKubeConfig } from './probes/cluster-api.js';
export type { ClusterApi, WorkloadSpec, PodReadiness } from './probes/cluster-api.js';

export { BackgroundCleaner } from './cleanup.js';
export type { CleanerOptions, RemoveFn } from './cleanup.js';

export { ToolDiscovery, createToolDiscovery } from './discovery.js';
export type { ToolDiscoveryOptions } from './discovery.js';

export { loadConfig, defaultConfig } from './config.js';
export type {
  ToolscoutConfig,
  DockerProbeConfig,
  KubernetesProbeConfig,
  CleanupConfig,
  PortRange,
} from './config.js';

export { findFreePort, isPortFree, canConnect } from './ports.js';
