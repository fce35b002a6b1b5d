/**
 * Container runtime port and its dockerode adapter.
 *
 * DockerProbe only talks to ContainerRuntime, so tests can drive the full
 * provision/discover/teardown cycle against an in-memory runtime.
 */

import Docker from 'dockerode';
import { PassThrough } from 'node:stream';
import type { Readable, Writable } from 'node:stream';
import { toProvisionError, statusCodeOf } from './provision-errors.js';

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface ContainerSpec {
  image: string;
  /** Replaces the image CMD when non-empty. */
  args: string[];
  env: Record<string, string>;
  labels: Record<string, string>;
  /** Keep stdin open for JSON-RPC over attach. */
  interactive: boolean;
  portBinding?: { containerPort: number; hostPort: number };
}

export interface AttachedStdio {
  stdin: Writable;
  /** Ends when the container's output stream closes. */
  stdout: Readable;
}

export interface ContainerStatus {
  running: boolean;
  exited: boolean;
  exitCode: number | null;
}

export interface ContainerRuntime {
  /** Create (not start) a container; resolves with its id. */
  createContainer(spec: ContainerSpec): Promise<string>;
  attach(id: string): Promise<AttachedStdio>;
  startContainer(id: string): Promise<void>;
  inspectContainer(id: string): Promise<ContainerStatus>;
  stopContainer(id: string, timeoutSeconds: number): Promise<void>;
  killContainer(id: string): Promise<void>;
  /** Force-remove; an already-gone container counts as removed. */
  removeContainer(id: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// dockerode adapter
// ---------------------------------------------------------------------------

export class DockerodeRuntime implements ContainerRuntime {
  private docker: Docker;

  constructor(docker: Docker | { socketPath: string }) {
    this.docker = docker instanceof Docker ? docker : new Docker({ socketPath: docker.socketPath });
  }

  async createContainer(spec: ContainerSpec): Promise<string> {
    const options = toCreateOptions(spec);
    try {
      const container = await this.docker.createContainer(options);
      return container.id;
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw toProvisionError(err, `Creating container from ${spec.image}`);
    }

    // Image not present locally
    console.log(`[docker-runtime] Pulling ${spec.image}`);
    try {
      await this.pull(spec.image);
      const container = await this.docker.createContainer(options);
      return container.id;
    } catch (err) {
      throw toProvisionError(err, `Pulling ${spec.image}`);
    }
  }

  async attach(id: string): Promise<AttachedStdio> {
    const container = this.docker.getContainer(id);
    const shortId = id.slice(0, 12);

    let stream: NodeJS.ReadWriteStream;
    try {
      stream = await container.attach({
        stream: true,
        stdin: true,
        stdout: true,
        stderr: true,
        hijack: true,
      });
    } catch (err) {
      throw toProvisionError(err, `Attaching to container ${shortId}`);
    }

    // Demultiplex Docker's multiplexed stream into separate stdout/stderr
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    container.modem.demuxStream(stream, stdout, stderr);

    stderr.on('data', (chunk: Buffer) => {
      const text = chunk.toString().trim();
      if (text) console.log(`[docker-runtime] ${shortId} stderr: ${text}`);
    });

    stream.on('end', () => {
      stdout.end();
      stderr.end();
    });
    stream.on('error', (err: Error) => {
      console.warn(`[docker-runtime] ${shortId} attach stream error: ${err.message}`);
      stdout.end();
    });

    const stdin = new PassThrough();
    stdin.pipe(stream);

    return { stdin, stdout };
  }

  async startContainer(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).start();
    } catch (err) {
      throw toProvisionError(err, `Starting container ${id.slice(0, 12)}`);
    }
  }

  async inspectContainer(id: string): Promise<ContainerStatus> {
    const info = await this.docker.getContainer(id).inspect();
    const state = info.State;
    const exited = state.Status === 'exited' || state.Status === 'dead';
    return {
      running: state.Running,
      exited,
      exitCode: exited ? state.ExitCode : null,
    };
  }

  async stopContainer(id: string, timeoutSeconds: number): Promise<void> {
    try {
      await this.docker.getContainer(id).stop({ t: timeoutSeconds });
    } catch (err) {
      // 304: already stopped
      if (statusCodeOf(err) !== 304) throw err;
    }
  }

  async killContainer(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).kill();
    } catch (err) {
      // 409: not running
      if (statusCodeOf(err) !== 409) throw err;
    }
  }

  async removeContainer(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).remove({ force: true });
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw err;
    }
  }

  private async pull(image: string): Promise<void> {
    const progress: NodeJS.ReadableStream = await this.docker.pull(image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(progress, (err: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

function toCreateOptions(spec: ContainerSpec): Docker.ContainerCreateOptions {
  const options: Docker.ContainerCreateOptions = {
    Image: spec.image,
    Env: Object.entries(spec.env).map(([key, value]) => `${key}=${value}`),
    Labels: spec.labels,
    OpenStdin: spec.interactive,
    StdinOnce: false,
    AttachStdin: spec.interactive,
    AttachStdout: spec.interactive,
    AttachStderr: spec.interactive,
    HostConfig: {
      SecurityOpt: ['no-new-privileges'],
    },
  };

  if (spec.args.length > 0) options.Cmd = spec.args;

  if (spec.portBinding) {
    const port = `${spec.portBinding.containerPort}/tcp`;
    options.ExposedPorts = { [port]: {} };
    options.HostConfig = {
      ...options.HostConfig,
      PortBindings: {
        [port]: [{ HostIp: '127.0.0.1', HostPort: String(spec.portBinding.hostPort) }],
      },
    };
  }

  return options;
}
