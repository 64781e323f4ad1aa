import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { CommandFailedError } from '../core/errors.js';
import { runCommand, shellEscape, spawnCommand, type LogCallback } from '../core/run-command.js';

export interface BuildImageInput {
  contextDir: string;
  dockerfile?: string;
  buildArgs?: Record<string, string>;
  signal?: AbortSignal;
  onLog?: LogCallback;
}

export interface RunContainerInput {
  name: string;
  image: string;
  hostPort: number;
  containerPort: number;
  env?: Record<string, string>;
  restartPolicy?: 'no' | 'unless-stopped';
}

export type ContainerState = 'running' | 'stopped' | 'absent';

/**
 * The container operations the pipeline needs. `DockerAdapter` drives the
 * docker CLI; tests substitute an in-memory engine.
 */
export interface ContainerEngine {
  /** Builds without tagging and returns the image id. */
  buildImage(input: BuildImageInput): Promise<string>;
  /** Image id a reference currently points at, or null. */
  resolveImageId(reference: string): Promise<string | null>;
  tagImage(source: string, target: string): Promise<void>;
  untagImage(reference: string): Promise<void>;
  login(registry: string, username: string, password: string): Promise<void>;
  logout(registry: string): Promise<void>;
  pushImage(reference: string, onLog?: LogCallback): Promise<void>;
  runContainer(input: RunContainerInput): Promise<string>;
  containerState(name: string): Promise<ContainerState>;
  stopContainer(name: string): Promise<void>;
  removeContainer(name: string): Promise<void>;
  containerLogs(name: string, tailLines?: number): Promise<string>;
  pruneImages(): Promise<void>;
}

const isNoSuchObject = (error: unknown): boolean =>
  error instanceof CommandFailedError && /no such (object|container|image)|not found/i.test(error.stderr);

export class DockerAdapter implements ContainerEngine {
  constructor(private readonly binary = 'docker') {}

  async buildImage(input: BuildImageInput): Promise<string> {
    // The image id is written to a file instead of tagging during the build,
    // so a failed build can never leave a tag behind.
    const workDir = await mkdtemp(join(tmpdir(), 'telco-churn-build-'));
    const iidFile = join(workDir, 'image.id');

    try {
      const args: string[] = ['--progress=plain', `--iidfile ${shellEscape(iidFile)}`];
      if (input.dockerfile) {
        args.push(`-f ${shellEscape(input.dockerfile)}`);
      }
      for (const [key, value] of Object.entries(input.buildArgs ?? {})) {
        args.push(`--build-arg ${shellEscape(`${key}=${value}`)}`);
      }

      await runCommand(`${this.binary} build ${args.join(' ')} ${shellEscape(input.contextDir)}`, {
        env: { DOCKER_BUILDKIT: '1' },
        ...(input.signal ? { signal: input.signal } : {}),
        ...(input.onLog ? { onLog: input.onLog } : {}),
      });

      return (await readFile(iidFile, 'utf8')).trim();
    } finally {
      await rm(workDir, { recursive: true, force: true }).catch(() => undefined);
    }
  }

  async resolveImageId(reference: string): Promise<string | null> {
    try {
      return await runCommand(`${this.binary} image inspect --format '{{.Id}}' ${shellEscape(reference)}`);
    } catch (error) {
      if (isNoSuchObject(error)) {
        return null;
      }
      throw error;
    }
  }

  async tagImage(source: string, target: string): Promise<void> {
    await runCommand(`${this.binary} tag ${shellEscape(source)} ${shellEscape(target)}`);
  }

  async untagImage(reference: string): Promise<void> {
    await runCommand(`${this.binary} rmi --no-prune ${shellEscape(reference)}`);
  }

  async login(registry: string, username: string, password: string): Promise<void> {
    // Password goes through stdin so it never shows up in a process listing.
    await runCommand(`${this.binary} login ${shellEscape(registry)} -u ${shellEscape(username)} --password-stdin`, {
      input: password,
    });
  }

  async logout(registry: string): Promise<void> {
    await runCommand(`${this.binary} logout ${shellEscape(registry)}`);
  }

  async pushImage(reference: string, onLog?: LogCallback): Promise<void> {
    await runCommand(`${this.binary} push ${shellEscape(reference)}`, onLog ? { onLog } : {});
  }

  async runContainer(input: RunContainerInput): Promise<string> {
    const envArgs = Object.entries(input.env ?? {}).map(([k, v]) => `-e ${shellEscape(`${k}=${v}`)}`);

    const cmd = [
      `${this.binary} run -d`,
      `--name ${shellEscape(input.name)}`,
      `--restart ${input.restartPolicy ?? 'no'}`,
      `-p ${input.hostPort}:${input.containerPort}`,
      ...envArgs,
      shellEscape(input.image),
    ].join(' ');

    return runCommand(cmd);
  }

  async containerState(name: string): Promise<ContainerState> {
    try {
      const running = await runCommand(
        `${this.binary} inspect --format '{{.State.Running}}' ${shellEscape(name)}`,
      );
      return running.trim() === 'true' ? 'running' : 'stopped';
    } catch (error) {
      if (isNoSuchObject(error)) {
        return 'absent';
      }
      throw error;
    }
  }

  async stopContainer(name: string): Promise<void> {
    await runCommand(`${this.binary} stop ${shellEscape(name)}`);
  }

  async removeContainer(name: string): Promise<void> {
    await runCommand(`${this.binary} rm -f ${shellEscape(name)}`);
  }

  async containerLogs(name: string, tailLines = 50): Promise<string> {
    const result = await spawnCommand(`${this.binary} logs --tail ${tailLines} ${shellEscape(name)}`);
    if (result.exitCode !== 0) {
      return '(unable to retrieve container logs)';
    }
    // docker logs replays the container's stderr on our stderr.
    return [result.stdout, result.stderr].filter(Boolean).join('\n');
  }

  async pruneImages(): Promise<void> {
    await runCommand(`${this.binary} image prune -f`);
  }
}
