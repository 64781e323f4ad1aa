import { isAbsolute, resolve } from 'path';

import type { ImageReference } from '@telco-churn/shared';

import type { ContainerEngine } from '../adapters/docker-adapter.js';
import { HealthCheckTimeoutError, PipelineError, RunCanceledError } from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logger.js';
import { spawnCommand, type CommandResult, type RunCommandOptions } from '../core/run-command.js';
import type { ContainerLauncher } from '../deployments/container-launcher.js';
import type { DeploymentManager } from '../deployments/deployment-manager.js';
import type { HealthGate } from '../health/health-gate.js';
import type { ImageBuilder } from '../images/image-builder.js';
import type { ImagePublisher } from '../images/image-publisher.js';
import { imageName, primaryReference } from '../images/image-reference.js';
import type { Notifier } from '../notifications/notifier.js';
import { buildNotificationEvent } from '../notifications/payload.js';
import type { PipelineDocument, PostAction, StageDescriptor } from './definition.js';
import { definePipeline } from './orchestrator.js';
import type { BuildMetadata, RunContext } from './run-context.js';
import type { Pipeline, PostHook, Stage, StageWork } from './types.js';

export type CommandExecutor = (command: string, options: RunCommandOptions) => Promise<CommandResult>;

export interface PipelineServices {
  engine: ContainerEngine;
  launcher: ContainerLauncher;
  builder: ImageBuilder;
  publisher: ImagePublisher;
  healthGate: HealthGate;
  deployments: DeploymentManager;
  notifier: Notifier;
  executeCommand?: CommandExecutor;
  logger?: Logger;
}

export interface PipelineSettings {
  workspaceDir: string;
  registry: string;
  repository: string;
  registryCredentialsId: string;
  appContainerPort: number;
  testContainerPort: number;
  testContainerPrefix: string;
  healthHost: string;
  healthPath: string;
  healthBudgetMs: number;
  healthIntervalMs: number;
  stagingName: string;
  stagingPort: number;
  stageTimeoutMs: number;
  recipients: string[];
}

const interpolate = (template: string, metadata: Readonly<BuildMetadata>): string =>
  template
    .replace(/\{runId\}/g, metadata.runId)
    .replace(/\{branch\}/g, metadata.branch.replace(/[^A-Za-z0-9_.-]/g, '-'))
    .replace(/\{revision\}/g, metadata.revision.slice(0, 12));

const requireImage = (context: RunContext): ImageReference => {
  if (!context.artifacts.image) {
    throw new PipelineError('WorkFailed', 'No image has been built in this run.');
  }
  return context.artifacts.image;
};

const metadataEnv = (metadata: Readonly<BuildMetadata>): Record<string, string> => ({
  PIPELINE_RUN_ID: metadata.runId,
  PIPELINE_BRANCH: metadata.branch,
  PIPELINE_REVISION: metadata.revision,
});

export const testInstanceName = (settings: PipelineSettings, runId: string): string =>
  `${settings.testContainerPrefix}-${runId}`.replace(/[^A-Za-z0-9_.-]/g, '-');

const stageWork = (descriptor: StageDescriptor, services: PipelineServices, settings: PipelineSettings): StageWork => {
  const executeCommand = services.executeCommand ?? spawnCommand;

  switch (descriptor.uses) {
    case 'command': {
      const { run, workingDirectory, env } = descriptor.with;
      const cwd = workingDirectory
        ? isAbsolute(workingDirectory)
          ? workingDirectory
          : resolve(settings.workspaceDir, workingDirectory)
        : settings.workspaceDir;

      return async ({ context, signal, log }) => {
        log(`$ ${run}`);
        const result = await executeCommand(run, {
          cwd,
          env: { ...context.env, ...metadataEnv(context.metadata), ...env },
          signal,
          onLog: log,
        });
        return { exitCode: result.exitCode };
      };
    }

    case 'build-image': {
      const options = descriptor.with;
      return async ({ context, signal, log }) => {
        const tags = options.tags.map((tag) => interpolate(tag, context.metadata));
        context.artifacts.image = await services.builder.build(
          {
            contextDir: resolve(settings.workspaceDir, options.context),
            ...(options.dockerfile ? { dockerfile: resolve(settings.workspaceDir, options.dockerfile) } : {}),
            ...(options.buildArgs ? { buildArgs: options.buildArgs } : {}),
          },
          tags,
          { signal, onLog: log },
        );
      };
    }

    case 'test-image': {
      const options = descriptor.with;
      const budgetMs = options.budgetSeconds ? options.budgetSeconds * 1000 : settings.healthBudgetMs;
      return async ({ context, signal, log }) => {
        const image = requireImage(context);
        const name = testInstanceName(settings, context.metadata.runId);
        context.artifacts.testInstanceName = name;

        const result = await services.healthGate.checkLiveness(
          {
            kind: 'ephemeral',
            name,
            image: primaryReference(image),
            host: settings.healthHost,
            hostPort: options.port ?? settings.testContainerPort,
            containerPort: settings.appContainerPort,
          },
          options.path ?? settings.healthPath,
          budgetMs,
          options.intervalMs ?? settings.healthIntervalMs,
          { signal, onLog: log },
        );

        if (result.status === 'healthy') {
          return;
        }
        if (result.reason === 'timeout') {
          throw new HealthCheckTimeoutError(
            `Test container ${name} did not become healthy within ${Math.round(budgetMs / 1000)}s: ${result.lastError ?? 'no response'}`,
          );
        }
        if (result.reason === 'aborted') {
          throw new RunCanceledError('Health check aborted.');
        }
        throw new PipelineError('WorkFailed', `Test container ${name} stopped before it became healthy.`);
      };
    }

    case 'push-image': {
      const credentialsId = descriptor.with.credentialsId ?? settings.registryCredentialsId;
      return async ({ context, log }) => {
        const image = requireImage(context);
        const credential = await context.resolveCredential(credentialsId);
        const report = await services.publisher.publish(image, credential, log);
        log(`Pushed ${report.pushed.join(', ')}`);
      };
    }

    case 'deploy': {
      const name = descriptor.with.name ?? settings.stagingName;
      const port = descriptor.with.port ?? settings.stagingPort;
      return async ({ context, signal, log }) => {
        const image = requireImage(context);
        context.artifacts.deployment = await services.deployments.deploy(name, image, port, { signal, onLog: log });
        log(`Deployed to ${context.artifacts.deployment.url}`);
      };
    }
  }
};

const describeResources = (descriptor: StageDescriptor, settings: PipelineSettings): string[] => {
  switch (descriptor.uses) {
    case 'test-image':
      return [`container:${settings.testContainerPrefix}-*`, `port:${descriptor.with.port ?? settings.testContainerPort}`];
    case 'push-image':
      return [`registry-session:${settings.registry}`];
    case 'deploy':
      return [
        `container:${descriptor.with.name ?? settings.stagingName}`,
        `port:${descriptor.with.port ?? settings.stagingPort}`,
      ];
    default:
      return [];
  }
};

const postActionHook = (
  action: PostAction,
  services: PipelineServices,
  settings: PipelineSettings,
  logger: Logger,
): PostHook => {
  if (action === 'notify') {
    return async ({ context, status, stages }) => {
      const event = buildNotificationEvent(
        context,
        status,
        stages,
        settings.recipients,
        {
          plannedImage: `${imageName(settings.registry, settings.repository)}:${context.metadata.runId}`,
          plannedTargetUrl: `http://${settings.healthHost}:${settings.stagingPort}`,
        },
      );
      await services.notifier.notify(event, context.redactor);
    };
  }

  return async ({ context }) => {
    const testName = context.artifacts.testInstanceName;
    if (testName && (await services.launcher.remove(testName))) {
      logger.info({ name: testName }, 'Removed leftover test container');
    }
    await services.engine.pruneImages();
  };
};

/**
 * Several actions under one hook all run; the first error is rethrown once
 * they are done so the orchestrator reports it.
 */
const combineHooks = (hooks: PostHook[], logger: Logger): PostHook | undefined => {
  if (hooks.length === 0) {
    return undefined;
  }

  return async (run) => {
    let firstError: unknown = null;
    for (const hook of hooks) {
      try {
        await hook(run);
      } catch (error) {
        if (firstError === null) {
          firstError = error;
        } else {
          logger.warn({ error }, 'Additional post-run action failed');
        }
      }
    }
    if (firstError !== null) {
      throw firstError;
    }
  };
};

export const compilePipeline = (
  document: PipelineDocument,
  services: PipelineServices,
  settings: PipelineSettings,
): Pipeline => {
  const logger = (services.logger ?? rootLogger).child({ component: 'pipeline-compiler' });

  const stages: Stage[] = document.stages.map((descriptor) => ({
    name: descriptor.name,
    run: stageWork(descriptor, services, settings),
    timeoutMs: descriptor.timeoutSeconds ? descriptor.timeoutSeconds * 1000 : settings.stageTimeoutMs,
    resources: describeResources(descriptor, settings),
  }));

  const hooksFor = (actions: PostAction[]) =>
    combineHooks(
      actions.map((action) => postActionHook(action, services, settings, logger)),
      logger,
    );

  const success = hooksFor(document.post.success);
  const failure = hooksFor(document.post.failure);
  const always = hooksFor(document.post.always);

  return definePipeline({
    name: document.name,
    stages,
    post: {
      ...(success ? { success } : {}),
      ...(failure ? { failure } : {}),
      ...(always ? { always } : {}),
    },
  });
};
