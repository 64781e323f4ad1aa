#!/usr/bin/env node
import { join, resolve } from 'path';

import { Redis } from 'ioredis';

import { DockerAdapter } from './adapters/docker-adapter.js';
import { env, type PipelineEnv } from './core/env.js';
import { logger } from './core/logger.js';
import { settingsFromEnv } from './core/settings.js';
import {
  ChainedCredentialStore,
  EncryptedFileCredentialStore,
  EnvCredentialStore,
  encryptionKeyFrom,
  type CredentialStore,
} from './credentials/credential-store.js';
import { ContainerLauncher } from './deployments/container-launcher.js';
import { DeploymentManager } from './deployments/deployment-manager.js';
import { RedisDeploymentLock, runExclusive } from './deployments/deployment-lock.js';
import { RedisRunEventPublisher } from './events/run-events.js';
import { HealthGate } from './health/health-gate.js';
import { ImageBuilder } from './images/image-builder.js';
import { ImagePublisher } from './images/image-publisher.js';
import { pushMetrics } from './monitoring/metrics.js';
import { Notifier, SmtpTransport } from './notifications/notifier.js';
import { loadPipelineDocument } from './pipeline/definition.js';
import { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { RunContext } from './pipeline/run-context.js';
import { compilePipeline } from './pipeline/stages.js';
import { formatRunSummary } from './pipeline/summary.js';
import { StageRunner } from './runner/stage-runner.js';

const buildCredentialStore = (config: PipelineEnv): CredentialStore => {
  const stores: CredentialStore[] = [new EnvCredentialStore()];
  if (config.CREDENTIALS_FILE && config.CREDENTIALS_ENCRYPTION_KEY) {
    stores.push(
      new EncryptedFileCredentialStore(
        resolve(config.CREDENTIALS_FILE),
        encryptionKeyFrom(config.CREDENTIALS_ENCRYPTION_KEY),
      ),
    );
  }
  return new ChainedCredentialStore(stores);
};

const start = async (): Promise<number> => {
  const settings = settingsFromEnv(env);
  const engine = new DockerAdapter();
  const launcher = new ContainerLauncher(engine);
  const healthGate = new HealthGate({ launcher, expectHealthyBody: env.HEALTHCHECK_EXPECT_BODY });
  const deployments = new DeploymentManager({
    launcher,
    healthGate,
    containerPort: env.APP_CONTAINER_PORT,
    host: env.STAGING_HOST,
    healthPath: env.HEALTHCHECK_PATH,
    settleMs: env.DEPLOY_SETTLE_MS,
    healthBudgetMs: settings.healthBudgetMs,
    healthIntervalMs: env.HEALTHCHECK_INTERVAL_MS,
  });
  const notifier = new Notifier(
    SmtpTransport.fromConfig({
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      secure: env.SMTP_SECURE,
      user: env.SMTP_USER,
      pass: env.SMTP_PASS,
      fromEmail: env.SMTP_FROM_EMAIL,
      fromName: env.SMTP_FROM_NAME,
    }),
  );

  const document = await loadPipelineDocument(resolve(env.PIPELINE_FILE ?? join(env.WORKSPACE_DIR, 'pipeline.json')));
  const pipeline = compilePipeline(
    document,
    {
      engine,
      launcher,
      builder: new ImageBuilder(engine, env.DOCKER_REGISTRY, env.DOCKER_IMAGE_NAME),
      publisher: new ImagePublisher(engine),
      healthGate,
      deployments,
      notifier,
    },
    settings,
  );

  const cancel = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, 'Cancellation requested; canceling the current stage');
    cancel.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const context = new RunContext({
    projectName: env.PROJECT_NAME,
    ...(env.BUILD_NUMBER ? { runId: env.BUILD_NUMBER } : {}),
    ...(env.GIT_BRANCH ? { branch: env.GIT_BRANCH } : {}),
    ...(env.GIT_COMMIT ? { revision: env.GIT_COMMIT } : {}),
    buildUrl: env.BUILD_URL ?? null,
    credentials: buildCredentialStore(env),
    signal: cancel.signal,
  });

  const redis = env.REDIS_URL
    ? new Redis(env.REDIS_URL, { maxRetriesPerRequest: 5, enableAutoPipelining: true, lazyConnect: true })
    : null;

  try {
    const orchestrator = new PipelineOrchestrator({
      runner: new StageRunner({ defaultTimeoutMs: settings.stageTimeoutMs }),
      events: redis ? new RedisRunEventPublisher(redis) : null,
    });
    const execute = () => orchestrator.run(pipeline, context);
    const outcome = redis
      ? await runExclusive(new RedisDeploymentLock(redis), settings.stagingName, env.DEPLOY_LOCK_TTL_SECONDS, execute)
      : await execute();

    console.log(formatRunSummary(outcome));

    if (env.PUSHGATEWAY_URL) {
      await pushMetrics(env.PUSHGATEWAY_URL, document.name, { project: env.PROJECT_NAME }).catch((error: unknown) => {
        logger.warn({ error }, 'Failed to push pipeline metrics');
      });
    }

    return outcome.exitCode;
  } finally {
    redis?.disconnect();
  }
};

start()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error({ error }, 'Pipeline engine failed before the run completed');
    process.exitCode = 1;
  });
