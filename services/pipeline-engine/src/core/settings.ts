import { resolve } from 'path';

import type { PipelineSettings } from '../pipeline/stages.js';
import type { PipelineEnv } from './env.js';

export const settingsFromEnv = (config: PipelineEnv): PipelineSettings => ({
  workspaceDir: resolve(config.WORKSPACE_DIR),
  registry: config.DOCKER_REGISTRY,
  repository: config.DOCKER_IMAGE_NAME,
  registryCredentialsId: config.REGISTRY_CREDENTIALS_ID,
  appContainerPort: config.APP_CONTAINER_PORT,
  testContainerPort: config.TEST_CONTAINER_PORT,
  testContainerPrefix: `${config.STAGING_CONTAINER_NAME.replace(/-staging$/, '')}-test`,
  healthHost: config.STAGING_HOST,
  healthPath: config.HEALTHCHECK_PATH,
  healthBudgetMs: config.HEALTHCHECK_TIMEOUT_SECONDS * 1000,
  healthIntervalMs: config.HEALTHCHECK_INTERVAL_MS,
  stagingName: config.STAGING_CONTAINER_NAME,
  stagingPort: config.STAGING_PORT,
  stageTimeoutMs: config.STAGE_TIMEOUT_SECONDS * 1000,
  recipients: config.NOTIFY_RECIPIENTS,
});
