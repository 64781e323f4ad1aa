import { describe, expect, it } from 'vitest';

import { loadEnv } from '../src/core/env.js';
import { settingsFromEnv } from '../src/core/settings.js';

describe('loadEnv', () => {
  it('applies the defaults of a local run', () => {
    const config = loadEnv({});

    expect(config).toMatchObject({
      PROJECT_NAME: 'telco-churn-prediction',
      DOCKER_REGISTRY: 'docker.io',
      STAGING_CONTAINER_NAME: 'telco-churn-staging',
      STAGING_PORT: 5000,
      HEALTHCHECK_TIMEOUT_SECONDS: 30,
      HEALTHCHECK_INTERVAL_MS: 2000,
      SMTP_SECURE: false,
      NOTIFY_RECIPIENTS: [],
    });
    expect(config.BUILD_NUMBER).toBeUndefined();
  });

  it('parses recipients and treats port 465 as implicit TLS', () => {
    const config = loadEnv({
      SMTP_PORT: '465',
      NOTIFY_RECIPIENTS: 'ops@example.test, ml@example.test',
      HEALTHCHECK_EXPECT_BODY: 'false',
      BUILD_NUMBER: '  ',
    });

    expect(config.SMTP_SECURE).toBe(true);
    expect(config.NOTIFY_RECIPIENTS).toEqual(['ops@example.test', 'ml@example.test']);
    expect(config.HEALTHCHECK_EXPECT_BODY).toBe(false);
    expect(config.BUILD_NUMBER).toBeUndefined();
  });

  it('rejects an invalid recipient', () => {
    expect(() => loadEnv({ NOTIFY_RECIPIENTS: 'not-an-address' })).toThrow();
  });
});

describe('settingsFromEnv', () => {
  it('derives pipeline settings from the environment', () => {
    const settings = settingsFromEnv(loadEnv({ WORKSPACE_DIR: '/work', STAGE_TIMEOUT_SECONDS: '600' }));

    expect(settings).toMatchObject({
      workspaceDir: '/work',
      repository: 'telco-churn-prediction',
      testContainerPrefix: 'telco-churn-test',
      healthBudgetMs: 30_000,
      stageTimeoutMs: 600_000,
      stagingName: 'telco-churn-staging',
    });
  });
});
