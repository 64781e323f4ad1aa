import type { NotificationEvent, NotificationKind, StageOutcome } from '@telco-churn/shared';

import { primaryReference } from '../images/image-reference.js';
import type { RunContext } from '../pipeline/run-context.js';

export interface PayloadDefaults {
  /** Reference the run would have produced, used when no image was built. */
  plannedImage: string;
  /** URL the deployment would have served, used when nothing was deployed. */
  plannedTargetUrl: string;
}

const LOCAL_BUILD_URL = 'n/a (local run)';

/**
 * Assembles the notification for a finished run. Pure: reads the context and
 * performs no I/O, so payload contents are testable without a mail relay.
 */
export const buildNotificationEvent = (
  context: RunContext,
  kind: NotificationKind,
  stages: readonly StageOutcome[],
  recipients: string[],
  defaults: PayloadDefaults,
  now: Date = new Date(),
): NotificationEvent => {
  const { metadata, artifacts, redactor } = context;
  const failed = stages.find((stage) => stage.status === 'failed');

  return {
    kind,
    recipients: [...recipients],
    payload: {
      projectName: metadata.projectName,
      branch: metadata.branch,
      revision: metadata.revision,
      runId: metadata.runId,
      image: artifacts.image ? primaryReference(artifacts.image) : defaults.plannedImage,
      targetUrl: artifacts.deployment?.url ?? defaults.plannedTargetUrl,
      buildUrl: metadata.buildUrl ?? LOCAL_BUILD_URL,
      timestamp: now.toISOString(),
      stages: stages.map((stage) => ({ name: stage.name, status: stage.status })),
      ...(kind === 'failure' && failed
        ? {
            failedStage: failed.name,
            errorMessage: redactor.redact(failed.message ?? `${failed.name} failed`),
          }
        : {}),
    },
  };
};
