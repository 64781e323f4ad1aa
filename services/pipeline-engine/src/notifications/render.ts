import type { NotificationEvent } from '@telco-churn/shared';

import type { SecretRedactor } from '../credentials/redactor.js';

export interface RenderedNotification {
  subject: string;
  text: string;
  html: string;
}

const STATUS_LABEL = { success: 'SUCCESS', failure: 'FAILURE' } as const;

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');

const buildTextTemplate = (event: NotificationEvent): string => {
  const { payload } = event;
  const lines = [
    event.kind === 'success'
      ? `Pipeline run #${payload.runId} for "${payload.projectName}" succeeded.`
      : `Pipeline run #${payload.runId} for "${payload.projectName}" failed.`,
    '',
    `Project: ${payload.projectName}`,
    `Branch: ${payload.branch}`,
    `Revision: ${payload.revision}`,
    `Run: ${payload.runId}`,
    `Image: ${payload.image}`,
  ];

  if (event.kind === 'success') {
    lines.push(`Staging URL: ${payload.targetUrl}`);
  }

  if (event.kind === 'failure' && payload.failedStage) {
    lines.push(`Failed stage: ${payload.failedStage}`);
    if (payload.errorMessage) {
      lines.push(`Error: ${payload.errorMessage}`);
    }
  }

  lines.push(`Build: ${payload.buildUrl}`, `Finished: ${payload.timestamp}`, '', 'Stages:');
  for (const stage of payload.stages) {
    lines.push(`  ${stage.name}: ${stage.status}`);
  }

  return `${lines.join('\n')}\n`;
};

const buildHtmlTemplate = (event: NotificationEvent): string => {
  const { payload } = event;
  const e = escapeHtml;
  const stageRows = payload.stages
    .map((stage) => `    <li>${e(stage.name)}: <strong>${e(stage.status)}</strong></li>`)
    .join('\n');

  return `<p>Pipeline run #${e(payload.runId)} for <strong>${e(payload.projectName)}</strong> <strong>${STATUS_LABEL[event.kind]}</strong>.</p>
<ul>
  <li><strong>Branch:</strong> ${e(payload.branch)}</li>
  <li><strong>Revision:</strong> ${e(payload.revision)}</li>
  <li><strong>Image:</strong> ${e(payload.image)}</li>
  ${event.kind === 'success' ? `<li><strong>Staging URL:</strong> <a href="${e(payload.targetUrl)}">${e(payload.targetUrl)}</a></li>` : ''}
  ${event.kind === 'failure' && payload.failedStage ? `<li><strong>Failed stage:</strong> ${e(payload.failedStage)}</li>` : ''}
  ${event.kind === 'failure' && payload.errorMessage ? `<li><strong>Error:</strong> ${e(payload.errorMessage)}</li>` : ''}
  <li><strong>Finished:</strong> ${e(payload.timestamp)}</li>
</ul>
<p>Stages:</p>
<ul>
${stageRows}
</ul>
<p><a href="${e(payload.buildUrl)}">View build</a></p>`;
};

export const renderNotification = (event: NotificationEvent, redactor?: SecretRedactor): RenderedNotification => {
  const redact = (value: string) => (redactor ? redactor.redact(value) : value);
  const subject = `[${event.payload.projectName}] ${STATUS_LABEL[event.kind]}: pipeline run #${event.payload.runId} (${event.payload.branch})`;

  return {
    subject: redact(subject),
    text: redact(buildTextTemplate(event)),
    html: redact(buildHtmlTemplate(event)),
  };
};
