import type { PipelineErrorCode, StageFailureKind } from '@telco-churn/shared';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  readonly stageFailureKind: StageFailureKind;

  constructor(code: PipelineErrorCode, message: string, stageFailureKind: StageFailureKind = 'WorkFailed') {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.stageFailureKind = stageFailureKind;
  }
}

export class CredentialNotFoundError extends PipelineError {
  constructor(readonly credentialName: string) {
    super('CredentialNotFound', `Credential "${credentialName}" is not defined.`);
    this.name = 'CredentialNotFoundError';
  }
}

export class BuildFailedError extends PipelineError {
  constructor(message: string) {
    super('BuildFailed', message);
    this.name = 'BuildFailedError';
  }
}

export class PublishFailedError extends PipelineError {
  /** Tags that reached the registry before the failure. They are not rolled back. */
  readonly pushedTags: string[];

  constructor(message: string, pushedTags: string[] = []) {
    super('PublishFailed', message);
    this.name = 'PublishFailedError';
    this.pushedTags = pushedTags;
  }
}

export class DeployFailedError extends PipelineError {
  constructor(message: string, readonly containerName: string) {
    super('DeployFailed', message);
    this.name = 'DeployFailedError';
  }
}

export class HealthCheckTimeoutError extends PipelineError {
  constructor(message: string) {
    super('HealthCheckTimeout', message, 'Timeout');
    this.name = 'HealthCheckTimeoutError';
  }
}

export class NotificationDispatchFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NotificationDispatchFailed', message);
    this.name = 'NotificationDispatchFailedError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

const formatLimit = (ms: number): string => (ms < 1000 ? `${ms}ms` : `${Math.round(ms / 1000)}s`);

export class StageTimeoutError extends PipelineError {
  constructor(stageName: string, timeoutMs: number) {
    super('Timeout', `Stage "${stageName}" exceeded its ${formatLimit(timeoutMs)} timeout.`, 'Timeout');
    this.name = 'StageTimeoutError';
  }
}

export class RunCanceledError extends PipelineError {
  constructor(message = 'Pipeline run canceled.') {
    super('Aborted', message, 'Aborted');
    this.name = 'RunCanceledError';
  }
}

export class CommandFailedError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stdout: string,
    readonly stderr: string,
  ) {
    super(stderr.trim() || `Command exited with code ${exitCode ?? 'unknown'}`);
    this.name = 'CommandFailedError';
  }
}

export const toErrorMessage = (error: unknown, fallback = 'Unknown error'): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === 'string' && error.length > 0) {
    return error;
  }
  return fallback;
};
