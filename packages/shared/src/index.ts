export type StageStatus = 'succeeded' | 'failed' | 'skipped';

export type StageFailureKind = 'WorkFailed' | 'Timeout' | 'Aborted';

export type PipelineErrorCode =
  | 'WorkFailed'
  | 'Timeout'
  | 'Aborted'
  | 'CredentialNotFound'
  | 'BuildFailed'
  | 'PublishFailed'
  | 'DeployFailed'
  | 'HealthCheckTimeout'
  | 'NotificationDispatchFailed';

export type RunStatus = 'success' | 'failure';

export type HookName = 'success' | 'failure' | 'always';

export interface ImageReference {
  registry: string;
  repository: string;
  /** First entry is the run-specific tag; floating tags such as `latest` follow. */
  tags: string[];
  imageId: string;
}

export interface DeploymentTarget {
  name: string;
  hostPort: number;
  containerPort: number;
  imageTag: string;
  containerId: string;
  url: string;
}

export interface StageOutcome {
  name: string;
  status: StageStatus;
  failureKind?: StageFailureKind;
  errorCode?: PipelineErrorCode;
  message?: string;
  exitCode?: number;
  durationMs: number;
  startedAt?: string;
  finishedAt?: string;
  /** Redacted tail of the captured output. */
  output: string[];
}

export interface RunWarning {
  code: 'NotificationDispatchFailed' | 'HookFailed' | 'EventPublishFailed';
  hook?: HookName;
  message: string;
}

export interface RunOutcome {
  runId: string;
  pipeline: string;
  status: RunStatus;
  exitCode: 0 | 1;
  stages: StageOutcome[];
  hooks: HookName[];
  warnings: RunWarning[];
  cancelled: boolean;
  durationMs: number;
  startedAt: string;
  finishedAt: string;
}

export type NotificationKind = 'success' | 'failure';

export interface NotificationPayload {
  projectName: string;
  branch: string;
  revision: string;
  runId: string;
  /** Repository and run tag, e.g. `telco-churn-prediction:42`. */
  image: string;
  targetUrl: string;
  buildUrl: string;
  timestamp: string;
  stages: Array<{ name: string; status: StageStatus }>;
  failedStage?: string;
  errorMessage?: string;
}

export interface NotificationEvent {
  kind: NotificationKind;
  payload: NotificationPayload;
  recipients: string[];
}
