import type { DeploymentTarget, ImageReference, RunWarning, StageOutcome } from '@telco-churn/shared';

import type { Credential, CredentialStore } from '../credentials/credential-store.js';
import { SecretRedactor } from '../credentials/redactor.js';

export interface BuildMetadata {
  projectName: string;
  /** Unique per run; doubles as the image's run-specific tag. */
  runId: string;
  branch: string;
  revision: string;
  buildUrl: string | null;
}

export interface RunArtifacts {
  image?: ImageReference;
  deployment?: DeploymentTarget;
  testInstanceName?: string;
}

export interface RunContextInit {
  projectName: string;
  runId?: string;
  branch?: string;
  revision?: string;
  buildUrl?: string | null;
  env?: Record<string, string>;
  credentials: CredentialStore;
  signal?: AbortSignal;
  now?: () => number;
}

/**
 * Mutable state of one pipeline run. Owned by a single orchestrator run and
 * never shared, so nothing here is locked.
 */
export class RunContext {
  readonly metadata: Readonly<BuildMetadata>;

  readonly env: Readonly<Record<string, string>>;

  readonly redactor = new SecretRedactor();

  readonly artifacts: RunArtifacts = {};

  readonly signal: AbortSignal;

  private readonly outcomeLog: StageOutcome[] = [];

  private readonly warningLog: RunWarning[] = [];

  private readonly resolved = new Map<string, Credential>();

  private readonly credentials: CredentialStore;

  constructor(init: RunContextInit) {
    const now = init.now ?? Date.now;
    this.metadata = Object.freeze({
      projectName: init.projectName,
      runId: init.runId ?? `local-${now()}`,
      branch: init.branch ?? 'local',
      revision: init.revision ?? 'unknown',
      buildUrl: init.buildUrl ?? null,
    });
    this.env = Object.freeze({ ...(init.env ?? {}) });
    this.credentials = init.credentials;
    this.signal = init.signal ?? new AbortController().signal;
  }

  get outcomes(): readonly StageOutcome[] {
    return this.outcomeLog;
  }

  get warnings(): readonly RunWarning[] {
    return this.warningLog;
  }

  recordOutcome(outcome: StageOutcome): void {
    this.outcomeLog.push(outcome);
  }

  recordWarning(warning: RunWarning): void {
    this.warningLog.push({ ...warning, message: this.redactor.redact(warning.message) });
  }

  /**
   * Resolves a credential for the duration of this run. Every secret field is
   * registered with the redactor before the caller sees it.
   */
  async resolveCredential(name: string): Promise<Credential> {
    const cached = this.resolved.get(name);
    if (cached) {
      return cached;
    }

    const credential = await this.credentials.resolve(name);
    this.redactor.registerAll(Object.values(credential.secrets));
    this.resolved.set(name, credential);
    return credential;
  }
}
