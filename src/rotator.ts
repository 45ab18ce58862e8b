/**
 * Credential / model rotation.
 *
 * Prioritized polling: credentials are the inner loop and models the outer
 * loop, so every credential serves a model once before the model advances.
 * With K credentials and M models the i-th selection is
 * `(credentials[i % K], models[floor(i / K) % M])`.
 *
 * Each selection is a single synchronous read-advance-wrap; on the event
 * loop no other selection can run in between, so a (key, model) pair is
 * never torn and no slot is skipped or repeated.
 *
 * @packageDocumentation
 */

import { ConfigError } from './errors.js';

export type CredentialStatus = 'valid' | 'invalid' | 'unknown';

export interface Credential {
  /** Ordinal position in the configured list. */
  readonly index: number;
  readonly secret: string;
}

export interface CredentialView {
  readonly index: number;
  /** Masked form, safe to log or return to callers. */
  readonly preview: string;
  readonly status: CredentialStatus;
}

export interface Selection {
  credential: Credential;
  model: string;
}

/**
 * Mask a secret down to a short prefix and suffix.
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) return '*'.repeat(secret.length);
  return `${secret.slice(0, 4)}...${secret.slice(-2)}`;
}

export class CredentialModelRotator {
  private credentials: readonly Credential[];
  private readonly models: readonly string[];
  private annotations: ReadonlyMap<number, CredentialStatus> = new Map();

  // cursor
  private keyIdx = 0;
  private modelIdx = 0;
  // independent cursor for nextModel()
  private roundRobinIdx = 0;

  constructor(secrets: readonly string[], models: readonly string[]) {
    if (secrets.length === 0) {
      throw new ConfigError('At least one upstream API key is required');
    }
    if (models.length === 0) {
      throw new ConfigError('At least one target model is required');
    }
    this.credentials = Object.freeze(secrets.map((secret, index) => Object.freeze({ index, secret })));
    this.models = Object.freeze([...models]);
  }

  get credentialCount(): number {
    return this.credentials.length;
  }

  get modelCount(): number {
    return this.models.length;
  }

  /**
   * Return the current (credential, model) pair and advance the cursor.
   */
  select(): Selection {
    const credential = this.credentials[this.keyIdx];
    const model = this.models[this.modelIdx];
    if (credential === undefined || model === undefined) {
      throw new Error(`Rotation cursor out of range (${this.keyIdx}, ${this.modelIdx})`);
    }

    this.keyIdx += 1;
    if (this.keyIdx >= this.credentials.length) {
      this.keyIdx = 0;
      this.modelIdx = (this.modelIdx + 1) % this.models.length;
    }
    return { credential, model };
  }

  /**
   * Plain round-robin over the model list, independent of `select()`.
   * For callers that need only a model choice.
   */
  nextModel(): string {
    const model = this.models[this.roundRobinIdx % this.models.length] ?? '';
    this.roundRobinIdx = (this.roundRobinIdx + 1) % this.models.length;
    return model;
  }

  /** Read-only snapshot of the credential list with annotations. */
  listCredentials(): CredentialView[] {
    return this.credentials.map((c) => ({
      index: c.index,
      preview: maskSecret(c.secret),
      status: this.annotations.get(c.index) ?? 'unknown',
    }));
  }

  /** Credentials themselves, for the probe and for redaction. */
  snapshotCredentials(): readonly Credential[] {
    return this.credentials;
  }

  /** Secrets in configured order; used to redact caller-visible messages. */
  secrets(): string[] {
    return this.credentials.map((c) => c.secret);
  }

  listModels(): readonly string[] {
    return this.models;
  }

  /**
   * Replace the validity annotations in one step. Annotations never
   * affect rotation.
   */
  annotate(statuses: ReadonlyMap<number, CredentialStatus>): void {
    const next = new Map(this.annotations);
    for (const [index, status] of statuses) {
      if (index >= 0 && index < this.credentials.length) next.set(index, status);
    }
    this.annotations = next;
  }

  statusOf(index: number): CredentialStatus {
    return this.annotations.get(index) ?? 'unknown';
  }

  /**
   * Keep only credentials matching `predicate`, renumbering them and
   * resetting the cursor. Startup only: call before serving traffic.
   */
  retainCredentials(predicate: (credential: Credential, status: CredentialStatus) => boolean): number {
    const kept = this.credentials.filter((c) => predicate(c, this.statusOf(c.index)));
    if (kept.length === 0) {
      throw new ConfigError('No upstream API keys left after filtering');
    }
    const nextAnnotations = new Map<number, CredentialStatus>();
    this.credentials = Object.freeze(
      kept.map((c, index) => {
        nextAnnotations.set(index, this.statusOf(c.index));
        return Object.freeze({ index, secret: c.secret });
      }),
    );
    this.annotations = nextAnnotations;
    this.keyIdx = 0;
    this.modelIdx = 0;
    return kept.length;
  }
}
