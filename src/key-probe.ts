/**
 * Upstream key probe.
 *
 * Sends one tiny inference request per credential (listing models is not
 * enough: many backends serve the model list without checking the key)
 * and reports which keys work. Results feed the rotator's annotations and
 * the `/validate-keys` endpoint.
 *
 * @packageDocumentation
 */

import { MalformedResponseError, classifyError, type ErrorCategory } from './errors.js';
import { type Logger, silentLogger } from './logger.js';
import { maskSecret, type Credential, type CredentialModelRotator, type CredentialStatus } from './rotator.js';
import type { UpstreamClient } from './upstream-client.js';

export interface ProbeOptions {
  /** Model to run the test inference against. */
  model: string;
}

export interface ProbeResult {
  index: number;
  preview: string;
  valid: boolean;
  category?: ErrorCategory;
  message: string;
}

export interface ProbeSummary {
  status: 'completed' | 'failed';
  total: number;
  valid: number;
  invalid: number;
  /** e.g. `"66.7%"` */
  validRate: string;
  recommendations: string[];
}

async function probeOne(
  credential: Credential,
  client: UpstreamClient,
  model: string,
  secrets: readonly string[],
): Promise<ProbeResult> {
  const base = { index: credential.index, preview: maskSecret(credential.secret) };
  const handle = client.open();
  try {
    await client.createChatCompletion(
      {
        model,
        messages: [{ role: 'user', content: 'Hello' }],
        max_tokens: 5,
        temperature: 0.1,
        stream: false,
      },
      credential,
      handle,
    );
    return { ...base, valid: true, message: 'Key is valid and can perform inference' };
  } catch (err) {
    // the key got through authentication even if the reply was odd
    if (err instanceof MalformedResponseError) {
      return { ...base, valid: true, message: 'Key authenticated but the reply was malformed' };
    }
    const envelope = classifyError(err, { secrets });
    return { ...base, valid: false, category: envelope.category, message: envelope.message };
  } finally {
    handle.release();
  }
}

/**
 * Probe every credential concurrently. Never rejects: each failure becomes
 * an invalid result.
 */
export async function probeCredentials(
  credentials: readonly Credential[],
  client: UpstreamClient,
  options: ProbeOptions,
): Promise<ProbeResult[]> {
  const secrets = credentials.map((c) => c.secret);
  return Promise.all(credentials.map((c) => probeOne(c, client, options.model, secrets)));
}

export function summarizeProbe(results: readonly ProbeResult[]): ProbeSummary {
  const total = results.length;
  const valid = results.filter((r) => r.valid).length;
  const invalid = total - valid;
  const recommendations: string[] = [];
  let status: ProbeSummary['status'] = 'completed';

  if (invalid > 0) {
    recommendations.push(
      'Remove or replace the invalid keys in OPENAI_API_KEY',
      'Check whether the invalid keys were revoked or lack inference permission',
    );
  }
  if (total === 0) {
    recommendations.push('No API keys configured. Set OPENAI_API_KEY');
  } else if (valid === 0) {
    recommendations.push('No valid API keys found; upstream requests will fail');
    status = 'failed';
  }

  return {
    status,
    total,
    valid,
    invalid,
    validRate: `${(total === 0 ? 0 : (valid / total) * 100).toFixed(1)}%`,
    recommendations,
  };
}

export function toStatuses(results: readonly ProbeResult[]): Map<number, CredentialStatus> {
  return new Map(results.map((r): [number, CredentialStatus] => [r.index, r.valid ? 'valid' : 'invalid']));
}

/**
 * Probe the rotator's credentials and write the annotations back. With
 * `keepInvalid: false` invalid keys are dropped; startup only.
 *
 * @throws ConfigError when dropping would leave no credentials
 */
export async function validateRotatorKeys(
  rotator: CredentialModelRotator,
  client: UpstreamClient,
  options: ProbeOptions & { keepInvalid: boolean; logger?: Logger },
): Promise<ProbeResult[]> {
  const logger = options.logger ?? silentLogger;
  const results = await probeCredentials(rotator.snapshotCredentials(), client, { model: options.model });
  rotator.annotate(toStatuses(results));

  for (const r of results) {
    if (r.valid) {
      logger.debug(`Key #${r.index + 1} (${r.preview}) is valid`);
    } else {
      logger.warn(`Key #${r.index + 1} (${r.preview}) is invalid: ${r.message}`);
    }
  }
  const summary = summarizeProbe(results);
  logger.info(`Key validation: ${summary.valid}/${summary.total} valid (${summary.validRate})`);

  if (!options.keepInvalid && summary.invalid > 0) {
    const kept = rotator.retainCredentials((_credential, status) => status === 'valid');
    logger.info(`Dropped ${summary.total - kept} invalid key(s); ${kept} left in rotation`);
  }
  return results;
}
