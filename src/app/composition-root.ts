import { randomUUID } from 'crypto';
import { FileAuditLogAdapter } from '../adapters/audit-log.file';
import { PresetConfirmationGate, ReadlineConfirmationGate } from '../adapters/confirmation.readline';
import { ClientCredentialsTokenProvider } from '../adapters/graph/client-credentials.token';
import { EDiscoverySearchAdapter } from '../adapters/graph/ediscovery-search.adapter';
import { GraphMailAdapter } from '../adapters/graph/graph-mail.adapter';
import { GraphClient, type HttpRequester } from '../adapters/graph/graph.client';
import type { PurgeConfig } from '../config/purge.config';
import type { AuditLogPort } from '../services/audit-log.port';
import { DeletionEngine, type DeletionEngineOptions, type MailBackend } from '../services/deletion-engine.service';
import type { AccessTokenProvider } from '../services/ports/access-token.port';
import { systemClock, type ClockPort } from '../services/ports/clock.port';
import type { ConfirmationGatePort } from '../services/ports/confirmation.port';
import { RetryService } from '../services/retry.service';
import { RunContext } from '../services/run-context';
import type { BackendKind } from '../types/purge.types';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface CompositionOverrides {
  clock?: ClockPort;
  http?: HttpRequester;
  tokens?: AccessTokenProvider;
  audit?: AuditLogPort;
  gate?: ConfirmationGatePort;
  runId?: string;
}

export interface CompositionInput {
  backend: BackendKind;
  // Pre-supplied token; when absent the gate asks on the terminal
  confirmToken?: string;
  engine: DeletionEngineOptions;
}

export interface PurgeRuntime {
  context: RunContext;
  backend: MailBackend;
  engine: DeletionEngine;
  audit: AuditLogPort;
}

/**
 * Validates that the selected backend can be wired from configuration.
 * Runs before anything touches the network or the audit directory.
 */
export function assertBackendConfigured(config: PurgeConfig, backend: BackendKind, hasTokenOverride: boolean = false): void {
  if (!config.credentials && !hasTokenOverride) {
    throw new ValidationError('Missing mail API credentials', [
      'Set MAIL_TENANT_ID, MAIL_CLIENT_ID and MAIL_CLIENT_SECRET (see .env.example)',
    ]);
  }
  if (backend === 'bulk-search' && !config.ediscoveryCaseId) {
    throw new ValidationError('The bulk-search backend needs an eDiscovery case', [
      'Set EDISCOVERY_CASE_ID to the id of the case that should host purge searches',
    ]);
  }
}

function createTokenProvider(config: PurgeConfig, clock: ClockPort, overrides: CompositionOverrides): AccessTokenProvider {
  if (overrides.tokens) return overrides.tokens;
  if (!config.credentials) {
    throw new ValidationError('Missing mail API credentials');
  }
  return new ClientCredentialsTokenProvider({
    credentials: config.credentials,
    authorityUrl: config.authorityUrl,
    clock,
    timeoutMs: config.requestTimeoutMs,
    http: overrides.http,
  });
}

/** Builds the backend selected for this run. Exactly one backend is constructed. */
export function createBackend(
  config: PurgeConfig,
  kind: BackendKind,
  graph: GraphClient,
  clock: ClockPort
): MailBackend {
  if (kind === 'remote-mail') return new GraphMailAdapter(graph);
  if (!config.ediscoveryCaseId) {
    throw new ValidationError('The bulk-search backend needs an eDiscovery case');
  }
  return new EDiscoverySearchAdapter({
    graph,
    caseId: config.ediscoveryCaseId,
    clock,
    pollIntervalMs: config.pollIntervalMs,
  });
}

export function createPurgeRuntime(
  config: PurgeConfig,
  input: CompositionInput,
  overrides: CompositionOverrides = {}
): PurgeRuntime {
  assertBackendConfigured(config, input.backend, overrides.tokens !== undefined);

  const clock = overrides.clock ?? systemClock;
  const runId = overrides.runId ?? randomUUID();
  const audit = overrides.audit ?? new FileAuditLogAdapter(config.auditLogDir, runId);
  const context = new RunContext(clock, audit, runId);

  const retry = new RetryService(clock, {
    maxAttempts: config.maxAttempts,
    backoffBaseSeconds: config.backoffBaseSeconds,
  });
  const graph = new GraphClient({
    baseUrl: config.graphBaseUrl,
    timeoutMs: config.requestTimeoutMs,
    tokens: createTokenProvider(config, clock, overrides),
    http: overrides.http,
    retry,
  });
  const backend = createBackend(config, input.backend, graph, clock);

  const gate =
    overrides.gate ??
    (input.confirmToken !== undefined ? new PresetConfirmationGate(input.confirmToken) : new ReadlineConfirmationGate());

  logger.info('purge.runtime_ready', {
    runId,
    backend: backend.kind,
    mode: input.engine.mode,
    presetConfirmation: input.confirmToken !== undefined,
  });

  return {
    context,
    backend,
    engine: new DeletionEngine(backend, gate, context, retry, input.engine),
    audit,
  };
}
