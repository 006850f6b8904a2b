/**
 * Hearthside - Error Types
 *
 * Only caller mistakes throw. Invalid targets, missing relationship pairs,
 * collaborator failures and out-of-window exit requests are reported through
 * return values and scene events instead.
 */

export class UnknownAgentError extends Error {
  name = 'UnknownAgentError';

  constructor(readonly agentId: string, context?: string) {
    super(context ? `Unknown agent "${agentId}" (${context})` : `Unknown agent "${agentId}"`);
  }
}

export class SceneStateError extends Error {
  name = 'SceneStateError';
}

export class SnapshotSchemaError extends Error {
  name = 'SnapshotSchemaError';

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class ConfigError extends Error {
  name = 'ConfigError';
}

/**
 * A collaborator call exceeded its time budget. Caught by the orchestrator
 * and turned into a skip; never escapes a beat.
 */
export class CollaboratorTimeoutError extends Error {
  name = 'CollaboratorTimeoutError';

  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}
