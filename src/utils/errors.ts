export const EXIT_CODES = {
  configuration: 1,
  issueNotFound: 2,
  sprintNotFound: 4,
  unexpectedState: 5,
  trackerWrite: 10,
  unexpected: 70,
} as const;

export abstract class ChoreError extends Error {
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends ChoreError {
  readonly exitCode = EXIT_CODES.configuration;

  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
  }
}

export type MissingEntity = 'issue' | 'epic' | 'sprint';

export class NotFoundError extends ChoreError {
  readonly exitCode: number;

  constructor(
    readonly entity: MissingEntity,
    readonly reference: string,
    hint?: string
  ) {
    const label = entity.charAt(0).toUpperCase() + entity.slice(1);
    super(`${label} ${reference} not found.${hint ? ` ${hint}` : ''}`);
    this.exitCode = entity === 'sprint' ? EXIT_CODES.sprintNotFound : EXIT_CODES.issueNotFound;
  }
}

export class UnexpectedStateError extends ChoreError {
  readonly exitCode = EXIT_CODES.unexpectedState;
}

export class TrackerWriteError extends ChoreError {
  readonly exitCode = EXIT_CODES.trackerWrite;

  constructor(
    readonly operation: string,
    readonly issueKey: string,
    cause: unknown
  ) {
    super(`Failed to ${operation} ${issueKey}: ${errorMessage(cause)}`, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function httpStatusOf(error: unknown): number | null {
  if (!error || typeof error !== 'object') return null;

  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  if ('response' in error) {
    const response = error.response;
    if (response && typeof response === 'object' && 'status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  return null;
}

/** Runs a tracker write and reports any failure as a TrackerWriteError. */
export async function guardWrite<T>(operation: string, issueKey: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ChoreError) throw error;
    throw new TrackerWriteError(operation, issueKey, error);
  }
}

export function exitCodeFor(error: unknown): number {
  return error instanceof ChoreError ? error.exitCode : EXIT_CODES.unexpected;
}
