export type UpdatePhase = 'crawl' | 'import' | 'write';

export class UpdateError extends Error {
  readonly phase: UpdatePhase;

  constructor(phase: UpdatePhase, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Update failed at ${phase}: ${message}`);
    this.name = 'UpdateError';
    this.phase = phase;
    this.cause = cause;
  }
}
