/**
 * Worker-specific error class
 * @module @herald/shared/errors/worker-error
 */

import { HeraldError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Raised when a worker cannot be built, initialized or kept running
 */
export class WorkerError extends HeraldError {
  /** Generation of the snapshot the worker was bound to */
  public readonly generation?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.WORKER_CONSTRUCTION_FAILED,
    meta: ErrorMeta = {},
    generation?: number,
    cause?: Error,
  ) {
    super(message, code, { ...meta, resourceType: 'worker', generation }, cause);
    this.name = 'WorkerError';
    this.generation = generation;
  }

  /**
   * Create for a factory that threw
   */
  static constructionFailed(generation: number, cause: Error): WorkerError {
    return new WorkerError(
      `Failed to construct worker for generation ${generation}: ${cause.message}`,
      ErrorCode.WORKER_CONSTRUCTION_FAILED,
      {},
      generation,
      cause,
    );
  }

  /**
   * Create for an initialize() that rejected
   */
  static initFailed(generation: number, cause: Error): WorkerError {
    return new WorkerError(
      `Failed to initialize worker for generation ${generation}: ${cause.message}`,
      ErrorCode.WORKER_INIT_FAILED,
      {},
      generation,
      cause,
    );
  }

  /**
   * Create for a snapshot older than the running worker's
   */
  static staleSnapshot(generation: number, current: number): WorkerError {
    return new WorkerError(
      `Snapshot generation ${generation} is not newer than running generation ${current}`,
      ErrorCode.STALE_SNAPSHOT,
      { current },
      generation,
    );
  }
}
