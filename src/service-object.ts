import type { Logger } from 'pino';
import logger from './logger';
import { AbstractServiceObjectError, InvalidErrorTypeError } from './errors';
import { assertErrorRecord, describeType, isErrorRecordShape } from './error-record';
import type { ServiceErrorRecord } from './error-record';

/**
 * Base class for a single unit of business logic.
 *
 * Subclasses take their inputs in the constructor and implement
 * `performOperation()`. Failures are recorded with `addError()` rather than
 * thrown; callers check `success` and read `result` or `errors`.
 *
 * The operation runs at most once per instance, on whichever comes first:
 * an explicit `call()` or the first read of `result`.
 *
 * @example
 * class CreateUser extends ServiceObject<User | null> {
 *   constructor(private readonly params: UserParams) {
 *     super();
 *   }
 *
 *   protected performOperation(): User | null {
 *     if (!this.params.email) {
 *       this.addError({ message: 'Email is required', kind: 'validation' });
 *       return null;
 *     }
 *     return users.create(this.params);
 *   }
 * }
 *
 * const service = new CreateUser(params);
 * service.call();
 *
 * if (service.success) {
 *   render(service.result);
 * } else {
 *   report(service.errors);
 * }
 */
export abstract class ServiceObject<TResult = unknown> {
  /**
   * Raw error list. Entries pushed here directly skip the append-time check
   * of `addError()` and are only validated when `errors` is read.
   */
  protected readonly errorEntries: unknown[] = [];

  protected readonly logger: Logger;

  // Set once the operation has completed, so an `undefined` result is still cached.
  private outcome: { value: TResult } | undefined;

  constructor() {
    if (new.target === ServiceObject) {
      throw new AbstractServiceObjectError();
    }

    this.logger = logger.child({ service: new.target.name });
  }

  /**
   * The business logic. Runs at most once per instance, through `call()`.
   */
  protected abstract performOperation(): TResult;

  /**
   * Run the operation if it has not run yet, and return its result.
   * Later calls return the cached value without running it again.
   *
   * An exception thrown by the operation propagates unchanged and nothing is
   * cached, so the next call runs it again.
   */
  call(): TResult {
    if (this.outcome) {
      return this.outcome.value;
    }

    let value: TResult;
    try {
      value = this.performOperation();
    } catch (err) {
      this.logger.error({ err }, 'Service object operation threw');
      throw err;
    }

    this.outcome = { value };
    this.logger.debug(
      { success: this.errorEntries.length === 0, errorCount: this.errorEntries.length },
      'Service object executed'
    );

    return value;
  }

  /**
   * Result of the operation, running it first if needed.
   */
  get result(): TResult {
    return this.outcome ? this.outcome.value : this.call();
  }

  get hasRun(): boolean {
    return this.outcome !== undefined;
  }

  /**
   * True when no errors have been recorded.
   *
   * Does not run the operation: read it after `call()` or `result`,
   * otherwise it only says that nothing has failed yet.
   */
  get success(): boolean {
    return this.errors.length === 0;
  }

  /**
   * Recorded errors, in the order they were added, as a frozen snapshot.
   * Record new failures with `addError()`.
   *
   * Every entry is checked on every read; the first one that is not a plain
   * object raises InvalidErrorTypeError.
   */
  get errors(): readonly Record<string, unknown>[] {
    return Object.freeze(
      this.errorEntries.map((entry) => {
        if (!isErrorRecordShape(entry)) {
          throw new InvalidErrorTypeError(entry, describeType(entry));
        }
        return entry;
      })
    );
  }

  /**
   * Messages of the recorded errors. Entries without a string `message` are skipped.
   */
  get errorMessages(): string[] {
    return this.errors.flatMap((error) => {
      const { message } = error;
      return typeof message === 'string' ? [message] : [];
    });
  }

  /**
   * Record a failure. The record is validated before it is appended.
   */
  protected addError(error: ServiceErrorRecord): void {
    assertErrorRecord(error);
    this.errorEntries.push(error);
  }

  /**
   * Record several failures. Nothing is appended unless every record is valid.
   */
  protected addErrors(...errors: ServiceErrorRecord[]): void {
    for (const error of errors) {
      assertErrorRecord(error);
    }
    this.errorEntries.push(...errors);
  }
}
