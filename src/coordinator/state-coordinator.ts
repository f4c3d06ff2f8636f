import { Logger } from '@nestjs/common';
import type {
  StateCoordinatorOptions,
  StateCoordinatorStrategies,
  StateFieldContext,
  WriteOutcome,
} from '../interfaces/state-coordinator.interface';
import type {
  IPersistableRecord,
  IStateRecord,
} from '../interfaces/state-record.interface';
import { DEFAULT_FAULT_POLICY } from '../state-persistence.constants';
import { isBlank } from '../utils/is-blank';
import { DEFAULT_STRATEGIES } from './default-strategies';

/**
 * Mediates every read and write of a record's state field.
 *
 * Holds no per-record state: the record is handed in on each call and the
 * field is re-read every time, so reloads are always observed.
 *
 * @example
 * ```typescript
 * const coordinator = new StateCoordinator({
 *   stateField: 'status',
 *   store,
 *   initialState: () => 'pending',
 * });
 *
 * coordinator.ensureInitialState(doc); // status: 'pending'
 * const outcome = await coordinator.writeState(doc, 'opened');
 * if (outcome.status === 'rolled_back') {
 *   // doc.get('status') is back to 'pending'
 * }
 * ```
 */
export class StateCoordinator {
  private readonly logger = new Logger(StateCoordinator.name);
  private readonly strategies: StateCoordinatorStrategies;
  private readonly context: StateFieldContext;

  constructor(private readonly options: StateCoordinatorOptions) {
    this.strategies = { ...DEFAULT_STRATEGIES, ...options.strategies };
    this.context = {
      stateField: options.stateField,
      store: options.store,
      faultPolicy: options.faultPolicy ?? DEFAULT_FAULT_POLICY,
    };
  }

  get stateField(): string {
    return this.context.stateField;
  }

  readState(record: IStateRecord): string | undefined {
    return this.strategies.readState(record, this.context);
  }

  /**
   * Populates a blank state field with the initial state. Call before every
   * validation attempt; a non-blank value is never touched.
   */
  ensureInitialState(record: IStateRecord): void {
    const populated = this.strategies.ensureInitialState(
      record,
      this.options.initialState,
      this.context,
    );
    if (!populated) return;

    const written = record.get(this.stateField);
    const state = written === null || written === undefined ? '' : String(written);
    if (isBlank(state)) {
      this.logger.warn(
        `Initial state supplier returned a blank value for field "${this.stateField}"`,
      );
    }
    this.options.listener?.initialized?.(record, state);
  }

  async writeState(
    record: IPersistableRecord,
    targetState: string,
  ): Promise<WriteOutcome> {
    const fromValue = record.get(this.stateField);

    let outcome: WriteOutcome;
    try {
      outcome = await this.strategies.writeState(
        record,
        targetState,
        this.context,
      );
    } catch (error) {
      this.logger.error(
        `Store fault while writing ${record.collection}/${record.id} -> ${targetState} (faultPolicy=${this.context.faultPolicy})`,
        error instanceof Error ? error.stack : error,
      );
      throw error;
    }

    if (outcome.status === 'committed') {
      this.options.listener?.committed?.(record, fromValue, outcome.state);
    } else {
      this.logger.warn(
        `Rolled back ${record.collection}/${record.id}: store refused state "${outcome.attemptedState}"`,
      );
      this.options.listener?.rolledBack?.(record, outcome);
    }

    return outcome;
  }

  writeStateWithoutPersistence(record: IStateRecord, targetState: string): void {
    const fromValue = record.get(this.stateField);
    this.strategies.writeStateWithoutPersistence(
      record,
      targetState,
      this.context,
    );
    this.options.listener?.deferred?.(record, fromValue, String(targetState));
  }
}
