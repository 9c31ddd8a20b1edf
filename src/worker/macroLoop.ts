import { setTimeout as sleep } from 'timers/promises';
import { formatScheduleTable, pickSeatClass, trainBrief, trainKey } from '../automation/trains.js';
import {
  CardInfo,
  Reservation,
  ReservationOutcome,
  ReservationRecord,
  SearchCriteria,
  SeatClass,
  Session,
  TrainCandidate,
} from '../automation/types.js';
import { PaymentOutcome } from '../services/paymentExecutor.js';
import {
  AuthFailedError,
  AuthTimeoutError,
  NetworkFaultError,
  RailApiError,
  SessionExpiredError,
  errorMessage,
  isAbortError,
} from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import { selectCandidates } from './candidateSelector.js';
import { Notifier } from './notificationService.js';
import { PendingOutcome, RunOutcome, hasReservation } from './outcome.js';

const logger = rootLogger.child('loop');

export interface RailService {
  searchSchedule(session: Session, criteria: SearchCriteria): Promise<TrainCandidate[]>;
  reserveSeat(session: Session, train: TrainCandidate, seatClass: SeatClass, passengers: number): Promise<ReservationOutcome>;
  listReservations(session: Session): Promise<ReservationRecord[]>;
}

export interface SessionProvider {
  ensureAuthenticated(signal?: AbortSignal): Promise<Session>;
  reauthenticate(signal?: AbortSignal): Promise<Session>;
  invalidate(): void;
  current(): Session | null;
}

export interface Payer {
  pay(session: Session, reservation: Reservation, card: CardInfo): Promise<PaymentOutcome>;
}

/** Lets the operator choose target trains once, from the first search result. */
export interface TrainPicker {
  pick(trains: readonly TrainCandidate[], signal?: AbortSignal): Promise<TrainCandidate[]>;
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface MacroLoopOptions {
  criteria: SearchCriteria;
  autoPay: boolean;
  notify: boolean;
  /** Search cycles allowed; 0 means unbounded. */
  maxAttempts: number;
  pollIntervalMs: number;
  maxConsecutiveErrors: number;
}

export interface MacroLoopDeps {
  rail: RailService;
  sessions: SessionProvider;
  payments: Payer;
  loadCard: () => Promise<CardInfo | null>;
  notifier: Notifier;
  picker?: TrainPicker;
  sleep?: Sleeper;
  onTransition?: (from: LoopState, to: LoopState) => void;
}

type Attempt = {
  candidate: TrainCandidate;
  seatClass: SeatClass;
  remaining: readonly TrainCandidate[];
};

export type LoopState =
  | { kind: 'INIT' }
  | { kind: 'SEARCHING' }
  | ({ kind: 'CANDIDATE_SELECTED' } & Attempt)
  | ({ kind: 'RESERVING'; session: Session } & Attempt)
  | { kind: 'VERIFYING'; candidate: TrainCandidate; seatClass: SeatClass }
  | { kind: 'REAUTH'; resume: ResumableState }
  | { kind: 'RESERVED'; reservation: Reservation }
  | { kind: 'PAYING'; reservation: Reservation }
  | { kind: 'NOTIFYING'; pending: PendingOutcome }
  | { kind: 'DONE'; outcome: RunOutcome }
  | { kind: 'FAILED'; outcome: RunOutcome }
  | { kind: 'CANCELLED'; outcome: RunOutcome };

/** States a REAUTH can return to. */
export type ResumableState = Extract<LoopState, { kind: 'INIT' } | { kind: 'SEARCHING' } | { kind: 'PAYING' }>;

export type TerminalState = Extract<LoopState, { kind: 'DONE' } | { kind: 'FAILED' } | { kind: 'CANCELLED' }>;

export function isTerminal(state: LoopState): state is TerminalState {
  return state.kind === 'DONE' || state.kind === 'FAILED' || state.kind === 'CANCELLED';
}

const defaultSleep: Sleeper = (ms, signal) => sleep(ms, undefined, { signal });

function sameDepartureTime(a: string, b: string): boolean {
  const left = a.replace(/\D/g, '').slice(0, 4);
  const right = b.replace(/\D/g, '').slice(0, 4);
  return left === '' || right === '' || left === right;
}

/**
 * Search → select → reserve → pay → notify, one backend round trip per
 * step. Each step maps one state to the next so transitions can be driven
 * and checked individually; run() just repeats step() until a terminal
 * state.
 */
export class MacroLoop {
  private readonly options: MacroLoopOptions;
  private readonly deps: MacroLoopDeps;
  private readonly sleep: Sleeper;

  private cycles = 0;
  private consecutiveErrors = 0;
  private targets: string[] | null = null;
  private confirmed: Reservation | null = null;
  private payReauthed = false;

  constructor(options: MacroLoopOptions, deps: MacroLoopDeps) {
    this.options = options;
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async run(signal?: AbortSignal): Promise<RunOutcome> {
    let state: LoopState = { kind: 'INIT' };

    while (!isTerminal(state)) {
      let next: LoopState;
      try {
        next = await this.step(state, signal);
      } catch (error) {
        if (!isAbortError(error) && !signal?.aborted) {
          throw error;
        }
        logger.warn('Run cancelled', { state: state.kind });
        next = {
          kind: 'CANCELLED',
          outcome: {
            status: 'cancelled',
            reservation: this.confirmed ?? undefined,
            notification: 'disabled',
            cycles: this.cycles,
          },
        };
      }

      this.deps.onTransition?.(state, next);
      state = next;
    }

    return state.outcome;
  }

  /**
   * Advance one state. Abort errors propagate; any other unexpected error
   * (a malformed backend response included) ends the run as failed.
   */
  async step(state: LoopState, signal?: AbortSignal): Promise<LoopState> {
    signal?.throwIfAborted();
    try {
      return await this.dispatch(state, signal);
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        throw error;
      }
      logger.error('Unrecoverable error', { state: state.kind, error: errorMessage(error) });
      if (state.kind === 'NOTIFYING') {
        return this.finish({ ...state.pending }, 'failed');
      }
      return this.fail(errorMessage(error));
    }
  }

  private dispatch(state: LoopState, signal?: AbortSignal): Promise<LoopState> {
    switch (state.kind) {
      case 'INIT':
        return this.init(signal);
      case 'SEARCHING':
        return this.search(signal);
      case 'CANDIDATE_SELECTED':
        return this.select(state);
      case 'RESERVING':
        return this.reserve(state, signal);
      case 'VERIFYING':
        return this.verify(state, signal);
      case 'REAUTH':
        return this.reauth(state, signal);
      case 'RESERVED':
        return this.reserved(state);
      case 'PAYING':
        return this.payState(state);
      case 'NOTIFYING':
        return this.notifyState(state);
      case 'DONE':
      case 'FAILED':
      case 'CANCELLED':
        return Promise.resolve(state);
    }
  }

  private async init(signal?: AbortSignal): Promise<LoopState> {
    let session: Session;
    try {
      session = await this.deps.sessions.ensureAuthenticated(signal);
    } catch (error) {
      if (error instanceof AuthTimeoutError || error instanceof AuthFailedError) {
        return this.notifying({ status: 'auth-failed', error: error.message });
      }
      throw error;
    }

    if (!this.deps.picker || this.targets) {
      return { kind: 'SEARCHING' };
    }

    let trains: TrainCandidate[];
    try {
      trains = await this.deps.rail.searchSchedule(session, this.options.criteria);
      this.consecutiveErrors = 0;
    } catch (error) {
      if (error instanceof SessionExpiredError) {
        this.deps.sessions.invalidate();
        return { kind: 'REAUTH', resume: { kind: 'INIT' } };
      }
      if (error instanceof NetworkFaultError || error instanceof RailApiError) {
        this.consecutiveErrors += 1;
        logger.warn('Initial search failed', { error: error.message, consecutive: this.consecutiveErrors });
        if (this.consecutiveErrors >= this.options.maxConsecutiveErrors) {
          return this.fail(`Too many consecutive search errors: ${error.message}`);
        }
        await this.sleep(this.options.pollIntervalMs * 2, signal);
        return { kind: 'INIT' };
      }
      throw error;
    }

    if (trains.length === 0) {
      // An empty schedule uses up a cycle of the attempt budget
      this.cycles += 1;
      if (this.options.maxAttempts > 0 && this.cycles >= this.options.maxAttempts) {
        return this.noSeats();
      }
      logger.info('Initial search returned no trains, searching again', { attempt: this.cycles });
      await this.sleep(this.options.pollIntervalMs, signal);
      return { kind: 'INIT' };
    }

    const picked = await this.deps.picker.pick(trains, signal);
    if (picked.length === 0) {
      return this.fail('No trains selected');
    }
    this.targets = picked.map(trainKey);
    logger.info('Target trains selected', { trains: picked.map(trainBrief) });
    return { kind: 'SEARCHING' };
  }

  private async search(signal?: AbortSignal): Promise<LoopState> {
    const { criteria, maxAttempts } = this.options;
    if (maxAttempts > 0 && this.cycles >= maxAttempts) {
      return this.noSeats();
    }

    const session = this.deps.sessions.current();
    if (!session?.isValid()) {
      return { kind: 'REAUTH', resume: { kind: 'SEARCHING' } };
    }

    this.cycles += 1;
    logger.info(`Attempt ${this.cycles}`, { route: `${criteria.departure}->${criteria.arrival}`, date: criteria.date });

    let trains: TrainCandidate[];
    try {
      trains = await this.deps.rail.searchSchedule(session, criteria);
      this.consecutiveErrors = 0;
    } catch (error) {
      if (error instanceof SessionExpiredError) {
        logger.warn('Session expired during search');
        this.deps.sessions.invalidate();
        return { kind: 'REAUTH', resume: { kind: 'SEARCHING' } };
      }
      if (error instanceof NetworkFaultError || error instanceof RailApiError) {
        this.consecutiveErrors += 1;
        logger.warn('Search error', { error: error.message, consecutive: this.consecutiveErrors });
        if (this.consecutiveErrors >= this.options.maxConsecutiveErrors) {
          return this.fail(`Too many consecutive search errors: ${error.message}`);
        }
        return this.endCycle(this.options.pollIntervalMs * 2, signal);
      }
      throw error;
    }

    if (trains.length > 0) {
      logger.debug(`\n${formatScheduleTable(trains)}`);
    }

    const { eligible, missingTargets } = selectCandidates(trains, criteria, this.targets);
    if (missingTargets > 0 && this.targets) {
      logger.info(`Selected trains not present now: ${missingTargets}/${this.targets.length}`);
    }

    const [first, ...remaining] = eligible;
    if (!first) {
      return this.endCycle(this.options.pollIntervalMs, signal);
    }
    return this.attempt(first, remaining);
  }

  private attempt(candidate: TrainCandidate, remaining: readonly TrainCandidate[]): LoopState {
    return {
      kind: 'CANDIDATE_SELECTED',
      candidate,
      seatClass: pickSeatClass(candidate, this.options.criteria.seat),
      remaining,
    };
  }

  private async select(state: Extract<LoopState, { kind: 'CANDIDATE_SELECTED' }>): Promise<LoopState> {
    const session = this.deps.sessions.current();
    if (!session?.isValid()) {
      return { kind: 'REAUTH', resume: { kind: 'SEARCHING' } };
    }
    logger.info(`Seat found: ${trainBrief(state.candidate)}. Reserving (${state.seatClass})...`);
    return { ...state, kind: 'RESERVING', session };
  }

  private async reserve(state: Extract<LoopState, { kind: 'RESERVING' }>, signal?: AbortSignal): Promise<LoopState> {
    if (this.confirmed) {
      throw new Error(`Reservation ${this.confirmed.reservationId} already confirmed`);
    }

    const { candidate, seatClass, remaining, session } = state;
    let outcome: ReservationOutcome;
    try {
      outcome = await this.deps.rail.reserveSeat(session, candidate, seatClass, this.options.criteria.passengers);
    } catch (error) {
      if (error instanceof NetworkFaultError) {
        // The request may have succeeded server-side; never repeat it blind
        logger.warn('Reservation outcome unknown, checking existing reservations', { error: error.message });
        return { kind: 'VERIFYING', candidate, seatClass };
      }
      throw error;
    }

    switch (outcome.kind) {
      case 'confirmed':
        return { kind: 'RESERVED', reservation: outcome.reservation };

      case 'session-expired':
        logger.warn('Session expired during reserve');
        this.deps.sessions.invalidate();
        return { kind: 'REAUTH', resume: { kind: 'SEARCHING' } };

      case 'rejected':
        if (!outcome.retryable) {
          return this.fail(`Reservation rejected: ${outcome.message} (${outcome.code})`);
        }
        logger.info(`Reserve failed: ${outcome.message}`, { code: outcome.code, trainNo: candidate.trainNo });
        break;

      case 'seat-unavailable':
        logger.info('Seat taken before reservation', { trainNo: candidate.trainNo, code: outcome.code });
        break;
    }

    const [next, ...rest] = remaining;
    if (next) {
      return this.attempt(next, rest);
    }
    return this.endCycle(this.options.pollIntervalMs, signal);
  }

  private async verify(state: Extract<LoopState, { kind: 'VERIFYING' }>, signal?: AbortSignal): Promise<LoopState> {
    const session = this.deps.sessions.current();
    if (!session?.isValid()) {
      return { kind: 'REAUTH', resume: { kind: 'SEARCHING' } };
    }

    const { candidate, seatClass } = state;
    let records: ReservationRecord[];
    try {
      records = await this.deps.rail.listReservations(session);
    } catch (error) {
      if (error instanceof SessionExpiredError) {
        this.deps.sessions.invalidate();
        return { kind: 'REAUTH', resume: { kind: 'SEARCHING' } };
      }
      if (error instanceof NetworkFaultError || error instanceof RailApiError) {
        logger.warn('Could not check reservations, searching again', { error: error.message });
        return this.endCycle(this.options.pollIntervalMs, signal);
      }
      throw error;
    }

    const match = records.find(
      (record) =>
        record.reservationId !== '' &&
        record.trainNo === candidate.trainNo &&
        record.depDate === candidate.depDate &&
        sameDepartureTime(record.depTime, candidate.depTime)
    );
    if (!match) {
      logger.info('No reservation was made, searching again', { trainNo: candidate.trainNo });
      return this.endCycle(this.options.pollIntervalMs, signal);
    }

    logger.info('Reservation found after network fault', { reservationId: match.reservationId });
    return {
      kind: 'RESERVED',
      reservation: {
        reservationId: match.reservationId,
        trainNo: candidate.trainNo,
        trainType: candidate.trainType,
        departure: candidate.departure,
        arrival: candidate.arrival,
        depDate: candidate.depDate,
        depTime: candidate.depTime,
        seatClass,
        fare: match.amount || candidate.price || undefined,
        raw: match.raw,
      },
    };
  }

  private async reauth(state: Extract<LoopState, { kind: 'REAUTH' }>, signal?: AbortSignal): Promise<LoopState> {
    logger.info('Re-authenticating', { resume: state.resume.kind });
    try {
      await this.deps.sessions.reauthenticate(signal);
    } catch (error) {
      if (!(error instanceof AuthTimeoutError) && !(error instanceof AuthFailedError)) {
        throw error;
      }
      if (state.resume.kind === 'PAYING') {
        return this.notifying({
          status: 'reserved-unpaid',
          reservation: state.resume.reservation,
          payment: { status: 'failed', reason: `Login failed before payment: ${error.message}` },
        });
      }
      return this.notifying({ status: 'auth-failed', error: error.message });
    }
    return state.resume;
  }

  private async reserved(state: Extract<LoopState, { kind: 'RESERVED' }>): Promise<LoopState> {
    const { reservation } = state;
    this.confirmed = reservation;
    logger.info('Reservation successful', {
      reservationId: reservation.reservationId,
      train: `${reservation.trainType} ${reservation.trainNo}`.trim(),
      paymentDeadline: reservation.paymentDeadline,
    });

    if (!this.options.autoPay) {
      return this.notifying({ status: 'reserved', reservation });
    }
    return { kind: 'PAYING', reservation };
  }

  private async payState(state: Extract<LoopState, { kind: 'PAYING' }>): Promise<LoopState> {
    const { reservation } = state;
    const session = this.deps.sessions.current();
    if (!session?.isValid()) {
      return { kind: 'REAUTH', resume: state };
    }

    const card = await this.deps.loadCard();
    if (!card) {
      logger.warn('Auto-pay skipped: card not configured');
      return this.notifying({
        status: 'reserved-unpaid',
        reservation,
        payment: { status: 'skipped', reason: 'card not configured' },
      });
    }

    let payment: PaymentOutcome;
    try {
      payment = await this.deps.payments.pay(session, reservation, card);
    } catch (error) {
      if (!(error instanceof SessionExpiredError)) throw error;
      if (!this.payReauthed) {
        this.payReauthed = true;
        logger.warn('Session expired before payment was sent, logging in again', { error: error.message });
        this.deps.sessions.invalidate();
        return { kind: 'REAUTH', resume: state };
      }
      payment = { status: 'failed', reason: error.message };
    }
    return this.notifying({
      status: payment.status === 'paid' ? 'reserved-and-paid' : 'reserved-unpaid',
      reservation,
      payment,
    });
  }

  private async notifyState(state: Extract<LoopState, { kind: 'NOTIFYING' }>): Promise<LoopState> {
    if (!this.options.notify) {
      return this.finish(state.pending, 'disabled');
    }
    const status = await this.deps.notifier.notify(state.pending);
    return this.finish(state.pending, status);
  }

  /**
   * Close out a cycle that produced no reservation: stop if the budget is
   * spent, otherwise sleep and search again.
   */
  private async endCycle(delayMs: number, signal?: AbortSignal): Promise<LoopState> {
    if (this.options.maxAttempts > 0 && this.cycles >= this.options.maxAttempts) {
      return this.noSeats();
    }
    await this.sleep(delayMs, signal);
    return { kind: 'SEARCHING' };
  }

  private noSeats(): LoopState {
    return this.notifying({
      status: 'no-seats',
      error: `No seats found within ${this.options.maxAttempts} attempts`,
    });
  }

  private fail(error: string): LoopState {
    return this.notifying({ status: 'failed', error });
  }

  private notifying(pending: PendingOutcome): LoopState {
    return { kind: 'NOTIFYING', pending };
  }

  private finish(pending: PendingOutcome, notification: RunOutcome['notification']): TerminalState {
    const outcome: RunOutcome = { ...pending, notification, cycles: this.cycles };
    return hasReservation(outcome.status) ? { kind: 'DONE', outcome } : { kind: 'FAILED', outcome };
  }
}
