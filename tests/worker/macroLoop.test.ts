import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { CardInfo, ReservationOutcome, SearchCriteria, Session, TrainCandidate } from '../../src/automation/types.js';
import {
  AuthTimeoutError,
  BackendProtocolError,
  NetworkFaultError,
  SessionExpiredError,
} from '../../src/utils/errors.js';
import {
  LoopState,
  MacroLoop,
  MacroLoopDeps,
  MacroLoopOptions,
  Payer,
  RailService,
  SessionProvider,
  Sleeper,
} from '../../src/worker/macroLoop.js';
import { NotificationStatus, PendingOutcome, exitCodeFor } from '../../src/worker/outcome.js';
import { makeReservation, makeSession, makeTrain } from '../helpers/fixtures.js';

const criteria: SearchCriteria = {
  departure: '서울',
  arrival: '부산',
  date: '20261120',
  hour: '08',
  seat: 'general',
  passengers: 1,
};

const card: CardInfo = { number: '0000111122223333', password: '00', birthday: '900101', expiry: '3012' };

const trainA = makeTrain({ trainNo: '101' });
const trainB = makeTrain({ trainNo: '103', depTime: '090000' });
const trainC = makeTrain({ trainNo: '105', depTime: '100000' });

function confirmed(train: TrainCandidate, id = 'PNR-1'): ReservationOutcome {
  return { kind: 'confirmed', reservation: makeReservation(train, id) };
}

class FakeSessions implements SessionProvider {
  session = makeSession(1);
  ensureAuthenticated = vi.fn(async (_signal?: AbortSignal): Promise<Session> => this.session);
  reauthenticate = vi.fn(async (_signal?: AbortSignal): Promise<Session> => {
    this.session = makeSession(this.session.generation + 1);
    return this.session;
  });
  invalidate = vi.fn(() => this.session.revoke());
  current = (): Session | null => this.session;
}

describe('MacroLoop', () => {
  let rail: {
    searchSchedule: Mock<RailService['searchSchedule']>;
    reserveSeat: Mock<RailService['reserveSeat']>;
    listReservations: Mock<RailService['listReservations']>;
  };
  let sessions: FakeSessions;
  let pay: Mock<Payer['pay']>;
  let notify: Mock<(outcome: PendingOutcome) => Promise<NotificationStatus>>;
  let loadCard: Mock<() => Promise<CardInfo | null>>;
  let sleep: Mock<Sleeper>;

  function createLoop(options: Partial<MacroLoopOptions> = {}, extra: Partial<MacroLoopDeps> = {}): MacroLoop {
    return new MacroLoop(
      {
        criteria,
        autoPay: false,
        notify: false,
        maxAttempts: 0,
        pollIntervalMs: 1000,
        maxConsecutiveErrors: 3,
        ...options,
      },
      {
        rail,
        sessions,
        payments: { pay },
        loadCard,
        notifier: { notify },
        sleep,
        ...extra,
      }
    );
  }

  beforeEach(() => {
    rail = {
      searchSchedule: vi.fn<RailService['searchSchedule']>().mockResolvedValue([trainA]),
      reserveSeat: vi.fn<RailService['reserveSeat']>().mockImplementation(async (_s, train) => confirmed(train)),
      listReservations: vi.fn<RailService['listReservations']>().mockResolvedValue([]),
    };
    sessions = new FakeSessions();
    pay = vi.fn<Payer['pay']>();
    notify = vi.fn<(outcome: PendingOutcome) => Promise<NotificationStatus>>().mockResolvedValue('sent');
    loadCard = vi.fn<() => Promise<CardInfo | null>>().mockResolvedValue(card);
    sleep = vi.fn<Sleeper>().mockResolvedValue(undefined);
  });

  it('should reserve on the first cycle when a seat is available', async () => {
    const transitions: string[] = [];
    const loop = createLoop({}, { onTransition: (_from, to) => transitions.push(to.kind) });

    const outcome = await loop.run();

    expect(outcome).toEqual({
      status: 'reserved',
      reservation: makeReservation(trainA),
      notification: 'disabled',
      cycles: 1,
    });
    expect(exitCodeFor(outcome)).toBe(0);
    expect(rail.reserveSeat).toHaveBeenCalledTimes(1);
    expect(rail.reserveSeat).toHaveBeenCalledWith(sessions.session, trainA, 'general', 1);
    expect(sleep).not.toHaveBeenCalled();
    expect(pay).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
    expect(transitions).toEqual(['SEARCHING', 'CANDIDATE_SELECTED', 'RESERVING', 'RESERVED', 'NOTIFYING', 'DONE']);
  });

  it('should keep polling while only another class has seats', async () => {
    rail.searchSchedule
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([makeTrain({ trainNo: '101', seats: { special: true } })]);

    const outcome = await createLoop().run();

    expect(outcome.status).toBe('reserved');
    expect(outcome.cycles).toBe(3);
    expect(sleep.mock.calls).toEqual([
      [1000, undefined],
      [1000, undefined],
    ]);
    expect(rail.reserveSeat).toHaveBeenCalledTimes(1);
  });

  it('should try the next candidate right away when a seat is taken', async () => {
    rail.searchSchedule.mockResolvedValue([trainA, trainB]);
    rail.reserveSeat.mockResolvedValueOnce({ kind: 'seat-unavailable', code: 'ERR211161', message: 'no seats left' });

    const outcome = await createLoop().run();

    expect(rail.reserveSeat.mock.calls.map(([, train]) => train.trainNo)).toEqual(['101', '103']);
    expect(sleep).not.toHaveBeenCalled();
    expect(outcome.reservation?.trainNo).toBe('103');
    expect(outcome.cycles).toBe(1);
  });

  it('should move on after a retryable rejection', async () => {
    rail.searchSchedule.mockResolvedValue([trainA, trainB]);
    rail.reserveSeat.mockResolvedValueOnce({ kind: 'rejected', code: 'X1', message: 'busy', retryable: true });

    const outcome = await createLoop().run();

    expect(outcome.reservation?.trainNo).toBe('103');
  });

  it('should stop on a fatal rejection', async () => {
    rail.reserveSeat.mockResolvedValue({ kind: 'rejected', code: 'WRR1', message: 'limit reached', retryable: false });

    const outcome = await createLoop().run();

    expect(outcome).toMatchObject({ status: 'failed', error: 'Reservation rejected: limit reached (WRR1)' });
    expect(exitCodeFor(outcome)).toBe(1);
  });

  it('should re-authenticate after a session expiry during search and resume', async () => {
    rail.searchSchedule.mockRejectedValueOnce(new SessionExpiredError('expired', 'P058'));

    const outcome = await createLoop().run();

    expect(sessions.invalidate).toHaveBeenCalledTimes(1);
    expect(sessions.reauthenticate).toHaveBeenCalledTimes(1);
    expect(rail.reserveSeat.mock.calls[0]?.[0].generation).toBe(2);
    expect(outcome.status).toBe('reserved');
    expect(outcome.cycles).toBe(2);
  });

  it('should re-authenticate when the reserve call reports an expired session', async () => {
    rail.reserveSeat.mockResolvedValueOnce({ kind: 'session-expired', code: 'WRT300004', message: 'expired' });

    const outcome = await createLoop().run();

    expect(sessions.reauthenticate).toHaveBeenCalledTimes(1);
    expect(rail.reserveSeat).toHaveBeenCalledTimes(2);
    expect(outcome.status).toBe('reserved');
  });

  it('should give up with no-seats once the attempt budget is spent', async () => {
    rail.searchSchedule.mockResolvedValue([]);

    const outcome = await createLoop({ maxAttempts: 3, notify: true }).run();

    expect(outcome).toEqual({
      status: 'no-seats',
      error: 'No seats found within 3 attempts',
      notification: 'sent',
      cycles: 3,
    });
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(rail.reserveSeat).not.toHaveBeenCalled();
    expect(pay).not.toHaveBeenCalled();
    expect(notify).toHaveBeenCalledWith({ status: 'no-seats', error: 'No seats found within 3 attempts' });
    expect(exitCodeFor(outcome)).toBe(1);
  });

  it('should fail after too many consecutive search faults', async () => {
    rail.searchSchedule.mockRejectedValue(new NetworkFaultError('/schedule', 'timeout'));

    const outcome = await createLoop().run();

    expect(outcome).toMatchObject({
      status: 'failed',
      error: 'Too many consecutive search errors: Network fault calling /schedule: timeout',
      cycles: 3,
    });
    expect(sleep.mock.calls).toEqual([
      [2000, undefined],
      [2000, undefined],
    ]);
  });

  it('should reset the fault counter after a successful search', async () => {
    const fault = new NetworkFaultError('/schedule', 'timeout');
    rail.searchSchedule
      .mockRejectedValueOnce(fault)
      .mockRejectedValueOnce(fault)
      .mockResolvedValueOnce([])
      .mockRejectedValueOnce(fault)
      .mockRejectedValueOnce(fault);

    const outcome = await createLoop().run();

    expect(outcome.status).toBe('reserved');
    expect(outcome.cycles).toBe(6);
  });

  it('should fail on a malformed backend response', async () => {
    rail.searchSchedule.mockRejectedValue(new BackendProtocolError('/schedule', 'Invalid JSON'));

    const outcome = await createLoop().run();

    expect(outcome).toMatchObject({ status: 'failed', error: 'Invalid JSON (/schedule)' });
  });

  it('should report auth-failed when login never completes', async () => {
    sessions.ensureAuthenticated.mockRejectedValue(new AuthTimeoutError(60000));

    const outcome = await createLoop({ notify: true }).run();

    expect(outcome).toEqual({
      status: 'auth-failed',
      error: 'Manual login not completed within 60s',
      notification: 'sent',
      cycles: 0,
    });
    expect(rail.searchSchedule).not.toHaveBeenCalled();
    expect(exitCodeFor(outcome)).toBe(3);
  });

  describe('ambiguous reserve outcome', () => {
    it('should adopt a reservation found after a network fault', async () => {
      rail.reserveSeat.mockRejectedValueOnce(new NetworkFaultError('/reserve', 'socket hang up'));
      rail.listReservations.mockResolvedValue([
        { reservationId: 'PNR-9', trainNo: '101', depDate: '20261120', depTime: '080000', amount: '59800', raw: {} },
      ]);

      const outcome = await createLoop().run();

      expect(rail.reserveSeat).toHaveBeenCalledTimes(1);
      expect(outcome.status).toBe('reserved');
      expect(outcome.reservation).toMatchObject({ reservationId: 'PNR-9', trainNo: '101', fare: '59800' });
    });

    it('should search again instead of repeating the call when nothing was reserved', async () => {
      rail.reserveSeat.mockRejectedValueOnce(new NetworkFaultError('/reserve', 'socket hang up'));
      rail.listReservations.mockResolvedValue([
        { reservationId: 'PNR-9', trainNo: '999', depDate: '20261120', depTime: '080000', amount: '', raw: {} },
      ]);

      const outcome = await createLoop().run();

      expect(rail.listReservations).toHaveBeenCalledTimes(1);
      expect(rail.searchSchedule).toHaveBeenCalledTimes(2);
      expect(rail.reserveSeat).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(outcome).toMatchObject({ status: 'reserved', cycles: 2 });
    });
  });

  describe('payment', () => {
    it('should pay exactly once when auto-pay is on', async () => {
      const confirmation = { reservationId: 'PNR-1', amount: '59800', message: 'ok' };
      pay.mockResolvedValue({ status: 'paid', confirmation });

      const outcome = await createLoop({ autoPay: true }).run();

      expect(pay).toHaveBeenCalledTimes(1);
      expect(pay).toHaveBeenCalledWith(sessions.session, makeReservation(trainA), card);
      expect(outcome).toMatchObject({ status: 'reserved-and-paid', payment: { status: 'paid', confirmation } });
      expect(exitCodeFor(outcome)).toBe(0);
    });

    it('should keep the reservation when payment fails', async () => {
      pay.mockResolvedValue({ status: 'failed', reason: 'Card declined', code: 'CARD01' });

      const outcome = await createLoop({ autoPay: true }).run();

      expect(outcome).toMatchObject({ status: 'reserved-unpaid', reservation: { reservationId: 'PNR-1' } });
      expect(exitCodeFor(outcome)).toBe(2);
    });

    it('should skip payment without a stored card', async () => {
      loadCard.mockResolvedValue(null);

      const outcome = await createLoop({ autoPay: true }).run();

      expect(pay).not.toHaveBeenCalled();
      expect(outcome).toMatchObject({
        status: 'reserved-unpaid',
        payment: { status: 'skipped', reason: 'card not configured' },
      });
    });

    it('should re-authenticate before paying with an expired session', async () => {
      rail.reserveSeat.mockImplementationOnce(async (_s, train) => {
        sessions.session.revoke();
        return confirmed(train);
      });
      pay.mockResolvedValue({ status: 'paid', confirmation: { reservationId: 'PNR-1', amount: '1', message: '' } });

      const outcome = await createLoop({ autoPay: true }).run();

      expect(sessions.reauthenticate).toHaveBeenCalledTimes(1);
      expect(pay.mock.calls[0]?.[0].generation).toBe(2);
      expect(rail.reserveSeat).toHaveBeenCalledTimes(1);
      expect(outcome.status).toBe('reserved-and-paid');
    });

    it('should log in again and pay when the session dies before the charge is sent', async () => {
      pay
        .mockRejectedValueOnce(new SessionExpiredError('Login required (before payment was sent, no charge was attempted)'))
        .mockResolvedValue({ status: 'paid', confirmation: { reservationId: 'PNR-1', amount: '1', message: '' } });

      const outcome = await createLoop({ autoPay: true }).run();

      expect(sessions.reauthenticate).toHaveBeenCalledTimes(1);
      expect(pay).toHaveBeenCalledTimes(2);
      expect(pay.mock.calls[1]?.[0].generation).toBe(2);
      expect(outcome.status).toBe('reserved-and-paid');
    });

    it('should keep the reservation unpaid when the session dies before the charge twice', async () => {
      pay.mockRejectedValue(new SessionExpiredError('Login required (before payment was sent, no charge was attempted)'));

      const outcome = await createLoop({ autoPay: true }).run();

      expect(sessions.reauthenticate).toHaveBeenCalledTimes(1);
      expect(pay).toHaveBeenCalledTimes(2);
      expect(outcome).toMatchObject({
        status: 'reserved-unpaid',
        payment: { status: 'failed', reason: 'Login required (before payment was sent, no charge was attempted)' },
      });
    });

    it('should report reserved-unpaid when re-login before payment fails', async () => {
      rail.reserveSeat.mockImplementationOnce(async (_s, train) => {
        sessions.session.revoke();
        return confirmed(train);
      });
      sessions.reauthenticate.mockRejectedValue(new AuthTimeoutError(60000));

      const outcome = await createLoop({ autoPay: true }).run();

      expect(pay).not.toHaveBeenCalled();
      expect(outcome).toMatchObject({
        status: 'reserved-unpaid',
        payment: { status: 'failed', reason: 'Login failed before payment: Manual login not completed within 60s' },
      });
    });
  });

  describe('notification', () => {
    it('should notify once with the final result when enabled', async () => {
      const outcome = await createLoop({ notify: true }).run();

      expect(notify).toHaveBeenCalledTimes(1);
      expect(notify).toHaveBeenCalledWith({ status: 'reserved', reservation: makeReservation(trainA) });
      expect(outcome.notification).toBe('sent');
    });

    it('should not change the result when delivery fails', async () => {
      notify.mockResolvedValue('failed');

      const outcome = await createLoop({ notify: true }).run();

      expect(outcome).toMatchObject({ status: 'reserved', notification: 'failed' });
    });

    it('should finish the run when the notifier throws', async () => {
      notify.mockRejectedValue(new Error('boom'));

      const outcome = await createLoop({ notify: true }).run();

      expect(outcome).toMatchObject({ status: 'reserved', notification: 'failed' });
    });
  });

  describe('target trains', () => {
    it('should pick targets once and reserve them in the chosen order', async () => {
      rail.searchSchedule.mockResolvedValue([trainA, trainB, trainC]);
      const pick = vi.fn(async () => [trainC, trainA]);

      const outcome = await createLoop({}, { picker: { pick } }).run();

      expect(pick).toHaveBeenCalledTimes(1);
      expect(rail.reserveSeat.mock.calls[0]?.[1]).toBe(trainC);
      expect(outcome.reservation?.trainNo).toBe('105');
      expect(outcome.cycles).toBe(1);
    });

    it('should skip targets missing from a cycle', async () => {
      rail.searchSchedule.mockResolvedValueOnce([trainA, trainB, trainC]).mockResolvedValue([trainA, trainB]);
      const pick = vi.fn(async () => [trainC, trainB]);

      const outcome = await createLoop({}, { picker: { pick } }).run();

      expect(rail.reserveSeat.mock.calls.map(([, train]) => train.trainNo)).toEqual(['103']);
      expect(outcome.reservation?.trainNo).toBe('103');
    });

    it('should fail when no train is picked', async () => {
      const outcome = await createLoop({}, { picker: { pick: vi.fn(async () => []) } }).run();

      expect(outcome).toMatchObject({ status: 'failed', error: 'No trains selected', cycles: 0 });
    });

    it('should fail when the search for picking keeps faulting', async () => {
      rail.searchSchedule.mockRejectedValue(new NetworkFaultError('/search', 'connection reset'));
      const pick = vi.fn(async () => [trainA]);

      const outcome = await createLoop({ maxAttempts: 2 }, { picker: { pick } }).run();

      expect(outcome).toEqual({
        status: 'failed',
        error: 'Too many consecutive search errors: Network fault calling /search: connection reset',
        notification: 'disabled',
        cycles: 0,
      });
      expect(rail.searchSchedule).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 2000]);
      expect(pick).not.toHaveBeenCalled();
    });

    it('should count empty schedules before picking against the attempt budget', async () => {
      rail.searchSchedule.mockResolvedValue([]);
      const pick = vi.fn(async () => [trainA]);

      const outcome = await createLoop({ maxAttempts: 2 }, { picker: { pick } }).run();

      expect(outcome).toEqual({
        status: 'no-seats',
        error: 'No seats found within 2 attempts',
        notification: 'disabled',
        cycles: 2,
      });
      expect(rail.searchSchedule).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(pick).not.toHaveBeenCalled();
    });
  });

  describe('cancellation', () => {
    it('should end in cancelled without notifying', async () => {
      const controller = new AbortController();
      rail.searchSchedule.mockResolvedValue([]);
      sleep.mockImplementation(async (_ms, signal) => {
        controller.abort();
        signal?.throwIfAborted();
      });

      const outcome = await createLoop({ notify: true }).run(controller.signal);

      expect(outcome).toEqual({ status: 'cancelled', notification: 'disabled', cycles: 1, reservation: undefined });
      expect(notify).not.toHaveBeenCalled();
      expect(exitCodeFor(outcome)).toBe(130);
    });
  });

  describe('step', () => {
    it('should refuse a second reservation once one is confirmed', async () => {
      const loop = createLoop();
      await loop.run();

      const retry: LoopState = {
        kind: 'RESERVING',
        session: sessions.session,
        candidate: trainB,
        seatClass: 'general',
        remaining: [],
      };
      const next = await loop.step(retry);

      expect(next).toEqual({
        kind: 'NOTIFYING',
        pending: { status: 'failed', error: 'Reservation PNR-1 already confirmed' },
      });
      expect(rail.reserveSeat).toHaveBeenCalledTimes(1);
    });

    it('should leave terminal states unchanged', async () => {
      const done: LoopState = { kind: 'DONE', outcome: { status: 'reserved', notification: 'sent', cycles: 1 } };

      await expect(createLoop().step(done)).resolves.toBe(done);
    });
  });
});
