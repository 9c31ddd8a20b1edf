import { Reservation } from '../automation/types.js';
import { PaymentOutcome } from '../services/paymentExecutor.js';

export type RunStatus =
  | 'reserved'
  | 'reserved-and-paid'
  | 'reserved-unpaid'
  | 'no-seats'
  | 'auth-failed'
  | 'failed'
  | 'cancelled';

export type NotificationStatus = 'sent' | 'failed' | 'not-configured' | 'disabled';

export interface RunOutcome {
  status: RunStatus;
  reservation?: Reservation;
  payment?: PaymentOutcome;
  notification: NotificationStatus;
  /** Search cycles performed */
  cycles: number;
  error?: string;
}

/** Outcome before the notification step has run. */
export type PendingOutcome = Omit<RunOutcome, 'notification' | 'cycles'>;

export const EXIT_CODES: Record<RunStatus, number> = {
  reserved: 0,
  'reserved-and-paid': 0,
  'no-seats': 1,
  failed: 1,
  'reserved-unpaid': 2,
  'auth-failed': 3,
  cancelled: 130,
};

export function hasReservation(status: RunStatus): boolean {
  return status === 'reserved' || status === 'reserved-and-paid' || status === 'reserved-unpaid';
}

export function exitCodeFor(outcome: RunOutcome): number {
  return EXIT_CODES[outcome.status];
}

export function formatDate(yyyymmdd: string): string {
  return yyyymmdd.length === 8 ? `${yyyymmdd.slice(0, 4)}-${yyyymmdd.slice(4, 6)}-${yyyymmdd.slice(6)}` : yyyymmdd;
}

export function formatTime(hhmm: string): string {
  const digits = hhmm.replace(/\D/g, '');
  return digits.length >= 4 ? `${digits.slice(0, 2)}:${digits.slice(2, 4)}` : hhmm;
}

function describePayment(payment: PaymentOutcome | undefined): string {
  if (!payment) return 'not requested';
  switch (payment.status) {
    case 'paid':
      return `paid (${payment.confirmation.amount})`;
    case 'failed':
      return `failed: ${payment.reason}`;
    case 'skipped':
      return `skipped: ${payment.reason}`;
  }
}

/**
 * Final report printed when the run ends, whatever the outcome.
 */
export function formatRunSummary(outcome: RunOutcome): string[] {
  const lines = [`Result: ${outcome.status}`, `Search cycles: ${outcome.cycles}`];

  const reservation = outcome.reservation;
  if (reservation) {
    lines.push(
      `Reservation: ${reservation.reservationId}`,
      `Train: ${reservation.trainType} ${reservation.trainNo} ${reservation.departure} -> ${reservation.arrival}`,
      `Departure: ${formatDate(reservation.depDate)} ${formatTime(reservation.depTime)}`
    );
    if (reservation.paymentDeadline) {
      lines.push(`Pay by: ${reservation.paymentDeadline}`);
    }
  }
  if (reservation || outcome.payment) {
    lines.push(`Payment: ${describePayment(outcome.payment)}`);
  }
  if (outcome.error) {
    lines.push(`Cause: ${outcome.error}`);
  }
  lines.push(`Notification: ${outcome.notification}`);
  return lines;
}
