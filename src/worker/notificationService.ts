import { Api } from 'grammy';
import { NotificationConfig } from '../services/credentialStore.js';
import { errorMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import { NotificationStatus, PendingOutcome, formatDate, formatTime } from './outcome.js';

const logger = rootLogger.child('notify');

export interface Notifier {
  /** Never throws; delivery problems are reported through the status. */
  notify(outcome: PendingOutcome): Promise<NotificationStatus>;
}

export interface TelegramNotifierOptions {
  /** Called on first use only, so secrets are not read unless needed. */
  loadConfig: () => Promise<NotificationConfig | null>;
  timeoutMs: number;
}

function escapeHtml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Format the notification message for an outcome
 */
export function formatNotification(outcome: PendingOutcome): string {
  const { status, reservation, payment, error } = outcome;

  const trainLines = reservation
    ? `Train: ${escapeHtml(`${reservation.trainType} ${reservation.trainNo}`.trim())}\n` +
      `Route: ${escapeHtml(reservation.departure)} → ${escapeHtml(reservation.arrival)}\n` +
      `Departure: ${formatDate(reservation.depDate)} ${formatTime(reservation.depTime)}\n` +
      `Reservation: <code>${escapeHtml(reservation.reservationId)}</code>\n`
    : '';

  switch (status) {
    case 'reserved':
      return (
        `<b>Seat Reserved</b>\n\n` +
        trainLines +
        (reservation?.paymentDeadline ? `Pay by: ${escapeHtml(reservation.paymentDeadline)}\n` : '') +
        `\nNot paid yet. Pay before the deadline or the seat is released.`
      );

    case 'reserved-and-paid':
      return (
        `<b>Seat Reserved and Paid</b>\n\n` +
        trainLines +
        (payment?.status === 'paid' ? `Amount: ${escapeHtml(payment.confirmation.amount)}\n` : '') +
        `\nYour ticket has been issued.`
      );

    case 'reserved-unpaid': {
      const reason = payment && payment.status !== 'paid' ? payment.reason : 'unknown';
      return (
        `<b>Seat Reserved, Payment Failed</b>\n\n` +
        trainLines +
        `Payment: ${escapeHtml(reason)}\n\n` +
        `The reservation is kept. Pay manually before the deadline.`
      );
    }

    case 'no-seats':
      return `<b>No Seats Found</b>\n\n${escapeHtml(error ?? 'Attempt budget exhausted')}`;

    case 'auth-failed':
      return `<b>Login Failed</b>\n\n${escapeHtml(error ?? 'Login was not completed')}`;

    default:
      return `<b>Reservation Failed</b>\n\nError: ${escapeHtml(error ?? 'Unknown error')}`;
  }
}

/**
 * Sends run outcomes to a Telegram chat. Best effort: a failure is logged
 * once as a warning and never affects the run's result.
 */
export class TelegramNotifier implements Notifier {
  private readonly loadConfig: () => Promise<NotificationConfig | null>;
  private readonly timeoutMs: number;

  constructor(options: TelegramNotifierOptions) {
    this.loadConfig = options.loadConfig;
    this.timeoutMs = options.timeoutMs;
  }

  async notify(outcome: PendingOutcome): Promise<NotificationStatus> {
    try {
      const config = await this.loadConfig();
      if (!config) {
        logger.warn('Telegram skipped: token/chat_id not configured');
        return 'not-configured';
      }

      const api = new Api(config.token, { timeoutSeconds: Math.max(1, Math.ceil(this.timeoutMs / 1000)) });
      await api.sendMessage(config.chatId, formatNotification(outcome), {
        parse_mode: 'HTML',
        link_preview_options: { is_disabled: true },
      });

      logger.info('Notification sent', { status: outcome.status });
      return 'sent';
    } catch (error) {
      logger.warn('Failed to send notification', { status: outcome.status, error: errorMessage(error) });
      return 'failed';
    }
  }
}
