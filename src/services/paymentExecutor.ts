import { CardInfo, PaymentConfirmation, PaymentResult, Reservation, Session } from '../automation/types.js';
import { NetworkFaultError, SessionExpiredError, errorMessage, isAbortError } from '../utils/errors.js';
import { maskSecret } from '../utils/crypto.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('payment');

export type PaymentOutcome =
  | { status: 'paid'; confirmation: PaymentConfirmation }
  | { status: 'failed'; reason: string; code?: string }
  | { status: 'skipped'; reason: string };

export interface PaymentGateway {
  payReservation(session: Session, reservation: Reservation, card: CardInfo): Promise<PaymentResult>;
}

/**
 * Charges a confirmed reservation exactly once. A failure is reported, never
 * retried: a second attempt could charge the card twice. The one exception
 * is a session that expires before the charge request is sent, which is
 * thrown as SessionExpiredError so the caller can log in again and pay.
 */
export class PaymentExecutor {
  private readonly gateway: PaymentGateway;

  constructor(gateway: PaymentGateway) {
    this.gateway = gateway;
  }

  async pay(session: Session, reservation: Reservation, card: CardInfo): Promise<PaymentOutcome> {
    logger.info('Paying reservation', {
      reservationId: reservation.reservationId,
      card: maskSecret(card.number),
    });

    let result: PaymentResult;
    try {
      result = await this.gateway.payReservation(session, reservation, card);
    } catch (error) {
      if (isAbortError(error)) throw error;

      const reason =
        error instanceof NetworkFaultError
          ? `${error.message} (payment outcome unknown, check your reservations before paying manually)`
          : error instanceof SessionExpiredError
            ? 'Session expired before payment was accepted'
            : errorMessage(error);
      logger.error('Payment failed', { reservationId: reservation.reservationId, reason });
      return { status: 'failed', reason };
    }

    if (result.kind === 'session-expired') {
      logger.warn('Session expired before the payment was sent', { reservationId: reservation.reservationId });
      throw new SessionExpiredError(`${result.message} (before payment was sent, no charge was attempted)`);
    }

    if (result.kind === 'rejected') {
      logger.error('Payment rejected', {
        reservationId: reservation.reservationId,
        code: result.code,
        message: result.message,
      });
      return { status: 'failed', reason: result.message, code: result.code || undefined };
    }

    logger.info('Payment successful', {
      reservationId: result.confirmation.reservationId,
      amount: result.confirmation.amount,
    });
    return { status: 'paid', confirmation: result.confirmation };
  }
}
