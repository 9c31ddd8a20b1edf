import { Reservation, SeatClass, SeatStatus, Session, TrainCandidate } from '../../src/automation/types.js';

const AVAILABLE: SeatStatus = { code: '11', label: '예약하기', available: true };
const SOLD_OUT: SeatStatus = { code: '13', label: '매진', available: false };

export interface TrainOptions {
  trainNo: string;
  depTime?: string;
  seats?: Partial<Record<SeatClass, boolean>>;
}

export function makeTrain({ trainNo, depTime = '080000', seats = { general: true } }: TrainOptions): TrainCandidate {
  return {
    trainNo,
    trainType: 'KTX',
    departure: '서울',
    arrival: '부산',
    depDate: '20261120',
    depTime,
    arrTime: '104000',
    price: '59800',
    seats: {
      general: seats.general ? AVAILABLE : SOLD_OUT,
      special: seats.special ? AVAILABLE : SOLD_OUT,
      standing: seats.standing ? AVAILABLE : SOLD_OUT,
    },
    raw: { h_trn_no: trainNo },
  };
}

export function makeReservation(train: TrainCandidate, reservationId = 'PNR-1'): Reservation {
  return {
    reservationId,
    trainNo: train.trainNo,
    trainType: train.trainType,
    departure: train.departure,
    arrival: train.arrival,
    depDate: train.depDate,
    depTime: train.depTime,
    seatClass: 'general',
    fare: train.price,
    paymentDeadline: '20261119 235900',
    raw: { h_pnr_no: reservationId },
  };
}

export function makeSession(generation = 1): Session & { revoke(): void } {
  let valid = true;
  return {
    generation,
    establishedAt: new Date('2026-11-01T00:00:00Z'),
    isValid: () => valid,
    revoke: () => {
      valid = false;
    },
  };
}
