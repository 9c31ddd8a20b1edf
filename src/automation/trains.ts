import { RSV_AVAILABLE } from './constants.js';
import { SearchCriteria, SeatClass, SeatPreference, TrainCandidate } from './types.js';

/**
 * Backend rows mix strings, numbers and nulls. Everything becomes a string,
 * missing values become ''.
 */
function normalizeRow(row: Record<string, unknown>): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    normalized[key] = value === null || value === undefined ? '' : String(value);
  }
  return normalized;
}

function seatStatus(code: string | undefined, label: string | undefined) {
  const normalizedCode = code ?? '';
  return {
    code: normalizedCode,
    label: label ?? '',
    available: normalizedCode === RSV_AVAILABLE,
  };
}

export function trainFromSchedule(row: Record<string, unknown>): TrainCandidate {
  const raw = normalizeRow(row);
  return {
    trainNo: raw.h_trn_no ?? '',
    trainType: raw.h_car_tp_nm ?? '',
    departure: raw.h_dpt_rs_stn_nm ?? '',
    arrival: raw.h_arv_rs_stn_nm ?? '',
    depDate: raw.h_dpt_dt ?? '',
    depTime: raw.h_dpt_tm_qb ?? '',
    arrTime: raw.h_arv_tm_qb ?? '',
    price: raw.h_rcvd_amt ?? '',
    seats: {
      general: seatStatus(raw.h_gen_rsv_cd, raw.h_gen_rsv_nm),
      special: seatStatus(raw.h_spe_rsv_cd, raw.h_spe_rsv_nm),
      standing: seatStatus(raw.h_stnd_rsv_cd, raw.h_stnd_rsv_nm),
    },
    raw,
  };
}

export function hasSeat(train: TrainCandidate, preference: SeatPreference): boolean {
  if (preference === 'any') {
    return train.seats.general.available || train.seats.special.available;
  }
  return train.seats[preference].available;
}

/**
 * Seat class to request for a train that satisfies the preference.
 * Standing seats are requested through the general class.
 */
export function pickSeatClass(train: TrainCandidate, preference: SeatPreference): SeatClass {
  switch (preference) {
    case 'general':
    case 'standing':
      return 'general';
    case 'special':
      return 'special';
    case 'any':
      return train.seats.general.available ? 'general' : 'special';
  }
}

/** Identity of a train across search cycles. */
export function trainKey(train: TrainCandidate): string {
  return [train.depDate, train.trainNo, train.depTime, train.departure, train.arrival].join('|');
}

export function trainBrief(train: TrainCandidate): string {
  return `${train.trainNo} ${train.depTime}-${train.arrTime} ${train.departure}->${train.arrival}`;
}

export function matchesCriteria(train: TrainCandidate, criteria: SearchCriteria): boolean {
  if (criteria.trainNumbers && criteria.trainNumbers.length > 0) {
    return criteria.trainNumbers.includes(train.trainNo);
  }
  return true;
}

/**
 * Fixed-width availability table, one row per train.
 */
export function formatScheduleTable(trains: readonly TrainCandidate[]): string {
  const header = 'idx train    type       dep->arr        time           gen       spe       stnd      price';
  const rows = trains.map((train, idx) => {
    const route = `${train.departure}->${train.arrival}`.slice(0, 14);
    const time = `${train.depTime}-${train.arrTime}`.slice(0, 12);
    const price = train.price.replace(/^0+/, '') || '0';
    return [
      String(idx).padStart(3),
      train.trainNo.padEnd(8),
      train.trainType.slice(0, 10).padEnd(10),
      route.padEnd(14),
      time.padEnd(12),
      '',
      train.seats.general.label.slice(0, 8).padEnd(9),
      train.seats.special.label.slice(0, 8).padEnd(9),
      train.seats.standing.label.slice(0, 8).padEnd(9),
      price,
    ].join(' ');
  });
  return [header, '-'.repeat(header.length), ...rows].join('\n');
}
