export type SeatClass = 'general' | 'special' | 'standing';

/** `any` accepts either a general or a special seat. */
export type SeatPreference = SeatClass | 'any';

export const SEAT_PREFERENCES: readonly SeatPreference[] = ['general', 'special', 'any', 'standing'];

export interface SearchCriteria {
  readonly departure: string;
  readonly arrival: string;
  /** YYYYMMDD */
  readonly date: string;
  /** HH, earliest departure hour */
  readonly hour: string;
  readonly seat: SeatPreference;
  readonly passengers: number;
  /** When set, only these train numbers are considered. */
  readonly trainNumbers?: readonly string[];
}

export interface SeatStatus {
  readonly code: string;
  readonly label: string;
  readonly available: boolean;
}

export interface TrainCandidate {
  readonly trainNo: string;
  readonly trainType: string;
  readonly departure: string;
  readonly arrival: string;
  readonly depDate: string;
  readonly depTime: string;
  readonly arrTime: string;
  readonly price: string;
  readonly seats: Readonly<Record<SeatClass, SeatStatus>>;
  readonly raw: Readonly<Record<string, string>>;
}

export interface Reservation {
  readonly reservationId: string;
  readonly trainNo: string;
  readonly trainType: string;
  readonly departure: string;
  readonly arrival: string;
  readonly depDate: string;
  readonly depTime: string;
  readonly seatClass: SeatClass;
  readonly fare?: string;
  readonly paymentDeadline?: string;
  readonly raw: Readonly<Record<string, unknown>>;
}

/** Reservation as listed by the backend, used to resolve ambiguous reserve calls. */
export interface ReservationRecord {
  readonly reservationId: string;
  readonly trainNo: string;
  readonly depDate: string;
  readonly depTime: string;
  readonly amount: string;
  readonly raw: Readonly<Record<string, unknown>>;
}

export type ReservationOutcome =
  | { kind: 'confirmed'; reservation: Reservation }
  | { kind: 'seat-unavailable'; code: string; message: string }
  | { kind: 'rejected'; code: string; message: string; retryable: boolean }
  | { kind: 'session-expired'; code: string; message: string };

export interface CardInfo {
  readonly number: string;
  /** First two digits of the card password */
  readonly password: string;
  /** YYMMDD for personal cards, 10-digit registration number for business cards */
  readonly birthday: string;
  /** YYMM */
  readonly expiry: string;
}

export interface PaymentConfirmation {
  readonly reservationId: string;
  readonly amount: string;
  readonly message: string;
}

export type PaymentResult =
  | { kind: 'paid'; confirmation: PaymentConfirmation }
  | { kind: 'rejected'; code: string; message: string }
  /** The session died while preparing the payment; no charge was attempted. */
  | { kind: 'session-expired'; message: string };

export interface BackendResponse {
  ok: boolean;
  status: number;
  text: string;
}

/**
 * Executes a backend operation from inside an authenticated page.
 * Requests must originate from page script; a bare HTTP client is blocked.
 */
export interface BackendTransport {
  postForm(endpoint: string, params: Record<string, string>): Promise<BackendResponse>;
}

/**
 * Proof of authentication attached to every backend call. Only the session
 * manager can revoke one; everything else can merely check it.
 */
export interface Session {
  readonly generation: number;
  readonly establishedAt: Date;
  isValid(): boolean;
}
