import { z } from 'zod';
import {
  API_LOGIN_CHECK,
  API_PAY,
  API_RESERVATION_LIST,
  API_RESERVATION_VIEW,
  API_RESERVE,
  API_SCHEDULE,
  MOBILE_DEVICE,
  MOBILE_KEY,
  MOBILE_VERSION,
  NO_RESULT_CODES,
  SESSION_EXPIRED_CODES,
  SOLD_OUT_CODES,
  SUCCESS_RESULTS,
  TRAIN_GROUP_ALL,
  TRAIN_GROUP_KTX,
  WEB_DEVICE,
  WEB_VERSION,
} from './constants.js';
import { trainFromSchedule } from './trains.js';
import {
  BackendResponse,
  BackendTransport,
  CardInfo,
  PaymentResult,
  Reservation,
  ReservationOutcome,
  ReservationRecord,
  SearchCriteria,
  SeatClass,
  Session,
  TrainCandidate,
} from './types.js';
import {
  BackendProtocolError,
  NetworkFaultError,
  RailApiError,
  SessionExpiredError,
  errorMessage,
  isAbortError,
} from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('rail');

const envelopeSchema = z.record(z.string(), z.unknown());

type Payload = Record<string, unknown>;

export interface LoginProfile {
  memberNo: string;
  name: string;
  loginId: string;
}

export interface RailClientOptions {
  /** Backend codes that end the run instead of moving on to the next candidate. */
  fatalRejectionCodes?: readonly string[];
}

const MOBILE_BASE = {
  Device: MOBILE_DEVICE,
  Version: MOBILE_VERSION,
  Key: MOBILE_KEY,
} as const;

const NEGATIVE_FLAGS = new Set(['N', 'FALSE', '0']);

const SOLD_OUT_WORDING = /잔여석|매진|sold out/i;

function text(value: unknown): string {
  return value === null || value === undefined ? '' : String(value).trim();
}

function firstPresent(data: Payload, keys: readonly string[]): string {
  for (const key of keys) {
    const value = text(data[key]);
    if (value && !NEGATIVE_FLAGS.has(value.toUpperCase())) {
      return value;
    }
  }
  return '';
}

function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The backend returns a bare object for one item and an array for several. */
function items(value: unknown): Payload[] {
  if (isPayload(value)) return [value];
  if (Array.isArray(value)) return value.filter(isPayload);
  return [];
}

function nested(data: Payload, outer: string, inner: string): Payload[] {
  const container = data[outer];
  return isPayload(container) ? items(container[inner]) : [];
}

function digitsOnly(value: unknown): string {
  return text(value).replace(/\D/g, '');
}

function isLoggedOutMessage(message: string): boolean {
  return message.includes('로그인 정보가 없습니다') || (message.includes('로그인') && message.includes('없'));
}

function isNoResult(error: RailApiError): boolean {
  return NO_RESULT_CODES.has(error.code) || (error.message.includes('예약') && error.message.includes('없'));
}

interface PaymentContext {
  price: string;
  wctNo: string;
  rsvChgNo: string;
  tmpJobSqno1: string;
  tmpJobSqno2: string;
}

const UNSET_SEQUENCE = new Set(['', '000000']);

function isIncomplete(ctx: PaymentContext): boolean {
  return (
    !ctx.price ||
    ctx.price === '0' ||
    !ctx.wctNo ||
    !ctx.rsvChgNo ||
    UNSET_SEQUENCE.has(ctx.tmpJobSqno1) ||
    UNSET_SEQUENCE.has(ctx.tmpJobSqno2)
  );
}

function hydrateFromItem(ctx: PaymentContext, pnrNo: string, item: Payload, requirePnr: boolean): void {
  if (requirePnr) {
    const itemPnr = text(item.h_pnr_no ?? item.hidPnrNo);
    if (itemPnr && itemPnr !== pnrNo) return;
  }

  if (!ctx.price || ctx.price === '0') {
    for (const key of ['h_rsv_amt', 'h_rcvd_amt', 'hidPayAmount']) {
      const candidate = digitsOnly(item[key]);
      if (candidate && candidate !== '0') {
        ctx.price = candidate;
        break;
      }
    }
  }
  if (!ctx.wctNo) {
    ctx.wctNo = text(item.h_wct_no) || text(item.hidWctNo);
  }
  if (!ctx.rsvChgNo) {
    ctx.rsvChgNo = text(item.h_rsv_chg_no) || text(item.hidRsvChgNo);
  }
  if (UNSET_SEQUENCE.has(ctx.tmpJobSqno1)) {
    ctx.tmpJobSqno1 = text(item.h_tmp_job_sqno1) || ctx.tmpJobSqno1;
  }
  if (UNSET_SEQUENCE.has(ctx.tmpJobSqno2)) {
    ctx.tmpJobSqno2 = text(item.h_tmp_job_sqno2) || ctx.tmpJobSqno2;
  }
}

function hydrateFromPayload(ctx: PaymentContext, pnrNo: string, data: Payload, includeTopLevel: boolean): void {
  if (includeTopLevel) {
    hydrateFromItem(ctx, pnrNo, data, false);
  }
  for (const journey of nested(data, 'jrny_infos', 'jrny_info')) {
    hydrateFromItem(ctx, pnrNo, journey, false);
    for (const train of nested(journey, 'train_infos', 'train_info')) {
      hydrateFromItem(ctx, pnrNo, train, true);
    }
  }
}

const RESERVATION_INHERIT_KEYS = [
  'h_pnr_no',
  'h_rsv_amt',
  'h_ntisu_lmt_dt',
  'h_ntisu_lmt_tm',
  'h_run_dt',
  'h_dpt_dt',
  'h_dpt_tm',
  'h_dpt_rs_stn_nm',
  'h_arv_rs_stn_nm',
  'h_trn_no',
  'h_rsv_chg_no',
  'hidRsvChgNo',
  'h_wct_no',
] as const;

function toReservationRecord(row: Payload): ReservationRecord {
  return {
    reservationId: text(row.h_pnr_no),
    trainNo: text(row.h_trn_no),
    depDate: text(row.h_dpt_dt) || text(row.h_run_dt),
    depTime: text(row.h_dpt_tm),
    amount: digitsOnly(row.h_rsv_amt),
    raw: row,
  };
}

/**
 * Request builders and response parsers for the rail backend. Holds no
 * session state: callers pass the active Session into every operation.
 */
export class RailClient {
  private readonly transport: BackendTransport;
  private readonly fatalRejectionCodes: ReadonlySet<string>;

  constructor(transport: BackendTransport, options: RailClientOptions = {}) {
    this.transport = transport;
    this.fatalRejectionCodes = new Set(options.fatalRejectionCodes ?? []);
  }

  private async call(endpoint: string, params: Record<string, string>): Promise<Payload> {
    let response: BackendResponse;
    try {
      response = await this.transport.postForm(endpoint, params);
    } catch (error) {
      if (error instanceof NetworkFaultError || isAbortError(error)) {
        throw error;
      }
      throw new NetworkFaultError(endpoint, errorMessage(error));
    }

    const body = response.text.trim();
    if (!body) {
      if (!response.ok) {
        throw new NetworkFaultError(endpoint, `HTTP ${response.status}`);
      }
      throw new BackendProtocolError(endpoint, 'Empty response');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      if (!response.ok) {
        throw new NetworkFaultError(endpoint, `HTTP ${response.status}`);
      }
      throw new BackendProtocolError(endpoint, 'Invalid JSON', body);
    }

    const envelope = envelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      throw new BackendProtocolError(endpoint, 'Unexpected JSON payload', body);
    }

    const data = envelope.data;
    if (text(data.strResult) === 'FAIL') {
      const code = text(data.h_msg_cd) || text(data.code);
      const message = text(data.h_msg_txt) || text(data.message) || 'Rail API failed';
      if (SESSION_EXPIRED_CODES.has(code)) {
        throw new SessionExpiredError(message, code);
      }
      throw new RailApiError(endpoint, message, code);
    }

    return data;
  }

  private assertValid(session: Session): void {
    if (!session.isValid()) {
      throw new SessionExpiredError('Session was invalidated');
    }
  }

  /**
   * Lightweight authenticated probe. The endpoint reports success even when
   * logged out, so the message text decides.
   */
  async isLoggedIn(): Promise<boolean> {
    let data: Payload;
    try {
      data = await this.call(API_LOGIN_CHECK, {});
    } catch (error) {
      if (
        error instanceof RailApiError ||
        error instanceof SessionExpiredError ||
        error instanceof BackendProtocolError
      ) {
        return false;
      }
      throw error;
    }

    if (isLoggedOutMessage(text(data.h_msg_txt))) {
      return false;
    }
    if (SUCCESS_RESULTS.has(text(data.strResult))) {
      return true;
    }
    return firstPresent(data, ['loginYn', 'isLogin']) !== '';
  }

  async loginProfile(): Promise<LoginProfile | null> {
    let data: Payload;
    try {
      data = await this.call(API_LOGIN_CHECK, {});
    } catch (error) {
      if (error instanceof RailApiError || error instanceof SessionExpiredError) {
        return null;
      }
      throw error;
    }

    if (isLoggedOutMessage(text(data.h_msg_txt))) {
      return null;
    }

    const profile: LoginProfile = {
      memberNo: firstPresent(data, ['strMbCrdNo', 'mbCrdNo', 'strCustNo', 'custNo']),
      name: firstPresent(data, ['strCustNm', 'custNm', 'h_cust_nm', 'strUserNm']),
      loginId: firstPresent(data, ['strCustId', 'custId', 'userId']),
    };

    if (!profile.memberNo && !profile.name && !profile.loginId) {
      return SUCCESS_RESULTS.has(text(data.strResult)) ? profile : null;
    }
    return profile;
  }

  /**
   * Query availability. Sold-out classes may be missing from the row
   * entirely; they parse as unavailable.
   */
  async searchSchedule(session: Session, criteria: SearchCriteria): Promise<TrainCandidate[]> {
    this.assertValid(session);

    const params: Record<string, string> = {
      Device: WEB_DEVICE,
      Version: WEB_VERSION,
      radJobId: '1',
      selGoTrain: TRAIN_GROUP_ALL,
      txtCardPsgCnt: '0',
      txtGdNo: '',
      txtGoAbrdDt: criteria.date,
      txtGoEnd: criteria.arrival,
      txtGoHour: `${criteria.hour.padStart(2, '0')}0000`,
      txtGoStart: criteria.departure,
      txtJobDv: '',
      txtMenuId: '11',
      txtPsgFlg_1: String(criteria.passengers),
      txtPsgFlg_2: '0',
      txtPsgFlg_3: '0',
      txtPsgFlg_4: '0',
      txtPsgFlg_5: '0',
      txtSeatAttCd_2: '000',
      txtSeatAttCd_3: '000',
      txtSeatAttCd_4: '015',
      txtTrnGpCd: TRAIN_GROUP_KTX,
      searchType: 'GENERAL',
    };

    let data: Payload;
    try {
      data = await this.call(API_SCHEDULE, params);
    } catch (error) {
      if (error instanceof RailApiError && isNoResult(error)) {
        return [];
      }
      throw error;
    }

    return nested(data, 'trn_infos', 'trn_info').map(trainFromSchedule);
  }

  /**
   * One reservation attempt. The search result was only a hint; this
   * outcome is authoritative.
   */
  async reserveSeat(
    session: Session,
    train: TrainCandidate,
    seatClass: SeatClass,
    passengers: number
  ): Promise<ReservationOutcome> {
    if (!session.isValid()) {
      return { kind: 'session-expired', code: '', message: 'Session was invalidated' };
    }

    let depTime = (train.raw.h_dpt_tm || train.raw.h_dpt_tm_qb || '').replace(/:/g, '');
    if (depTime.length === 4) {
      depTime = `${depTime}00`;
    }

    const params: Record<string, string> = {
      Device: WEB_DEVICE,
      Version: WEB_VERSION,
      txtMenuId: '11',
      txtJobId: '1101',
      txtGdNo: '',
      hidFreeFlg: 'N',
      txtTotPsgCnt: String(passengers),
      txtSeatAttCd1: '000',
      txtSeatAttCd2: '000',
      txtSeatAttCd3: '000',
      txtSeatAttCd4: '015',
      txtSeatAttCd5: '000',
      txtStndFlg: 'N',
      txtSrcarCnt: '0',
      txtJrnyCnt: '1',
      txtJrnySqno1: '001',
      txtJrnyTpCd1: '11',
      txtDptDt1: train.depDate,
      txtDptRsStnCd1: train.raw.h_dpt_rs_stn_cd ?? '',
      txtDptTm1: depTime,
      txtArvRsStnCd1: train.raw.h_arv_rs_stn_cd ?? '',
      txtTrnNo1: train.trainNo,
      txtRunDt1: train.raw.h_run_dt || train.depDate,
      txtTrnClsfCd1: train.raw.h_trn_clsf_cd || '100',
      txtTrnGpCd1: train.raw.h_trn_gp_cd || TRAIN_GROUP_KTX,
      txtPsrmClCd1: seatClass === 'special' ? '2' : '1',
      txtChgFlg1: '',
      txtPsgTpCd1: '1',
      txtDiscKndCd1: '000',
      txtCompaCnt1: String(passengers),
      txtCardCode_1: '',
      txtCardNo_1: '',
      txtCardPw_1: '',
    };

    let data: Payload;
    try {
      data = await this.call(API_RESERVE, params);
    } catch (error) {
      if (error instanceof SessionExpiredError) {
        return { kind: 'session-expired', code: error.code ?? '', message: error.message };
      }
      if (error instanceof RailApiError) {
        return this.classifyRejection(error);
      }
      throw error;
    }

    const reservationId = text(data.h_pnr_no);
    if (!reservationId) {
      throw new BackendProtocolError(
        API_RESERVE,
        'Reservation accepted without a reservation number',
        JSON.stringify(data)
      );
    }

    const deadlineDate = text(data.h_ntisu_lmt_dt);
    const deadlineTime = text(data.h_ntisu_lmt_tm);
    const reservation: Reservation = {
      reservationId,
      trainNo: train.trainNo,
      trainType: train.trainType,
      departure: train.departure,
      arrival: train.arrival,
      depDate: train.depDate,
      depTime: train.depTime,
      seatClass,
      fare: digitsOnly(data.h_rsv_amt) || train.price || undefined,
      paymentDeadline: deadlineDate ? `${deadlineDate} ${deadlineTime}`.trim() : undefined,
      raw: data,
    };

    logger.info('Reservation confirmed', { reservationId, trainNo: train.trainNo });
    return { kind: 'confirmed', reservation };
  }

  private classifyRejection(error: RailApiError): ReservationOutcome {
    if (SOLD_OUT_CODES.has(error.code) || SOLD_OUT_WORDING.test(error.message)) {
      return { kind: 'seat-unavailable', code: error.code, message: error.message };
    }
    return {
      kind: 'rejected',
      code: error.code,
      message: error.message,
      retryable: !this.fatalRejectionCodes.has(error.code),
    };
  }

  /**
   * Reservations currently held by the account, one entry per train leg.
   */
  async listReservations(session: Session): Promise<ReservationRecord[]> {
    this.assertValid(session);

    let data: Payload;
    try {
      data = await this.call(API_RESERVATION_VIEW, { ...MOBILE_BASE });
    } catch (error) {
      if (error instanceof RailApiError && isNoResult(error)) {
        return [];
      }
      throw error;
    }

    const records: ReservationRecord[] = [];
    for (const journey of nested(data, 'jrny_infos', 'jrny_info')) {
      const trains = nested(journey, 'train_infos', 'train_info');
      if (trains.length === 0) {
        records.push(toReservationRecord(journey));
        continue;
      }
      for (const train of trains) {
        const merged: Payload = { ...train };
        for (const key of RESERVATION_INHERIT_KEYS) {
          if (!text(merged[key]) && key in journey) {
            merged[key] = journey[key];
          }
        }
        records.push(toReservationRecord(merged));
      }
    }
    return records;
  }

  /**
   * Pay a confirmed reservation by card. Reserve responses often omit the
   * payment context, so it is recovered from the reservation list and then
   * the reservation view before paying.
   */
  async payReservation(session: Session, reservation: Reservation, card: CardInfo): Promise<PaymentResult> {
    this.assertValid(session);

    const pnrNo = reservation.reservationId;
    const raw = reservation.raw;
    const ctx: PaymentContext = {
      price: '',
      wctNo: text(raw.h_wct_no),
      rsvChgNo: text(raw.h_rsv_chg_no ?? raw.hidRsvChgNo),
      tmpJobSqno1: 'h_tmp_job_sqno1' in raw ? text(raw.h_tmp_job_sqno1) : '000000',
      tmpJobSqno2: 'h_tmp_job_sqno2' in raw ? text(raw.h_tmp_job_sqno2) : '000000',
    };

    try {
      hydrateFromPayload(ctx, pnrNo, raw, true);

      try {
        if (isIncomplete(ctx)) {
          const detail = await this.call(API_RESERVATION_LIST, { ...MOBILE_BASE, hidPnrNo: pnrNo });
          hydrateFromPayload(ctx, pnrNo, detail, true);
        }
        if (isIncomplete(ctx)) {
          const view = await this.call(API_RESERVATION_VIEW, { ...MOBILE_BASE });
          hydrateFromPayload(ctx, pnrNo, view, false);
        }
      } catch (error) {
        // Nothing has been charged yet
        if (error instanceof SessionExpiredError) {
          return { kind: 'session-expired', message: error.message };
        }
        throw error;
      }

      if (!ctx.price || ctx.price === '0') {
        return { kind: 'rejected', code: '', message: 'Unable to determine payment amount' };
      }
      if (!ctx.wctNo) {
        return { kind: 'rejected', code: '', message: 'Unable to determine payment key' };
      }

      const params: Record<string, string> = {
        ...MOBILE_BASE,
        hidPnrNo: pnrNo,
        hidWctNo: ctx.wctNo,
        hidTmpJobSqno1: ctx.tmpJobSqno1,
        hidTmpJobSqno2: ctx.tmpJobSqno2,
        hidRsvChgNo: ctx.rsvChgNo || '000',
        hidInrecmnsGridcnt: '1',
        hidStlMnsSqno1: '1',
        hidStlMnsCd1: '02',
        hidMnsStlAmt1: ctx.price,
        hidCrdInpWayCd1: '@',
        hidStlCrCrdNo1: card.number,
        hidVanPwd1: card.password,
        hidCrdVlidTrm1: card.expiry,
        hidIsmtMnthNum1: '0',
        hidAthnDvCd1: card.birthday.length <= 6 ? 'J' : 'S',
        hidAthnVal1: card.birthday,
        hiduserYn: 'Y',
      };

      const data = await this.call(API_PAY, params);
      return {
        kind: 'paid',
        confirmation: {
          reservationId: text(data.h_pnr_no) || pnrNo,
          amount: ctx.price,
          message: text(data.h_msg_txt),
        },
      };
    } catch (error) {
      if (error instanceof RailApiError) {
        return { kind: 'rejected', code: error.code, message: error.message };
      }
      throw error;
    }
  }
}
