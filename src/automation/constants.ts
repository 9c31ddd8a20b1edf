// Paths are relative to the backend origin and are called from inside the page.
export const LOGIN_PATH = '/ticket/login';
export const SEARCH_PATH = '/ticket/search/general';

export const API_SCHEDULE = '/classes/com.korail.mobile.seatMovie.ScheduleView';
export const API_LOGIN_CHECK = '/ebizweb/common/loginCheck';
export const API_RESERVE = '/classes/com.korail.mobile.certification.TicketReservation';
export const API_RESERVATION_LIST = '/classes/com.korail.mobile.certification.ReservationList';
export const API_RESERVATION_VIEW = '/classes/com.korail.mobile.reservation.ReservationView';
export const API_PAY = '/classes/com.korail.mobile.payment.ReservationPayment';

// Web client identity for search/reserve
export const WEB_DEVICE = 'BH';
export const WEB_VERSION = '999999999';

// Mobile app identity, required by the reservation and payment endpoints
export const MOBILE_DEVICE = 'AD';
export const MOBILE_VERSION = '250601002';
export const MOBILE_KEY = 'korail1234567890';

export const RSV_AVAILABLE = '11';

export const TRAIN_GROUP_KTX = '100';
export const TRAIN_GROUP_ALL = '00';

export const SESSION_EXPIRED_CODES: ReadonlySet<string> = new Set(['P058', 'WRT300004', 'WRD000003']);
export const NO_RESULT_CODES: ReadonlySet<string> = new Set(['P100', 'WRG000000', 'WRD000061', 'WRT300005']);
export const SOLD_OUT_CODES: ReadonlySet<string> = new Set(['ERR211161']);

export const SUCCESS_RESULTS: ReadonlySet<string> = new Set(['SUCC', 'SUCCESS', 'Y']);
