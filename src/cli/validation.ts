import { InvalidArgumentError } from 'commander';
import { SEAT_PREFERENCES, SeatPreference } from '../automation/types.js';

const LEAD_MINUTES = 10;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function leadTime(now: Date): Date {
  return new Date(now.getTime() + LEAD_MINUTES * 60 * 1000);
}

/** Departure date default: today, or tomorrow shortly before midnight. */
export function defaultDate(now: Date = new Date()): string {
  const at = leadTime(now);
  return `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
}

export function defaultHour(now: Date = new Date()): string {
  return pad(leadTime(now).getHours());
}

export function normalizeStation(value: string, known: readonly string[]): string {
  const name = value.trim();
  if (!known.includes(name)) {
    throw new InvalidArgumentError(`Unknown station: ${name}`);
  }
  return name;
}

export function parseDate(value: string): string {
  const trimmed = value.trim();
  if (!/^\d{8}$/.test(trimmed)) {
    throw new InvalidArgumentError('date must be YYYYMMDD');
  }
  const year = Number(trimmed.slice(0, 4));
  const month = Number(trimmed.slice(4, 6));
  const day = Number(trimmed.slice(6, 8));
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new InvalidArgumentError('date must be YYYYMMDD');
  }
  return trimmed;
}

export function parseHour(value: string): string {
  const trimmed = value.trim();
  if (!/^\d{1,2}$/.test(trimmed)) {
    throw new InvalidArgumentError('time must be HH (00-23)');
  }
  const hour = Number(trimmed);
  if (hour > 23) {
    throw new InvalidArgumentError('time must be HH (00-23)');
  }
  return pad(hour);
}

export function parseSeat(value: string): SeatPreference {
  const seat = SEAT_PREFERENCES.find((preference) => preference === value.trim());
  if (!seat) {
    throw new InvalidArgumentError(`seat must be one of ${SEAT_PREFERENCES.join(', ')}`);
  }
  return seat;
}

function parseInteger(value: string, min: number, max: number, label: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || parsed < min || parsed > max) {
    throw new InvalidArgumentError(`${label} must be an integer between ${min} and ${max}`);
  }
  return parsed;
}

export function parsePassengers(value: string): number {
  return parseInteger(value, 1, 9, 'passengers');
}

export function parseMaxAttempts(value: string): number {
  return parseInteger(value, 0, Number.MAX_SAFE_INTEGER, 'max-attempts');
}

/** Repeatable `--train` collector */
export function collectTrainNumber(value: string, previous: string[] = []): string[] {
  const trainNo = value.trim();
  if (!/^\d+$/.test(trainNo)) {
    throw new InvalidArgumentError(`Invalid train number: ${value}`);
  }
  return [...previous, trainNo];
}

export function ensureDistinctStations(departure: string, arrival: string): void {
  if (departure === arrival) {
    throw new InvalidArgumentError('departure and arrival must differ');
  }
}
