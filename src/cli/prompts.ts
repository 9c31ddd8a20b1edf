import { createInterface, Interface } from 'readline/promises';
import { formatScheduleTable, trainBrief } from '../automation/trains.js';
import { SearchCriteria, SEAT_PREFERENCES, TrainCandidate } from '../automation/types.js';
import { errorMessage } from '../utils/errors.js';
import { TrainPicker } from '../worker/macroLoop.js';
import {
  ensureDistinctStations,
  normalizeStation,
  parseDate,
  parseHour,
  parseSeat,
} from './validation.js';

/**
 * Parse a train selection such as `0,2,5`, `1-3` or `all` against a list of
 * `count` trains. Returns null when the input is not a valid selection.
 * Duplicates are dropped; the order typed is kept.
 */
export function parseSelection(input: string, count: number): number[] | null {
  const text = input.trim().toLowerCase();
  if (text === '') return null;
  if (text === 'all' || text === '*') {
    return Array.from({ length: count }, (_, idx) => idx);
  }

  const picked: number[] = [];
  for (const part of text.split(',')) {
    const token = part.trim();
    const range = /^(\d+)\s*-\s*(\d+)$/.exec(token);
    let indices: number[];
    if (range) {
      const start = Number(range[1]);
      const end = Number(range[2]);
      if (start > end) return null;
      indices = Array.from({ length: end - start + 1 }, (_, offset) => start + offset);
    } else if (/^\d+$/.test(token)) {
      indices = [Number(token)];
    } else {
      return null;
    }

    for (const idx of indices) {
      if (idx >= count) return null;
      if (!picked.includes(idx)) picked.push(idx);
    }
  }
  return picked;
}

export class Prompter {
  private readonly rl: Interface;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = createInterface({ input, output });
  }

  /** Ctrl-C while a prompt is open reaches readline, not the process. */
  onInterrupt(handler: () => void): void {
    this.rl.on('SIGINT', handler);
  }

  async ask(question: string, defaultValue?: string, signal?: AbortSignal): Promise<string> {
    const suffix = defaultValue ? ` [${defaultValue}]` : '';
    const answer = await this.rl.question(`${question}${suffix}: `, { signal });
    const trimmed = answer.trim();
    return trimmed === '' && defaultValue !== undefined ? defaultValue : trimmed;
  }

  async confirm(question: string, defaultYes = true, signal?: AbortSignal): Promise<boolean> {
    const answer = await this.ask(`${question} (${defaultYes ? 'Y/n' : 'y/N'})`, undefined, signal);
    if (answer === '') return defaultYes;
    return /^y(es)?$/i.test(answer);
  }

  /** Ask until the parser accepts the answer. */
  async askValid<T>(
    question: string,
    defaultValue: string,
    parse: (value: string) => T,
    signal?: AbortSignal
  ): Promise<T> {
    for (;;) {
      const answer = await this.ask(question, defaultValue, signal);
      try {
        return parse(answer);
      } catch (error) {
        console.log(`Invalid input: ${errorMessage(error)}`);
      }
    }
  }

  async promptConditions(
    initial: SearchCriteria,
    stations: readonly string[],
    signal?: AbortSignal
  ): Promise<SearchCriteria> {
    console.log(`\nStations: ${stations.join(', ')}`);
    for (;;) {
      const departure = await this.askValid(
        'Departure station',
        initial.departure,
        (value) => normalizeStation(value, stations),
        signal
      );
      const arrival = await this.askValid(
        'Arrival station',
        initial.arrival,
        (value) => normalizeStation(value, stations),
        signal
      );
      try {
        ensureDistinctStations(departure, arrival);
      } catch (error) {
        console.log(`Invalid input: ${errorMessage(error)}`);
        continue;
      }

      const date = await this.askValid('Date (YYYYMMDD)', initial.date, parseDate, signal);
      const hour = await this.askValid('Earliest hour (HH)', initial.hour, parseHour, signal);
      const seat = await this.askValid(`Seat (${SEAT_PREFERENCES.join('/')})`, initial.seat, parseSeat, signal);

      return { ...initial, departure, arrival, date, hour, seat };
    }
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * Shows the first search result and lets the operator choose which trains
 * the run should target.
 */
export class PromptTrainPicker implements TrainPicker {
  private readonly prompter: Prompter;

  constructor(prompter: Prompter) {
    this.prompter = prompter;
  }

  async pick(trains: readonly TrainCandidate[], signal?: AbortSignal): Promise<TrainCandidate[]> {
    console.log(`\n${formatScheduleTable(trains)}\n`);

    for (;;) {
      const answer = await this.prompter.ask('Trains to reserve (e.g. 0,2 or 1-3 or all)', undefined, signal);
      const indices = parseSelection(answer, trains.length);
      if (!indices || indices.length === 0) {
        console.log('No valid train selected.');
        if (!(await this.prompter.confirm('Select again?', true, signal))) {
          return [];
        }
        continue;
      }

      const selected: TrainCandidate[] = [];
      for (const idx of indices) {
        const train = trains[idx];
        if (train) selected.push(train);
      }
      console.log(`Selected: ${selected.map(trainBrief).join(', ')}`);
      return selected;
    }
  }
}
