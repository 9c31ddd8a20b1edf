import { BrowserBridge, PlaywrightBridge } from '../../automation/browser.js';
import { RailClient } from '../../automation/railClient.js';
import { SearchCriteria, SeatPreference } from '../../automation/types.js';
import { CredentialStore, loadCard, loadNotificationConfig } from '../../services/credentialStore.js';
import { PaymentExecutor } from '../../services/paymentExecutor.js';
import { ProbeLoginWaiter, SessionManager } from '../../services/sessionManager.js';
import { SessionStore } from '../../services/sessionStore.js';
import { config } from '../../utils/config.js';
import { isAbortError } from '../../utils/errors.js';
import { logger as rootLogger } from '../../utils/logger.js';
import { MacroLoop, MacroLoopDeps, MacroLoopOptions, TrainPicker } from '../../worker/macroLoop.js';
import { TelegramNotifier } from '../../worker/notificationService.js';
import { EXIT_CODES, exitCodeFor, formatRunSummary } from '../../worker/outcome.js';
import { PromptTrainPicker, Prompter } from '../prompts.js';
import { loadStations } from '../stations.js';
import { defaultDate, defaultHour, ensureDistinctStations, normalizeStation } from '../validation.js';

const logger = rootLogger.child('reserve');

export interface ReserveCliOptions {
  departure?: string;
  arrival?: string;
  date?: string;
  time?: string;
  seat: SeatPreference;
  train?: string[];
  passengers: number;
  headless: boolean;
  interactive?: boolean;
  maxAttempts: number;
  autoPay: boolean;
  notify: boolean;
}

/** Process-level pieces of a run, swapped out in tests. */
export interface ReserveRuntime {
  createBridge(headless: boolean): BrowserBridge;
  createLoop(options: MacroLoopOptions, deps: MacroLoopDeps): Pick<MacroLoop, 'run'>;
  /** Subscribe to stop requests; returns the unsubscribe function. */
  onStop(handler: (signal: NodeJS.Signals) => void): () => void;
}

const processRuntime: ReserveRuntime = {
  createBridge: (headless) =>
    new PlaywrightBridge({ baseUrl: config.baseUrl, headless, navTimeoutMs: config.navTimeoutMs }),
  createLoop: (options, deps) => new MacroLoop(options, deps),
  onStop: (handler) => {
    process.on('SIGINT', handler);
    process.on('SIGTERM', handler);
    return () => {
      process.off('SIGINT', handler);
      process.off('SIGTERM', handler);
    };
  },
};

function initialCriteria(options: ReserveCliOptions, stations: readonly string[]): SearchCriteria {
  const [first = '', second = ''] = stations;
  return {
    departure: options.departure ? normalizeStation(options.departure, stations) : first,
    arrival: options.arrival ? normalizeStation(options.arrival, stations) : second,
    date: options.date ?? defaultDate(),
    hour: options.time ?? defaultHour(),
    seat: options.seat,
    passengers: options.passengers,
    trainNumbers: options.train,
  };
}

/**
 * Run one reservation attempt end to end. Returns the process exit code.
 * The browser is closed on every path out.
 */
export async function reserveCommand(
  options: ReserveCliOptions,
  runtime: ReserveRuntime = processRuntime
): Promise<number> {
  const stations = loadStations();
  const interactive = options.interactive ?? Boolean(process.stdin.isTTY);

  if (!interactive && (!options.departure || !options.arrival)) {
    throw new Error('--departure and --arrival are required in non-interactive mode');
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.warn(`Received ${signal}, stopping`);
    controller.abort();
  };
  const unsubscribe = runtime.onStop(onSignal);

  const prompter = interactive ? new Prompter() : null;
  prompter?.onInterrupt(() => onSignal('SIGINT'));

  const bridge = runtime.createBridge(options.headless);

  try {
    let criteria = initialCriteria(options, stations);
    let picker: TrainPicker | undefined;
    if (prompter) {
      criteria = await prompter.promptConditions(criteria, stations, controller.signal);
      if (!criteria.trainNumbers?.length) {
        picker = new PromptTrainPicker(prompter);
      }
    }
    ensureDistinctStations(criteria.departure, criteria.arrival);

    const rail = new RailClient(bridge, { fatalRejectionCodes: config.fatalRejectionCodes });
    const sessions = new SessionManager({
      bridge,
      store: new SessionStore(config.dataDir),
      probe: rail,
      loginWaiter: new ProbeLoginWaiter(rail),
      headless: options.headless,
      loginTimeoutMs: config.loginTimeoutMs,
    });
    const credentials = new CredentialStore({ dataDir: config.dataDir, encryptionKey: config.encryptionKey });

    const loop = runtime.createLoop(
      {
        criteria,
        autoPay: options.autoPay,
        notify: options.notify,
        maxAttempts: options.maxAttempts,
        pollIntervalMs: config.pollIntervalMs,
        maxConsecutiveErrors: config.maxConsecutiveErrors,
      },
      {
        rail,
        sessions,
        payments: new PaymentExecutor(rail),
        loadCard: () => loadCard(credentials),
        notifier: new TelegramNotifier({
          loadConfig: () =>
            loadNotificationConfig(credentials, {
              token: config.telegramBotToken,
              chatId: config.telegramChatId,
            }),
          timeoutMs: config.notifyTimeoutMs,
        }),
        picker,
        onTransition: (from, to) => logger.debug(`${from.kind} -> ${to.kind}`),
      }
    );

    logger.info('Starting reservation run', {
      route: `${criteria.departure}->${criteria.arrival}`,
      date: criteria.date,
      hour: criteria.hour,
      seat: criteria.seat,
      passengers: criteria.passengers,
      trains: criteria.trainNumbers,
      autoPay: options.autoPay,
      notify: options.notify,
    });

    const outcome = await loop.run(controller.signal);
    console.log(`\n${formatRunSummary(outcome).join('\n')}`);
    return exitCodeFor(outcome);
  } catch (error) {
    if (isAbortError(error) || controller.signal.aborted) {
      console.log('\nCancelled before the run started.');
      return EXIT_CODES.cancelled;
    }
    throw error;
  } finally {
    unsubscribe();
    prompter?.close();
    await bridge.close();
  }
}
