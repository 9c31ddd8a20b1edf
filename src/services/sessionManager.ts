import { setTimeout as sleep } from 'timers/promises';
import { BrowserBridge } from '../automation/browser.js';
import { LoginProfile } from '../automation/railClient.js';
import { Session } from '../automation/types.js';
import { AuthFailedError, AuthTimeoutError, errorMessage, isAbortError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import { LoadResult, SessionState } from './sessionStore.js';

const logger = rootLogger.child('session');

export interface AuthProbe {
  isLoggedIn(): Promise<boolean>;
  loginProfile(): Promise<LoginProfile | null>;
}

export interface SessionPersistence {
  load(): Promise<LoadResult>;
  save(state: SessionState): Promise<void>;
  clear(): Promise<void>;
}

/**
 * Blocks until a human completes the backend's login flow, the timeout
 * passes (false) or the signal aborts (throws).
 */
export interface LoginWaiter {
  waitForLogin(timeoutMs: number, signal?: AbortSignal): Promise<boolean>;
}

export interface ProbeLoginWaiterOptions {
  pollIntervalMs?: number;
  /** Consecutive positive probes needed; the login cookie takes a moment to settle. */
  stableChecks?: number;
  stableIntervalMs?: number;
}

export class ProbeLoginWaiter implements LoginWaiter {
  private readonly probe: Pick<AuthProbe, 'isLoggedIn'>;
  private readonly pollIntervalMs: number;
  private readonly stableChecks: number;
  private readonly stableIntervalMs: number;

  constructor(probe: Pick<AuthProbe, 'isLoggedIn'>, options: ProbeLoginWaiterOptions = {}) {
    this.probe = probe;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.stableChecks = Math.max(1, options.stableChecks ?? 2);
    this.stableIntervalMs = options.stableIntervalMs ?? 300;
  }

  async waitForLogin(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    let streak = 0;

    while (Date.now() < deadline) {
      signal?.throwIfAborted();

      let loggedIn = false;
      try {
        loggedIn = await this.probe.isLoggedIn();
      } catch (error) {
        if (isAbortError(error)) throw error;
        logger.debug('Login probe failed, retrying', { error: errorMessage(error) });
      }

      streak = loggedIn ? streak + 1 : 0;
      if (streak >= this.stableChecks) {
        return true;
      }

      await sleep(loggedIn ? this.stableIntervalMs : this.pollIntervalMs, undefined, { signal });
    }

    return false;
  }
}

class ManagedSession implements Session {
  readonly generation: number;
  readonly establishedAt: Date;
  private valid = true;

  constructor(generation: number) {
    this.generation = generation;
    this.establishedAt = new Date();
  }

  isValid(): boolean {
    return this.valid;
  }

  revoke(): void {
    this.valid = false;
  }
}

export interface SessionManagerOptions {
  bridge: BrowserBridge;
  store: SessionPersistence;
  probe: AuthProbe;
  loginWaiter: LoginWaiter;
  /** Mode for automated calls; manual login always uses a visible browser. */
  headless: boolean;
  loginTimeoutMs: number;
}

/**
 * Owns the authenticated session: restores it from disk, validates it,
 * falls back to a human login in a visible browser, and persists the result.
 * It is the only component that creates or revokes a Session.
 */
export class SessionManager {
  private readonly bridge: BrowserBridge;
  private readonly store: SessionPersistence;
  private readonly probe: AuthProbe;
  private readonly loginWaiter: LoginWaiter;
  private readonly headless: boolean;
  private readonly loginTimeoutMs: number;

  private session: ManagedSession | null = null;
  private generation = 0;
  private bridgeStarted = false;
  private requireManualLogin = false;

  constructor(options: SessionManagerOptions) {
    this.bridge = options.bridge;
    this.store = options.store;
    this.probe = options.probe;
    this.loginWaiter = options.loginWaiter;
    this.headless = options.headless;
    this.loginTimeoutMs = options.loginTimeoutMs;
  }

  current(): Session | null {
    return this.session;
  }

  async ensureAuthenticated(signal?: AbortSignal): Promise<Session> {
    if (this.session?.isValid()) {
      return this.session;
    }
    signal?.throwIfAborted();

    if (!this.requireManualLogin) {
      const restored = await this.restore();
      if (restored) {
        return restored;
      }
    }

    return this.manualLogin(signal);
  }

  /**
   * Mark the current session dead. The next ensureAuthenticated() goes
   * straight to manual login.
   */
  invalidate(): void {
    if (this.session?.isValid()) {
      logger.warn('Session invalidated', { generation: this.session.generation });
    }
    this.session?.revoke();
    this.requireManualLogin = true;
  }

  async reauthenticate(signal?: AbortSignal): Promise<Session> {
    this.invalidate();
    return this.ensureAuthenticated(signal);
  }

  private async restore(): Promise<Session | null> {
    const loaded = await this.store.load();
    if (loaded.status === 'absent') {
      logger.info('No saved session');
      return null;
    }
    if (loaded.status === 'corrupt') {
      logger.warn('Saved session unreadable, logging in again', { reason: loaded.reason });
      return null;
    }

    try {
      await this.startBridge(this.headless, loaded.state);
      if (!(await this.probe.isLoggedIn())) {
        logger.info('Saved session is no longer accepted');
        return null;
      }
    } catch (error) {
      if (isAbortError(error)) throw error;
      logger.warn('Could not check saved session, logging in again', { error: errorMessage(error) });
      return null;
    }

    const session = await this.establish();
    logger.info('Logged in via saved session', { generation: session.generation });
    return session;
  }

  private async manualLogin(signal?: AbortSignal): Promise<Session> {
    if (this.requireManualLogin) {
      await this.store.clear();
    }

    if (!this.bridgeStarted || this.bridge.isHeadless()) {
      logger.info('Opening a visible browser for manual login');
      await this.startBridge(false);
    }

    await this.bridge.openLoginPage();
    logger.info('Please log in through the browser window', {
      timeoutSeconds: Math.round(this.loginTimeoutMs / 1000),
    });

    const completed = await this.loginWaiter.waitForLogin(this.loginTimeoutMs, signal);
    if (!completed) {
      throw new AuthTimeoutError(this.loginTimeoutMs);
    }

    await this.bridge.openSearchPage();
    const state = await this.bridge.exportState();
    try {
      await this.store.save(state);
    } catch (error) {
      logger.error('Failed to persist session, continuing with in-memory session', {
        error: errorMessage(error),
      });
    }

    if (this.headless) {
      try {
        await this.startBridge(true, state);
      } catch (error) {
        if (isAbortError(error)) throw error;
        throw new AuthFailedError(`Could not re-launch headless browser: ${errorMessage(error)}`);
      }
      if (!(await this.confirmHeadless())) {
        throw new AuthFailedError('Session was rejected right after login; try again with --no-headless');
      }
    }

    this.requireManualLogin = false;
    const session = await this.establish();
    logger.info('Login successful, session saved', { generation: session.generation });
    return session;
  }

  /** Probe the re-launched headless browser, retrying once on a fault. */
  private async confirmHeadless(): Promise<boolean> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.probe.isLoggedIn();
      } catch (error) {
        if (isAbortError(error)) throw error;
        logger.warn('Login check after re-launch failed', { attempt, error: errorMessage(error) });
        if (attempt >= 2) {
          throw new AuthFailedError(`Could not confirm login after re-launch: ${errorMessage(error)}`);
        }
      }
    }
  }

  private async startBridge(headless: boolean, state?: SessionState): Promise<void> {
    await this.bridge.restart({ headless, state });
    this.bridgeStarted = true;
  }

  private async establish(): Promise<ManagedSession> {
    this.generation += 1;
    this.session = new ManagedSession(this.generation);

    try {
      const profile = await this.probe.loginProfile();
      if (profile) {
        logger.info('Authenticated', { name: profile.name || undefined, loginId: profile.loginId || undefined });
      }
    } catch (error) {
      logger.debug('Could not read login profile', { error: errorMessage(error) });
    }

    return this.session;
  }
}
