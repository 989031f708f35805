import type { BrowserLauncher, BrowserSession } from '../browser/driver.js';
import type {
  ActionOutcome,
  ConsoleAction,
  ConsoleProfile,
  RunSettings,
  RunSummary,
  SessionState,
} from '../schema/index.js';
import { ConnectionError, InvocationError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { performAction } from './actions.js';
import { extractHostIdentifier } from './archiver.js';
import { authenticate, navigate } from './login.js';
import { consoleBaseUrl, deepLinkUrl } from './urls.js';

// ── State machine ────────────────────────────────────────────

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  Disconnected: ['Connected', 'Failed'],
  Connected: ['Authenticated', 'Failed'],
  Authenticated: ['ActionInProgress', 'Done', 'Failed'],
  ActionInProgress: ['Authenticated', 'Failed'],
  Done: [],
  Failed: [],
};

export class StateTransitionError extends Error {
  readonly from: SessionState;
  readonly to: SessionState;

  constructor(from: SessionState, to: SessionState) {
    super(`Illegal session transition ${from} → ${to}`);
    this.name = 'StateTransitionError';
    this.from = from;
    this.to = to;
  }
}

export class AuthenticationError extends Error {
  constructor(reason: string) {
    super(`Login failed: ${reason}`);
    this.name = 'AuthenticationError';
  }
}

// ── Action selection ─────────────────────────────────────────

/**
 * Profile actions to run, in profile order. `names` narrows the set;
 * unknown names and actions without an archive directory are
 * invocation errors.
 */
export function selectActions(
  profile: ConsoleProfile,
  archiveDirs: Readonly<Record<string, string>>,
  names?: readonly string[],
): ConsoleAction[] {
  if (names !== undefined) {
    const known = new Set(profile.actions.map((a) => a.name));
    const unknown = names.filter((n) => !known.has(n));
    if (unknown.length > 0) {
      throw new InvocationError(
        `Unknown action(s): ${unknown.join(', ')} (available: ${[...known].join(', ')})`,
      );
    }
  }

  const selected = profile.actions.filter((a) => names === undefined || names.includes(a.name));
  const unarchived = selected.filter((a) => archiveDirs[a.name] === undefined);
  if (unarchived.length > 0) {
    throw new InvocationError(
      `No archive directory configured for: ${unarchived.map((a) => a.name).join(', ')}`,
    );
  }
  return selected;
}

// ── Controller ───────────────────────────────────────────────

export interface SessionDependencies {
  launch: BrowserLauncher;
  logger: Logger;
  now?: () => Date;
}

/**
 * Owns the browser for one run:
 * `Disconnected → Connected → Authenticated ⇄ ActionInProgress → Done | Failed`.
 *
 * Both terminal states close the browser; `run()` never returns or
 * throws with the browser still open.
 */
export class SessionController {
  private state: SessionState = 'Disconnected';
  private session: BrowserSession | null = null;
  private readonly baseUrl: string;
  private readonly host: string;
  private readonly now: () => Date;

  constructor(
    private readonly settings: RunSettings,
    private readonly profile: ConsoleProfile,
    private readonly deps: SessionDependencies,
  ) {
    this.baseUrl = consoleBaseUrl(settings.targetUrl, profile.loginPathMarker);
    this.host = extractHostIdentifier(settings.targetUrl);
    this.now = deps.now ?? (() => new Date());
  }

  get currentState(): SessionState {
    return this.state;
  }

  /**
   * Connect, sign in, run every selected action, tear down.
   * Rethrows `ConnectionError` (after teardown) so the caller can
   * abort with its own exit code; every other failure is in the summary.
   */
  async run(): Promise<RunSummary> {
    const { logger } = this.deps;
    const startedAt = this.now();
    const actions = selectActions(this.profile, this.settings.archiveDirs, this.settings.actions);
    const outcomes: ActionOutcome[] = [];
    let authenticated = false;
    let error: string | undefined;

    try {
      await this.connect();
      await this.authenticate();
      authenticated = true;

      for (const [i, action] of actions.entries()) {
        if (i > 0) await this.returnToDashboard();
        const actionStarted = Date.now();
        try {
          outcomes.push(await this.runAction(action));
        } catch (err) {
          outcomes.push({
            action: action.name,
            success: false,
            failure: 'unexpected',
            message: errorMessage(err),
            durationMs: Date.now() - actionStarted,
          });
          throw err;
        }
      }

      this.transition('Done');
    } catch (err) {
      error = errorMessage(err);
      logger.error(error);
      this.state = 'Failed';
      if (err instanceof ConnectionError) throw err;
    } finally {
      await this.teardown();
    }

    const finishedAt = this.now();
    return {
      targetUrl: this.settings.targetUrl,
      host: this.host,
      browser: this.settings.browser,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
      authenticated,
      finalState: this.state,
      ...(error !== undefined ? { error } : {}),
      outcomes,
    };
  }

  // ── Transitions ────────────────────────────────────────────

  async connect(): Promise<void> {
    const { browser, headless, downloadDir } = this.settings;
    this.deps.logger.info(`Starting ${browser}…`);
    this.session = await this.deps.launch({ browser, headless, downloadDir });
    this.transition('Connected');
  }

  async authenticate(): Promise<void> {
    const result = await authenticate(
      this.profile,
      { username: this.settings.username, password: this.settings.password },
      {
        page: this.page(),
        loginUrl: this.settings.targetUrl,
        timeoutMs: this.settings.elementTimeoutMs,
        navigationTimeoutMs: this.settings.navigationTimeoutMs,
        settle: this.settings.settle,
        debugDir: this.settings.debugDir,
        captureAfterLogin: this.settings.captureAfterLogin,
        logger: this.deps.logger,
      },
    );
    if (!result.ok) throw new AuthenticationError(result.reason);
    this.transition('Authenticated');
  }

  async runAction(action: ConsoleAction): Promise<ActionOutcome> {
    this.transition('ActionInProgress');
    const outcome = await performAction(action, {
      page: this.page(),
      baseUrl: this.baseUrl,
      hostIdentifier: this.host,
      downloadDir: this.settings.downloadDir,
      archiveDir: this.archiveDirFor(action),
      debugDir: this.settings.debugDir,
      timeoutMs: this.settings.elementTimeoutMs,
      navigationTimeoutMs: this.settings.navigationTimeoutMs,
      downloadTimeoutMs: this.settings.downloadTimeoutMs,
      pollIntervalMs: this.settings.pollIntervalMs,
      settle: this.settings.settle,
      logger: this.deps.logger,
      now: this.now,
    });
    this.transition('Authenticated');
    return outcome;
  }

  private async returnToDashboard(): Promise<void> {
    if (this.profile.betweenActions === undefined) return;
    const url = deepLinkUrl(this.baseUrl, this.profile.betweenActions);
    this.deps.logger.info(`Returning to ${url}`);
    try {
      await navigate(this.page(), url, this.settings.navigationTimeoutMs, this.deps.logger);
      await this.page().sleep(this.settings.settle.navigationMs);
    } catch (err) {
      this.deps.logger.warn(`Failed to navigate to ${url}: ${errorMessage(err)}`);
    }
  }

  private async teardown(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session === null) {
      this.deps.logger.debug('Browser never started, nothing to close');
      return;
    }
    this.deps.logger.info('Closing browser…');
    try {
      await session.close();
      this.deps.logger.info('Browser closed');
    } catch (err) {
      this.deps.logger.error(`Error closing browser: ${errorMessage(err)}`);
    }
  }

  // ── Helpers ────────────────────────────────────────────────

  private transition(to: SessionState): void {
    if (!TRANSITIONS[this.state].includes(to)) {
      throw new StateTransitionError(this.state, to);
    }
    this.deps.logger.debug(`Session ${this.state} → ${to}`);
    this.state = to;
  }

  private page(): BrowserSession['page'] {
    if (this.session === null) {
      throw new StateTransitionError(this.state, 'Connected');
    }
    return this.session.page;
  }

  private archiveDirFor(action: ConsoleAction): string {
    const dir = this.settings.archiveDirs[action.name];
    if (dir === undefined) {
      throw new InvocationError(`No archive directory configured for ${action.name}`);
    }
    return dir;
  }
}
