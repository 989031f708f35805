/**
 * Run logger for unisphere-backup.
 *
 * All output goes to stderr so stdout stays clean for `--json` output.
 * Emoji prefixes give instant visual context in the terminal.
 *
 * Created once at startup and handed to every component; nothing
 * reaches for a global instance.
 */

// ── Types ───────────────────────────────────────────────────

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  verbose?: boolean;
  timestamps?: boolean;
  sink?: LogSink;
  now?: () => Date;
}

export interface Logger {
  info(message: string): void;
  detail(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  section(title: string): void;
  login(message: string): void;
  download(message: string): void;
}

// ── Factory ─────────────────────────────────────────────────

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? stderrSink;
  const verbose = options.verbose ?? false;
  const timestamps = options.timestamps ?? true;
  const now = options.now ?? (() => new Date());

  function write(message: string): void {
    sink(timestamps ? `${formatClock(now())} ${message}` : message);
  }

  return {
    info(message) {
      write(`ℹ️  ${message}`);
    },
    detail(message) {
      write(`   ${message}`);
    },
    success(message) {
      write(`✅ ${message}`);
    },
    warn(message) {
      write(`⚠️  ${message}`);
    },
    error(message) {
      write(`❌ ${message}`);
    },
    debug(message) {
      if (verbose) write(`🔎 ${message}`);
    },
    section(title) {
      sink(`\n${'─'.repeat(50)}`);
      write(`▶  ${title}`);
      sink('─'.repeat(50));
    },
    login(message) {
      write(`🔐 ${message}`);
    },
    download(message) {
      write(`📥 ${message}`);
    },
  };
}

/** Logger that drops everything. Handy where a caller has no use for output. */
export const silentLogger: Logger = createLogger({ sink: () => {} });

function formatClock(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `[${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}]`;
}
