import type { Logger } from '../logger';
import type { RunLogStore } from '../run_log_store';
import { formatIsoTimestamp } from '../utils';
import type {
  LogEntry,
  LogFormat,
  LogSeverity,
  LogSink,
  OperationLogOptions,
  PersistedRunLog,
} from './operation_log.types';

export const DEFAULT_LOG_TTL_SECONDS = 3600;

/**
 * OperationLog - ordered, append-only log of one export or import run
 *
 * A run owns its log: it calls `clear()` first, appends as it goes and
 * finishes with `persistLast()`, which replaces whatever the previous run
 * left in the RunLogStore. Readers use `formattedLast()`.
 *
 * @example
 * ```typescript
 * const log = new OperationLog({ store: new MemoryRunLogStore() });
 * log.clear();
 * log.append('Import started.', 'INFO_IMPORTANT');
 * await log.persistLast();
 * console.log(await log.formattedLast());
 * ```
 */
export class OperationLog implements LogSink {
  private buffer: LogEntry[] = [];
  private readonly store: RunLogStore;
  private readonly logger: Logger | undefined;
  private readonly clock: () => Date;
  private readonly ttlSeconds: number;

  constructor(options: OperationLogOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_LOG_TTL_SECONDS;
  }

  clear(): void {
    this.buffer = [];
  }

  append(message: string, severity: LogSeverity = 'INFO'): void {
    const entry: LogEntry = {
      timestamp: this.clock().toISOString(),
      severity,
      message,
    };
    this.buffer.push(entry);
    this.mirror(entry);
  }

  /** Copy of the current buffer, in append order. */
  entries(): LogEntry[] {
    return this.buffer.map((entry) => ({ ...entry }));
  }

  async persistLast(): Promise<void> {
    const now = this.clock();
    const persisted: PersistedRunLog = {
      savedAt: now.toISOString(),
      expiresAt: new Date(now.getTime() + this.ttlSeconds * 1000).toISOString(),
      entries: this.entries(),
    };
    await this.store.save(persisted);
  }

  /**
   * Renders the persisted log. Empty string when nothing is stored or the
   * stored log has expired.
   */
  async formattedLast(format: LogFormat = 'text'): Promise<string> {
    const persisted = await this.store.load();
    if (!persisted) {
      return '';
    }
    const expiresAt = Date.parse(persisted.expiresAt);
    if (Number.isNaN(expiresAt) || expiresAt <= this.clock().getTime()) {
      return '';
    }
    return formatEntries(persisted.entries, format);
  }

  private mirror(entry: LogEntry): void {
    if (!this.logger) return;
    switch (entry.severity) {
      case 'ERROR':
        this.logger.error(entry.message);
        break;
      case 'WARNING':
        this.logger.warn(entry.message);
        break;
      case 'INFO_DETAIL':
        this.logger.debug(entry.message);
        break;
      default:
        this.logger.info(entry.message);
    }
  }
}

/**
 * One line per entry: `[SEVERITY] YYYY-MM-DD HH:mm:ss - message`.
 *
 * text: control characters are escaped, so one entry is always one line.
 * html: each line is HTML-escaped and wrapped in `<ul><li>…</li></ul>`.
 */
export function formatEntries(entries: readonly LogEntry[], format: LogFormat = 'text'): string {
  const lines = entries.map(formatLine);
  if (format === 'html') {
    if (lines.length === 0) return '';
    return `<ul>${lines.map((line) => `<li>${escapeHtml(line)}</li>`).join('')}</ul>`;
  }
  return lines.map(escapeControlCharacters).join('\n');
}

export function formatLine(entry: LogEntry): string {
  return `[${entry.severity}] ${formatIsoTimestamp(entry.timestamp)} - ${entry.message}`;
}

export function escapeControlCharacters(text: string): string {
  return text.replace(/[\u0000-\u001f\u007f]/g, (char) => {
    if (char === '\n') return '\\n';
    return `\\x${char.charCodeAt(0).toString(16).padStart(2, '0')}`;
  });
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
