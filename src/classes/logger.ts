/**
 * Severity-levelled message recorder.
 *
 * Loggers form a stack. The module-level `log()` helpers always write to the
 * most recently created logger that is still open, so code deep inside a
 * loader can report problems without a logger being passed down to it:
 *
 *   const logger = new Logger();
 *   try {
 *     parseCaveText(text);          // reports through logWarning()
 *     warnings = logger.messages;
 *   } finally {
 *     logger.close();
 *   }
 *
 * The root logger, used when no other logger is open, echoes every message
 * to stderr. Stdout belongs to the MCP transport.
 */

export type Severity = 'debug' | 'info' | 'message' | 'warning' | 'critical' | 'error';

export interface LogMessage {
    severity: Severity;
    message: string;
}

export interface LoggerOptions {
    /** Drop every message instead of recording it */
    ignore?: boolean;
    /** Also write each message to stderr */
    echo?: boolean;
}

export class Logger {
    private static stack: Logger[] = [];
    private static root: Logger | null = null;

    private readonly _messages: LogMessage[] = [];
    private readonly ignore: boolean;
    private readonly echo: boolean;
    private _context = '';
    private closed = false;

    constructor(options: LoggerOptions = {}) {
        this.ignore = options.ignore ?? false;
        this.echo = options.echo ?? false;
        Logger.stack.push(this);
    }

    /**
     * The logger the module-level helpers write to.
     */
    static active(): Logger {
        const top = Logger.stack.at(-1);
        if (top !== undefined) return top;
        if (Logger.root === null) {
            Logger.root = new RootLogger();
        }
        return Logger.root;
    }

    get context(): string {
        return this._context;
    }

    get messages(): readonly LogMessage[] {
        return this._messages;
    }

    get empty(): boolean {
        return this._messages.length === 0;
    }

    /**
     * All messages joined by newlines, each prefixed with its severity.
     */
    messagesInOneString(): string {
        return this._messages.map((m) => `${m.severity}: ${m.message}`).join('\n');
    }

    log(severity: Severity, message: string): void {
        if (this.ignore) return;
        const text = this._context === '' ? message : `${this._context}: ${message}`;
        this._messages.push({ severity, message: text });
        if (this.echo) {
            console.error(`[${severity}] ${text}`);
        }
    }

    clear(): void {
        this._messages.length = 0;
    }

    /**
     * Removes the logger from the stack. Messages stay readable.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        const index = Logger.stack.lastIndexOf(this);
        if (index !== -1) Logger.stack.splice(index, 1);
    }

    /**
     * Runs `fn` with `context` appended to this logger's context, restoring the
     * previous context afterwards.
     */
    withContext<R>(context: string, fn: () => R): R {
        const original = this._context;
        this._context = original === '' ? context : `${original}, ${context}`;
        try {
            return fn();
        } finally {
            this._context = original;
        }
    }

    /**
     * Clears the stack and the root logger. For tests.
     */
    static reset(): void {
        Logger.stack = [];
        Logger.root = null;
    }
}

/**
 * Root logger: not on the stack, echoes to stderr, keeps no backlog.
 */
class RootLogger extends Logger {
    constructor() {
        super({ echo: true });
        this.close();
    }

    override log(severity: Severity, message: string): void {
        super.log(severity, message);
        this.clear();
    }
}

export function log(severity: Severity, message: string): void {
    Logger.active().log(severity, message);
}

export function logDebug(message: string): void {
    log('debug', message);
}

export function logMessage(message: string): void {
    log('message', message);
}

export function logWarning(message: string): void {
    log('warning', message);
}

export function logCritical(message: string): void {
    log('critical', message);
}

/**
 * Sets a context on the active logger for the duration of `fn`.
 */
export function withLoggerContext<R>(context: string, fn: () => R): R {
    return Logger.active().withContext(context, fn);
}
