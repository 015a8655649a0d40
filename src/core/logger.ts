/**
 * 日志级别
 * EN: Log levels
 */
export enum LogLevel {
    Debug = 0,
    Info = 1,
    Warn = 2,
    Error = 3,
    Fatal = 4,
    /** 关闭全部输出 EN: Emit nothing */
    Silent = 5,
}

type LogContext = Record<string, unknown>;

/**
 * 日志条目
 * EN: Log entry handed to a sink
 */
export interface LogEntry {
    timestamp: Date;
    level: LogLevel;
    /** 点分日志器名称，如 "bsonkit.raw" EN: Dotted logger name such as "bsonkit.raw" */
    name: string;
    message: string;
    context?: LogContext;
}

/**
 * 日志输出目标
 * EN: Where log entries are written
 */
export type LogSink = (entry: LogEntry) => void;

export interface ILogger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
    fatal(message: string, context?: LogContext): void;
}

// bigint 不能直接 JSON 序列化
// EN: bigint is not JSON-serializable as is
function jsonReplacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * 默认输出：一行文本写到对应级别的 console 方法
 * EN: Default sink; one text line per entry on the console method for its level
 */
export const consoleSink: LogSink = (entry) => {
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context, jsonReplacer)}` : '';
    const line =
        `[${entry.timestamp.toISOString()}] ${LogLevel[entry.level].toUpperCase()} [${entry.name}] ` +
        `${entry.message}${contextStr}`;

    switch (entry.level) {
        case LogLevel.Debug:
            console.debug(line);
            break;
        case LogLevel.Info:
            console.info(line);
            break;
        case LogLevel.Warn:
            console.warn(line);
            break;
        default:
            console.error(line);
            break;
    }
};

/**
 * 分层日志器：子日志器共享根的级别和输出目标
 * EN: Hierarchical logger; children share the root's level and sink
 *
 * 模块在加载时创建子日志器，因此之后对根调用 `setLevel` 或 `setSink`
 * 也会作用于它们。
 * EN: Modules create their children at load time, so a later `setLevel` or
 * `setSink` on the root still reaches them.
 */
export class LoggerImpl implements ILogger {
    private minLevel: LogLevel;
    private sink: LogSink = consoleSink;

    constructor(
        private readonly name: string = 'bsonkit',
        minLevel: LogLevel = LogLevel.Info,
        private readonly parent?: LoggerImpl
    ) {
        this.minLevel = minLevel;
    }

    get level(): LogLevel {
        return this.parent ? this.parent.level : this.minLevel;
    }

    isEnabled(level: LogLevel): boolean {
        return level !== LogLevel.Silent && level >= this.level;
    }

    private get output(): LogSink {
        return this.parent ? this.parent.output : this.sink;
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (!this.isEnabled(level)) {
            return;
        }
        this.output({ timestamp: new Date(), level, name: this.name, message, context });
    }

    debug(message: string, context?: LogContext): void {
        this.log(LogLevel.Debug, message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log(LogLevel.Info, message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log(LogLevel.Warn, message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log(LogLevel.Error, message, context);
    }

    fatal(message: string, context?: LogContext): void {
        this.log(LogLevel.Fatal, message, context);
    }

    child(name: string): LoggerImpl {
        return new LoggerImpl(`${this.name}.${name}`, this.minLevel, this);
    }

    /**
     * 设置最小级别；在子日志器上调用时作用于根
     * EN: Set the minimum level; on a child this applies to the root
     */
    setLevel(level: LogLevel): void {
        if (this.parent) {
            this.parent.setLevel(level);
            return;
        }
        this.minLevel = level;
    }

    /**
     * 替换输出目标；在子日志器上调用时作用于根
     * EN: Replace the sink; on a child this applies to the root
     */
    setSink(sink: LogSink): void {
        if (this.parent) {
            this.parent.setSink(sink);
            return;
        }
        this.sink = sink;
    }
}

/**
 * 库的根日志器，默认级别 Info
 * EN: The library's root logger, Info by default
 */
export const logger = new LoggerImpl();

/**
 * 静态门面
 * EN: Static facade
 */
export const Logger = {
    debug: (message: string, context?: LogContext) => logger.debug(message, context),
    info: (message: string, context?: LogContext) => logger.info(message, context),
    warn: (message: string, context?: LogContext) => logger.warn(message, context),
    error: (message: string, context?: LogContext) => logger.error(message, context),
    fatal: (message: string, context?: LogContext) => logger.fatal(message, context),
    child: (name: string) => logger.child(name),
    setLevel: (level: LogLevel) => logger.setLevel(level),
    setSink: (sink: LogSink) => logger.setSink(sink),
};
