/**
 * @file 日志模块
 *
 * 终端会话占用 stdout，日志不能直接写到终端上。
 * 默认只在设置了 TERMWIRE_LOG 时追加写入该文件；
 * 命令行工具可以额外打开 stderr 输出（使用 chalk 着色）。
 *
 * 行格式：[HH:MM:SS] LEVEL scope: message {data}
 */

import { appendFileSync } from "node:fs";
import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LoggerOptions {
	/** 日志文件路径，默认读取 TERMWIRE_LOG */
	path?: string;
	/** 最低级别，默认读取 TERMWIRE_LOG_LEVEL，否则为 info */
	level?: LogLevel;
	/** 同时输出到 stderr */
	console?: boolean;
	env?: NodeJS.ProcessEnv;
	now?: () => Date;
}

export interface Logger {
	readonly scope: string;
	/** 是否有任何输出目标 */
	readonly enabled: boolean;
	/** 文件写入失败时记录的错误，之后文件输出被关闭 */
	readonly sinkError: Error | undefined;
	debug(message: string, data?: Record<string, unknown>): void;
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	child(scope: string): Logger;
}

/**
 * 生成当前时间戳字符串
 * @returns 格式为 [HH:MM:SS] 的时间戳
 */
export function timestamp(now: Date = new Date()): string {
	const hh = String(now.getHours()).padStart(2, "0");
	const mm = String(now.getMinutes()).padStart(2, "0");
	const ss = String(now.getSeconds()).padStart(2, "0");
	return `[${hh}:${mm}:${ss}]`;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
	return value === "debug" || value === "info" || value === "warn" || value === "error";
}

const CONSOLE_COLORS: Record<LogLevel, (text: string) => string> = {
	debug: chalk.dim,
	info: chalk.blue,
	warn: chalk.yellow,
	error: chalk.red,
};

class ScopedLogger implements Logger {
	private path: string | undefined;
	private _sinkError: Error | undefined;

	constructor(
		readonly scope: string,
		private readonly level: LogLevel,
		path: string | undefined,
		private readonly toConsole: boolean,
		private readonly now: () => Date,
	) {
		this.path = path;
	}

	get enabled(): boolean {
		return this.path !== undefined || this.toConsole;
	}

	get sinkError(): Error | undefined {
		return this._sinkError;
	}

	debug(message: string, data?: Record<string, unknown>): void {
		this.write("debug", message, data);
	}

	info(message: string, data?: Record<string, unknown>): void {
		this.write("info", message, data);
	}

	warn(message: string, data?: Record<string, unknown>): void {
		this.write("warn", message, data);
	}

	error(message: string, data?: Record<string, unknown>): void {
		this.write("error", message, data);
	}

	child(scope: string): Logger {
		return new ScopedLogger(`${this.scope}:${scope}`, this.level, this.path, this.toConsole, this.now);
	}

	private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
		if (!this.enabled || LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
		const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
		const line = `${timestamp(this.now())} ${level.toUpperCase()} ${this.scope}: ${message}${suffix}`;

		if (this.toConsole) {
			process.stderr.write(`${CONSOLE_COLORS[level](line)}\n`);
		}
		if (this.path !== undefined) {
			try {
				appendFileSync(this.path, `${line}\n`, { encoding: "utf8" });
			} catch (error) {
				// 写入失败后关闭文件输出，日志不能影响终端会话
				this._sinkError = error instanceof Error ? error : new Error(String(error));
				this.path = undefined;
			}
		}
	}
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
	const env = options.env ?? process.env;
	const envLevel = env.TERMWIRE_LOG_LEVEL;
	const level = options.level ?? (isLogLevel(envLevel) ? envLevel : "info");
	const path = options.path ?? (env.TERMWIRE_LOG || undefined);
	return new ScopedLogger(scope, level, path, options.console ?? false, options.now ?? (() => new Date()));
}
