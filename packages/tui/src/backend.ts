/**
 * @file 后端选择
 *
 * 判断原始模式是否可用的唯一可靠方法是实际尝试进入原始模式。
 * 选择器从不根据环境变量推断，而是调用原始模式驱动并根据真实结果分支：
 *
 * - 成功：使用 raw 后端，终端已处于原始模式
 * - 已被占用或不支持：回退到 tty 后端，附带检测到的终端能力
 * - 其他错误：回退到 tty 后端，并附带错误原因
 *
 * 每个选择器最多尝试一次，之后返回缓存的结果；release() 之后可以重新选择。
 */

import { type Capabilities, type DetectOptions, getCapabilities } from "./capabilities.js";
import type { RawOptions, TtyOptions } from "./config.js";
import { createLogger, type Logger } from "./log.js";
import type { TerminalSize } from "./platform.js";

export type RawModeOutcome =
	| { status: "ok" }
	| { status: "already-claimed" }
	| { status: "unsupported" }
	| { status: "error"; reason: string };

/**
 * 原始模式驱动
 *
 * 抽象出进入/离开原始模式的底层操作，便于测试时替换。
 */
export interface RawModeDriver {
	enter(): RawModeOutcome;
	leave(): void;
	/** 输入输出是否都连接到终端 */
	isTerminal(): boolean;
	dimensions(): TerminalSize | null;
}

/** process.stdin 上用到的部分 */
export interface RawInput {
	isTTY?: boolean;
	isRaw?: boolean;
	setRawMode?(mode: boolean): unknown;
}

/** process.stdout 上用到的部分 */
export interface SizedOutput {
	isTTY?: boolean;
	columns?: number;
	rows?: number;
}

// 这些错误码表示终端已经被其他进程或 shell 占用
const CLAIMED_ERROR_CODES = new Set(["EIO", "EBUSY", "EPERM"]);

function errorCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}

export function createProcessRawModeDriver(
	stdin: RawInput = process.stdin,
	stdout: SizedOutput = process.stdout,
): RawModeDriver {
	let entered = false;
	return {
		enter() {
			if (!stdin.isTTY || !stdin.setRawMode) return { status: "unsupported" };
			if (stdin.isRaw) return { status: "already-claimed" };
			try {
				stdin.setRawMode(true);
			} catch (error) {
				const code = errorCode(error);
				if (code && CLAIMED_ERROR_CODES.has(code)) return { status: "already-claimed" };
				return { status: "error", reason: error instanceof Error ? error.message : String(error) };
			}
			entered = true;
			return { status: "ok" };
		},
		leave() {
			if (!entered) return;
			entered = false;
			stdin.setRawMode?.(false);
		},
		isTerminal: () => Boolean(stdin.isTTY && stdout.isTTY),
		dimensions() {
			const { columns, rows } = stdout;
			return columns && rows ? { rows, cols: columns } : null;
		},
	};
}

export interface RawState {
	rawModeStarted: true;
}

/** tty 后端使用的能力信息 */
export type TtyCapabilities = Capabilities & {
	readonly terminal: boolean;
	readonly dimensions: TerminalSize | null;
	/** 尝试进入原始模式时的意外错误 */
	readonly rawModeError?: string;
};

export type ExplicitBackend =
	| "raw"
	| "tty"
	| { backend: "raw"; options?: Partial<RawOptions> }
	| { backend: "tty"; options?: Partial<TtyOptions> };

export type ExplicitSelection =
	| { kind: "explicit"; backend: "raw"; options: Partial<RawOptions> }
	| { kind: "explicit"; backend: "tty"; options: Partial<TtyOptions> };

export type AutoSelection = { kind: "raw"; state: RawState } | { kind: "tty"; capabilities: TtyCapabilities };

export type BackendSelection = AutoSelection | ExplicitSelection;

export interface BackendSelectorOptions {
	driver?: RawModeDriver;
	/** tty 回退时获取能力快照，默认使用进程级缓存 */
	detect?: (options?: DetectOptions) => Capabilities;
	detectOptions?: DetectOptions;
	logger?: Logger;
}

function explicitSelection(request: ExplicitBackend): ExplicitSelection {
	if (request === "raw") return { kind: "explicit", backend: "raw", options: {} };
	if (request === "tty") return { kind: "explicit", backend: "tty", options: {} };
	if (request.backend === "raw") return { kind: "explicit", backend: "raw", options: request.options ?? {} };
	return { kind: "explicit", backend: "tty", options: request.options ?? {} };
}

export class BackendSelector {
	private readonly driver: RawModeDriver;
	private readonly detect: (options?: DetectOptions) => Capabilities;
	private readonly detectOptions: DetectOptions | undefined;
	private readonly logger: Logger;
	private result: AutoSelection | undefined;

	constructor(options: BackendSelectorOptions = {}) {
		this.driver = options.driver ?? createProcessRawModeDriver();
		this.detect = options.detect ?? getCapabilities;
		this.detectOptions = options.detectOptions;
		this.logger = options.logger ?? createLogger("backend");
	}

	/** 当前缓存的自动选择结果 */
	get current(): AutoSelection | undefined {
		return this.result;
	}

	/**
	 * 选择后端。无参数或 "auto" 时尝试原始模式；
	 * 显式请求原样返回，不触碰终端。
	 */
	select(request: "auto" | ExplicitBackend = "auto"): BackendSelection {
		if (request !== "auto") return explicitSelection(request);
		if (this.result) return this.result;

		const outcome = this.driver.enter();
		this.logger.info("raw mode attempt", { outcome: outcome.status });

		if (outcome.status === "ok") {
			this.result = { kind: "raw", state: { rawModeStarted: true } };
		} else {
			this.result = { kind: "tty", capabilities: this.ttyCapabilities(outcome) };
		}
		return this.result;
	}

	/** 离开原始模式（如果进入过）并允许重新选择 */
	release(): void {
		if (this.result?.kind === "raw") {
			this.driver.leave();
		}
		this.result = undefined;
	}

	private ttyCapabilities(outcome: RawModeOutcome): TtyCapabilities {
		const base = {
			...this.detect(this.detectOptions),
			terminal: this.driver.isTerminal(),
			dimensions: this.driver.dimensions(),
		};
		if (outcome.status === "error") {
			this.logger.warn("raw mode failed, using tty backend", { reason: outcome.reason });
			return Object.freeze({ ...base, rawModeError: outcome.reason });
		}
		return Object.freeze(base);
	}
}

let defaultSelector: BackendSelector | undefined;

function getDefaultSelector(): BackendSelector {
	defaultSelector ??= new BackendSelector();
	return defaultSelector;
}

/** 使用进程级选择器选择后端 */
export function selectBackend(request: "auto" | ExplicitBackend = "auto"): BackendSelection {
	return getDefaultSelector().select(request);
}

export function releaseBackend(): void {
	defaultSelector?.release();
}
