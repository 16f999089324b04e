/**
 * @file 终端接口和实现
 *
 * 本文件定义了终端会话的抽象接口（Terminal），
 * 以及基于 process.stdin/stdout 的真实终端实现（ProcessTerminal）。
 *
 * ProcessTerminal 负责：
 * - 通过 BackendSelector 选择 raw 或 tty 后端
 * - 根据配置和终端能力启用备用屏幕、隐藏光标、括号粘贴、焦点事件、鼠标跟踪
 * - 记录每个已启用模式的撤销序列，停止时严格逆序恢复
 * - 通过 InputDecoder 将输入字节解码为事件
 * - Windows 平台的 VT 输入支持
 */

import {
	type Command,
	createEncoder,
	cursorDown,
	cursorHide,
	cursorShow,
	cursorTo,
	cursorUp,
	clearLineFromCursor,
	clearScreen,
	clearScreenFromCursor,
	disableMode,
	type Encoder,
	enableMode,
	reset,
	setTitle,
	type TerminalMode,
} from "./ansi.js";
import {
	type BackendSelection,
	BackendSelector,
	createProcessRawModeDriver,
	type RawInput,
	type RawModeDriver,
	type SizedOutput,
} from "./backend.js";
import { type Capabilities, type DetectOptions, getCapabilities } from "./capabilities.js";
import { effectiveCharacterSet, getConfig, type MouseTracking, type TermwireConfig } from "./config.js";
import { InputDecoder } from "./decoder.js";
import type { InputEvent } from "./events.js";
import { createLogger, type Logger } from "./log.js";
import { DEFAULT_TERMINAL_SIZE, getPlatform, type PlatformAdapter, type TerminalSize } from "./platform.js";

/** 终端会话使用的输入流 */
export interface TerminalInput extends RawInput {
	on(event: "data", listener: (chunk: Buffer | string) => void): unknown;
	removeListener(event: "data", listener: (chunk: Buffer | string) => void): unknown;
	resume(): unknown;
	pause(): unknown;
}

/** 终端会话使用的输出流 */
export interface TerminalOutput extends SizedOutput {
	write(data: string): unknown;
	on(event: "resize", listener: () => void): unknown;
	removeListener(event: "resize", listener: () => void): unknown;
}

/**
 * 终端会话的最小接口
 *
 * 可以用不同的实现替换（如测试用的模拟终端）。
 */
export interface Terminal {
	/** 使用事件处理器启动终端 */
	start(onInput: (event: InputEvent) => void, onResize?: (size: TerminalSize) => void): void;

	/** 停止终端并恢复状态，可重复调用 */
	stop(): void;

	/** 向终端写入输出 */
	write(data: string): void;

	/** 按协商的颜色模式编码并写入命令 */
	execute(commands: readonly Command[]): void;

	get columns(): number;
	get rows(): number;

	/** 当前会话使用的后端，未启动时为 undefined */
	get backend(): "raw" | "tty" | undefined;

	/** 当前会话使用的能力快照，未启动时为 undefined */
	get capabilities(): Capabilities | undefined;

	/** 相对移动光标（正数向下，负数向上） */
	moveBy(lines: number): void;

	hideCursor(): void;
	showCursor(): void;

	/** 从光标位置清除到行尾 */
	clearLine(): void;
	/** 从光标位置清除到屏幕末尾 */
	clearFromCursor(): void;
	/** 清除整个屏幕并将光标移到 (1,1) */
	clearScreen(): void;

	setTitle(title: string): void;
}

export interface ProcessTerminalOptions {
	stdin?: TerminalInput;
	stdout?: TerminalOutput;
	config?: TermwireConfig;
	driver?: RawModeDriver;
	platform?: PlatformAdapter;
	/** 获取能力快照，默认使用进程级缓存 */
	detect?: (options?: DetectOptions) => Capabilities;
	/** 向当前进程发送信号，用于启动时刷新终端尺寸 */
	signal?: (signal: NodeJS.Signals) => void;
	logger?: Logger;
}

const MOUSE_MODES: Record<MouseTracking, readonly TerminalMode[]> = {
	none: [],
	click: ["mouseNormal", "sgrMouse"],
	drag: ["mouseButton", "sgrMouse"],
	all: ["mouseAny", "sgrMouse"],
};

/** 鼠标跟踪级别对应需要启用的模式，按启用顺序排列 */
export function mouseTrackingModes(tracking: MouseTracking): readonly TerminalMode[] {
	return MOUSE_MODES[tracking];
}

/**
 * 基于 process.stdin/stdout 的真实终端实现
 *
 * 启动时会：
 * 1. 选择后端（自动选择时尝试原始模式）
 * 2. 按配置和能力启用终端模式，并记录撤销序列
 * 3. 开始解码输入并监听尺寸变化
 * 4. 在 Windows 上启用 VT 输入
 */
export class ProcessTerminal implements Terminal {
	private readonly stdin: TerminalInput;
	private readonly stdout: TerminalOutput;
	private readonly driver: RawModeDriver;
	private readonly selector: BackendSelector;
	private readonly platform: PlatformAdapter;
	private readonly detect: (options?: DetectOptions) => Capabilities;
	private readonly signal: (signal: NodeJS.Signals) => void;
	private readonly logger: Logger;
	private readonly configOverride: TermwireConfig | undefined;

	private readonly decoder = new InputDecoder();
	/** 已启用模式的撤销序列，停止时逆序写出 */
	private undoStack: string[] = [];
	private selection?: BackendSelection;
	/** 显式 raw 后端由本实例直接进入原始模式 */
	private ownsRawMode = false;
	private encoder?: Encoder;
	private _capabilities?: Capabilities;
	private started = false;
	private inputHandler?: (event: InputEvent) => void;
	private resizeCallback?: (size: TerminalSize) => void;
	private stdinDataHandler?: (chunk: Buffer | string) => void;
	private stdoutResizeHandler?: () => void;

	constructor(options: ProcessTerminalOptions = {}) {
		this.stdin = options.stdin ?? process.stdin;
		this.stdout = options.stdout ?? process.stdout;
		this.driver = options.driver ?? createProcessRawModeDriver(this.stdin, this.stdout);
		this.platform = options.platform ?? getPlatform();
		this.detect = options.detect ?? getCapabilities;
		this.signal = options.signal ?? ((signal) => process.kill(process.pid, signal));
		this.logger = options.logger ?? createLogger("terminal");
		this.configOverride = options.config;
		this.selector = new BackendSelector({ driver: this.driver, detect: this.detect, logger: this.logger });
	}

	get backend(): "raw" | "tty" | undefined {
		if (!this.selection) return undefined;
		return this.selection.kind === "explicit" ? this.selection.backend : this.selection.kind;
	}

	get capabilities(): Capabilities | undefined {
		return this._capabilities;
	}

	/** 当前启用的模式撤销序列（按启用顺序） */
	get activeModes(): readonly string[] {
		return this.undoStack;
	}

	start(onInput: (event: InputEvent) => void, onResize?: (size: TerminalSize) => void): void {
		if (this.started) throw new Error("Terminal already started");
		const config = this.configOverride ?? getConfig();
		const detectOptions: DetectOptions = { platform: this.platform, terminfo: config.terminfo };

		const selection = this.selector.select(
			config.backend === "auto"
				? "auto"
				: config.backend === "raw"
					? { backend: "raw", options: config.raw }
					: { backend: "tty", options: config.tty },
		);
		if (selection.kind === "explicit" && selection.backend === "raw") {
			const outcome = this.driver.enter();
			if (outcome.status !== "ok") {
				const detail = outcome.status === "error" ? `${outcome.status}: ${outcome.reason}` : outcome.status;
				throw new Error(`Raw backend requested but raw mode could not be entered (${detail})`);
			}
			this.ownsRawMode = true;
		}
		this.selection = selection;
		this.started = true;
		this.inputHandler = onInput;
		this.resizeCallback = onResize;

		const caps = selection.kind === "tty" ? selection.capabilities : this.detect(detectOptions);
		this._capabilities = caps;
		this.encoder = createEncoder(caps.colorMode, { characterSet: effectiveCharacterSet(config, caps) });
		this.logger.info("terminal started", { backend: this.backend, colorMode: caps.colorMode });

		if (this.backend === "raw") {
			const raw =
				selection.kind === "explicit" && selection.backend === "raw"
					? { ...config.raw, ...selection.options }
					: config.raw;
			if (raw.alternateScreen && caps.alternateScreen) this.enable("alternateScreen");
			if (raw.hideCursor) this.pushMode(cursorHide(), cursorShow());
			if (caps.bracketedPaste) this.enable("bracketedPaste");
			if (caps.focusEvents) this.enable("focusEvents");
			if (caps.mouse) {
				for (const mode of mouseTrackingModes(raw.mouseTracking)) this.enable(mode);
			}
		} else {
			const tty =
				selection.kind === "explicit" && selection.backend === "tty"
					? { ...config.tty, ...selection.options }
					: config.tty;
			if (tty.alternateScreen && caps.alternateScreen) this.enable("alternateScreen");
		}

		this.stdinDataHandler = (chunk) => this.handleInput(chunk);
		this.stdin.on("data", this.stdinDataHandler);
		this.stdin.resume();

		this.stdoutResizeHandler = () => this.handleResize();
		this.stdout.on("resize", this.stdoutResizeHandler);

		// 进程挂起期间丢失的 SIGWINCH 会让尺寸过期，启动时主动刷新
		if (this.platform.isUnix && this.platform.signalAvailable("SIGWINCH")) {
			this.signal("SIGWINCH");
		}

		// Windows 控制台需要在进入原始模式后开启 VT 输入，否则 Shift+Tab 等修饰键信息会丢失
		const windows = this.platform.windows();
		if (windows && this.backend === "raw") {
			this.logger.debug("windows vt input", { enabled: windows.enableVirtualTerminalInput() });
		}
	}

	stop(): void {
		if (!this.started) return;
		this.started = false;

		this.stdout.write(reset());
		while (this.undoStack.length > 0) {
			const undo = this.undoStack.pop();
			if (undo !== undefined) this.stdout.write(undo);
		}

		if (this.stdinDataHandler) {
			this.stdin.removeListener("data", this.stdinDataHandler);
			this.stdinDataHandler = undefined;
		}
		if (this.stdoutResizeHandler) {
			this.stdout.removeListener("resize", this.stdoutResizeHandler);
			this.stdoutResizeHandler = undefined;
		}
		this.inputHandler = undefined;
		this.resizeCallback = undefined;
		this.decoder.reset();

		// 暂停 stdin，避免缓冲的输入在退出原始模式后被 shell 解释
		this.stdin.pause();

		if (this.ownsRawMode) {
			this.driver.leave();
			this.ownsRawMode = false;
		}
		this.selector.release();
		this.selection = undefined;
		this.encoder = undefined;
		this.logger.info("terminal stopped");
	}

	write(data: string): void {
		this.stdout.write(data);
		this.logger.debug("write", { data });
	}

	execute(commands: readonly Command[]): void {
		if (!this.encoder) throw new Error("Terminal not started");
		this.write(this.encoder.encodeAll(commands));
	}

	get columns(): number {
		return this.stdout.columns || DEFAULT_TERMINAL_SIZE.cols;
	}

	get rows(): number {
		return this.stdout.rows || DEFAULT_TERMINAL_SIZE.rows;
	}

	moveBy(lines: number): void {
		if (lines > 0) {
			this.write(cursorDown(lines));
		} else if (lines < 0) {
			this.write(cursorUp(-lines));
		}
	}

	hideCursor(): void {
		this.write(cursorHide());
	}

	showCursor(): void {
		this.write(cursorShow());
	}

	clearLine(): void {
		this.write(clearLineFromCursor());
	}

	clearFromCursor(): void {
		this.write(clearScreenFromCursor());
	}

	clearScreen(): void {
		this.write(clearScreen() + cursorTo(1, 1));
	}

	setTitle(title: string): void {
		this.write(setTitle(title));
	}

	private enable(mode: TerminalMode): void {
		this.pushMode(enableMode(mode), disableMode(mode));
	}

	private pushMode(enableSequence: string, undoSequence: string): void {
		this.stdout.write(enableSequence);
		this.undoStack.push(undoSequence);
	}

	private handleInput(chunk: Buffer | string): void {
		const { events } = this.decoder.decode(chunk);
		// 终端在同一块中发送完整的转义序列；块末只剩 ESC、ESC [ 或 ESC O 时是 Escape 或 Alt 组合键
		if (this.decoder.pendingPrefixOnly) {
			events.push(...this.decoder.flush());
		}
		for (const event of events) {
			this.inputHandler?.(event);
		}
	}

	private handleResize(): void {
		const size = { rows: this.rows, cols: this.columns };
		this.inputHandler?.({ type: "resize", cols: size.cols, rows: size.rows });
		this.resizeCallback?.(size);
	}
}
