/**
 * @file 平台适配层
 *
 * 项目中唯一按操作系统分支的地方。其他模块通过 PlatformAdapter
 * 查询平台事实（系统家族、版本、WSL、可用特性和信号、terminfo 路径、终端尺寸）。
 *
 * Windows 只提供存根级支持：报告最低版本要求，
 * 通过控制台 API（koffi）查询 VT 序列是否启用，从不假设。
 */

import { spawnSync } from "node:child_process";
import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import { homedir, release as osRelease } from "node:os";
import { join } from "node:path";
import { createLogger, type Logger } from "./log.js";

const cjsRequire = createRequire(import.meta.url);

export type PlatformFamily = "linux" | "macos" | "freebsd" | "windows" | "unknown";

export type PlatformFeature = "signals" | "pty" | "terminfo" | "vtSequences";

export type OsVersion = readonly [major: number, minor: number, patch: number];

export type VtSupport = "enabled" | "disabled" | "unknown";

export interface TerminalSize {
	rows: number;
	cols: number;
}

/** 环境中可观察到的终端会话线索 */
export interface SessionHints {
	/** 运行在 Windows Terminal 中（WT_SESSION） */
	windowsTerminal: boolean;
}

export interface WindowsSupport {
	readonly minimumVersion: OsVersion;
	/** 当前系统版本是否满足最低要求；版本未知时为 false */
	readonly meetsMinimumVersion: boolean;
	/** 查询标准输出控制台是否启用了 VT 序列处理 */
	vtSupport(): VtSupport;
	/** 为标准输入开启 ENABLE_VIRTUAL_TERMINAL_INPUT，成功返回 true */
	enableVirtualTerminalInput(): boolean;
}

export interface PlatformInfo {
	family: PlatformFamily;
	osVersion: OsVersion | null;
	isWsl: boolean;
	features: PlatformFeature[];
	signals: NodeJS.Signals[];
	terminalSize: TerminalSize;
}

/** Windows 控制台句柄 */
export type ConsoleHandle = "input" | "output";

/** 控制台模式访问，默认实现基于 koffi 调用 kernel32 */
export interface ConsoleApi {
	getMode(handle: ConsoleHandle): number | null;
	setMode(handle: ConsoleHandle, mode: number): boolean;
}

export interface PlatformAdapterOptions {
	platform?: NodeJS.Platform;
	/** 系统版本字符串（os.release()） */
	release?: string;
	env?: NodeJS.ProcessEnv;
	homeDir?: string;
	/** 读取文本文件，文件不存在或不可读时返回 undefined */
	readFile?: (path: string) => string | undefined;
	stdout?: { columns?: number; rows?: number };
	/** 运行 stty size 并返回输出，失败返回 null */
	stty?: () => string | null;
	consoleApi?: ConsoleApi;
	logger?: Logger;
}

export interface PlatformAdapter {
	readonly family: PlatformFamily;
	readonly osVersion: OsVersion | null;
	readonly isUnix: boolean;
	readonly isWindows: boolean;
	readonly isWsl: boolean;
	supportsFeature(feature: PlatformFeature): boolean;
	supportedSignals(): NodeJS.Signals[];
	signalAvailable(signal: NodeJS.Signals): boolean;
	terminfoPaths(): string[];
	terminalSize(): TerminalSize;
	sessionHints(): SessionHints;
	/** 仅在 Windows 上返回存根支持信息 */
	windows(): WindowsSupport | null;
	info(): PlatformInfo;
}

export const WINDOWS_MINIMUM_VERSION: OsVersion = [10, 0, 10586];

export const DEFAULT_TERMINAL_SIZE: TerminalSize = { rows: 24, cols: 80 };

/** 行数或列数的上限，超出的值视为无效 */
export const MAX_TERMINAL_DIMENSION = 9999;

const UNIX_FEATURES: readonly PlatformFeature[] = ["signals", "pty", "terminfo", "vtSequences"];
const WINDOWS_FEATURES: readonly PlatformFeature[] = ["vtSequences"];

const UNIX_SIGNALS: readonly NodeJS.Signals[] = ["SIGWINCH", "SIGTERM", "SIGINT", "SIGHUP", "SIGUSR1", "SIGUSR2"];
// Node 在 Windows 上模拟了 SIGINT、SIGBREAK 和窗口大小变化时的 SIGWINCH
const WINDOWS_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGBREAK", "SIGWINCH"];

const SYSTEM_TERMINFO_DIRS = ["/usr/share/terminfo", "/usr/lib/terminfo", "/lib/terminfo", "/etc/terminfo"];

const ENABLE_VIRTUAL_TERMINAL_PROCESSING = 0x0004;
const ENABLE_VIRTUAL_TERMINAL_INPUT = 0x0200;

export function familyOf(platform: NodeJS.Platform): PlatformFamily {
	switch (platform) {
		case "linux":
			return "linux";
		case "darwin":
			return "macos";
		case "freebsd":
		case "openbsd":
		case "netbsd":
			return "freebsd";
		case "win32":
			return "windows";
		default:
			return "unknown";
	}
}

/** 解析 "10.0.19045" 或 "6.5.0-14-generic" 形式的版本号 */
export function parseOsVersion(release: string): OsVersion | null {
	const match = /^(\d+)\.(\d+)(?:\.(\d+))?/.exec(release);
	if (!match) return null;
	return [Number(match[1]), Number(match[2]), Number(match[3] ?? "0")];
}

export function compareVersions(a: OsVersion, b: OsVersion): number {
	for (let i = 0; i < 3; i++) {
		const diff = a[i] - b[i];
		if (diff !== 0) return diff;
	}
	return 0;
}

export function isValidDimension(value: number | undefined): value is number {
	return value !== undefined && Number.isInteger(value) && value >= 1 && value <= MAX_TERMINAL_DIMENSION;
}

function validSize(rows: number | undefined, cols: number | undefined): TerminalSize | null {
	return isValidDimension(rows) && isValidDimension(cols) ? { rows, cols } : null;
}

function envDimension(value: string | undefined): number | undefined {
	const trimmed = value?.trim();
	return trimmed && /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

/** 解析 stty size 的输出（"rows cols"） */
export function parseSttySize(output: string): TerminalSize | null {
	const match = /^\s*(\d+)\s+(\d+)\s*$/.exec(output);
	if (!match) return null;
	return validSize(Number(match[1]), Number(match[2]));
}

function runStty(): string | null {
	// stty 从标准输入读取终端尺寸
	const result = spawnSync("stty", ["size"], {
		encoding: "utf8",
		timeout: 1000,
		stdio: ["inherit", "pipe", "pipe"],
	});
	if (result.error || result.status !== 0) return null;
	return result.stdout;
}

function readTextFile(path: string): string | undefined {
	try {
		return readFileSync(path, { encoding: "utf8" });
	} catch {
		return undefined;
	}
}

/**
 * 基于 koffi 的 kernel32 控制台 API。
 * koffi 是可选依赖，动态加载；加载失败时返回 null，由调用方报告为 unknown。
 */
export function createKoffiConsoleApi(logger: Logger): ConsoleApi | null {
	let kernel32: {
		getStdHandle: (id: number) => unknown;
		getConsoleMode: (handle: unknown, out: Uint32Array) => boolean;
		setConsoleMode: (handle: unknown, mode: number) => boolean;
	};
	try {
		const koffi: typeof import("koffi") = cjsRequire("koffi");
		const k32 = koffi.load("kernel32.dll");
		kernel32 = {
			getStdHandle: k32.func("void* __stdcall GetStdHandle(int)"),
			getConsoleMode: k32.func("bool __stdcall GetConsoleMode(void*, _Out_ uint32_t*)"),
			setConsoleMode: k32.func("bool __stdcall SetConsoleMode(void*, uint32_t)"),
		};
	} catch (error) {
		logger.warn("console API unavailable", { error: String(error) });
		return null;
	}

	const STD_INPUT_HANDLE = -10;
	const STD_OUTPUT_HANDLE = -11;
	const handleOf = (handle: ConsoleHandle) =>
		kernel32.getStdHandle(handle === "input" ? STD_INPUT_HANDLE : STD_OUTPUT_HANDLE);

	return {
		getMode(handle) {
			const mode = new Uint32Array(1);
			if (!kernel32.getConsoleMode(handleOf(handle), mode)) return null;
			return mode[0] ?? null;
		},
		setMode(handle, mode) {
			return kernel32.setConsoleMode(handleOf(handle), mode);
		},
	};
}

class WindowsStub implements WindowsSupport {
	readonly minimumVersion = WINDOWS_MINIMUM_VERSION;
	readonly meetsMinimumVersion: boolean;
	private api: ConsoleApi | null | undefined;

	constructor(
		osVersion: OsVersion | null,
		private readonly resolveApi: () => ConsoleApi | null,
	) {
		this.meetsMinimumVersion = osVersion !== null && compareVersions(osVersion, WINDOWS_MINIMUM_VERSION) >= 0;
	}

	private consoleApi(): ConsoleApi | null {
		if (this.api === undefined) this.api = this.resolveApi();
		return this.api;
	}

	vtSupport(): VtSupport {
		const mode = this.consoleApi()?.getMode("output");
		if (mode === null || mode === undefined) return "unknown";
		return mode & ENABLE_VIRTUAL_TERMINAL_PROCESSING ? "enabled" : "disabled";
	}

	enableVirtualTerminalInput(): boolean {
		const api = this.consoleApi();
		const mode = api?.getMode("input");
		if (!api || mode === null || mode === undefined) return false;
		return api.setMode("input", mode | ENABLE_VIRTUAL_TERMINAL_INPUT);
	}
}

export function createPlatformAdapter(options: PlatformAdapterOptions = {}): PlatformAdapter {
	const platform = options.platform ?? process.platform;
	const env = options.env ?? process.env;
	const readFile = options.readFile ?? readTextFile;
	const stdout = options.stdout ?? process.stdout;
	const stty = options.stty ?? runStty;
	const logger = options.logger ?? createLogger("platform", { env });
	const family = familyOf(platform);
	const osVersion = parseOsVersion(options.release ?? osRelease());
	const isWindows = family === "windows";
	const isUnix = family === "linux" || family === "macos" || family === "freebsd";

	const procVersion = family === "linux" ? (readFile("/proc/version") ?? "").toLowerCase() : "";
	const isWsl = procVersion.includes("microsoft") || procVersion.includes("wsl");

	const features: readonly PlatformFeature[] = isUnix ? UNIX_FEATURES : isWindows ? WINDOWS_FEATURES : [];
	const signals: readonly NodeJS.Signals[] = isUnix ? UNIX_SIGNALS : isWindows ? WINDOWS_SIGNALS : [];

	const windowsStub = isWindows
		? new WindowsStub(osVersion, () =>
				options.consoleApi !== undefined ? options.consoleApi : createKoffiConsoleApi(logger),
			)
		: null;

	const adapter: PlatformAdapter = {
		family,
		osVersion,
		isUnix,
		isWindows,
		isWsl,
		supportsFeature: (feature) => features.includes(feature),
		supportedSignals: () => [...signals],
		signalAvailable: (signal) => signals.includes(signal),
		terminfoPaths() {
			if (!isUnix) return [];
			const home = options.homeDir ?? env.HOME ?? homedir();
			const paths = env.TERMINFO ? [env.TERMINFO] : [];
			return [...paths, join(home, ".terminfo"), ...SYSTEM_TERMINFO_DIRS];
		},
		/** 依次尝试输出流、LINES/COLUMNS 和 stty size，都无效时使用 24x80 */
		terminalSize() {
			const fromStream = validSize(stdout.rows, stdout.columns);
			if (fromStream) return fromStream;
			const fromEnv = validSize(envDimension(env.LINES), envDimension(env.COLUMNS));
			if (fromEnv) return fromEnv;
			if (isUnix) {
				const output = stty();
				const fromStty = output === null ? null : parseSttySize(output);
				if (fromStty) return fromStty;
			}
			return { ...DEFAULT_TERMINAL_SIZE };
		},
		sessionHints: () => ({ windowsTerminal: Boolean(env.WT_SESSION) }),
		windows: () => windowsStub,
		info: () => ({
			family,
			osVersion,
			isWsl,
			features: [...features],
			signals: [...signals],
			terminalSize: adapter.terminalSize(),
		}),
	};
	return adapter;
}

let defaultPlatform: PlatformAdapter | undefined;

/** 当前进程的平台适配器（惰性创建） */
export function getPlatform(): PlatformAdapter {
	defaultPlatform ??= createPlatformAdapter();
	return defaultPlatform;
}
