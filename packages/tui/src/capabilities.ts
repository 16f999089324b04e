/**
 * @file 终端能力检测
 *
 * 根据环境变量和 terminfo 数据库判断终端的颜色深度、Unicode 和交互特性。
 * 检测按固定顺序进行，每一步只能提升颜色等级，不能降低：
 *
 * 1. TERM 精确匹配（linux、dumb）确定基线
 * 2. TERM 模式匹配（truecolor、24bit、256color，xterm/screen/tmux 前缀）
 * 3. COLORTERM
 * 4. TERM_PROGRAM 白名单和平台会话线索
 * 5. 区域设置决定 Unicode
 * 6. 可选的 infocmp 查询（带超时）
 * 7. 根据最终颜色数推导鼠标、括号粘贴、焦点事件
 *
 * 检测从不抛出异常，没有任何信号时返回保守默认值。
 * 结果是冻结的快照，缓存在进程内，显式失效后重新检测。
 */

import { spawnSync } from "node:child_process";
import { createLogger, type Logger } from "./log.js";
import { getPlatform, type PlatformAdapter } from "./platform.js";

export type ColorMode = "monochrome" | "color16" | "color256" | "trueColor";

export interface Capabilities {
	readonly colorMode: ColorMode;
	readonly maxColors: number;
	readonly unicode: boolean;
	readonly mouse: boolean;
	readonly bracketedPaste: boolean;
	readonly focusEvents: boolean;
	readonly alternateScreen: boolean;
	/** TERM 的值 */
	readonly terminalType: string | null;
	/** TERM_PROGRAM 的值 */
	readonly terminalProgram: string | null;
}

export const TRUE_COLOR_COUNT = 16_777_216;

const COLOR_RANK: Record<ColorMode, number> = { monochrome: 0, color16: 1, color256: 2, trueColor: 3 };

const COLOR_COUNT: Record<ColorMode, number> = {
	monochrome: 2,
	color16: 16,
	color256: 256,
	trueColor: TRUE_COLOR_COUNT,
};

/** 已知支持真彩色的终端程序 */
export const TRUE_COLOR_PROGRAMS: readonly string[] = ["iTerm.app", "vscode", "WezTerm", "kitty", "Alacritty", "Hyper", "ghostty"];

/** 已知支持 256 色的终端程序 */
export const COLOR_256_PROGRAMS: readonly string[] = ["Apple_Terminal", "gnome-terminal", "konsole", "xfce4-terminal"];

export const DEFAULT_CAPABILITIES: Capabilities = Object.freeze({
	colorMode: "color16",
	maxColors: 16,
	unicode: false,
	mouse: false,
	bracketedPaste: false,
	focusEvents: false,
	alternateScreen: true,
	terminalType: null,
	terminalProgram: null,
});

export function colorModeRank(mode: ColorMode): number {
	return COLOR_RANK[mode];
}

/** 只在目标模式等级更高时升级 */
export function upgradeColorMode(current: ColorMode, candidate: ColorMode): ColorMode {
	return COLOR_RANK[candidate] > COLOR_RANK[current] ? candidate : current;
}

export function supportsTrueColor(caps: Capabilities): boolean {
	return caps.colorMode === "trueColor";
}

export function supports256Color(caps: Capabilities): boolean {
	return COLOR_RANK[caps.colorMode] >= COLOR_RANK.color256;
}

/** 在给定环境中查询 terminfo 的颜色数，失败返回 null */
export type TerminfoQuery = (term: string, timeoutMs: number, env: NodeJS.ProcessEnv) => number | null;

export interface DetectOptions {
	env?: NodeJS.ProcessEnv;
	platform?: PlatformAdapter;
	terminfo?: { enabled?: boolean; timeoutMs?: number };
	queryTerminfo?: TerminfoQuery;
	logger?: Logger;
}

/** 从 infocmp 输出中解析 colors#N，支持十进制和 0x 十六进制 */
export function parseTerminfoColors(output: string): number | null {
	const match = /(?:^|[\s,])colors[#=](0x[0-9a-fA-F]+|\d+)/.exec(output);
	if (!match?.[1]) return null;
	const value = match[1].startsWith("0x") ? Number.parseInt(match[1].slice(2), 16) : Number.parseInt(match[1], 10);
	return Number.isFinite(value) ? value : null;
}

/** 运行 infocmp -1，受超时限制；任何失败都视为没有信息 */
export const queryInfocmp: TerminfoQuery = (term, timeoutMs, env) => {
	const result = spawnSync("infocmp", ["-1", term], {
		encoding: "utf8",
		timeout: timeoutMs,
		env: { ...env, TERM: term },
	});
	if (result.error || result.status !== 0) return null;
	return parseTerminfoColors(result.stdout);
};

interface DetectionState {
	colorMode: ColorMode;
	maxColors: number;
	mouse: boolean;
	bracketedPaste: boolean;
	focusEvents: boolean;
}

function raise(state: DetectionState, mode: ColorMode, maxColors = COLOR_COUNT[mode]): void {
	state.colorMode = upgradeColorMode(state.colorMode, mode);
	state.maxColors = Math.max(state.maxColors, maxColors);
}

/** TERM 检测，精确匹配确定基线（dumb 降为单色） */
function applyTerm(state: DetectionState, term: string): void {
	if (term === "dumb") {
		state.colorMode = "monochrome";
		state.maxColors = COLOR_COUNT.monochrome;
		return;
	}
	if (term === "linux") {
		raise(state, "color16");
		return;
	}
	if (term.includes("truecolor") || term.includes("24bit")) {
		raise(state, "trueColor");
	} else if (term.includes("256color")) {
		raise(state, "color256");
	} else if (term.startsWith("xterm") || term.startsWith("screen") || term.startsWith("tmux")) {
		raise(state, "color256");
	}
}

function applyTrueColorProgram(state: DetectionState): void {
	raise(state, "trueColor");
	state.mouse = true;
	state.bracketedPaste = true;
	state.focusEvents = true;
}

function applyTerminfoColors(state: DetectionState, colors: number): void {
	if (colors >= TRUE_COLOR_COUNT) {
		raise(state, "trueColor", colors);
	} else if (colors >= 256) {
		raise(state, "color256", colors);
	} else if (colors >= 16) {
		raise(state, "color16", colors);
	} else if (colors >= 8) {
		state.maxColors = Math.max(state.maxColors, colors);
	}
}

function detectUnicode(env: NodeJS.ProcessEnv): boolean {
	const locale = [env.LC_ALL, env.LC_CTYPE, env.LANG].find((value) => value !== undefined && value !== "") ?? "";
	const normalized = locale.toLowerCase();
	return normalized.includes("utf-8") || normalized.includes("utf8");
}

/**
 * 检测终端能力，从不抛出异常。
 */
export function detectCapabilities(options: DetectOptions = {}): Capabilities {
	const env = options.env ?? process.env;
	const platform = options.platform ?? getPlatform();
	const logger = options.logger ?? createLogger("capabilities", { env });
	const term = env.TERM || null;
	const program = env.TERM_PROGRAM || null;

	const state: DetectionState = {
		colorMode: DEFAULT_CAPABILITIES.colorMode,
		maxColors: DEFAULT_CAPABILITIES.maxColors,
		mouse: false,
		bracketedPaste: false,
		focusEvents: false,
	};

	if (term) applyTerm(state, term);

	const colorterm = env.COLORTERM ?? "";
	if (colorterm === "truecolor" || colorterm === "24bit") {
		raise(state, "trueColor");
	}

	if (program && TRUE_COLOR_PROGRAMS.includes(program)) {
		applyTrueColorProgram(state);
	} else if (program && COLOR_256_PROGRAMS.includes(program)) {
		raise(state, "color256");
		state.mouse = true;
		state.bracketedPaste = true;
	}
	if (platform.sessionHints().windowsTerminal) {
		applyTrueColorProgram(state);
	}

	const unicode = detectUnicode(env);

	// 没有 TERM 时没有可查询的终端类型
	const terminfoEnabled = options.terminfo?.enabled ?? true;
	if (term && terminfoEnabled && platform.supportsFeature("terminfo")) {
		const query = options.queryTerminfo ?? queryInfocmp;
		let colors: number | null = null;
		try {
			colors = query(term, options.terminfo?.timeoutMs ?? 1000, env);
		} catch (error) {
			logger.debug("terminfo query failed", { error: String(error) });
		}
		if (colors !== null) applyTerminfoColors(state, colors);
	}

	if (state.maxColors >= 256) {
		state.mouse = true;
		state.bracketedPaste = true;
	}
	if (state.maxColors >= TRUE_COLOR_COUNT) {
		state.focusEvents = true;
	}

	const caps: Capabilities = Object.freeze({
		colorMode: state.colorMode,
		maxColors: state.maxColors,
		unicode,
		mouse: state.mouse,
		bracketedPaste: state.bracketedPaste,
		focusEvents: state.focusEvents,
		alternateScreen: true,
		terminalType: term,
		terminalProgram: program,
	});
	logger.debug("capabilities detected", { colorMode: caps.colorMode, maxColors: caps.maxColors, unicode });
	return caps;
}

/**
 * 能力快照缓存
 *
 * 快照通过替换引用原子更新，读者不会看到半更新的结果。
 */
export class CapabilityCache {
	private snapshot: Capabilities | undefined;

	constructor(private readonly detect: (options?: DetectOptions) => Capabilities = detectCapabilities) {}

	/** 返回缓存的快照，没有时检测一次 */
	get(options?: DetectOptions): Capabilities {
		if (!this.snapshot) this.snapshot = this.detect(options);
		return this.snapshot;
	}

	/** 重新检测并替换缓存 */
	refresh(options?: DetectOptions): Capabilities {
		const next = this.detect(options);
		this.snapshot = next;
		return next;
	}

	peek(): Capabilities | undefined {
		return this.snapshot;
	}

	invalidate(): void {
		this.snapshot = undefined;
	}
}

const defaultCache = new CapabilityCache();

/** 进程级缓存的能力快照 */
export function getCapabilities(options?: DetectOptions): Capabilities {
	return defaultCache.get(options);
}

/** 清除进程级缓存（可重复调用） */
export function clearCapabilitiesCache(): void {
	defaultCache.invalidate();
}
