/**
 * @file ANSI 编码器
 *
 * 将光标、屏幕、样式和模式命令编码为精确的转义序列。
 * 所有函数都是纯函数；参数非法时抛出 RangeError（即使颜色随后会被丢弃）。
 *
 * 颜色输出不会超过协商的颜色模式：
 * - trueColor：原样输出
 * - color256：RGB 映射到 256 色索引
 * - color16：索引和 RGB 映射到最接近的 16 色
 * - monochrome：丢弃颜色，只保留属性
 */

import type { ColorMode } from "./capabilities.js";
import {
	ANSI_COLOR_NAMES,
	type AnsiColorName,
	assertColorIndex,
	assertRgb,
	color256To16,
	rgbTo16,
	rgbTo256,
	toAscii,
} from "./color-fallbacks.js";

const ESC = "\x1b";
const CSI = `${ESC}[`;
const BEL = "\x07";

export type NamedColor = AnsiColorName | "default";

export interface RgbColor {
	r: number;
	g: number;
	b: number;
}

/** 具名颜色、256 色索引或 RGB */
export type Color = NamedColor | number | RgbColor;

export type TextAttribute = "bold" | "dim" | "italic" | "underline" | "blink" | "reverse" | "hidden" | "strikethrough";

export interface Style {
	fg?: Color;
	bg?: Color;
	attrs?: readonly TextAttribute[];
}

export type CharacterSet = "unicode" | "ascii";

const ATTRIBUTE_ON: Record<TextAttribute, number> = {
	bold: 1,
	dim: 2,
	italic: 3,
	underline: 4,
	blink: 5,
	reverse: 7,
	hidden: 8,
	strikethrough: 9,
};

const ATTRIBUTE_OFF: Record<TextAttribute, number> = {
	bold: 22,
	dim: 22,
	italic: 23,
	underline: 24,
	blink: 25,
	reverse: 27,
	hidden: 28,
	strikethrough: 29,
};

/** DEC 私有模式编号 */
const MODE_CODES = {
	applicationCursor: 1,
	mouseX10: 9,
	cursorVisible: 25,
	mouseNormal: 1000,
	mouseButton: 1002,
	mouseAny: 1003,
	focusEvents: 1004,
	sgrMouse: 1006,
	alternateScreen: 1049,
	bracketedPaste: 2004,
} as const;

export type TerminalMode = keyof typeof MODE_CODES;

function assertCount(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 1) {
		throw new RangeError(`${name} must be an integer >= 1, got ${value}`);
	}
}

// 光标

export function cursorTo(row: number, col: number): string {
	assertCount("row", row);
	assertCount("col", col);
	return `${CSI}${row};${col}H`;
}

export function cursorUp(n = 1): string {
	assertCount("n", n);
	return `${CSI}${n}A`;
}

export function cursorDown(n = 1): string {
	assertCount("n", n);
	return `${CSI}${n}B`;
}

export function cursorForward(n = 1): string {
	assertCount("n", n);
	return `${CSI}${n}C`;
}

export function cursorBack(n = 1): string {
	assertCount("n", n);
	return `${CSI}${n}D`;
}

export function cursorShow(): string {
	return `${CSI}?25h`;
}

export function cursorHide(): string {
	return `${CSI}?25l`;
}

export function saveCursor(): string {
	return `${CSI}s`;
}

export function restoreCursor(): string {
	return `${CSI}u`;
}

// 屏幕

export function clearScreen(): string {
	return `${CSI}2J`;
}

export function clearScreenFromCursor(): string {
	return `${CSI}0J`;
}

export function clearScreenToCursor(): string {
	return `${CSI}1J`;
}

export function clearLine(): string {
	return `${CSI}2K`;
}

export function clearLineFromCursor(): string {
	return `${CSI}K`;
}

export function clearLineToCursor(): string {
	return `${CSI}1K`;
}

export function setScrollRegion(top: number, bottom: number): string {
	assertCount("top", top);
	assertCount("bottom", bottom);
	if (bottom <= top) {
		throw new RangeError(`scroll region bottom (${bottom}) must be greater than top (${top})`);
	}
	return `${CSI}${top};${bottom}r`;
}

export function scrollUp(n = 1): string {
	assertCount("n", n);
	return `${CSI}${n}S`;
}

export function scrollDown(n = 1): string {
	assertCount("n", n);
	return `${CSI}${n}T`;
}

/** OSC 0 设置窗口标题，标题不能包含 ESC 或 BEL */
export function setTitle(title: string): string {
	if (title.includes(ESC) || title.includes(BEL)) {
		throw new RangeError("title must not contain ESC or BEL");
	}
	return `${ESC}]0;${title}${BEL}`;
}

/** 请求终端以 ESC[8;rows;cols t 上报文本区域大小 */
export function requestWindowSize(): string {
	return `${CSI}18t`;
}

// 颜色

function namedIndex(name: NamedColor): number {
	if (name === "default") return -1;
	const index = ANSI_COLOR_NAMES.indexOf(name);
	if (index < 0) throw new RangeError(`unknown color name: ${String(name)}`);
	return index;
}

function namedParam(index: number, background: boolean): string {
	if (index < 0) return background ? "49" : "39";
	const base = index < 8 ? (background ? 40 : 30) + index : (background ? 100 : 90) + index - 8;
	return String(base);
}

export function foreground(name: NamedColor): string {
	return `${CSI}${namedParam(namedIndex(name), false)}m`;
}

export function background(name: NamedColor): string {
	return `${CSI}${namedParam(namedIndex(name), true)}m`;
}

export function foreground256(index: number): string {
	assertColorIndex(index);
	return `${CSI}38;5;${index}m`;
}

export function background256(index: number): string {
	assertColorIndex(index);
	return `${CSI}48;5;${index}m`;
}

export function foregroundRgb(r: number, g: number, b: number): string {
	assertRgb(r, g, b);
	return `${CSI}38;2;${r};${g};${b}m`;
}

export function backgroundRgb(r: number, g: number, b: number): string {
	assertRgb(r, g, b);
	return `${CSI}48;2;${r};${g};${b}m`;
}

/**
 * 颜色按颜色模式降级后的 SGR 参数。
 * 先校验再降级；单色模式返回空数组。
 */
export function colorParams(color: Color, mode: ColorMode, background = false): string[] {
	const prefix = background ? "48" : "38";

	if (typeof color === "string") {
		const index = namedIndex(color);
		return mode === "monochrome" ? [] : [namedParam(index, background)];
	}

	if (typeof color === "number") {
		assertColorIndex(color);
		if (mode === "monochrome") return [];
		if (mode === "color16") return [namedParam(color256To16(color), background)];
		return [prefix, "5", String(color)];
	}

	const { r, g, b } = color;
	assertRgb(r, g, b);
	switch (mode) {
		case "trueColor":
			return [prefix, "2", String(r), String(g), String(b)];
		case "color256":
			return [prefix, "5", String(rgbTo256(r, g, b))];
		case "color16":
			return [namedParam(rgbTo16(r, g, b), background)];
		case "monochrome":
			return [];
	}
}

// 属性

export function attribute(name: TextAttribute): string {
	return `${CSI}${ATTRIBUTE_ON[name]}m`;
}

export function attributeOff(name: TextAttribute): string {
	return `${CSI}${ATTRIBUTE_OFF[name]}m`;
}

export function reset(): string {
	return `${CSI}0m`;
}

/**
 * 将样式合并为一个 SGR 序列，顺序为属性、前景色、背景色。
 * 没有任何参数（例如单色模式下只有颜色）时返回空串。
 */
export function sgr(style: Style, mode: ColorMode = "trueColor"): string {
	const params: string[] = [];
	for (const attr of style.attrs ?? []) {
		const code = ATTRIBUTE_ON[attr];
		if (code === undefined) throw new RangeError(`unknown attribute: ${String(attr)}`);
		params.push(String(code));
	}
	if (style.fg !== undefined) params.push(...colorParams(style.fg, mode, false));
	if (style.bg !== undefined) params.push(...colorParams(style.bg, mode, true));
	return params.length === 0 ? "" : `${CSI}${params.join(";")}m`;
}

// 模式

export function enableMode(mode: TerminalMode): string {
	return `${CSI}?${MODE_CODES[mode]}h`;
}

export function disableMode(mode: TerminalMode): string {
	return `${CSI}?${MODE_CODES[mode]}l`;
}

// 命令

type CountedCommand = "cursorUp" | "cursorDown" | "cursorForward" | "cursorBack" | "scrollUp" | "scrollDown";

type SimpleCommand =
	| "cursorShow"
	| "cursorHide"
	| "saveCursor"
	| "restoreCursor"
	| "clearScreen"
	| "clearScreenFromCursor"
	| "clearScreenToCursor"
	| "clearLine"
	| "clearLineFromCursor"
	| "clearLineToCursor"
	| "reset"
	| "requestWindowSize";

export type Command =
	| { type: "cursorTo"; row: number; col: number }
	| { type: CountedCommand; n?: number }
	| { type: SimpleCommand }
	| { type: "setScrollRegion"; top: number; bottom: number }
	| { type: "style"; style: Style }
	| { type: "enableMode" | "disableMode"; mode: TerminalMode }
	| { type: "setTitle"; title: string }
	| { type: "text"; text: string };

const COUNTED: Record<CountedCommand, (n?: number) => string> = {
	cursorUp,
	cursorDown,
	cursorForward,
	cursorBack,
	scrollUp,
	scrollDown,
};

const SIMPLE: Record<SimpleCommand, () => string> = {
	cursorShow,
	cursorHide,
	saveCursor,
	restoreCursor,
	clearScreen,
	clearScreenFromCursor,
	clearScreenToCursor,
	clearLine,
	clearLineFromCursor,
	clearLineToCursor,
	reset,
	requestWindowSize,
};

export interface EncodeOptions {
	/** ascii 时 text 命令中的 Unicode 制表符替换为 ASCII */
	characterSet?: CharacterSet;
}

/** 编码单个命令 */
export function encode(command: Command, mode: ColorMode, options: EncodeOptions = {}): string {
	switch (command.type) {
		case "cursorTo":
			return cursorTo(command.row, command.col);
		case "cursorUp":
		case "cursorDown":
		case "cursorForward":
		case "cursorBack":
		case "scrollUp":
		case "scrollDown":
			return COUNTED[command.type](command.n);
		case "cursorShow":
		case "cursorHide":
		case "saveCursor":
		case "restoreCursor":
		case "clearScreen":
		case "clearScreenFromCursor":
		case "clearScreenToCursor":
		case "clearLine":
		case "clearLineFromCursor":
		case "clearLineToCursor":
		case "reset":
		case "requestWindowSize":
			return SIMPLE[command.type]();
		case "setScrollRegion":
			return setScrollRegion(command.top, command.bottom);
		case "style":
			return sgr(command.style, mode);
		case "enableMode":
			return enableMode(command.mode);
		case "disableMode":
			return disableMode(command.mode);
		case "setTitle":
			return setTitle(command.title);
		case "text":
			return options.characterSet === "ascii" ? toAscii(command.text) : command.text;
	}
}

export interface Encoder {
	readonly colorMode: ColorMode;
	readonly characterSet: CharacterSet;
	encode(command: Command): string;
	/** 依次编码并拼接 */
	encodeAll(commands: readonly Command[]): string;
	style(style: Style): string;
	/** 带样式的文本，末尾重置属性 */
	styled(text: string, style: Style): string;
}

/** 绑定协商结果的编码器 */
export function createEncoder(colorMode: ColorMode, options: EncodeOptions = {}): Encoder {
	const characterSet = options.characterSet ?? "unicode";
	const encodeOne = (command: Command) => encode(command, colorMode, { characterSet });
	return {
		colorMode,
		characterSet,
		encode: encodeOne,
		encodeAll: (commands) => commands.map(encodeOne).join(""),
		style: (style) => sgr(style, colorMode),
		styled(text, style) {
			const prefix = sgr(style, colorMode);
			const body = characterSet === "ascii" ? toAscii(text) : text;
			return prefix === "" ? body : `${prefix}${body}${reset()}`;
		},
	};
}
