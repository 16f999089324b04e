/**
 * @file 转义序列解码器
 *
 * 将终端输入字节流解码为结构化的输入事件。
 * 解码器是可恢复的状态机：一次调用末尾未完成的序列会保留在解码器中，
 * 由下一次调用的字节补全。
 *
 * 支持的输入：
 * - 可打印字符（含多字节 UTF-8，可跨块拆分）和控制字节
 * - ESC 前缀的 Alt 组合键
 * - CSI 和 SS3 功能键（方向键、Home/End、F1-F12 等），含 xterm 修饰键参数
 * - X10 和 SGR 两种鼠标上报格式
 * - 括号粘贴（ESC[200~ ... ESC[201~）
 * - 焦点事件（ESC[I / ESC[O）和窗口大小上报（ESC[8;rows;cols t）
 *
 * 截断策略：decode() 总是保留未完成的尾部序列并通过 remaining 返回其字节。
 * 调用方确认输入已静止或结束时调用 flush()。
 */

import { type InputEvent, type KeyEvent, keyEvent, type Modifier, type MouseButton, type MouseEvent } from "./events.js";
import { isValidDimension } from "./platform.js";

export type DecoderMode = "ground" | "escape" | "csi" | "ss3" | "x10Mouse" | "sgrMouse" | "utf8" | "paste";

export interface DecodeResult {
	events: InputEvent[];
	/** 尚未组成完整序列的字节 */
	remaining: Buffer;
}

const ESC = 0x1b;
const DEL = 0x7f;
const LEFT_BRACKET = 0x5b;
const LETTER_O = 0x4f;
const LETTER_M = 0x4d;
const LESS_THAN = 0x3c;

/** CSI 序列的最大长度，超出视为畸形并丢弃 */
const MAX_SEQUENCE_LENGTH = 64;

const PASTE_START = Buffer.from("\x1b[200~");
const PASTE_END = Buffer.from("\x1b[201~");

/** ESC [ n ~ 的数字编码表 */
const TILDE_KEYS: Readonly<Record<number, string>> = {
	1: "home",
	2: "insert",
	3: "delete",
	4: "end",
	5: "pageUp",
	6: "pageDown",
	7: "home",
	8: "end",
	11: "f1",
	12: "f2",
	13: "f3",
	14: "f4",
	15: "f5",
	17: "f6",
	18: "f7",
	19: "f8",
	20: "f9",
	21: "f10",
	23: "f11",
	24: "f12",
};

const CSI_LETTER_KEYS: Readonly<Record<string, string>> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	F: "end",
	H: "home",
	P: "f1",
	Q: "f2",
	R: "f3",
	S: "f4",
};

const SS3_KEYS: Readonly<Record<string, string>> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	F: "end",
	H: "home",
	P: "f1",
	Q: "f2",
	R: "f3",
	S: "f4",
};

const CTRL_PUNCTUATION: Readonly<Record<number, string>> = {
	28: "\\",
	29: "]",
	30: "^",
	31: "_",
};

/** xterm 修饰键参数 m：m - 1 的位 1 shift、2 alt、4 ctrl、8 meta */
function decodeKeyModifiers(param: number): Modifier[] {
	const bits = param - 1;
	const modifiers: Modifier[] = [];
	if (bits & 1) modifiers.push("shift");
	if (bits & 2) modifiers.push("alt");
	if (bits & 4) modifiers.push("ctrl");
	if (bits & 8) modifiers.push("meta");
	return modifiers;
}

function decodeMouseModifiers(code: number): Modifier[] {
	const modifiers: Modifier[] = [];
	if (code & 4) modifiers.push("shift");
	if (code & 8) modifiers.push("alt");
	if (code & 16) modifiers.push("ctrl");
	return modifiers;
}

const BASE_BUTTONS: readonly MouseButton[] = ["left", "middle", "right", "none"];

/**
 * 将鼠标按钮码解码为鼠标事件。
 * released 仅对 SGR 格式有意义（结尾为 m）。
 */
function decodeMouse(code: number, x: number, y: number, released: boolean): MouseEvent | null {
	const base = code & 3;
	const modifiers = decodeMouseModifiers(code);
	const position = { x: Math.max(1, x), y: Math.max(1, y) };

	if (code & 64) {
		// 只支持垂直滚轮，水平滚轮（base 2/3）不产生事件
		if (base > 1) return null;
		return { type: "mouse", action: "wheel", button: base === 0 ? "wheelUp" : "wheelDown", ...position, modifiers };
	}

	const button = BASE_BUTTONS[base] ?? "none";
	if (code & 32) {
		return { type: "mouse", action: button === "none" ? "move" : "drag", button, ...position, modifiers };
	}
	if (released || button === "none") {
		return { type: "mouse", action: "release", button, ...position, modifiers };
	}
	return { type: "mouse", action: "press", button, ...position, modifiers };
}

/** 控制字节（0-31 和 127）对应的按键 */
function controlKey(byte: number, extra: Modifier[] = []): KeyEvent | null {
	switch (byte) {
		case 0:
			return keyEvent("space", ["ctrl", ...extra]);
		case 8:
		case DEL:
			return keyEvent("backspace", extra);
		case 9:
			return keyEvent("tab", extra);
		case 10:
		case 13:
			return keyEvent("enter", extra);
	}
	if (byte >= 1 && byte <= 26) {
		return keyEvent(String.fromCharCode(byte + 96), ["ctrl", ...extra]);
	}
	const punctuation = CTRL_PUNCTUATION[byte];
	if (punctuation !== undefined) {
		return keyEvent(punctuation, ["ctrl", ...extra]);
	}
	return null;
}

function printableKey(char: string): KeyEvent {
	return char === " " ? keyEvent("space", [], " ") : keyEvent(char, [], char);
}

/** 解析 CSI 参数串，仅接受数字和分号；空参数记为 undefined */
function parseParams(text: string): (number | undefined)[] | null {
	if (text === "") return [];
	if (!/^[0-9;]*$/.test(text)) return null;
	return text.split(";").map((part) => (part === "" ? undefined : Number.parseInt(part, 10)));
}

/** UTF-8 首字节后续还需要的字节数，非法首字节返回 -1 */
function utf8Continuations(byte: number): number {
	if (byte >= 0xc2 && byte <= 0xdf) return 1;
	if (byte >= 0xe0 && byte <= 0xef) return 2;
	if (byte >= 0xf0 && byte <= 0xf4) return 3;
	return -1;
}

function endsWith(bytes: number[], suffix: Buffer): boolean {
	if (bytes.length < suffix.length) return false;
	const offset = bytes.length - suffix.length;
	for (let i = 0; i < suffix.length; i++) {
		if (bytes[offset + i] !== suffix[i]) return false;
	}
	return true;
}

/**
 * 输入解码器
 *
 * 每个会话持有一个实例。不注册任何定时器：
 * 是否把孤立的 ESC 当作 Escape 键由调用方通过 flush() 决定。
 */
export class InputDecoder {
	private _mode: DecoderMode = "ground";
	/** 当前未完成序列的原始字节 */
	private pending: number[] = [];
	/** UTF-8 或 X10 鼠标序列还需要的字节数 */
	private expected = 0;
	/** 序列超长，丢弃到终止字节为止 */
	private overflowed = false;

	get mode(): DecoderMode {
		return this._mode;
	}

	get hasPending(): boolean {
		return this.pending.length > 0;
	}

	/**
	 * 只收到 ESC，或 ESC 加一个引导字节（[ 或 O）。
	 * 终端在一次写入中发送完整序列，输入块停在这里说明用户按的是 Escape 或 Alt 组合键。
	 */
	get pendingPrefixOnly(): boolean {
		if (this._mode === "escape") return true;
		return (this._mode === "csi" || this._mode === "ss3") && this.pending.length === 2;
	}

	/**
	 * 解码一块输入，返回完整的事件和未完成的尾部字节。
	 * 字符串按 UTF-8 编码为字节后处理。
	 */
	decode(input: Uint8Array | string): DecodeResult {
		const bytes = typeof input === "string" ? Buffer.from(input, "utf8") : input;
		const events: InputEvent[] = [];
		for (const byte of bytes) {
			this.feed(byte, events);
		}
		return { events, remaining: Buffer.from(this.pending) };
	}

	/**
	 * 强制结束未完成的序列：
	 * - 只有 ESC [ 或 ESC O 时产生 Alt+[ 或 Alt+O
	 * - 其他 ESC 开头的序列产生 Escape 键，ESC 之后的字节从初始状态重新解码（仍不完整的尾部丢弃）
	 * - 未结束的粘贴产生包含已收到内容的 Paste 事件
	 * - 不完整的 UTF-8 字符丢弃
	 */
	flush(): InputEvent[] {
		const events: InputEvent[] = [];
		const mode = this._mode;
		const pending = this.pending;
		this.reset();

		const introducer = pending[1];
		if (mode === "paste") {
			events.push({ type: "paste", content: Buffer.from(pending.slice(PASTE_START.length)).toString("utf8") });
		} else if ((mode === "csi" || mode === "ss3") && pending.length === 2 && introducer !== undefined) {
			events.push(keyEvent(String.fromCharCode(introducer), ["alt"]));
		} else if (mode !== "ground" && mode !== "utf8") {
			events.push(keyEvent("escape"));
			for (const byte of pending.slice(1)) {
				this.feed(byte, events);
			}
			this.reset();
		}
		return events;
	}

	/** 丢弃所有未完成状态 */
	reset(): void {
		this._mode = "ground";
		this.pending = [];
		this.expected = 0;
		this.overflowed = false;
	}

	private feed(byte: number, events: InputEvent[]): void {
		switch (this._mode) {
			case "ground":
				this.feedGround(byte, events);
				break;
			case "escape":
				this.feedEscape(byte, events);
				break;
			case "csi":
				this.feedCsi(byte, events);
				break;
			case "ss3":
				this.feedSs3(byte, events);
				break;
			case "sgrMouse":
				this.feedSgrMouse(byte, events);
				break;
			case "x10Mouse":
				this.feedX10Mouse(byte, events);
				break;
			case "utf8":
				this.feedUtf8(byte, events);
				break;
			case "paste":
				this.feedPaste(byte, events);
				break;
		}
	}

	private beginEscape(): void {
		this._mode = "escape";
		this.pending = [ESC];
		this.expected = 0;
	}

	private feedGround(byte: number, events: InputEvent[]): void {
		if (byte === ESC) {
			this.beginEscape();
			return;
		}
		if (byte < 0x20 || byte === DEL) {
			const key = controlKey(byte);
			if (key) events.push(key);
			return;
		}
		if (byte < 0x80) {
			events.push(printableKey(String.fromCharCode(byte)));
			return;
		}
		const continuations = utf8Continuations(byte);
		if (continuations < 0) return; // 非法 UTF-8 首字节
		this._mode = "utf8";
		this.pending = [byte];
		this.expected = continuations;
	}

	private feedEscape(byte: number, events: InputEvent[]): void {
		if (byte === LEFT_BRACKET) {
			this._mode = "csi";
			this.pending.push(byte);
			return;
		}
		if (byte === LETTER_O) {
			this._mode = "ss3";
			this.pending.push(byte);
			return;
		}
		if (byte === ESC) {
			events.push(keyEvent("escape"));
			this.beginEscape();
			return;
		}

		this.reset();
		if (byte >= 0x80) {
			events.push(keyEvent("escape"));
			this.feedGround(byte, events);
			return;
		}
		if (byte < 0x20 || byte === DEL) {
			const key = controlKey(byte, ["alt"]);
			if (key) events.push(key);
			return;
		}
		const char = String.fromCharCode(byte);
		events.push(keyEvent(char === " " ? "space" : char, ["alt"]));
	}

	private pushParameter(byte: number): void {
		if (this.overflowed) return;
		this.pending.push(byte);
		if (this.pending.length > MAX_SEQUENCE_LENGTH) this.overflowed = true;
	}

	/** 畸形序列：丢弃已缓冲字节；如果出错字节是 ESC，则开始新的序列 */
	private abandon(byte: number): void {
		if (byte === ESC) {
			this.beginEscape();
		} else {
			this.reset();
		}
	}

	private feedCsi(byte: number, events: InputEvent[]): void {
		if (this.pending.length === 2) {
			if (byte === LETTER_M) {
				this._mode = "x10Mouse";
				this.pending.push(byte);
				this.expected = 3;
				return;
			}
			if (byte === LESS_THAN) {
				this._mode = "sgrMouse";
				this.pending.push(byte);
				return;
			}
		}

		if (byte >= 0x20 && byte <= 0x3f) {
			// 参数字节和中间字节
			this.pushParameter(byte);
			return;
		}
		if (byte >= 0x40 && byte <= 0x7e) {
			if (this.overflowed) {
				this.reset();
				return;
			}
			const body = Buffer.from(this.pending.slice(2)).toString("latin1");
			this.pending.push(byte);
			this.dispatchCsi(body, String.fromCharCode(byte), events);
			return;
		}
		this.abandon(byte);
	}

	private dispatchCsi(body: string, final: string, events: InputEvent[]): void {
		const params = parseParams(body);
		if (params === null) {
			// 私有标记（? > =）或中间字节：不是输入事件
			this.reset();
			return;
		}

		if (final === "~" && params[0] === 200 && params.length === 1) {
			// 进入粘贴模式，pending 保留起始标记
			this._mode = "paste";
			return;
		}

		const event = this.csiEvent(params, final);
		this.reset();
		if (event) events.push(event);
	}

	private csiEvent(params: (number | undefined)[], final: string): InputEvent | null {
		const bare = params.length === 0;

		if (final === "~") {
			const code = params[0];
			if (code === undefined || params.length > 2) return null;
			const key = TILDE_KEYS[code];
			if (!key) return null;
			const modifier = params[1];
			if (params.length === 2 && (modifier === undefined || modifier < 1)) return null;
			return keyEvent(key, modifier === undefined ? [] : decodeKeyModifiers(modifier));
		}

		if (bare) {
			switch (final) {
				case "I":
					return { type: "focus", focused: true };
				case "O":
					return { type: "focus", focused: false };
				case "Z":
					return keyEvent("tab", ["shift"]);
				case "A":
				case "B":
				case "C":
				case "D":
				case "F":
				case "H":
					return keyEvent(CSI_LETTER_KEYS[final] ?? final);
			}
			return null;
		}

		if (final === "t") {
			const [kind, rows, cols] = params;
			if (params.length === 3 && kind === 8 && isValidDimension(rows) && isValidDimension(cols)) {
				return { type: "resize", cols, rows };
			}
			return null;
		}

		// 带修饰键的形式 ESC [ 1 ; m <letter>。H 只接受无参数形式，ESC [ 1 ; n H 是光标定位
		const key = final === "H" ? undefined : CSI_LETTER_KEYS[final];
		const [first, modifier] = params;
		if (key && params.length === 2 && first === 1 && modifier !== undefined && modifier >= 2) {
			return keyEvent(key, decodeKeyModifiers(modifier));
		}
		return null;
	}

	private feedSs3(byte: number, events: InputEvent[]): void {
		const key = SS3_KEYS[String.fromCharCode(byte)];
		this.reset();
		if (key) {
			events.push(keyEvent(key));
			return;
		}
		// 不是 SS3 功能键：ESC O 是 Alt+O，当前字节重新解码
		events.push(keyEvent("O", ["alt"]));
		this.feedGround(byte, events);
	}

	private feedSgrMouse(byte: number, events: InputEvent[]): void {
		if ((byte >= 0x30 && byte <= 0x39) || byte === 0x3b) {
			this.pushParameter(byte);
			return;
		}
		if (byte === 0x4d || byte === 0x6d) {
			if (this.overflowed) {
				this.reset();
				return;
			}
			const params = parseParams(Buffer.from(this.pending.slice(3)).toString("latin1"));
			this.reset();
			if (params === null || params.length !== 3) return;
			const [code, x, y] = params;
			if (code === undefined || x === undefined || y === undefined) return;
			const event = decodeMouse(code, x, y, byte === 0x6d);
			if (event) events.push(event);
			return;
		}
		this.abandon(byte);
	}

	private feedX10Mouse(byte: number, events: InputEvent[]): void {
		this.pending.push(byte);
		this.expected--;
		if (this.expected > 0) return;

		const [code, x, y] = this.pending.slice(3).map((b) => b - 32);
		this.reset();
		if (code === undefined || x === undefined || y === undefined || code < 0) return;
		const event = decodeMouse(code, x, y, false);
		if (event) events.push(event);
	}

	private feedUtf8(byte: number, events: InputEvent[]): void {
		if (byte < 0x80 || byte > 0xbf) {
			// 续字节缺失：丢弃残缺字符，当前字节重新解码
			this.reset();
			this.feedGround(byte, events);
			return;
		}
		this.pending.push(byte);
		this.expected--;
		if (this.expected > 0) return;

		const char = Buffer.from(this.pending).toString("utf8");
		this.reset();
		if (!char.includes("\uFFFD")) events.push(printableKey(char));
	}

	private feedPaste(byte: number, events: InputEvent[]): void {
		this.pending.push(byte);
		if (!endsWith(this.pending, PASTE_END)) return;
		const content = Buffer.from(this.pending.slice(PASTE_START.length, -PASTE_END.length)).toString("utf8");
		this.reset();
		events.push({ type: "paste", content });
	}
}

/** 一次性解码完整输入，末尾未完成的序列按 flush() 规则处理 */
export function decodeInput(input: Uint8Array | string): InputEvent[] {
	const decoder = new InputDecoder();
	const { events } = decoder.decode(input);
	return [...events, ...decoder.flush()];
}
