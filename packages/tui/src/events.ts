/**
 * @file 输入事件类型
 *
 * 解码器输出的结构化事件：按键、鼠标、粘贴、焦点和窗口大小变化。
 * 所有事件都是不可变的值对象，按 type 字段区分。
 */

/** 修饰键，按 shift、alt、ctrl、meta 的固定顺序出现 */
export type Modifier = "shift" | "alt" | "ctrl" | "meta";

/** 具名按键（不含可打印字符） */
export type NamedKey =
	| "up"
	| "down"
	| "left"
	| "right"
	| "home"
	| "end"
	| "insert"
	| "delete"
	| "pageUp"
	| "pageDown"
	| "f1"
	| "f2"
	| "f3"
	| "f4"
	| "f5"
	| "f6"
	| "f7"
	| "f8"
	| "f9"
	| "f10"
	| "f11"
	| "f12"
	| "enter"
	| "tab"
	| "backspace"
	| "escape"
	| "space";

/**
 * 按键事件
 *
 * key 为具名按键或单个字符。可打印字符同时出现在 char 中。
 */
export interface KeyEvent {
	readonly type: "key";
	readonly key: NamedKey | string;
	/** 按键产生的可打印文本（如有） */
	readonly char?: string;
	readonly modifiers: readonly Modifier[];
}

export type MouseAction = "press" | "release" | "drag" | "move" | "wheel";

export type MouseButton = "left" | "middle" | "right" | "wheelUp" | "wheelDown" | "none";

/** 鼠标事件，坐标从 1 开始 */
export interface MouseEvent {
	readonly type: "mouse";
	readonly action: MouseAction;
	readonly button: MouseButton;
	readonly x: number;
	readonly y: number;
	readonly modifiers: readonly Modifier[];
}

/** 括号粘贴模式下收到的完整粘贴内容 */
export interface PasteEvent {
	readonly type: "paste";
	readonly content: string;
}

export interface FocusEvent {
	readonly type: "focus";
	readonly focused: boolean;
}

export interface ResizeEvent {
	readonly type: "resize";
	readonly cols: number;
	readonly rows: number;
}

export type InputEvent = KeyEvent | MouseEvent | PasteEvent | FocusEvent | ResizeEvent;

const MODIFIER_ORDER: readonly Modifier[] = ["shift", "alt", "ctrl", "meta"];

/** 按固定顺序去重排列修饰键 */
export function normalizeModifiers(modifiers: Iterable<Modifier>): Modifier[] {
	const set = new Set(modifiers);
	return MODIFIER_ORDER.filter((m) => set.has(m));
}

export function keyEvent(key: string, modifiers: Iterable<Modifier> = [], char?: string): KeyEvent {
	const event: KeyEvent = { type: "key", key, modifiers: normalizeModifiers(modifiers) };
	return char === undefined ? event : { ...event, char };
}

/**
 * 判断按键事件是否匹配指定按键和修饰键组合。
 * 修饰键需要完全一致（顺序无关）。
 */
export function matchesKey(event: InputEvent, key: string, modifiers: readonly Modifier[] = []): boolean {
	if (event.type !== "key" || event.key !== key) return false;
	const expected = normalizeModifiers(modifiers);
	return expected.length === event.modifiers.length && expected.every((m, i) => event.modifiers[i] === m);
}
