/**
 * @file 颜色和字符降级
 *
 * 终端能力不足时的降级链：
 * - 颜色：真彩色 → 256 色 → 16 色 → 单色
 * - 字符：Unicode 制表符 → ASCII
 */

import { readFileSync } from "node:fs";

/** 16 色调色板的颜色名，下标即 ANSI 颜色索引 */
export const ANSI_COLOR_NAMES = [
	"black",
	"red",
	"green",
	"yellow",
	"blue",
	"magenta",
	"cyan",
	"white",
	"brightBlack",
	"brightRed",
	"brightGreen",
	"brightYellow",
	"brightBlue",
	"brightMagenta",
	"brightCyan",
	"brightWhite",
] as const;

export type AnsiColorName = (typeof ANSI_COLOR_NAMES)[number];

/** 16 色调色板的参考 RGB 值 */
const ANSI_PALETTE: readonly (readonly [number, number, number])[] = [
	[0, 0, 0],
	[128, 0, 0],
	[0, 128, 0],
	[128, 128, 0],
	[0, 0, 128],
	[128, 0, 128],
	[0, 128, 128],
	[192, 192, 192],
	[128, 128, 128],
	[255, 0, 0],
	[0, 255, 0],
	[255, 255, 0],
	[0, 0, 255],
	[255, 0, 255],
	[0, 255, 255],
	[255, 255, 255],
];

function assertChannel(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 0 || value > 255) {
		throw new RangeError(`${name} must be an integer between 0 and 255, got ${value}`);
	}
}

export function assertRgb(r: number, g: number, b: number): void {
	assertChannel("red", r);
	assertChannel("green", g);
	assertChannel("blue", b);
}

export function assertColorIndex(index: number): void {
	if (!Number.isInteger(index) || index < 0 || index > 255) {
		throw new RangeError(`color index must be an integer between 0 and 255, got ${index}`);
	}
}

function cubeLevel(value: number): number {
	if (value < 48) return 0;
	if (value < 115) return 1;
	if (value < 155) return 2;
	if (value < 195) return 3;
	if (value < 235) return 4;
	return 5;
}

/**
 * RGB 转换为最接近的 256 色索引。
 * 三个分量相差不超过 8 时使用灰阶（232-255），否则使用 6x6x6 色立方（16-231）。
 */
export function rgbTo256(r: number, g: number, b: number): number {
	assertRgb(r, g, b);
	const max = Math.max(r, g, b);
	const min = Math.min(r, g, b);
	if (max - min <= 8) {
		const gray = Math.round(((r + g + b) / 3 / 255) * 23);
		return 232 + Math.min(23, gray);
	}
	return 16 + 36 * cubeLevel(r) + 6 * cubeLevel(g) + cubeLevel(b);
}

/** RGB 转换为欧氏距离最近的 16 色索引，距离相同时取较小索引 */
export function rgbTo16(r: number, g: number, b: number): number {
	assertRgb(r, g, b);
	let best = 0;
	let bestDistance = Number.POSITIVE_INFINITY;
	ANSI_PALETTE.forEach(([pr, pg, pb], index) => {
		const distance = (r - pr) ** 2 + (g - pg) ** 2 + (b - pb) ** 2;
		if (distance < bestDistance) {
			best = index;
			bestDistance = distance;
		}
	});
	return best;
}

/** 256 色索引降级为 16 色索引 */
export function color256To16(index: number): number {
	assertColorIndex(index);
	if (index < 16) return index;
	if (index < 232) {
		const cube = index - 16;
		return rgbTo16(Math.floor(cube / 36) * 51, (Math.floor(cube / 6) % 6) * 51, (cube % 6) * 51);
	}
	const gray = (index - 232) * 10 + 8;
	return rgbTo16(gray, gray, gray);
}

let glyphFallbacks: ReadonlyMap<string, string> | undefined;

/** 从 data/glyph-fallbacks.json 加载 Unicode → ASCII 对照表（只加载一次） */
function loadGlyphFallbacks(): ReadonlyMap<string, string> {
	if (glyphFallbacks) return glyphFallbacks;
	const raw: unknown = JSON.parse(
		readFileSync(new URL("../data/glyph-fallbacks.json", import.meta.url), { encoding: "utf8" }),
	);
	if (typeof raw !== "object" || raw === null) {
		throw new Error("glyph-fallbacks.json must contain an object");
	}
	const table = new Map<string, string>();
	for (const [glyph, replacement] of Object.entries(raw)) {
		if (typeof replacement === "string") table.set(glyph, replacement);
	}
	glyphFallbacks = table;
	return table;
}

/** 单个字符的 ASCII 替代，没有定义替代时原样返回 */
export function glyphToAscii(glyph: string): string {
	return loadGlyphFallbacks().get(glyph) ?? glyph;
}

/** 替换字符串中所有已知的 Unicode 字符 */
export function toAscii(text: string): string {
	let result = "";
	for (const glyph of text) {
		result += glyphToAscii(glyph);
	}
	return result;
}
