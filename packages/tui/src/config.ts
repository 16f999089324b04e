/**
 * @file 配置管理模块
 *
 * 配置来源（后者覆盖前者）：
 * - 内置默认值
 * - 配置文件 ~/.termwire/config.json（目录可通过 TERMWIRE_CONFIG_DIR 自定义）
 * - 环境变量 TERMWIRE_BACKEND、TERMWIRE_CHARSET
 *
 * 合并后的结果使用 Typebox schema 校验，不合法时抛出错误并指出出错的路径。
 * 重新加载配置会使终端能力缓存失效。
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { CharacterSet } from "./ansi.js";
import { type Capabilities, clearCapabilitiesCache } from "./capabilities.js";

const CharacterSetSchema = Type.Union([Type.Literal("unicode"), Type.Literal("ascii")]);

export const BackendConfigSchema = Type.Union([Type.Literal("auto"), Type.Literal("raw"), Type.Literal("tty")]);

export const MouseTrackingSchema = Type.Union([
	Type.Literal("none"),
	Type.Literal("click"),
	Type.Literal("drag"),
	Type.Literal("all"),
]);

export const RawOptionsSchema = Type.Object(
	{
		alternateScreen: Type.Boolean(),
		hideCursor: Type.Boolean(),
		mouseTracking: MouseTrackingSchema,
	},
	{ additionalProperties: false },
);

export const TtyOptionsSchema = Type.Object(
	{
		alternateScreen: Type.Boolean(),
	},
	{ additionalProperties: false },
);

export const ConfigSchema = Type.Object(
	{
		backend: BackendConfigSchema,
		characterSet: CharacterSetSchema,
		/** 终端不支持 Unicode 时使用的字符集 */
		fallbackCharacterSet: CharacterSetSchema,
		raw: RawOptionsSchema,
		tty: TtyOptionsSchema,
		terminfo: Type.Object(
			{
				enabled: Type.Boolean(),
				timeoutMs: Type.Integer({ minimum: 1, maximum: 60000 }),
			},
			{ additionalProperties: false },
		),
	},
	{ additionalProperties: false },
);

export type TermwireConfig = Static<typeof ConfigSchema>;
export type BackendChoice = Static<typeof BackendConfigSchema>;
export type RawOptions = Static<typeof RawOptionsSchema>;
export type TtyOptions = Static<typeof TtyOptionsSchema>;
export type MouseTracking = Static<typeof MouseTrackingSchema>;

export const DEFAULT_CONFIG: TermwireConfig = {
	backend: "auto",
	characterSet: "unicode",
	fallbackCharacterSet: "ascii",
	raw: { alternateScreen: true, hideCursor: true, mouseTracking: "none" },
	tty: { alternateScreen: false },
	terminfo: { enabled: true, timeoutMs: 1000 },
};

export interface LoadConfigOptions {
	env?: NodeJS.ProcessEnv;
	/** 配置文件路径，默认 $TERMWIRE_CONFIG_DIR/config.json */
	path?: string;
}

/**
 * 获取配置目录路径
 * 优先使用 TERMWIRE_CONFIG_DIR 环境变量，默认为 ~/.termwire
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
	return env.TERMWIRE_CONFIG_DIR || join(homedir(), ".termwire");
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
	return join(getConfigDir(env), "config.json");
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** 将文件内容合并到默认值上，嵌套对象按一层展开合并 */
function mergeWithDefaults(input: Record<string, unknown>): Record<string, unknown> {
	const merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG);
	for (const [key, value] of Object.entries(input)) {
		const base = merged[key];
		merged[key] = isRecord(base) && isRecord(value) ? { ...base, ...value } : value;
	}
	return merged;
}

function readConfigFile(path: string): Record<string, unknown> {
	if (!existsSync(path)) return {};
	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(path, "utf-8"));
	} catch (error) {
		throw new Error(`Error reading config ${path}: ${error instanceof Error ? error.message : String(error)}`);
	}
	if (!isRecord(parsed)) {
		throw new Error(`Error reading config ${path}: expected a JSON object`);
	}
	return parsed;
}

/**
 * 加载并校验配置
 * @throws Error 配置文件无法解析或不符合 schema
 */
export function loadConfig(options: LoadConfigOptions = {}): TermwireConfig {
	const env = options.env ?? process.env;
	const path = options.path ?? getConfigPath(env);
	const merged = mergeWithDefaults(readConfigFile(path));

	if (env.TERMWIRE_BACKEND) merged.backend = env.TERMWIRE_BACKEND;
	if (env.TERMWIRE_CHARSET) merged.characterSet = env.TERMWIRE_CHARSET;

	if (!Value.Check(ConfigSchema, merged)) {
		const first = Value.Errors(ConfigSchema, merged).First();
		const where = first?.path || "/";
		throw new Error(`Invalid config ${path} at ${where}: ${first?.message ?? "does not match schema"}`);
	}
	return merged;
}

let currentConfig: TermwireConfig | undefined;

/** 进程级配置（首次调用时加载） */
export function getConfig(): TermwireConfig {
	currentConfig ??= loadConfig();
	return currentConfig;
}

/** 重新加载配置，并使终端能力缓存失效 */
export function reloadConfig(options: LoadConfigOptions = {}): TermwireConfig {
	const next = loadConfig(options);
	currentConfig = next;
	clearCapabilitiesCache();
	return next;
}

/** 配置要求 Unicode 但终端不支持时使用后备字符集 */
export function effectiveCharacterSet(config: TermwireConfig, caps: Capabilities): CharacterSet {
	if (config.characterSet === "unicode" && !caps.unicode) {
		return config.fallbackCharacterSet;
	}
	return config.characterSet;
}
