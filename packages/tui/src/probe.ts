/**
 * @file 终端探测报告
 *
 * termwire-probe 命令的实现：收集平台信息、终端能力和后端选择结果，
 * 输出为带颜色的文本或 JSON。
 */

import chalk, { type ChalkInstance } from "chalk";
import { BackendSelector } from "./backend.js";
import { type Capabilities, type DetectOptions, detectCapabilities } from "./capabilities.js";
import { loadConfig, type TermwireConfig } from "./config.js";
import { createPlatformAdapter, type PlatformAdapter, type PlatformInfo, type VtSupport } from "./platform.js";

export interface ProbeOptions {
	json: boolean;
	/** 实际尝试进入原始模式，然后立即退出 */
	select: boolean;
	terminfo: boolean;
	verbose: boolean;
	help: boolean;
	version: boolean;
}

export function parseProbeArgs(args: readonly string[]): ProbeOptions {
	const options: ProbeOptions = {
		json: false,
		select: false,
		terminfo: true,
		verbose: false,
		help: false,
		version: false,
	};
	for (const arg of args) {
		switch (arg) {
			case "--json":
				options.json = true;
				break;
			case "--select":
				options.select = true;
				break;
			case "--no-terminfo":
				options.terminfo = false;
				break;
			case "--verbose":
				options.verbose = true;
				break;
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			default:
				throw new Error(`Unknown option: ${arg}`);
		}
	}
	return options;
}

export interface ProbeReport {
	platform: PlatformInfo;
	windows: { meetsMinimumVersion: boolean; vtSupport: VtSupport } | null;
	capabilities: Capabilities;
	config: Pick<TermwireConfig, "backend" | "characterSet">;
	/** 仅在 --select 时存在 */
	selection?: { backend: "raw" | "tty"; rawModeError?: string };
}

export interface ProbeDependencies {
	env?: NodeJS.ProcessEnv;
	platform?: PlatformAdapter;
	config?: TermwireConfig;
	detect?: (options?: DetectOptions) => Capabilities;
	selector?: BackendSelector;
}

export function buildProbeReport(options: ProbeOptions, deps: ProbeDependencies = {}): ProbeReport {
	const env = deps.env ?? process.env;
	const platform = deps.platform ?? createPlatformAdapter({ env });
	const config = deps.config ?? loadConfig({ env });
	const detect = deps.detect ?? detectCapabilities;
	const terminfo = { enabled: options.terminfo && config.terminfo.enabled, timeoutMs: config.terminfo.timeoutMs };
	const capabilities = detect({ env, platform, terminfo });

	const windows = platform.windows();
	const report: ProbeReport = {
		platform: platform.info(),
		windows: windows ? { meetsMinimumVersion: windows.meetsMinimumVersion, vtSupport: windows.vtSupport() } : null,
		capabilities,
		config: { backend: config.backend, characterSet: config.characterSet },
	};

	if (options.select) {
		const selector = deps.selector ?? new BackendSelector({ detect: () => capabilities });
		const selection = selector.select();
		try {
			if (selection.kind === "raw") {
				report.selection = { backend: "raw" };
			} else if (selection.kind === "tty") {
				const { rawModeError } = selection.capabilities;
				report.selection = rawModeError === undefined ? { backend: "tty" } : { backend: "tty", rawModeError };
			}
		} finally {
			selector.release();
		}
	}
	return report;
}

function yesNo(value: boolean): string {
	return value ? "yes" : "no";
}

function row(painter: ChalkInstance, label: string, value: string): string {
	return `  ${painter.dim(`${label}:`.padEnd(18))}${value}`;
}

/** 格式化为人类可读的文本 */
export function formatProbeReport(report: ProbeReport, painter: ChalkInstance = chalk): string {
	const { platform, capabilities: caps } = report;
	const version = platform.osVersion ? ` ${platform.osVersion.join(".")}` : "";
	const lines = [
		painter.bold("Platform"),
		row(painter, "family", `${platform.family}${version}`),
		row(painter, "wsl", yesNo(platform.isWsl)),
		row(painter, "features", platform.features.join(", ") || "none"),
		row(painter, "signals", platform.signals.join(", ") || "none"),
		row(painter, "terminal size", `${platform.terminalSize.cols}x${platform.terminalSize.rows}`),
	];
	if (report.windows) {
		lines.push(row(painter, "windows build ok", yesNo(report.windows.meetsMinimumVersion)));
		lines.push(row(painter, "vt sequences", report.windows.vtSupport));
	}

	lines.push(
		"",
		painter.bold("Capabilities"),
		row(painter, "TERM", caps.terminalType ?? "(unset)"),
		row(painter, "TERM_PROGRAM", caps.terminalProgram ?? "(unset)"),
		row(painter, "color mode", `${painter.green(caps.colorMode)} (${caps.maxColors} colors)`),
		row(painter, "unicode", yesNo(caps.unicode)),
		row(painter, "mouse", yesNo(caps.mouse)),
		row(painter, "bracketed paste", yesNo(caps.bracketedPaste)),
		row(painter, "focus events", yesNo(caps.focusEvents)),
		row(painter, "alternate screen", yesNo(caps.alternateScreen)),
		"",
		painter.bold("Backend"),
		row(painter, "configured", `${report.config.backend} (${report.config.characterSet})`),
	);

	if (report.selection) {
		const selected = report.selection.rawModeError
			? `${report.selection.backend} ${painter.yellow(`(raw mode error: ${report.selection.rawModeError})`)}`
			: report.selection.backend;
		lines.push(row(painter, "selected", selected));
	}
	return lines.join("\n");
}

export function helpText(version: string): string {
	return `termwire-probe v${version} - Inspect terminal capabilities

Usage:
  termwire-probe [options]

Options:
  --json           Print the report as JSON
  --select         Attempt raw mode and report the selected backend
  --no-terminfo    Skip the infocmp query
  --verbose        Log diagnostics to stderr
  -h, --help       Show this help
  -v, --version    Show version

Environment:
  TERMWIRE_CONFIG_DIR   Config directory (default: ~/.termwire)
  TERMWIRE_BACKEND      Override backend (auto, raw, tty)
  TERMWIRE_CHARSET      Override character set (unicode, ascii)
  TERMWIRE_LOG          Append diagnostics to this file`;
}
