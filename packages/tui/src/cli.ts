#!/usr/bin/env node
/**
 * @file CLI 入口文件 - termwire-probe
 *
 * 打印当前终端的平台信息、能力检测结果和后端选择结果。
 */
import { readFileSync } from "node:fs";
import chalk from "chalk";
import { createLogger } from "./log.js";
import { createPlatformAdapter } from "./platform.js";
import { buildProbeReport, formatProbeReport, helpText, parseProbeArgs } from "./probe.js";

/** 从 package.json 中读取版本信息 */
const packageJson: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
const version =
	typeof packageJson === "object" && packageJson !== null && "version" in packageJson
		? String(packageJson.version)
		: "0.0.0";

let options: ReturnType<typeof parseProbeArgs>;
try {
	options = parseProbeArgs(process.argv.slice(2));
} catch (error) {
	console.error(chalk.red(error instanceof Error ? error.message : String(error)));
	console.error(helpText(version));
	process.exit(1);
}

if (options.help) {
	console.log(helpText(version));
	process.exit(0);
}

if (options.version) {
	console.log(version);
	process.exit(0);
}

try {
	const logger = createLogger("probe", { console: options.verbose, level: options.verbose ? "debug" : undefined });
	const report = buildProbeReport(options, { platform: createPlatformAdapter({ logger }) });
	console.log(options.json ? JSON.stringify(report, null, 2) : formatProbeReport(report));
} catch (error) {
	console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
	process.exit(1);
}
