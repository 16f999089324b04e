import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
	type Capabilities,
	CapabilityCache,
	type ColorMode,
	DEFAULT_CAPABILITIES,
	type DetectOptions,
	detectCapabilities,
	parseTerminfoColors,
	supports256Color,
	supportsTrueColor,
	TRUE_COLOR_COUNT,
	upgradeColorMode,
} from "../src/capabilities.js";
import { createPlatformAdapter } from "../src/platform.js";

const linux = createPlatformAdapter({
	platform: "linux",
	release: "6.1.0",
	env: {},
	readFile: () => undefined,
	stdout: { columns: 80, rows: 24 },
});

function detect(env: NodeJS.ProcessEnv, options: DetectOptions = {}): Capabilities {
	return detectCapabilities({ platform: linux, terminfo: { enabled: false }, ...options, env });
}

describe("detectCapabilities", () => {
	it("returns the conservative default without signals", () => {
		const caps = detect({});
		assert.deepEqual(caps, DEFAULT_CAPABILITIES);
		assert.equal(Object.isFrozen(caps), true);
	});

	it("reads color depth from TERM", () => {
		const caps = detect({ TERM: "xterm-256color" });
		assert.equal(caps.colorMode, "color256");
		assert.equal(caps.maxColors, 256);
		assert.equal(caps.mouse, true);
		assert.equal(caps.bracketedPaste, true);
		assert.equal(caps.focusEvents, false);
		assert.equal(caps.terminalType, "xterm-256color");

		assert.equal(detect({ TERM: "screen" }).colorMode, "color256");
		assert.equal(detect({ TERM: "foot-truecolor" }).colorMode, "trueColor");
		assert.equal(detect({ TERM: "linux" }).colorMode, "color16");
	});

	it("treats dumb as monochrome", () => {
		const caps = detect({ TERM: "dumb" });
		assert.equal(caps.colorMode, "monochrome");
		assert.equal(caps.maxColors, 2);
		assert.equal(caps.mouse, false);
	});

	it("upgrades to true color from COLORTERM", () => {
		const caps = detect({ TERM: "xterm", COLORTERM: "truecolor" });
		assert.equal(caps.colorMode, "trueColor");
		assert.equal(caps.maxColors, 16_777_216);
		assert.equal(caps.focusEvents, true);
		assert.equal(detect({ COLORTERM: "24bit" }).colorMode, "trueColor");
	});

	it("reaches 16777216 colors from COLORTERM alone", () => {
		const caps = detect({ COLORTERM: "truecolor" });
		assert.equal(caps.colorMode, "trueColor");
		assert.equal(caps.maxColors, 16_777_216);
	});

	it("lands on the same tier whichever sources point to it", () => {
		const tier = (caps: Capabilities) => ({
			colorMode: caps.colorMode,
			maxColors: caps.maxColors,
			mouse: caps.mouse,
			bracketedPaste: caps.bracketedPaste,
			focusEvents: caps.focusEvents,
		});
		const trueColorTerminfo: DetectOptions = { terminfo: { enabled: true }, queryTerminfo: () => TRUE_COLOR_COUNT };
		const results = [
			detect({ COLORTERM: "truecolor" }),
			detect({ TERM: "xterm-256color", COLORTERM: "truecolor" }),
			detect({ TERM: "xterm-256color" }, trueColorTerminfo),
			detect({ TERM: "xterm-256color", COLORTERM: "24bit" }, trueColorTerminfo),
			detect({ TERM: "xterm-truecolor", TERM_PROGRAM: "WezTerm" }, trueColorTerminfo),
		].map(tier);
		for (const result of results) {
			assert.deepEqual(result, {
				colorMode: "trueColor",
				maxColors: 16_777_216,
				mouse: true,
				bracketedPaste: true,
				focusEvents: true,
			});
		}
	});

	it("recognizes known terminal programs", () => {
		const iterm = detect({ TERM_PROGRAM: "iTerm.app" });
		assert.equal(iterm.colorMode, "trueColor");
		assert.equal(iterm.mouse, true);
		assert.equal(iterm.bracketedPaste, true);
		assert.equal(iterm.focusEvents, true);
		assert.equal(iterm.terminalProgram, "iTerm.app");
	});

	it("only raises the color rank within one pass", () => {
		const caps = detect({ TERM: "dumb", TERM_PROGRAM: "Apple_Terminal" });
		assert.equal(caps.colorMode, "color256");
		assert.equal(caps.maxColors, 256);
		assert.equal(caps.mouse, true);
		assert.equal(caps.bracketedPaste, true);
		assert.equal(caps.focusEvents, false);
	});

	it("reads Unicode support from the first non-empty locale variable", () => {
		assert.equal(detect({ LC_ALL: "", LC_CTYPE: "en_US.UTF-8", LANG: "C" }).unicode, true);
		assert.equal(detect({ LC_ALL: "C", LANG: "en_US.UTF-8" }).unicode, false);
		assert.equal(detect({ LANG: "de_DE.utf8" }).unicode, true);
	});

	it("raises the tier from terminfo", () => {
		const query = () => 16_777_216;
		const caps = detect({ TERM: "vt100" }, { terminfo: { enabled: true }, queryTerminfo: query });
		assert.equal(caps.colorMode, "trueColor");
		assert.equal(caps.focusEvents, true);
	});

	it("never lowers the tier from terminfo", () => {
		const caps = detect({ TERM: "xterm" }, { terminfo: { enabled: true }, queryTerminfo: () => 8 });
		assert.equal(caps.colorMode, "color256");
		assert.equal(caps.maxColors, 256);
	});

	it("raises only maxColors for 8 to 15 terminfo colors", () => {
		const caps = detect({ TERM: "dumb" }, { terminfo: { enabled: true }, queryTerminfo: () => 8 });
		assert.equal(caps.colorMode, "monochrome");
		assert.equal(caps.maxColors, 8);
	});

	it("passes TERM, the timeout and the detection env to the terminfo query", () => {
		const calls: [string, number, NodeJS.ProcessEnv][] = [];
		const env = { TERM: "xterm", TERMINFO: "/opt/terminfo" };
		detect(env, {
			terminfo: { enabled: true, timeoutMs: 250 },
			queryTerminfo: (term, timeoutMs, queryEnv) => {
				calls.push([term, timeoutMs, queryEnv]);
				return null;
			},
		});
		assert.deepEqual(calls, [["xterm", 250, env]]);
	});

	it("does not query terminfo without TERM", () => {
		let called = false;
		detect(
			{},
			{
				terminfo: { enabled: true },
				queryTerminfo: () => {
					called = true;
					return TRUE_COLOR_COUNT;
				},
			},
		);
		assert.equal(called, false);
	});

	it("keeps the conservative default with terminfo enabled and an empty env", () => {
		const caps = detectCapabilities({ env: {}, platform: linux, terminfo: { enabled: true } });
		assert.deepEqual(caps, DEFAULT_CAPABILITIES);
	});

	it("treats a failing terminfo query as no information", () => {
		const caps = detect(
			{ TERM: "xterm" },
			{
				terminfo: { enabled: true },
				queryTerminfo: () => {
					throw new Error("infocmp missing");
				},
			},
		);
		assert.equal(caps.colorMode, "color256");
	});

	it("skips terminfo where the platform has no terminfo database", () => {
		const windows = createPlatformAdapter({ platform: "win32", release: "10.0.19045", env: {} });
		let called = false;
		detectCapabilities({
			env: {},
			platform: windows,
			queryTerminfo: () => {
				called = true;
				return 256;
			},
		});
		assert.equal(called, false);
	});

	it("applies the Windows Terminal session hint", () => {
		const env = { WT_SESSION: "test-session" };
		const windows = createPlatformAdapter({ platform: "win32", release: "10.0.19045", env });
		const caps = detectCapabilities({ env, platform: windows });
		assert.equal(caps.colorMode, "trueColor");
		assert.equal(caps.mouse, true);
	});
});

describe("color mode helpers", () => {
	it("upgrades but never downgrades", () => {
		assert.equal(upgradeColorMode("color256", "color16"), "color256");
		assert.equal(upgradeColorMode("monochrome", "trueColor"), "trueColor");
	});

	it("ends on the highest tier whatever the order of upgrades", () => {
		const orders: ColorMode[][] = [
			["color16", "color256", "trueColor"],
			["trueColor", "color16", "color256"],
			["color256", "trueColor", "color16"],
			["trueColor", "color256", "color16"],
		];
		for (const order of orders) {
			assert.equal(order.reduce(upgradeColorMode, "monochrome"), "trueColor");
		}
	});

	it("answers support queries", () => {
		const caps = detect({ TERM: "xterm-256color" });
		assert.equal(supports256Color(caps), true);
		assert.equal(supportsTrueColor(caps), false);
	});
});

describe("parseTerminfoColors", () => {
	it("parses decimal and hexadecimal values", () => {
		assert.equal(parseTerminfoColors("xterm-256color|xterm with 256 colors,\n\tcolors#256,\n\tcols#80,"), 256);
		assert.equal(parseTerminfoColors("\tcolors#0x1000000,"), 16_777_216);
		assert.equal(parseTerminfoColors("\tcols#80,"), null);
	});
});

describe("CapabilityCache", () => {
	it("detects once until invalidated", () => {
		let calls = 0;
		const cache = new CapabilityCache(() => {
			calls++;
			return DEFAULT_CAPABILITIES;
		});
		assert.equal(cache.peek(), undefined);
		cache.get();
		cache.get();
		assert.equal(calls, 1);
		cache.invalidate();
		cache.invalidate();
		assert.equal(cache.peek(), undefined);
		cache.get();
		assert.equal(calls, 2);
	});

	it("replaces the snapshot on refresh", () => {
		const cache = new CapabilityCache((options) => detectCapabilities(options));
		const first = cache.get({ env: { TERM: "dumb" }, platform: linux, terminfo: { enabled: false } });
		const second = cache.refresh({ env: { TERM: "xterm-256color" }, platform: linux, terminfo: { enabled: false } });
		assert.equal(first.colorMode, "monochrome");
		assert.equal(second.colorMode, "color256");
		assert.equal(cache.get(), second);
	});
});
