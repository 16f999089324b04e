import assert from "node:assert/strict";
import { EventEmitter } from "node:events";
import { describe, it } from "node:test";
import type { RawModeDriver, RawModeOutcome } from "../src/backend.js";
import { type Capabilities, DEFAULT_CAPABILITIES } from "../src/capabilities.js";
import { DEFAULT_CONFIG, type TermwireConfig } from "../src/config.js";
import { type InputEvent, keyEvent } from "../src/events.js";
import { createLogger } from "../src/log.js";
import { type ConsoleApi, createPlatformAdapter, type PlatformAdapter, type TerminalSize } from "../src/platform.js";
import { mouseTrackingModes, ProcessTerminal } from "../src/terminal.js";

class FakeStdin extends EventEmitter {
	isTTY = true;
	isRaw = false;
	paused = true;

	setRawMode(mode: boolean): void {
		this.isRaw = mode;
	}

	resume(): void {
		this.paused = false;
	}

	pause(): void {
		this.paused = true;
	}
}

class FakeStdout extends EventEmitter {
	isTTY = true;
	columns = 100;
	rows = 30;
	chunks: string[] = [];

	write(data: string): boolean {
		this.chunks.push(data);
		return true;
	}

	take(): string[] {
		const chunks = this.chunks;
		this.chunks = [];
		return chunks;
	}
}

const FULL_CAPS: Capabilities = Object.freeze({
	...DEFAULT_CAPABILITIES,
	colorMode: "trueColor",
	maxColors: 16777216,
	unicode: true,
	mouse: true,
	bracketedPaste: true,
	focusEvents: true,
});

const CLICK_CONFIG: TermwireConfig = { ...DEFAULT_CONFIG, raw: { ...DEFAULT_CONFIG.raw, mouseTracking: "click" } };

interface Setup {
	outcome?: RawModeOutcome;
	caps?: Capabilities;
	config?: TermwireConfig;
	platform?: PlatformAdapter;
}

function setup(options: Setup = {}) {
	const stdin = new FakeStdin();
	const stdout = new FakeStdout();
	const counts = { enters: 0, leaves: 0 };
	const signals: NodeJS.Signals[] = [];
	const driver: RawModeDriver = {
		enter() {
			counts.enters++;
			return options.outcome ?? { status: "ok" };
		},
		leave() {
			counts.leaves++;
		},
		isTerminal: () => true,
		dimensions: () => ({ rows: stdout.rows, cols: stdout.columns }),
	};
	const platform =
		options.platform ?? createPlatformAdapter({ platform: "linux", env: {}, readFile: () => undefined, stdout });
	const terminal = new ProcessTerminal({
		stdin,
		stdout,
		driver,
		platform,
		config: options.config ?? CLICK_CONFIG,
		detect: () => options.caps ?? FULL_CAPS,
		signal: (signal) => signals.push(signal),
		logger: createLogger("test", { env: {} }),
	});
	const events: InputEvent[] = [];
	const resizes: TerminalSize[] = [];
	return { stdin, stdout, counts, signals, terminal, events, resizes };
}

describe("mouseTrackingModes", () => {
	it("maps tracking levels to modes", () => {
		assert.deepEqual(mouseTrackingModes("none"), []);
		assert.deepEqual(mouseTrackingModes("click"), ["mouseNormal", "sgrMouse"]);
		assert.deepEqual(mouseTrackingModes("drag"), ["mouseButton", "sgrMouse"]);
		assert.deepEqual(mouseTrackingModes("all"), ["mouseAny", "sgrMouse"]);
	});
});

describe("ProcessTerminal", () => {
	it("enables modes in order on the raw backend", () => {
		const { stdout, counts, signals, terminal } = setup();
		terminal.start(() => {});
		assert.equal(terminal.backend, "raw");
		assert.equal(counts.enters, 1);
		assert.deepEqual(stdout.take(), [
			"\x1b[?1049h",
			"\x1b[?25l",
			"\x1b[?2004h",
			"\x1b[?1004h",
			"\x1b[?1000h",
			"\x1b[?1006h",
		]);
		assert.deepEqual(signals, ["SIGWINCH"]);
		terminal.stop();
	});

	it("restores modes in reverse order on stop", () => {
		const { stdin, stdout, counts, terminal } = setup();
		terminal.start(() => {});
		stdout.take();
		terminal.stop();
		assert.deepEqual(stdout.take(), [
			"\x1b[0m",
			"\x1b[?1006l",
			"\x1b[?1000l",
			"\x1b[?1004l",
			"\x1b[?2004l",
			"\x1b[?25h",
			"\x1b[?1049l",
		]);
		assert.equal(counts.leaves, 1);
		assert.equal(stdin.paused, true);
		assert.equal(terminal.backend, undefined);
		assert.deepEqual(terminal.activeModes, []);

		terminal.stop();
		assert.deepEqual(stdout.take(), []);
		assert.equal(counts.leaves, 1);
	});

	it("skips modes the terminal does not support", () => {
		const { stdout, terminal } = setup({ caps: DEFAULT_CAPABILITIES });
		terminal.start(() => {});
		assert.deepEqual(stdout.take(), ["\x1b[?1049h", "\x1b[?25l"]);
		terminal.stop();
	});

	it("decodes input into events", () => {
		const { stdin, events, terminal } = setup();
		terminal.start((event) => events.push(event));
		stdin.emit("data", Buffer.from("a\x1b[A"));
		stdin.emit("data", "\x1b");
		stdin.emit("data", "\x1b[1;");
		stdin.emit("data", "5B");
		assert.deepEqual(events, [
			keyEvent("a", [], "a"),
			keyEvent("up"),
			keyEvent("escape"),
			keyEvent("down", ["ctrl"]),
		]);
		terminal.stop();
	});

	it("does not swallow the next key after Alt+O or Alt+[", () => {
		const { stdin, events, terminal } = setup();
		terminal.start((event) => events.push(event));
		stdin.emit("data", "\x1bO");
		stdin.emit("data", "x");
		stdin.emit("data", "\x1b[");
		stdin.emit("data", "a");
		assert.deepEqual(events, [
			keyEvent("O", ["alt"]),
			keyEvent("x", [], "x"),
			keyEvent("[", ["alt"]),
			keyEvent("a", [], "a"),
		]);
		terminal.stop();
	});

	it("reports resizes", () => {
		const { stdout, events, resizes, terminal } = setup();
		terminal.start(
			(event) => events.push(event),
			(size) => resizes.push(size),
		);
		stdout.columns = 120;
		stdout.emit("resize");
		assert.deepEqual(events, [{ type: "resize", cols: 120, rows: 30 }]);
		assert.deepEqual(resizes, [{ rows: 30, cols: 120 }]);
		assert.equal(terminal.columns, 120);
		terminal.stop();
	});

	it("removes its listeners on stop", () => {
		const { stdin, stdout, terminal } = setup();
		terminal.start(() => {});
		assert.equal(stdin.listenerCount("data"), 1);
		assert.equal(stdout.listenerCount("resize"), 1);
		assert.equal(stdin.paused, false);
		terminal.stop();
		assert.equal(stdin.listenerCount("data"), 0);
		assert.equal(stdout.listenerCount("resize"), 0);
	});

	it("falls back to the tty backend", () => {
		const { stdout, counts, terminal } = setup({ outcome: { status: "already-claimed" } });
		terminal.start(() => {});
		assert.equal(terminal.backend, "tty");
		assert.equal(terminal.capabilities?.colorMode, "trueColor");
		assert.deepEqual(stdout.take(), []);
		terminal.stop();
		assert.deepEqual(stdout.take(), ["\x1b[0m"]);
		assert.equal(counts.leaves, 0);
	});

	it("uses the alternate screen on tty when configured", () => {
		const config: TermwireConfig = { ...DEFAULT_CONFIG, backend: "tty", tty: { ...DEFAULT_CONFIG.tty, alternateScreen: true } };
		const { stdout, counts, terminal } = setup({ config });
		terminal.start(() => {});
		assert.equal(terminal.backend, "tty");
		assert.equal(counts.enters, 0);
		assert.deepEqual(stdout.take(), ["\x1b[?1049h"]);
		terminal.stop();
		assert.deepEqual(stdout.take(), ["\x1b[0m", "\x1b[?1049l"]);
	});

	it("enters raw mode itself for an explicit raw backend", () => {
		const { counts, terminal } = setup({ config: { ...CLICK_CONFIG, backend: "raw" } });
		terminal.start(() => {});
		assert.equal(terminal.backend, "raw");
		assert.equal(counts.enters, 1);
		terminal.stop();
		assert.equal(counts.leaves, 1);
	});

	it("fails when an explicit raw backend cannot enter raw mode", () => {
		const { stdin, terminal } = setup({ outcome: { status: "unsupported" }, config: { ...DEFAULT_CONFIG, backend: "raw" } });
		assert.throws(
			() => terminal.start(() => {}),
			/^Error: Raw backend requested but raw mode could not be entered \(unsupported\)$/,
		);
		assert.equal(terminal.backend, undefined);
		assert.equal(stdin.listenerCount("data"), 0);
	});

	it("rejects a second start", () => {
		const { terminal } = setup();
		terminal.start(() => {});
		assert.throws(() => terminal.start(() => {}), /Terminal already started/);
		terminal.stop();
	});

	it("encodes commands for the negotiated color mode", () => {
		const { stdout, terminal } = setup({ caps: { ...FULL_CAPS, colorMode: "color256", maxColors: 256 } });
		assert.throws(() => terminal.execute([{ type: "text", text: "x" }]), /Terminal not started/);
		terminal.start(() => {});
		stdout.take();
		terminal.execute([
			{ type: "style", style: { fg: { r: 255, g: 0, b: 0 } } },
			{ type: "text", text: "hi" },
		]);
		assert.deepEqual(stdout.take(), ["\x1b[38;5;196mhi"]);
		terminal.stop();
	});

	it("falls back to ASCII when the terminal lacks unicode", () => {
		const { stdout, terminal } = setup({ caps: { ...FULL_CAPS, unicode: false } });
		terminal.start(() => {});
		stdout.take();
		terminal.execute([{ type: "text", text: "✓ done" }]);
		assert.deepEqual(stdout.take(), ["[x] done"]);
		terminal.stop();
	});

	it("writes cursor and screen helpers", () => {
		const { stdout, terminal } = setup();
		terminal.start(() => {});
		stdout.take();
		terminal.moveBy(3);
		terminal.moveBy(-2);
		terminal.moveBy(0);
		terminal.clearLine();
		terminal.clearFromCursor();
		terminal.clearScreen();
		assert.deepEqual(stdout.take(), ["\x1b[3B", "\x1b[2A", "\x1b[K", "\x1b[0J", "\x1b[2J\x1b[1;1H"]);
		terminal.stop();
	});

	it("enables VT input on Windows", () => {
		const writes: [string, number][] = [];
		const consoleApi: ConsoleApi = {
			getMode: () => 0x0007,
			setMode: (handle, mode) => {
				writes.push([handle, mode]);
				return true;
			},
		};
		const platform = createPlatformAdapter({ platform: "win32", release: "10.0.19045", env: {}, consoleApi });
		const { signals, terminal } = setup({ platform });
		terminal.start(() => {});
		assert.deepEqual(writes, [["input", 0x0207]]);
		assert.deepEqual(signals, []);
		terminal.stop();
	});
});
