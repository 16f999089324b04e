import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
	clearLine,
	clearLineFromCursor,
	clearScreen,
	createEncoder,
	cursorBack,
	cursorDown,
	cursorForward,
	cursorHide,
	cursorShow,
	cursorTo,
	cursorUp,
	disableMode,
	enableMode,
	requestWindowSize,
	reset,
	restoreCursor,
	saveCursor,
	scrollDown,
	scrollUp,
	setScrollRegion,
	sgr,
} from "../src/ansi.js";
import { decodeInput, InputDecoder } from "../src/decoder.js";
import type { InputEvent } from "../src/events.js";

describe("encoder output fed back to the decoder", () => {
	it("never looks like user input", () => {
		const sequences = [
			cursorTo(1, 1),
			cursorTo(12, 40),
			cursorUp(),
			cursorUp(3),
			cursorDown(2),
			cursorForward(),
			cursorBack(5),
			cursorHide(),
			cursorShow(),
			saveCursor(),
			restoreCursor(),
			clearScreen(),
			clearLine(),
			clearLineFromCursor(),
			scrollUp(),
			scrollDown(2),
			setScrollRegion(2, 20),
			requestWindowSize(),
			reset(),
			sgr({ fg: "red", bg: { r: 0, g: 0, b: 255 }, attrs: ["bold"] }),
			sgr({ fg: 196 }, "color256"),
			enableMode("alternateScreen"),
			disableMode("sgrMouse"),
		];
		for (const sequence of sequences) {
			assert.deepEqual(decodeInput(sequence), [], JSON.stringify(sequence));
		}
	});

	it("decodes only the text of an encoded frame", () => {
		const encoder = createEncoder("color16");
		const frame = encoder.encodeAll([
			{ type: "clearScreen" },
			{ type: "cursorTo", row: 1, col: 1 },
			{ type: "style", style: { fg: "green" } },
			{ type: "text", text: "ok" },
		]);
		assert.deepEqual(
			decodeInput(frame).map((event) => (event.type === "key" ? event.char : event.type)),
			["o", "k"],
		);
	});
});

describe("split input", () => {
	const input = Buffer.from(
		"a\x1b[1;5C\x1b[<0;10;5M\x1b[200~pasted 日本\x1b[201~é\x1bOP\x1b[15~\x1b[M *%\x1b[I\x1bx",
	);
	const expected = decodeInput(input);

	it("decodes the whole input", () => {
		assert.equal(expected.length, 10);
	});

	it("yields the same events wherever the input is split", () => {
		for (let split = 1; split < input.length; split++) {
			const decoder = new InputDecoder();
			const events: InputEvent[] = [
				...decoder.decode(input.subarray(0, split)).events,
				...decoder.decode(input.subarray(split)).events,
				...decoder.flush(),
			];
			assert.deepEqual(events, expected, `split at ${split}`);
		}
	});

	it("yields the same events when fed one byte at a time", () => {
		const decoder = new InputDecoder();
		const events: InputEvent[] = [];
		for (const byte of input) {
			events.push(...decoder.decode(Uint8Array.of(byte)).events);
		}
		events.push(...decoder.flush());
		assert.deepEqual(events, expected);
	});
});
