import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { setTimeout as delay } from "timers/promises";
import { createTheme } from "../cli/theme.js";
import { TypingIndicator } from "../cli/typing.js";
import { OutputCapture } from "./helpers.js";

const CLEAR_LINE = `\r${" ".repeat(30)}\r`;

describe("TypingIndicator", () => {
  it("animates until stopped, then clears the line", async () => {
    const output = new OutputCapture();
    const typing = new TypingIndicator({ output, theme: createTheme({ colors: false }), intervalMs: 5 });

    typing.start();
    assert.equal(typing.active, true);
    await delay(30);
    await typing.stop();

    assert.equal(typing.active, false);
    assert.ok(output.text.startsWith("\rAssistant is typing   "));
    assert.ok(output.text.includes("\rAssistant is typing.  "));
    assert.ok(output.text.endsWith(CLEAR_LINE));
  });

  it("does nothing when stopped without starting", async () => {
    const output = new OutputCapture();
    const typing = new TypingIndicator({ output, theme: createTheme({ colors: false }) });
    await typing.stop();
    assert.equal(output.text, "");
  });

  it("ignores a second start", async () => {
    const output = new OutputCapture();
    const typing = new TypingIndicator({ output, theme: createTheme({ colors: false }), intervalMs: 1000 });
    typing.start();
    typing.start();
    await typing.stop();
    assert.equal(output.text, `\rAssistant is typing   ${CLEAR_LINE}`);
  });
});
