// test/vim.commandParser.test.ts
import {
  expectsArgument,
  isExCommand,
  isOperatorPrefix,
  parseNormalCommand,
  stripColonPrefix,
} from "../src/utils/vim/commands/CommandParser";

const idle = { recording: false };

describe("parseNormalCommand", () => {
  it("recognises single-key motions and commands", () => {
    expect(parseNormalCommand("j", idle)).toEqual({ status: "complete", command: { type: "motion", motion: "down" } });
    expect(parseNormalCommand("Left", idle)).toEqual({
      status: "complete",
      command: { type: "motion", motion: "left" },
    });
    expect(parseNormalCommand("x", idle)).toEqual({ status: "complete", command: { type: "deleteChar" } });
    expect(parseNormalCommand("Ctrl+r", idle)).toEqual({ status: "complete", command: { type: "redo" } });
    expect(parseNormalCommand(":", idle)).toEqual({
      status: "complete",
      command: { type: "enterCommandLine", kind: ":" },
    });
  });

  it("waits for the second key of gg", () => {
    expect(parseNormalCommand("g", idle)).toEqual({ status: "pending" });
    expect(parseNormalCommand("gg", idle)).toEqual({
      status: "complete",
      command: { type: "motion", motion: "firstLine" },
    });
    expect(parseNormalCommand("gx", idle)).toEqual({ status: "unknown" });
  });

  it("pairs operators with a doubled key or a motion", () => {
    expect(parseNormalCommand("d", idle)).toEqual({ status: "pending" });
    expect(parseNormalCommand("dd", idle)).toEqual({
      status: "complete",
      command: { type: "operator", operator: "delete", motion: "line" },
    });
    expect(parseNormalCommand("cw", idle)).toEqual({
      status: "complete",
      command: { type: "operator", operator: "change", motion: "wordForward" },
    });
    expect(parseNormalCommand("y$", idle)).toEqual({
      status: "complete",
      command: { type: "operator", operator: "yank", motion: "lineEnd" },
    });
    expect(parseNormalCommand("dg", idle)).toEqual({ status: "pending" });
    expect(parseNormalCommand("dgg", idle)).toEqual({
      status: "complete",
      command: { type: "operator", operator: "delete", motion: "firstLine" },
    });
    expect(parseNormalCommand("dz", idle)).toEqual({ status: "unknown" });
    expect(parseNormalCommand("dy", idle)).toEqual({ status: "unknown" });
  });

  it("maps Y to a line yank", () => {
    expect(parseNormalCommand("Y", idle)).toEqual({
      status: "complete",
      command: { type: "operator", operator: "yank", motion: "line" },
    });
  });

  it("takes the key after r literally", () => {
    expect(parseNormalCommand("r", idle)).toEqual({ status: "pending" });
    expect(parseNormalCommand("r ", idle)).toEqual({
      status: "complete",
      command: { type: "replaceChar", char: " " },
    });
    expect(parseNormalCommand("rEnter", idle)).toEqual({ status: "unknown" });
  });

  it("accepts letters as mark names", () => {
    expect(parseNormalCommand("ma", idle)).toEqual({ status: "complete", command: { type: "setMark", name: "a" } });
    expect(parseNormalCommand("'a", idle)).toEqual({
      status: "complete",
      command: { type: "jumpToMark", name: "a", exact: false },
    });
    expect(parseNormalCommand("`a", idle)).toEqual({
      status: "complete",
      command: { type: "jumpToMark", name: "a", exact: true },
    });
    expect(parseNormalCommand("m1", idle)).toEqual({ status: "unknown" });
  });

  it("treats a bare q as the stop key only while recording", () => {
    expect(parseNormalCommand("q", idle)).toEqual({ status: "pending" });
    expect(parseNormalCommand("q", { recording: true })).toEqual({
      status: "complete",
      command: { type: "stopRecording" },
    });
    expect(parseNormalCommand("qa", idle)).toEqual({
      status: "complete",
      command: { type: "startRecording", register: "a" },
    });
    expect(parseNormalCommand("q!", idle)).toEqual({ status: "unknown" });
  });

  it("parses macro playback and register selection", () => {
    expect(parseNormalCommand("@a", idle)).toEqual({ status: "complete", command: { type: "playMacro", register: "a" } });
    expect(parseNormalCommand("@@", idle)).toEqual({ status: "complete", command: { type: "playMacro", register: "@" } });
    expect(parseNormalCommand("@!", idle)).toEqual({ status: "unknown" });
    expect(parseNormalCommand('"a', idle)).toEqual({
      status: "complete",
      command: { type: "selectRegister", register: "a" },
    });
    expect(parseNormalCommand('""', idle)).toEqual({
      status: "complete",
      command: { type: "selectRegister", register: '"' },
    });
  });

  it("does not match inherited object keys", () => {
    expect(parseNormalCommand("constructor", idle)).toEqual({ status: "unknown" });
    expect(parseNormalCommand("toString", idle)).toEqual({ status: "unknown" });
  });

  it("returns unknown for unbound keys", () => {
    expect(parseNormalCommand("Z", idle)).toEqual({ status: "unknown" });
    expect(parseNormalCommand("F1", idle)).toEqual({ status: "unknown" });
  });
});

describe("prefix predicates", () => {
  it("isOperatorPrefix matches only the operator keys", () => {
    expect(isOperatorPrefix("d")).toBe(true);
    expect(isOperatorPrefix("c")).toBe(true);
    expect(isOperatorPrefix("x")).toBe(false);
    expect(isOperatorPrefix("")).toBe(false);
  });

  it("expectsArgument matches keys that take a literal next key", () => {
    expect(expectsArgument("r")).toBe(true);
    expect(expectsArgument('"')).toBe(true);
    expect(expectsArgument("d")).toBe(false);
  });
});

describe("ex command helpers", () => {
  it("detects and strips the colon prefix", () => {
    expect(isExCommand(":w")).toBe(true);
    expect(isExCommand("w")).toBe(false);
    expect(stripColonPrefix(":wq")).toBe("wq");
    expect(stripColonPrefix("wq")).toBe("wq");
  });
});
