// test/vim.substitute.test.ts
import { VimError, parseSubstituteCommand, substituteLines } from "../src/utils/vim";
import { setup } from "./helpers/vimHarness";

describe("parseSubstituteCommand", () => {
  it("splits pattern, replacement and flags", () => {
    expect(parseSubstituteCommand("s/foo/bar/")).toEqual({
      pattern: "foo",
      replacement: "bar",
      global: false,
      ignoreCase: false,
    });
    expect(parseSubstituteCommand("s/foo/bar/gi")).toEqual({
      pattern: "foo",
      replacement: "bar",
      global: true,
      ignoreCase: true,
    });
  });

  it("allows the replacement and flags to be omitted", () => {
    expect(parseSubstituteCommand("s/foo")).toEqual({
      pattern: "foo",
      replacement: "",
      global: false,
      ignoreCase: false,
    });
  });

  it("treats an escaped slash as part of the pattern", () => {
    expect(parseSubstituteCommand("s/a\\/b/c/").pattern).toBe("a/b");
  });

  it("keeps regex escapes and turns group references into $n", () => {
    const command = parseSubstituteCommand("s/(\\w+) (\\w+)/\\2 \\1/");
    expect(command.pattern).toBe("(\\w+) (\\w+)");
    expect(command.replacement).toBe("$2 $1");
  });

  it("rejects malformed commands", () => {
    expect(() => parseSubstituteCommand("x/a/b/")).toThrow(VimError);
    expect(() => parseSubstituteCommand("s/a/b/c/d")).toThrow("Trailing characters: s/a/b/c/d");
    expect(() => parseSubstituteCommand("s/a/b/x")).toThrow("Invalid flags: x");
  });

  it("reports syntax errors with the substitution kind", () => {
    let caught: unknown;
    try {
      parseSubstituteCommand("s/a/b/q");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(VimError);
    expect(caught).toMatchObject({ kind: "InvalidSubstitutionSyntax" });
  });
});

describe("substituteLines", () => {
  const first = parseSubstituteCommand("s/foo/bar/");
  const every = parseSubstituteCommand("s/foo/bar/g");

  it("replaces only the first match without g", () => {
    const result = substituteLines(["foo foo"], 0, 0, first);
    expect(result).toEqual({ replaced: true, count: 1, lineCount: 1, lines: ["bar foo"] });
  });

  it("replaces every match with g", () => {
    const result = substituteLines(["foo foo"], 0, 0, every);
    expect(result).toEqual({ replaced: true, count: 2, lineCount: 1, lines: ["bar bar"] });
  });

  it("only touches rows inside the range and leaves the input alone", () => {
    const input = ["foo", "foo", "foo"];
    const result = substituteLines(input, 1, 1, first);
    expect(result.lines).toEqual(["foo", "bar", "foo"]);
    expect(input).toEqual(["foo", "foo", "foo"]);
  });

  it("reports no replacement when nothing matches", () => {
    const result = substituteLines(["abc"], 0, 0, first);
    expect(result.replaced).toBe(false);
    expect(result.count).toBe(0);
    expect(result.lines).toEqual(["abc"]);
  });

  it("swaps groups through back-references", () => {
    const command = parseSubstituteCommand("s/(\\w+) (\\w+)/\\2 \\1/");
    expect(substituteLines(["john smith"], 0, 0, command).lines).toEqual(["smith john"]);
  });

  it("writes a doubled backslash as one literal backslash", () => {
    const command = parseSubstituteCommand("s/x/a\\\\b/");
    expect(substituteLines(["x"], 0, 0, command).lines).toEqual(["a\\b"]);
  });

  it("honours the ignore-case flag", () => {
    const command = parseSubstituteCommand("s/FOO/bar/i");
    expect(substituteLines(["Foo"], 0, 0, command).lines).toEqual(["bar"]);
  });

  it("rejects an invalid pattern", () => {
    expect(() => substituteLines(["x"], 0, 0, parseSubstituteCommand("s/(/y/"))).toThrow("Invalid pattern: (");
  });
});

describe(":s through the state machine", () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  it("replaces the first match on the current line", () => {
    const { doc, host, ex } = setup("foo foo");
    ex("s/foo/bar/");
    expect(doc.getLines()).toEqual(["bar foo"]);
    expect(host.showMessage).toHaveBeenCalledWith("1 substitution on 1 line");
  });

  it("replaces every match with g", () => {
    const { doc, host, ex } = setup("foo foo");
    ex("s/foo/bar/g");
    expect(doc.getLines()).toEqual(["bar bar"]);
    expect(host.showMessage).toHaveBeenCalledWith("2 substitutions on 1 line");
  });

  it("applies % to the whole document and keeps the cursor", () => {
    const { doc, host, press, ex } = setup(["a1", "b", "a2"]);
    press("j");
    ex("%s/a/z/");
    expect(doc.getLines()).toEqual(["z1", "b", "z2"]);
    expect(doc.getCursor()).toEqual({ row: 1, column: 0 });
    expect(host.showMessage).toHaveBeenCalledWith("2 substitutions on 2 lines");
  });

  it("accepts a numbered range", () => {
    const { doc, ex } = setup(["x", "x", "x", "x"]);
    ex("2,3s/x/y/");
    expect(doc.getLines()).toEqual(["x", "y", "y", "x"]);
  });

  it("reuses the last search pattern when the pattern is empty", () => {
    const { doc, press, type, ex } = setup("x foo");
    press("/");
    type("foo");
    press("Enter");
    ex("s//baz/");
    expect(doc.getLines()).toEqual(["x baz"]);
  });

  it("makes its pattern the one n searches for", () => {
    const { doc, press, ex } = setup(["foo", "foo"]);
    ex("s/foo/bar/");
    press("n");
    expect(doc.getCursor()).toEqual({ row: 1, column: 0 });
  });

  it("reports an empty pattern with no previous search", () => {
    const { doc, host, ex } = setup("abc");
    ex("s//x/");
    expect(doc.getLines()).toEqual(["abc"]);
    expect(host.showError).toHaveBeenCalledWith(
      expect.objectContaining({ kind: "InvalidSubstitutionSyntax", message: "No previous regular expression" })
    );
    expect(warn).toHaveBeenCalledWith("[VimStateMachine] InvalidSubstitutionSyntax: No previous regular expression");
  });

  it("folds case when ignorecase is set", () => {
    const { doc, ex } = setup("foo");
    ex("set ic");
    ex("s/FOO/x/");
    expect(doc.getLines()).toEqual(["x"]);
  });

  it("leaves an unmatched document unmodified", () => {
    const { doc, host, ex } = setup("abc");
    ex("s/zzz/y/");
    expect(doc.isModified()).toBe(false);
    expect(host.showMessage).not.toHaveBeenCalled();
    expect(host.showError).not.toHaveBeenCalled();
  });

  it("can be undone", () => {
    const { doc, press, ex } = setup("foo");
    ex("s/foo/bar/");
    press("u");
    expect(doc.getLines()).toEqual(["foo"]);
  });
});
