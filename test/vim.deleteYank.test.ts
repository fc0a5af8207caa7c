// test/vim.deleteYank.test.ts
import { setup } from "./helpers/vimHarness";

const FIVE_LINES = "line 1\nline 2\nline 3\nline 4\nline 5";

describe("Delete and Yank Operations", () => {
  describe("whole lines", () => {
    it("dd removes one line and p puts it back below", () => {
      const { doc, vim, press } = setup(FIVE_LINES);
      press("d", "d");
      expect(doc.getLines()).toEqual(["line 2", "line 3", "line 4", "line 5"]);
      expect(vim.getState().registers.get('"')).toBe("line 1\n");

      press("p");
      expect(doc.getLines()).toEqual(["line 2", "line 1", "line 3", "line 4", "line 5"]);
      expect(doc.getCursor()).toEqual({ row: 1, column: 0 });
    });

    it("a count deletes several lines into one capture", () => {
      const { doc, vim, press } = setup(FIVE_LINES);
      press("j", "3", "d", "d");
      expect(doc.getLines()).toEqual(["line 1", "line 5"]);
      expect(vim.getState().registers.get('"')).toBe("line 2\nline 3\nline 4\n");
      expect(doc.getCursor()).toEqual({ row: 1, column: 0 });
    });

    it("dd on the last line moves the cursor up", () => {
      const { doc, press } = setup(FIVE_LINES);
      press("G", "d", "d");
      expect(doc.getLines()).toEqual(["line 1", "line 2", "line 3", "line 4"]);
      expect(doc.getCursor()).toEqual({ row: 3, column: 0 });
    });

    it("dd on the only line leaves one empty line", () => {
      const { doc, press } = setup("only");
      press("d", "d");
      expect(doc.getLines()).toEqual([""]);
    });

    it("yy p p adds two copies below", () => {
      const { doc, press } = setup(FIVE_LINES);
      press("y", "y", "p", "p");
      expect(doc.getLines()).toEqual(["line 1", "line 1", "line 1", "line 2", "line 3", "line 4", "line 5"]);
    });

    it("Y yanks the line and P puts it above", () => {
      const { doc, vim, press } = setup(FIVE_LINES);
      press("j", "Y", "P");
      expect(vim.getState().registers.get("0")).toBe("line 2\n");
      expect(doc.getLines().slice(0, 3)).toEqual(["line 1", "line 2", "line 2"]);
      expect(doc.getCursor()).toEqual({ row: 1, column: 0 });
    });

    it("dj, dG and dgg act on whole lines", () => {
      const first = setup(FIVE_LINES);
      first.press("d", "j");
      expect(first.doc.getLines()).toEqual(["line 3", "line 4", "line 5"]);
      expect(first.vim.getState().registers.get('"')).toBe("line 1\nline 2\n");

      const second = setup(FIVE_LINES);
      second.press("j", "j", "d", "G");
      expect(second.doc.getLines()).toEqual(["line 1", "line 2"]);

      const third = setup(FIVE_LINES);
      third.press("j", "j", "d", "g", "g");
      expect(third.doc.getLines()).toEqual(["line 4", "line 5"]);
    });

    it("a paste count repeats the lines", () => {
      const { doc, press } = setup("a\nb");
      press("y", "y", "2", "p");
      expect(doc.getLines()).toEqual(["a", "a", "a", "b"]);
    });
  });

  describe("characters", () => {
    it("x deletes under the cursor and a count widens it", () => {
      const { doc, vim, press } = setup("line 1");
      press("x");
      expect(doc.getLines()).toEqual(["ine 1"]);
      expect(vim.getState().registers.get('"')).toBe("l");

      press("3", "x");
      expect(doc.getLines()).toEqual([" 1"]);
    });

    it("x at the end of the line pulls the cursor back", () => {
      const { doc, press } = setup("line 1");
      press("$", "x");
      expect(doc.getLines()).toEqual(["line "]);
      expect(doc.getCursor()).toEqual({ row: 0, column: 4 });
    });

    it("x on an empty line changes nothing", () => {
      const { doc, press } = setup("");
      press("x");
      expect(doc.isModified()).toBe(false);
    });

    it("X deletes before the cursor", () => {
      const { doc, press } = setup("line 1");
      press("l", "l", "X");
      expect(doc.getLines()).toEqual(["lne 1"]);
      expect(doc.getCursor()).toEqual({ row: 0, column: 1 });
    });

    it("xp swaps two characters", () => {
      const { doc, press } = setup("ab");
      press("x", "p");
      expect(doc.getLines()).toEqual(["ba"]);
    });

    it("p and P insert inline text after and at the cursor", () => {
      const { doc, press } = setup("abc");
      press("x", "p");
      expect(doc.getLines()).toEqual(["bac"]);
      expect(doc.getCursor()).toEqual({ row: 0, column: 1 });

      press("x", "P");
      expect(doc.getLines()).toEqual(["bac"]);
      expect(doc.getCursor()).toEqual({ row: 0, column: 1 });
    });

    it("a count repeats an inline paste", () => {
      const { doc, press } = setup("abc");
      press("x", "3", "p");
      expect(doc.getLines()).toEqual(["baaac"]);
      expect(doc.getCursor()).toEqual({ row: 0, column: 3 });
    });

    it("pasting an empty register does nothing", () => {
      const { doc, press } = setup("abc");
      press("p");
      expect(doc.getLines()).toEqual(["abc"]);
      expect(doc.isModified()).toBe(false);
    });

    it("r replaces count characters, or nothing when the line is too short", () => {
      const { doc, press } = setup("abc");
      press("r", "z");
      expect(doc.getLines()).toEqual(["zbc"]);

      press("2", "r", "y");
      expect(doc.getLines()).toEqual(["yyc"]);
      expect(doc.getCursor()).toEqual({ row: 0, column: 1 });

      press("5", "r", "q");
      expect(doc.getLines()).toEqual(["yyc"]);
    });

    it("r takes a digit as the replacement", () => {
      const { doc, press } = setup("abc");
      press("r", "5");
      expect(doc.getLines()).toEqual(["5bc"]);
    });
  });

  describe("operators with motions", () => {
    it("dw deletes the word and the space after it", () => {
      const { doc, vim, press } = setup("hello world foo");
      press("d", "w");
      expect(doc.getLines()).toEqual(["world foo"]);
      expect(vim.getState().registers.get('"')).toBe("hello ");
    });

    it("dw on the last word stops at the line end", () => {
      const { doc, press } = setup("hello world foo\nnext");
      press("w", "w", "d", "w");
      expect(doc.getLines()).toEqual(["hello world ", "next"]);
      expect(doc.getCursor()).toEqual({ row: 0, column: 11 });
    });

    it("counts before and after the operator multiply", () => {
      const first = setup("a b c d e");
      first.press("d", "3", "w");
      expect(first.doc.getLines()).toEqual(["d e"]);

      const second = setup("a b c d e");
      second.press("2", "d", "2", "w");
      expect(second.doc.getLines()).toEqual(["e"]);
    });

    it("de includes the last character of the word", () => {
      const { doc, press } = setup("hello world");
      press("d", "e");
      expect(doc.getLines()).toEqual([" world"]);
    });

    it("d0 and D delete to either end of the line", () => {
      const first = setup("hello world");
      first.press("w", "d", "0");
      expect(first.doc.getLines()).toEqual(["world"]);
      expect(first.vim.getState().registers.get('"')).toBe("hello ");

      const second = setup("hello world");
      second.press("w", "D");
      expect(second.doc.getLines()).toEqual(["hello "]);
      expect(second.doc.getCursor()).toEqual({ row: 0, column: 5 });
      expect(second.vim.getState().registers.get('"')).toBe("world");
    });

    it("yw copies without changing the document", () => {
      const { doc, vim, press } = setup("hello world");
      press("y", "w");
      expect(vim.getState().registers.get("0")).toBe("hello ");
      expect(doc.isModified()).toBe(false);
    });

    it("dl deletes the character under the cursor, even the last one", () => {
      const { doc, vim, press } = setup("abc");
      press("$", "d", "l");
      expect(doc.getLines()).toEqual(["ab"]);
      expect(doc.getCursor()).toEqual({ row: 0, column: 1 });
      expect(vim.getState().registers.get('"')).toBe("c");
    });

    it("a count on dl stops at the line end", () => {
      const { doc, press } = setup("abc");
      press("2", "d", "l");
      expect(doc.getLines()).toEqual(["c"]);

    });

    it("dl with a count past the line end deletes to the end", () => {
      const { doc, press } = setup("abc");
      press("l", "5", "d", "l");
      expect(doc.getLines()).toEqual(["a"]);
      expect(doc.getCursor()).toEqual({ row: 0, column: 0 });
    });

    it("db deletes back to the start of the previous word", () => {
      const { doc, press } = setup("one two");
      press("w", "d", "b");
      expect(doc.getLines()).toEqual(["two"]);
      expect(doc.getCursor()).toEqual({ row: 0, column: 0 });
    });
  });

  describe("change operators", () => {
    it("cw changes to the end of the word", () => {
      const { doc, vim, press } = setup("hello world");
      press("c", "w");
      expect(doc.getLines()).toEqual([" world"]);
      expect(vim.getMode()).toBe("insert");
      expect(doc.getCursor()).toEqual({ row: 0, column: 0 });
    });

    it("cw on whitespace changes the whitespace run", () => {
      const { doc, press } = setup("a   b");
      press("l", "c", "w");
      expect(doc.getLines()).toEqual(["ab"]);
    });

    it("cc leaves one empty line, indented when autoindent is on", () => {
      const plain = setup("  indented\nnext");
      plain.press("c", "c");
      expect(plain.doc.getLines()).toEqual(["", "next"]);
      expect(plain.vim.getState().registers.get('"')).toBe("  indented\n");

      const indented = setup("  indented\nnext", { autoIndent: true });
      indented.press("c", "c");
      expect(indented.doc.getLines()).toEqual(["  ", "next"]);
      expect(indented.doc.getCursor()).toEqual({ row: 0, column: 2 });
      expect(indented.vim.getMode()).toBe("insert");
    });

    it("C deletes to the line end and enters Insert", () => {
      const { doc, vim, press } = setup("hello world");
      press("w", "C");
      expect(doc.getLines()).toEqual(["hello "]);
      expect(doc.getCursor()).toEqual({ row: 0, column: 6 });
      expect(vim.getMode()).toBe("insert");
    });
  });

  describe("visual selections", () => {
    const TEXT = "hello world\nsecond line\nthird";

    it("v e y yanks inclusively and returns to the start", () => {
      const { doc, vim, press } = setup(TEXT);
      press("w", "v", "e", "y");
      expect(vim.getState().registers.get('"')).toBe("world");
      expect(vim.getMode()).toBe("normal");
      expect(doc.getCursor()).toEqual({ row: 0, column: 6 });
      expect(doc.getSelection()).toBeNull();
    });

    it("v l l d deletes three characters", () => {
      const { doc, vim, press } = setup(TEXT);
      press("v", "l", "l", "d");
      expect(doc.getLines()[0]).toBe("lo world");
      expect(vim.getState().registers.get('"')).toBe("hel");
    });

    it("V j d deletes whole lines", () => {
      const { doc, vim, press } = setup(TEXT);
      press("V", "j", "d");
      expect(doc.getLines()).toEqual(["third"]);
      expect(vim.getState().registers.get('"')).toBe("hello world\nsecond line\n");
    });

    it("Ctrl+v cuts a column block", () => {
      const { doc, vim, press } = setup(TEXT);
      press("Ctrl+v", "j", "l", "x");
      expect(doc.getLines()).toEqual(["llo world", "cond line", "third"]);
      expect(vim.getState().registers.get('"')).toBe("he\nse");
    });

    it("v c deletes the selection and enters Insert", () => {
      const { doc, vim, press } = setup(TEXT);
      press("v", "c");
      expect(doc.getLines()[0]).toBe("ello world");
      expect(vim.getMode()).toBe("insert");
    });

    it("yanks a selection into a named register", () => {
      const { vim, press } = setup(TEXT);
      press("v", "e", '"', "a", "y");
      expect(vim.getState().registers.get("a")).toBe("hello");
    });
  });
});
