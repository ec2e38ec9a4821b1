import { describe, it, expect } from "vitest";
import { postProcessText, toPageMarkdown } from "../text.js";

describe("postProcessText", () => {
  it("normalizes line endings and spacing", () => {
    expect(postProcessText("  Total   due:\t 42  \r\nThank you \rBye")).toBe(
      "Total due: 42\nThank you\nBye"
    );
  });

  it("collapses three or more line breaks into one blank line", () => {
    expect(postProcessText("Header\n\n\n\nBody\n\nFooter")).toBe("Header\n\nBody\n\nFooter");
  });

  it("joins words hyphenated across a line break", () => {
    expect(postProcessText("The docu-\nment was signed")).toBe("The document was signed");
  });

  it("keeps the hyphen when the next line starts a new word", () => {
    expect(postProcessText("Co-\nOperative")).toBe("Co-\nOperative");
    expect(postProcessText("pages 10-\n12")).toBe("pages 10-\n12");
  });

  it("trims leading and trailing blank lines", () => {
    expect(postProcessText("\n\n  text  \n\n")).toBe("text");
  });
});

describe("toPageMarkdown", () => {
  it("renders a page heading followed by the text", () => {
    expect(toPageMarkdown("Line one\nLine two", 2)).toBe("## Page 2\n\nLine one\nLine two\n");
  });

  it("renders only the heading for an empty page", () => {
    expect(toPageMarkdown("", 3)).toBe("## Page 3\n");
  });
});
