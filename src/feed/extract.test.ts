import { describe, expect, it } from "vitest";
import { htmlToText, resolveBodyText } from "./extract.js";

describe("htmlToText", () => {
  it("renders reddit html as text", () => {
    const html =
      '<div class="md"><p>Loading up on <a href="https://example.com/TSLA">calls</a></p>\n\n<p>AAPL &amp; friends</p>\n</div>';
    expect(htmlToText(html)).toBe("Loading up on calls\nAAPL & friends");
  });

  it("separates adjacent blocks", () => {
    expect(htmlToText('<div class="md"><p>AAPL</p><p>TSLA</p></div>')).toBe("AAPL\nTSLA");
    expect(htmlToText("<ul><li>GOOG</li><li>MSFT</li></ul>")).toBe("GOOG\nMSFT");
  });

  it("breaks lines at <br>", () => {
    expect(htmlToText("<p>AAPL<br>TSLA</p>")).toBe("AAPL\nTSLA");
  });
});

describe("resolveBodyText", () => {
  it("prefers rendered html over markdown", () => {
    expect(resolveBodyText("[calls](https://example.com/TSLA)", "<p>calls</p>")).toBe("calls");
  });

  it("falls back to the raw text", () => {
    expect(resolveBodyText("  plain   text  ", null)).toBe("plain text");
    expect(resolveBodyText(undefined, undefined)).toBe("");
  });
});
