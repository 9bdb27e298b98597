import { isSafeHref, renderMessageHtml } from "@/components/chat/markdown";

describe("renderMessageHtml", () => {
  it("renders markdown formatting", () => {
    expect(renderMessageHtml("**Model:** VE-Pro 2")).toBe("<p><strong>Model:</strong> VE-Pro 2</p>\n");
  });

  it("keeps raw HTML from the text escaped", () => {
    expect(renderMessageHtml("**bold** <b>x</b>")).toBe("<p><strong>bold</strong> &lt;b&gt;x&lt;/b&gt;</p>\n");
  });

  it("turns single newlines into line breaks", () => {
    expect(renderMessageHtml("first\nsecond")).toBe("<p>first<br>second</p>\n");
  });
});

describe("renderMessageHtml links", () => {
  it("keeps http and https links", () => {
    expect(renderMessageHtml("[site](https://example.com)")).toBe('<p><a href="https://example.com">site</a></p>\n');
  });

  it("keeps mailto links", () => {
    expect(renderMessageHtml("[write](mailto:service@example.com)")).toBe(
      '<p><a href="mailto:service@example.com">write</a></p>\n'
    );
  });

  it("drops javascript: targets and keeps the link text", () => {
    expect(renderMessageHtml("[click here](javascript:alert(document.cookie))")).toBe("<p>click here</p>\n");
  });

  it("drops javascript: targets written in mixed case", () => {
    expect(renderMessageHtml("[click](JaVaScRiPt:alert(1))")).toBe("<p>click</p>\n");
  });

  it("drops data: image sources", () => {
    expect(renderMessageHtml("![pic](data:text/html,hello)")).toBe("<p>pic</p>\n");
  });
});

describe("isSafeHref", () => {
  it("accepts relative targets", () => {
    expect(isSafeHref("/help")).toBe(true);
  });

  it("rejects schemes split by control characters", () => {
    expect(isSafeHref("java\tscript:alert(1)")).toBe(false);
  });
});
