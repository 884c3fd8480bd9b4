import { describe, it } from "mocha";
import { expect } from "chai";

import { extractImageUrls, extractPageSummary, extractPdfLinks, htmlToText } from "../../src/extract/html.js";

const PAGE = `<!doctype html>
<html>
  <head>
    <title> Ownership in Rust </title>
    <meta name="description" content="How   borrowing works">
    <style>body { color: red }</style>
  </head>
  <body>
    <nav><a href="/">Home</a></nav>
    <h1>Ownership</h1><p>Each value has<br>one owner.</p>
    <script>window.track = true;</script>
    <img src="diagram.png"><img src="/static/diagram.png"><img src="data:image/png;base64,AAAA"><img src="">
    <a href="paper.PDF#page=2">Paper</a><a href="https://other.test/notes.pdf">Notes</a><a href="/guide">Guide</a>
  </body>
</html>`;

const BASE = "https://docs.test/book/ch04.html";

describe("extract/html", () => {
  it("extracts readable text without scripts or styles", () => {
    expect(htmlToText(PAGE)).to.equal("Home Ownership Each value has one owner. PaperNotesGuide");
  });

  it("resolves image URLs against the page and drops duplicates and data URIs", () => {
    expect(extractImageUrls(PAGE, BASE)).to.deep.equal([
      "https://docs.test/book/diagram.png",
      "https://docs.test/static/diagram.png",
    ]);
    expect(extractImageUrls(PAGE, BASE, 1)).to.deep.equal(["https://docs.test/book/diagram.png"]);
  });

  it("collects PDF links without fragments", () => {
    expect(extractPdfLinks(PAGE, BASE)).to.deep.equal([
      "https://docs.test/book/paper.PDF",
      "https://other.test/notes.pdf",
    ]);
  });

  it("summarises the page", () => {
    expect(extractPageSummary(PAGE)).to.deep.equal({
      title: "Ownership in Rust",
      description: "How borrowing works",
      linkCount: 4,
      imageCount: 4,
    });
  });
});
