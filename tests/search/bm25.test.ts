import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { RelevanceRanker, tokenize } from "../../src/search/bm25.js";

describe("search/bm25", () => {
  it("tokenizes into lowercase runs of two or more characters", () => {
    expect(tokenize("Rust's Ownership, a b 42!")).to.deep.equal(["rust", "ownership", "42"]);
    expect(tokenize("   ")).to.deep.equal([]);
  });

  it("never produces a negative idf", () => {
    const ranker = new RelevanceRanker();
    expect(ranker.idf(1, 1)).to.be.closeTo(Math.log(4 / 3), 1e-12);
    expect(ranker.idf(10, 10)).to.be.greaterThan(0);
    expect(ranker.idf(3, 1)).to.be.closeTo(Math.log(1 + 2.5 / 1.5), 1e-12);
  });

  it("normalises a single matching document to 1 and a non-matching one to 0", () => {
    const ranker = new RelevanceRanker();
    expect(ranker.score("rust", ["all about rust"])).to.deep.equal([1]);
    expect(ranker.score("rust", ["all about go"])).to.deep.equal([0]);
  });

  it("returns zeros for degenerate input", () => {
    const ranker = new RelevanceRanker();
    expect(ranker.score("rust", [])).to.deep.equal([]);
    expect(ranker.score("!", ["rust", "go"])).to.deep.equal([0, 0]);
    expect(ranker.score("rust", ["", ""])).to.deep.equal([0, 0]);
  });

  it("ranks by descending relative score", () => {
    const ranker = new RelevanceRanker({ k1: 1.2, b: 0.75 });
    const ranked = ranker.rank(
      "rust ownership",
      ["https://a.test/", "https://b.test/", "https://c.test/"],
      ["rust ownership borrow", "python garbage", "rust"],
    );

    expect(ranked.map((result) => result.url)).to.deep.equal(["https://a.test/", "https://c.test/", "https://b.test/"]);
    expect(ranked[0]?.score).to.equal(1);
    expect(ranked[1]?.score).to.be.closeTo(0.4906, 1e-3);
    expect(ranked[2]?.score).to.equal(0);
  });

  it("keeps the input order for equal scores", () => {
    const ranked = new RelevanceRanker().rank("rust", ["https://b.test/", "https://a.test/"], ["rust book", "rust book"]);
    expect(ranked).to.deep.equal([
      { url: "https://b.test/", score: 1 },
      { url: "https://a.test/", score: 1 },
    ]);
  });

  it("refuses misaligned urls and documents", () => {
    expect(() => new RelevanceRanker().rank("rust", ["https://a.test/"], [])).to.throw(RangeError);
  });

  it("returns one bounded score per document", () => {
    const ranker = new RelevanceRanker();
    fc.assert(
      fc.property(fc.string(), fc.array(fc.string({ maxLength: 200 }), { maxLength: 20 }), (query, documents) => {
        const scores = ranker.score(query, documents);
        expect(scores).to.have.length(documents.length);
        for (const score of scores) {
          expect(score).to.be.within(0, 1);
        }
      }),
    );
  });
});
