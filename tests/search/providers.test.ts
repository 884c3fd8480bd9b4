import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { parseConfig } from "../../src/config/loader.js";
import { ProviderError } from "../../src/errors.js";
import { createProviders, DuckDuckGoProvider, GoogleProvider, TavilyProvider } from "../../src/search/providers/index.js";
import { bodyResponse, jsonResponse, rejectionOf } from "../helpers/http.js";

function fetchStub() {
  return sinon.stub<Parameters<typeof fetch>, ReturnType<typeof fetch>>();
}

async function providerErrorOf(promise: Promise<unknown>): Promise<ProviderError> {
  const error = await rejectionOf(promise);
  expect(error).to.be.instanceOf(ProviderError);
  if (!(error instanceof ProviderError)) {
    throw error;
  }
  return error;
}

describe("search/providers", () => {
  describe("DuckDuckGoProvider", () => {
    const endpoint = "https://api.duckduckgo.test/";

    it("collects links from the abstract, results and grouped topics", async () => {
      const fetchImpl = fetchStub().resolves(
        jsonResponse({
          AbstractURL: "https://en.wikipedia.org/wiki/Rust",
          Results: [{ FirstURL: "https://www.rust-lang.org/" }],
          RelatedTopics: [
            { FirstURL: "https://doc.rust-lang.org/book/" },
            {
              Name: "Crates",
              Topics: [{ FirstURL: "https://en.wikipedia.org/wiki/Rust" }, { FirstURL: "https://crates.io/" }],
            },
            { Text: "no link here" },
          ],
        }),
      );
      const provider = new DuckDuckGoProvider({ endpoint, timeoutMs: 1_000, fetchImpl });

      const urls = await provider.search("rust ownership", 10);

      expect(urls).to.deep.equal([
        "https://en.wikipedia.org/wiki/Rust",
        "https://www.rust-lang.org/",
        "https://doc.rust-lang.org/book/",
        "https://crates.io/",
      ]);
      const [requested] = fetchImpl.firstCall.args;
      expect(String(requested)).to.equal(
        "https://api.duckduckgo.test/?q=rust+ownership&format=json&no_html=1&skip_disambig=1",
      );
    });

    it("returns at most maxResults links", async () => {
      const fetchImpl = fetchStub().resolves(
        jsonResponse({ Results: [{ FirstURL: "https://a.test/" }, { FirstURL: "https://b.test/" }, { FirstURL: "https://c.test/" }] }),
      );
      const provider = new DuckDuckGoProvider({ endpoint, timeoutMs: 1_000, fetchImpl });
      expect(await provider.search("q", 2)).to.deep.equal(["https://a.test/", "https://b.test/"]);
    });

    it("classifies HTTP failures by status", async () => {
      const unavailable = new DuckDuckGoProvider({ endpoint, timeoutMs: 1_000, fetchImpl: fetchStub().resolves(jsonResponse({}, 503)) });
      const transient = await providerErrorOf(unavailable.search("q", 5));
      expect(transient.code).to.equal("E-PROVIDER-HTTP");
      expect(transient.transient).to.equal(true);
      expect(transient.status).to.equal(503);

      const forbidden = new DuckDuckGoProvider({ endpoint, timeoutMs: 1_000, fetchImpl: fetchStub().resolves(jsonResponse({}, 403)) });
      const permanent = await providerErrorOf(forbidden.search("q", 5));
      expect(permanent.transient).to.equal(false);
      expect(permanent.status).to.equal(403);
    });

    it("treats network failures and aborts as transient", async () => {
      const offline = new DuckDuckGoProvider({
        endpoint,
        timeoutMs: 1_000,
        fetchImpl: fetchStub().rejects(new TypeError("fetch failed")),
      });
      const network = await providerErrorOf(offline.search("q", 5));
      expect(network.code).to.equal("E-PROVIDER-NETWORK");
      expect(network.transient).to.equal(true);

      const abort = new Error("The operation was aborted");
      abort.name = "AbortError";
      const slow = new DuckDuckGoProvider({ endpoint, timeoutMs: 1_000, fetchImpl: fetchStub().rejects(abort) });
      const timeout = await providerErrorOf(slow.search("q", 5));
      expect(timeout.code).to.equal("E-PROVIDER-TIMEOUT");
      expect(timeout.transient).to.equal(true);
    });

    it("times out when the body stalls after the headers", async () => {
      const stalled = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"Results": ['));
        },
      });
      const provider = new DuckDuckGoProvider({
        endpoint,
        timeoutMs: 50,
        fetchImpl: fetchStub().resolves(bodyResponse(stalled, "application/json")),
      });

      const error = await providerErrorOf(provider.search("q", 5));

      expect(error.code).to.equal("E-PROVIDER-TIMEOUT");
      expect(error.transient).to.equal(true);
    });

    it("treats a connection dropped while reading the body as transient", async () => {
      const dropped = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"Results": ['));
          controller.error(new TypeError("terminated"));
        },
      });
      const provider = new DuckDuckGoProvider({
        endpoint,
        timeoutMs: 1_000,
        fetchImpl: fetchStub().resolves(bodyResponse(dropped, "application/json")),
      });

      const error = await providerErrorOf(provider.search("q", 5));

      expect(error.code).to.equal("E-PROVIDER-NETWORK");
      expect(error.transient).to.equal(true);
    });

    it("rejects payloads that are not the expected JSON", async () => {
      const html = new DuckDuckGoProvider({
        endpoint,
        timeoutMs: 1_000,
        fetchImpl: fetchStub().resolves(bodyResponse("<html></html>", "text/html")),
      });
      const notJson = await providerErrorOf(html.search("q", 5));
      expect(notJson.code).to.equal("E-PROVIDER-SCHEMA");
      expect(notJson.transient).to.equal(false);

      const wrongShape = new DuckDuckGoProvider({
        endpoint,
        timeoutMs: 1_000,
        fetchImpl: fetchStub().resolves(jsonResponse({ Results: "nope" })),
      });
      expect((await providerErrorOf(wrongShape.search("q", 5))).code).to.equal("E-PROVIDER-SCHEMA");
    });
  });

  describe("TavilyProvider", () => {
    const endpoint = "https://api.tavily.test/search";

    it("fails permanently without an API key and sends no request", async () => {
      const fetchImpl = fetchStub();
      const provider = new TavilyProvider({ endpoint, apiKey: null, timeoutMs: 1_000, fetchImpl });

      const error = await providerErrorOf(provider.search("q", 5));

      expect(error.code).to.equal("E-PROVIDER-CREDENTIALS");
      expect(error.transient).to.equal(false);
      sinon.assert.notCalled(fetchImpl);
    });

    it("posts the query and reads result URLs", async () => {
      const fetchImpl = fetchStub().resolves(
        jsonResponse({ results: [{ url: "https://a.test/", title: "A" }, { url: "https://b.test/" }] }),
      );
      const provider = new TavilyProvider({ endpoint, apiKey: "test-secret", timeoutMs: 1_000, fetchImpl });

      expect(await provider.search("rust", 3)).to.deep.equal(["https://a.test/", "https://b.test/"]);

      const init = fetchImpl.firstCall.args[1];
      expect(init?.method).to.equal("POST");
      expect(JSON.parse(String(init?.body))).to.deep.equal({
        api_key: "test-secret",
        query: "rust",
        max_results: 3,
        search_depth: "basic",
      });
    });
  });

  describe("GoogleProvider", () => {
    const endpoint = "https://customsearch.test/v1";

    it("needs both the key and the engine id", async () => {
      const fetchImpl = fetchStub();
      const provider = new GoogleProvider({ endpoint, apiKey: "test-secret", cseId: null, timeoutMs: 1_000, fetchImpl });
      expect((await providerErrorOf(provider.search("q", 5))).code).to.equal("E-PROVIDER-CREDENTIALS");
      sinon.assert.notCalled(fetchImpl);
    });

    it("caps the page size and keeps http(s) links only", async () => {
      const fetchImpl = fetchStub().resolves(
        jsonResponse({ items: [{ link: "https://a.test/" }, { link: "ftp://files.test/a" }, { link: "http://b.test/" }] }),
      );
      const provider = new GoogleProvider({
        endpoint,
        apiKey: "test-secret",
        cseId: "test-cse",
        timeoutMs: 1_000,
        fetchImpl,
      });

      expect(await provider.search("rust", 25)).to.deep.equal(["https://a.test/", "http://b.test/"]);
      const requested = new URL(String(fetchImpl.firstCall.args[0]));
      expect(requested.searchParams.get("num")).to.equal("10");
      expect(requested.searchParams.get("cx")).to.equal("test-cse");
      expect(requested.searchParams.get("q")).to.equal("rust");
    });
  });

  it("builds every provider from the configuration", () => {
    const providers = createProviders(parseConfig({}), fetchStub());
    expect(Object.keys(providers)).to.deep.equal(["duckduckgo", "tavily", "google"]);
    expect(providers.google.name).to.equal("google");
  });
});
