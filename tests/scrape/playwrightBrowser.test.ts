import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import type { BrowserContextOptions, Page } from "playwright-core";

import { PlaywrightRenderer, type ChromiumHandle, type PageContext } from "../../src/scrape/playwrightBrowser.js";
import { rejectionOf } from "../helpers/http.js";

describe("scrape/playwrightBrowser", () => {
  it("closes the fresh context when the page cannot be opened", async () => {
    const failure = new Error("Target page, context or browser has been closed");
    const closeContext = sinon.stub<[], Promise<void>>().resolves();
    const context: PageContext = {
      newPage: async (): Promise<Page> => {
        throw failure;
      },
      close: closeContext,
    };
    const newContext = sinon.stub<[BrowserContextOptions], Promise<PageContext>>().resolves(context);
    const browser: ChromiumHandle = { newContext, close: sinon.stub<[], Promise<void>>().resolves() };
    const renderer = new PlaywrightRenderer(browser);

    const error = await rejectionOf(renderer.newPage({ userAgent: "ua-1", headers: { "Accept-Language": "en" } }));

    expect(error).to.equal(failure);
    sinon.assert.calledOnceWithExactly(newContext, { userAgent: "ua-1", extraHTTPHeaders: { "Accept-Language": "en" } });
    sinon.assert.calledOnce(closeContext);
  });
});
