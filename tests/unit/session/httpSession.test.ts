import { afterEach, describe, expect, it } from "vitest";
import { TooManyRedirectsError, withQuery } from "../../../src/session";
import { createHarness, disposeHarness, Harness, requestedUrls, SITE } from "../../helpers/harness";

describe("withQuery", () => {
  it("appends parameters in insertion order", () => {
    expect(withQuery(`${SITE}/search`, { keyword: "", type: "slide", page: 2 })).toBe(`${SITE}/search?keyword=&type=slide&page=2`);
  });

  it("leaves the url alone without parameters", () => {
    expect(withQuery(`${SITE}/search`)).toBe(`${SITE}/search`);
  });
});

describe("HttpSession", () => {
  let harness: Harness;

  afterEach(async () => {
    await disposeHarness(harness);
  });

  it("keeps cookies set on intermediate redirects", async () => {
    harness = createHarness();
    const site = harness.agent.get(SITE);
    site.intercept({ path: "/start", method: "GET" }).reply(302, "", {
      headers: { location: "/landing", "set-cookie": "hop=1; Path=/" },
    });
    site.intercept({ path: "/landing", method: "GET", headers: { cookie: "hop=1" } }).reply(200, "landed");

    const response = await harness.session.get(`${SITE}/start`);

    expect(response.status).toBe(200);
    await expect(response.text()).resolves.toBe("landed");
    expect(await harness.session.cookieNames(`${SITE}/`)).toEqual(["hop"]);
  });

  it("returns the redirect itself when following is disabled", async () => {
    harness = createHarness();
    harness.agent.get(SITE).intercept({ path: "/start", method: "GET" }).reply(302, "", { headers: { location: "/landing" } });

    const response = await harness.session.get(`${SITE}/start`, { followRedirects: false });

    expect(response.status).toBe(302);
    expect(response.headers.get("location")).toBe("/landing");
  });

  it("turns a POST into a GET after a 303", async () => {
    harness = createHarness();
    const site = harness.agent.get(SITE);
    site.intercept({ path: "/form", method: "POST" }).reply(303, "", { headers: { location: "/done" } });
    site.intercept({ path: "/done", method: "GET" }).reply(200, "ok");

    const response = await harness.session.postForm(`${SITE}/form`, { a: "1" });

    expect(response.status).toBe(200);
    expect(requestedUrls(harness)).toEqual([`${SITE}/form`, `${SITE}/done`]);
  });

  it("stops an endless redirect loop", async () => {
    harness = createHarness();
    harness.agent
      .get(SITE)
      .intercept({ path: "/loop", method: "GET" })
      .reply(302, "", { headers: { location: "/loop" } })
      .persist();

    await expect(harness.session.get(`${SITE}/loop`)).rejects.toBeInstanceOf(TooManyRedirectsError);
  });

  it("forgets cookies on clear", async () => {
    harness = createHarness();
    harness.agent.get(SITE).intercept({ path: "/", method: "GET" }).reply(200, "", { headers: { "set-cookie": "a=1; Path=/" } });

    await harness.session.get(`${SITE}/`);
    await harness.session.clearCookies();

    expect(await harness.session.cookieNames(`${SITE}/`)).toEqual([]);
  });
});
