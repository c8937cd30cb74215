import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { MockAgent } from "undici";
import { USER_AGENT } from "./http";
import { fetchRobotsTxt, getRobotsUrl, isAllowedByRobots, parsePolicy } from "./robots";
import { CancelledError, DecodeError, InvalidUrlError, PolicyParseError } from "./errors";

const ORIGIN = "https://example.com";
const ROBOTS_URL = `${ORIGIN}/robots.txt`;

describe("getRobotsUrl", () => {
  it("keeps scheme, host and port and drops the rest", () => {
    expect(getRobotsUrl("https://example.com/a/b?c=d#e")).toBe("https://example.com/robots.txt");
    expect(getRobotsUrl("http://sub.example.com:8080/page")).toBe("http://sub.example.com:8080/robots.txt");
    expect(getRobotsUrl("https://example.com:443/")).toBe("https://example.com/robots.txt");
  });

  it("rejects malformed URLs", () => {
    expect(() => getRobotsUrl("")).toThrow(InvalidUrlError);
    expect(() => getRobotsUrl("no scheme here")).toThrow(InvalidUrlError);
  });
});

describe("RobotsPolicy", () => {
  const txt = [
    "User-agent: *",
    "Disallow: /private",
    "",
    "User-agent: MetaFetcher",
    "Disallow: /no-previews",
  ].join("\n");

  it("lets a group naming the agent override the * group", () => {
    const policy = parsePolicy(ROBOTS_URL, txt);

    expect(policy.allowed(USER_AGENT, `${ORIGIN}/private/page`)).toBe(true);
    expect(policy.allowed(USER_AGENT, `${ORIGIN}/no-previews/page`)).toBe(false);
    expect(policy.allowed("OtherBot/2.0", `${ORIGIN}/private/page`)).toBe(false);
    expect(policy.allowed("OtherBot/2.0", `${ORIGIN}/no-previews/page`)).toBe(true);
  });

  it("applies the most specific matching rule", () => {
    const policy = parsePolicy(ROBOTS_URL, "User-agent: *\nDisallow: /docs\nAllow: /docs/public\n");

    expect(policy.allowed(USER_AGENT, `${ORIGIN}/docs/public/intro`)).toBe(true);
    expect(policy.allowed(USER_AGENT, `${ORIGIN}/docs/internal`)).toBe(false);
    expect(policy.allowed(USER_AGENT, `${ORIGIN}/blog`)).toBe(true);
  });

  it("understands * and $ patterns", () => {
    const policy = parsePolicy(ROBOTS_URL, "User-agent: *\nDisallow: /*.pdf$\n");

    expect(policy.allowed(USER_AGENT, `${ORIGIN}/files/report.pdf`)).toBe(false);
    expect(policy.allowed(USER_AGENT, `${ORIGIN}/files/report.pdfx`)).toBe(true);
  });

  it("allows everything when no rule matches", () => {
    expect(parsePolicy(ROBOTS_URL, "").allowed(USER_AGENT, `${ORIGIN}/anything`)).toBe(true);
    expect(parsePolicy(ROBOTS_URL, "# just a comment\n").allowed(USER_AGENT, `${ORIGIN}/`)).toBe(true);
  });

  it("rejects a document that is not text", () => {
    expect(() => parsePolicy(ROBOTS_URL, "User-agent: *\u0000\u0001\u0002")).toThrow(PolicyParseError);
  });
});

describe("isAllowedByRobots", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it("asks for robots.txt as the fixed user agent", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/robots.txt", method: "GET", headers: { "user-agent": USER_AGENT } })
      .reply(200, "User-agent: MetaFetcher\nDisallow: /\n");

    await expect(isAllowedByRobots(`${ORIGIN}/article`, { dispatcher: agent })).resolves.toBe(false);
    agent.assertNoPendingInterceptors();
  });

  it("allows when robots.txt is missing", async () => {
    agent.get(ORIGIN).intercept({ path: "/robots.txt", method: "GET" }).reply(404, "not found");

    await expect(isAllowedByRobots(`${ORIGIN}/article`, { dispatcher: agent })).resolves.toBe(true);
  });

  it("allows when robots.txt errors on the server", async () => {
    agent.get(ORIGIN).intercept({ path: "/robots.txt", method: "GET" }).reply(500, "oops");

    await expect(isAllowedByRobots(`${ORIGIN}/article`, { dispatcher: agent })).resolves.toBe(true);
  });

  it("allows when robots.txt cannot be reached", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/robots.txt", method: "GET" })
      .replyWithError(new Error("getaddrinfo ENOTFOUND example.com"));

    await expect(isAllowedByRobots(`${ORIGIN}/article`, { dispatcher: agent })).resolves.toBe(true);
  });

  it("surfaces a robots.txt that cannot be parsed", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/robots.txt", method: "GET" })
      .reply(200, Buffer.from([0x00, 0x01, 0x02, 0x03]));

    const err = await isAllowedByRobots(`${ORIGIN}/article`, { dispatcher: agent }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PolicyParseError);
    expect(err).toMatchObject({ url: `${ORIGIN}/article`, robotsUrl: ROBOTS_URL });
  });

  it("surfaces a robots.txt whose bytes are not valid text", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/robots.txt", method: "GET" })
      .reply(200, Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]));

    const err = await isAllowedByRobots(`${ORIGIN}/article`, { dispatcher: agent }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PolicyParseError);
    expect(err).toMatchObject({
      code: "POLICY_PARSE_ERROR",
      url: `${ORIGIN}/article`,
      robotsUrl: ROBOTS_URL,
      message: `Could not parse ${ROBOTS_URL}: document is not text`,
    });
    expect(err instanceof PolicyParseError && err.cause).toBeInstanceOf(DecodeError);
  });

  it("does not swallow cancellation", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(fetchRobotsTxt(ROBOTS_URL, { dispatcher: agent, signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
  });
});
