import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigurationError } from "@/common/errors/gateway.errors";
import { loadAccountDefinitions, loadSiteDefinitions, parseProxyUrl, readJsonFile } from "../gateway-config.loader";

const proxy = { protocol: "http" as const, host: "127.0.0.1", port: 7890 };

function violationsOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.violations;
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("gateway config loader", () => {
  describe("loadSiteDefinitions", () => {
    it("should order backups by priority and fill in defaults", () => {
      const sites = loadSiteDefinitions(
        {
          sites: [
            { name: "late", url: "https://late.example.com", role: "backup", requiresProxy: false, requiresChallengeSolution: false, priority: 5 },
            { name: "main", url: "https://main.example.com/", role: "primary", requiresProxy: true, requiresChallengeSolution: true },
            { name: "early", url: "https://early.example.com", role: "backup", requiresProxy: false, requiresChallengeSolution: false, priority: 1 },
          ],
        },
        proxy
      );

      expect(sites.map(site => site.name)).toEqual(["main", "early", "late"]);
      expect(sites[0]).toEqual({
        name: "main",
        url: "https://main.example.com",
        role: "primary",
        requiresProxy: true,
        requiresChallengeSolution: true,
        priority: 1,
        challengePath: "/login",
        requiredCookies: [],
      });
      expect(Object.isFrozen(sites[0])).toBe(true);
    });

    it("should keep file order between backups of equal priority", () => {
      const backup = { role: "backup", requiresProxy: false, requiresChallengeSolution: false, priority: 1 };
      const sites = loadSiteDefinitions({
        sites: [
          { name: "p", url: "https://p.example.com", role: "primary", requiresProxy: false, requiresChallengeSolution: false },
          { ...backup, name: "b1", url: "https://b1.example.com" },
          { ...backup, name: "b2", url: "https://b2.example.com" },
        ],
      });

      expect(sites.map(site => site.name)).toEqual(["p", "b1", "b2"]);
    });

    it("should require a proxy for sites that need one or need a challenge solution", () => {
      const violations = violationsOf(() =>
        loadSiteDefinitions({
          sites: [{ name: "main", url: "https://main.example.com", role: "primary", requiresProxy: true, requiresChallengeSolution: true }],
        })
      );

      expect(violations).toEqual([
        'site "main" requires a proxy but GATEWAY_PROXY_URL is not set',
        'site "main" requires a challenge solution but GATEWAY_PROXY_URL is not set',
      ]);
    });

    it("should require exactly one primary and unique names", () => {
      const site = { url: "https://x.example.com", role: "primary", requiresProxy: false, requiresChallengeSolution: false };
      const violations = violationsOf(() => loadSiteDefinitions({ sites: [{ ...site, name: "a" }, { ...site, name: "a" }] }));

      expect(violations).toEqual(["exactly one primary site is required, found 2", 'duplicate site name "a"']);
    });

    it("should report field errors with their path", () => {
      const violations = violationsOf(() =>
        loadSiteDefinitions({
          sites: [{ name: "main", url: "not a url", role: "primary", requiresProxy: false, requiresChallengeSolution: false }],
        })
      );

      expect(violations).toHaveLength(1);
      expect(violations[0].startsWith("sites.0.url: ")).toBe(true);
    });

    it("should reject a file that is not an object", () => {
      expect(() => loadSiteDefinitions([])).toThrow(ConfigurationError);
    });
  });

  describe("loadAccountDefinitions", () => {
    it("should apply defaults and drop empty credentials", () => {
      const [account] = loadAccountDefinitions([{ name: "alpha", apiUser: "", apiKey: "", cookies: { session: "s" } }]);

      expect(account).toEqual({
        name: "alpha",
        provider: "default",
        apiUser: undefined,
        apiKey: undefined,
        cookies: { session: "s" },
        enabled: true,
      });
    });

    it("should prefix every problem with the entry index", () => {
      const violations = violationsOf(() => loadAccountDefinitions([{ name: "ok" }, "nope", { name: "ok" }]));

      expect(violations).toEqual(["accounts[1]: must be an object", 'duplicate account name "ok"']);
    });

    it("should reject non-string cookie values", () => {
      const violations = violationsOf(() => loadAccountDefinitions([{ name: "alpha", cookies: { session: 1 } }]));

      expect(violations).toHaveLength(1);
      expect(violations[0].startsWith("accounts[0]: cookies: ")).toBe(true);
    });

    it("should require an array", () => {
      expect(violationsOf(() => loadAccountDefinitions({}))).toEqual(["accounts file must contain a JSON array"]);
    });
  });

  describe("parseProxyUrl", () => {
    it("should parse host and port", () => {
      expect(parseProxyUrl("http://127.0.0.1:7890")).toEqual(proxy);
      expect(parseProxyUrl("https://proxy.example.com")).toEqual({ protocol: "https", host: "proxy.example.com", port: 443 });
    });

    it("should reject unsupported protocols and garbage", () => {
      expect(() => parseProxyUrl("socks5://127.0.0.1:1080")).toThrow('Unsupported proxy protocol "socks5"');
      expect(() => parseProxyUrl("::")).toThrow('Invalid proxy URL "::"');
    });
  });

  describe("readJsonFile", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "loader-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should fail on missing files and invalid JSON", () => {
      const file = path.join(dir, "sites.json");
      expect(() => readJsonFile(file)).toThrow(`Cannot read ${file}`);

      fs.writeFileSync(file, "{ not json");
      expect(() => readJsonFile(file)).toThrow(`Invalid JSON in ${file}`);
    });

    it("should parse a valid file", () => {
      const file = path.join(dir, "sites.json");
      fs.writeFileSync(file, '{"sites": []}');

      expect(readJsonFile(file)).toEqual({ sites: [] });
    });
  });
});
