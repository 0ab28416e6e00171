import { Readable } from "stream";
import { AxiosHeaders, type AxiosResponse } from "axios";
import type { AccountDefinition, SiteDefinition } from "@/common/types/gateway";

/**
 * Helper functions for common test operations
 */
export class TestHelpers {
  static async wait(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Let pending promise callbacks run
   */
  static async flushPromises(rounds = 5): Promise<void> {
    for (let i = 0; i < rounds; i++) {
      await Promise.resolve();
    }
  }

  /**
   * Create a promise that can be settled from outside
   */
  static createDeferred<T>(): {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: unknown) => void;
  } {
    let settle: { resolve: (value: T) => void; reject: (error: unknown) => void } | undefined;
    const promise = new Promise<T>((resolve, reject) => {
      settle = { resolve, reject };
    });
    return {
      promise,
      resolve: value => settle?.resolve(value),
      reject: error => settle?.reject(error),
    };
  }

  /**
   * Complete axios response for mocked calls
   */
  static axiosResponse<T>(status: number, data: T, headers: Record<string, string> = {}): AxiosResponse<T> {
    return { status, statusText: "", data, headers, config: { headers: new AxiosHeaders() } };
  }

  static streamOf(text: string): Readable {
    return Readable.from([Buffer.from(text, "utf-8")]);
  }

  static async readStream(stream: Readable): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString("utf-8");
  }
}

/**
 * Builders for gateway fixtures
 */
export class TestDataBuilder {
  static createSite(overrides: Partial<SiteDefinition> = {}): SiteDefinition {
    return {
      name: "primary",
      url: "https://primary.example.com",
      role: "primary",
      requiresProxy: false,
      requiresChallengeSolution: true,
      priority: 0,
      challengePath: "/login",
      requiredCookies: [],
      ...overrides,
    };
  }

  static createBackupSite(name: string, priority: number, overrides: Partial<SiteDefinition> = {}): SiteDefinition {
    return TestDataBuilder.createSite({
      name,
      url: `https://${name}.example.com`,
      role: "backup",
      requiresChallengeSolution: false,
      priority,
      ...overrides,
    });
  }

  static createAccount(name: string, overrides: Partial<AccountDefinition> = {}): AccountDefinition {
    return {
      name,
      provider: "default",
      apiUser: "1001",
      apiKey: `test-key-${name}`,
      cookies: { session: `test-session-${name}` },
      enabled: true,
      ...overrides,
    };
  }
}
