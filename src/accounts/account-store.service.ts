import * as fs from "fs";
import * as path from "path";
import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { ConfigurationError } from "@/common/errors/gateway.errors";
import type { AccountDefinition } from "@/common/types/gateway";
import { loadAccountDefinitions, readJsonFile } from "@/config/gateway-config.loader";

export type AccountInput = {
  name: string;
  provider?: string;
  apiUser?: string;
  apiKey?: string;
  cookies?: Record<string, string> | string;
  enabled?: boolean;
};

export type AccountPatch = Partial<Omit<AccountInput, "name">>;

export interface ReloadSummary {
  total: number;
  added: string[];
  removed: string[];
}

/**
 * Account records shared by the pool and the account-management hooks.
 *
 * Every mutation is validated with the same rules as the accounts file and,
 * when a file path is set, written back through a temp file and rename.
 */
@Injectable()
export class AccountStoreService extends BaseService {
  private accounts: readonly AccountDefinition[] = [];

  constructor(
    private readonly filePath?: string,
    initial?: readonly AccountInput[]
  ) {
    super();
    if (initial) {
      this.accounts = loadAccountDefinitions(initial);
    } else if (filePath) {
      this.accounts = this.readFile(filePath);
    }
    this.logger.log(`Loaded ${this.accounts.length} accounts${filePath ? ` from ${filePath}` : ""}`);
  }

  list(): readonly AccountDefinition[] {
    return this.accounts;
  }

  get(name: string): AccountDefinition | undefined {
    return this.accounts.find(account => account.name === name);
  }

  add(input: AccountInput): AccountDefinition {
    if (this.get(input.name)) {
      throw new ConfigurationError(`Account "${input.name}" already exists`);
    }
    this.replace([...this.accounts.map(toInput), input]);
    return this.require(input.name);
  }

  update(name: string, patch: AccountPatch): AccountDefinition {
    const existing = this.require(name);
    this.replace(this.accounts.map(account => (account === existing ? { ...toInput(account), ...patch } : toInput(account))));
    return this.require(name);
  }

  remove(name: string): boolean {
    if (!this.get(name)) return false;
    this.replace(this.accounts.filter(account => account.name !== name).map(toInput));
    return true;
  }

  toggleEnabled(name: string, enabled?: boolean): AccountDefinition {
    const existing = this.require(name);
    return this.update(name, { enabled: enabled ?? !existing.enabled });
  }

  /**
   * Re-read the accounts file. Without a file path this is a no-op.
   */
  reload(): ReloadSummary {
    if (!this.filePath) {
      return { total: this.accounts.length, added: [], removed: [] };
    }

    const previous = new Set(this.accounts.map(account => account.name));
    const next = this.readFile(this.filePath);
    const current = new Set(next.map(account => account.name));
    this.accounts = next;

    const summary: ReloadSummary = {
      total: next.length,
      added: [...current].filter(name => !previous.has(name)),
      removed: [...previous].filter(name => !current.has(name)),
    };
    this.logCriticalOperation("accounts_reloaded", { ...summary });
    return summary;
  }

  private require(name: string): AccountDefinition {
    const account = this.get(name);
    if (!account) {
      throw new ConfigurationError(`Account "${name}" not found`);
    }
    return account;
  }

  private replace(inputs: AccountInput[]): void {
    const next = loadAccountDefinitions(inputs);
    if (this.filePath) {
      this.writeFile(this.filePath, next);
    }
    this.accounts = next;
  }

  private readFile(filePath: string): AccountDefinition[] {
    if (!fs.existsSync(filePath)) {
      this.logWarning(`Accounts file ${filePath} does not exist, starting with no accounts`);
      return [];
    }
    return loadAccountDefinitions(readJsonFile(filePath));
  }

  private writeFile(filePath: string, accounts: readonly AccountDefinition[]): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp`;
    fs.writeFileSync(tempPath, JSON.stringify(accounts, null, 2) + "\n", "utf-8");
    fs.renameSync(tempPath, filePath);
  }
}

function toInput(account: AccountDefinition): AccountInput {
  return { ...account, cookies: { ...account.cookies } };
}
