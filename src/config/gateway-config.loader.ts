/**
 * Loads and validates the sites and accounts files.
 * Every problem found is reported at once through a single ConfigurationError.
 */

import * as fs from "fs";
import { plainToInstance } from "class-transformer";
import { validateSync, type ValidationError } from "class-validator";
import { ConfigurationError, describeError } from "@/common/errors/gateway.errors";
import type { AccountDefinition, ProxySettings, SiteDefinition } from "@/common/types/gateway";
import { AccountDefinitionDto } from "./dto/account-definition.dto";
import { SitesFileDto } from "./dto/site-definition.dto";

const DEFAULT_CHALLENGE_PATH = "/login";
const DEFAULT_PROVIDER = "default";

export function readJsonFile(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${filePath}: ${describeError(error)}`);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${filePath}: ${describeError(error)}`);
  }
}

export function parseProxyUrl(url: string): ProxySettings {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Invalid proxy URL "${url}"`);
  }

  const protocol = parsed.protocol.replace(/:$/, "");
  if (protocol !== "http" && protocol !== "https") {
    throw new ConfigurationError(`Unsupported proxy protocol "${protocol}" (expected http or https)`);
  }

  const port = parsed.port ? Number(parsed.port) : protocol === "https" ? 443 : 80;
  return { protocol, host: parsed.hostname, port };
}

/**
 * Validate the sites file. Backups come back ordered by priority, then by file order.
 */
export function loadSiteDefinitions(raw: unknown, proxy?: ProxySettings): SiteDefinition[] {
  if (!isPlainObject(raw)) {
    throw new ConfigurationError("Invalid sites configuration", ['sites file must contain an object with a "sites" array']);
  }

  const dto = plainToInstance(SitesFileDto, raw);
  const errors = validateSync(dto, { forbidUnknownValues: true });
  if (errors.length > 0) {
    throw new ConfigurationError("Invalid sites configuration", flattenValidationErrors(errors));
  }

  const violations: string[] = [];
  const sites: SiteDefinition[] = dto.sites.map((site, index) => ({
    name: site.name,
    url: site.url.replace(/\/+$/, ""),
    role: site.role,
    requiresProxy: site.requiresProxy,
    requiresChallengeSolution: site.requiresChallengeSolution,
    priority: site.priority ?? index,
    challengePath: site.challengePath ?? DEFAULT_CHALLENGE_PATH,
    requiredCookies: Object.freeze([...(site.requiredCookies ?? [])]),
  }));

  const primaries = sites.filter(site => site.role === "primary");
  if (primaries.length !== 1) {
    violations.push(`exactly one primary site is required, found ${primaries.length}`);
  }

  for (const name of findDuplicates(sites.map(site => site.name))) {
    violations.push(`duplicate site name "${name}"`);
  }

  for (const site of sites) {
    if (site.requiresProxy && !proxy) {
      violations.push(`site "${site.name}" requires a proxy but GATEWAY_PROXY_URL is not set`);
    }
    if (site.requiresChallengeSolution && !proxy) {
      violations.push(`site "${site.name}" requires a challenge solution but GATEWAY_PROXY_URL is not set`);
    }
  }

  if (violations.length > 0) {
    throw new ConfigurationError("Invalid sites configuration", violations);
  }

  const backups = sites
    .map((site, index) => ({ site, index }))
    .filter(({ site }) => site.role === "backup")
    .sort((a, b) => a.site.priority - b.site.priority || a.index - b.index)
    .map(({ site }) => site);

  return [...primaries, ...backups].map(site => Object.freeze(site));
}

/**
 * Validate the accounts file (a JSON array)
 */
export function loadAccountDefinitions(raw: unknown): AccountDefinition[] {
  if (!Array.isArray(raw)) {
    throw new ConfigurationError("Invalid accounts configuration", ["accounts file must contain a JSON array"]);
  }

  const violations: string[] = [];
  const accounts: AccountDefinition[] = [];

  raw.forEach((entry: unknown, index: number) => {
    if (!isPlainObject(entry)) {
      violations.push(`accounts[${index}]: must be an object`);
      return;
    }

    const dto = plainToInstance(AccountDefinitionDto, entry);
    const errors = validateSync(dto, { forbidUnknownValues: true });
    if (errors.length > 0) {
      violations.push(...flattenValidationErrors(errors).map(message => `accounts[${index}]: ${message}`));
      return;
    }

    accounts.push(
      Object.freeze({
        name: dto.name,
        provider: dto.provider ?? DEFAULT_PROVIDER,
        apiUser: dto.apiUser || undefined,
        apiKey: dto.apiKey || undefined,
        cookies: Object.freeze({ ...dto.cookies }),
        enabled: dto.enabled ?? true,
      })
    );
  });

  for (const name of findDuplicates(accounts.map(account => account.name))) {
    violations.push(`duplicate account name "${name}"`);
  }

  if (violations.length > 0) {
    throw new ConfigurationError("Invalid accounts configuration", violations);
  }

  return accounts;
}

function flattenValidationErrors(errors: ValidationError[], parentPath = ""): string[] {
  return errors.flatMap(error => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(message => `${path}: ${message}`);
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function findDuplicates(values: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return [...duplicates];
}
