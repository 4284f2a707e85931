import fs from "node:fs";
import { z } from "zod";
import { conditionDesignSchema, formatIssues } from "../../domain/condition";
import { ConfigurationError } from "../../domain/errors";
import { ListRandomizer } from "./listRandomizer";
import { SessionQuota } from "./sessionQuota";
import type { SlotQuota, SlotQuotaDeps } from "./slotQuota";

const sharedOptions = {
  name: z.string().trim().min(1),
  respectVersion: z.boolean().optional(),
  sessionIds: z.array(z.string().min(1)).min(1).optional(),
  randomSeed: z.union([z.number(), z.string()]).optional(),
};

const sessionQuotaSchema = z
  .object({
    kind: z.literal("session"),
    ...sharedOptions,
    target: z.number().int().positive(),
  })
  .strict();

const listRandomizerSchema = conditionDesignSchema.extend({
  kind: z.literal("list"),
  ...sharedOptions,
});

export const quotaConfigSchema = z
  .object({
    quotas: z.array(z.discriminatedUnion("kind", [sessionQuotaSchema, listRandomizerSchema])),
  })
  .strict();

export type QuotaConfig = z.input<typeof quotaConfigSchema>;
export type QuotaEntry = z.output<typeof quotaConfigSchema>["quotas"][number];

/**
 * Parse and validate a quota configuration document.
 *
 * @throws ConfigurationError on any schema violation or duplicate quota name
 */
export function parseQuotaConfig(raw: unknown): QuotaEntry[] {
  const result = quotaConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid quota configuration: ${formatIssues(result.error)}`);
  }

  const names = new Set<string>();
  for (const entry of result.data.quotas) {
    if (names.has(entry.name)) {
      throw new ConfigurationError(`Quota "${entry.name}" is defined more than once`);
    }
    names.add(entry.name);
  }

  return result.data.quotas;
}

export function loadQuotaConfig(filePath: string): QuotaEntry[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Quota configuration not found at ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse quota configuration ${filePath}: ${message}`);
  }

  return parseQuotaConfig(raw);
}

export const createQuota = (entry: QuotaEntry, version: string, deps: SlotQuotaDeps): SlotQuota => {
  const options = {
    name: entry.name,
    version,
    respectVersion: entry.respectVersion,
    sessionIds: entry.sessionIds,
    randomSeed: entry.randomSeed,
  };

  if (entry.kind === "session") {
    return new SessionQuota({ ...options, target: entry.target }, deps);
  }

  const { conditions, factors, target, targetPerCondition, perConditionTarget } = entry;
  return new ListRandomizer(
    { conditions, factors, target, targetPerCondition, perConditionTarget },
    options,
    deps,
  );
};

/**
 * Named quotas of the running experiment, built once at startup.
 */
export class QuotaRegistry {
  private readonly quotas = new Map<string, SlotQuota>();

  constructor(quotas: Iterable<SlotQuota> = []) {
    for (const quota of quotas) {
      this.add(quota);
    }
  }

  static fromEntries(entries: QuotaEntry[], version: string, deps: SlotQuotaDeps): QuotaRegistry {
    return new QuotaRegistry(entries.map((entry) => createQuota(entry, version, deps)));
  }

  add(quota: SlotQuota): void {
    if (this.quotas.has(quota.name)) {
      throw new ConfigurationError(`Quota "${quota.name}" is already registered`);
    }
    this.quotas.set(quota.name, quota);
  }

  get(name: string): SlotQuota | undefined {
    return this.quotas.get(name);
  }

  list(): SlotQuota[] {
    return [...this.quotas.values()];
  }
}
