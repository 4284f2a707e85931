import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { ConditionTarget } from "./slot";

/** Joins factor levels into a condition name, in factor declaration order. */
export const CONDITION_SEPARATOR = ".";

const nameSchema = z.string().trim().min(1, "names must not be empty");
const targetSchema = z
  .number({ invalid_type_error: "targets must be numbers" })
  .int("targets must be whole numbers")
  .positive("targets must be greater than 0");

export const conditionDesignSchema = z
  .object({
    conditions: z.array(nameSchema).optional(),
    factors: z.record(nameSchema, z.array(nameSchema)).optional(),
    /** Total number of slots, divided evenly between conditions. */
    target: targetSchema.optional(),
    /** Same number of slots for every condition. */
    targetPerCondition: targetSchema.optional(),
    /** Explicit slot count for each condition; must name every condition exactly once. */
    perConditionTarget: z.record(nameSchema, targetSchema).optional(),
  })
  .strict();

export type ConditionDesignInput = z.input<typeof conditionDesignSchema>;

export interface Factor {
  name: string;
  levels: string[];
}

export interface ConditionDesign {
  conditions: ConditionTarget[];
  factors?: Factor[];
}

export const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

const findDuplicate = (values: string[]): string | undefined => {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) return value;
    seen.add(value);
  }
  return undefined;
};

/**
 * Cartesian product of factor levels, first factor varying slowest.
 * `[A: [A1, A2], B: [B1, B2]]` gives `A1.B1, A1.B2, A2.B1, A2.B2`.
 */
export function crossFactors(factors: Factor[]): string[] {
  return factors.reduce<string[][]>(
    (combinations, factor) =>
      combinations.flatMap((prefix) => factor.levels.map((level) => [...prefix, level])),
    [[]],
  ).map((levels) => levels.join(CONDITION_SEPARATOR));
}

const parseFactors = (raw: Record<string, string[]>): Factor[] => {
  const factors = Object.entries(raw).map(([name, levels]) => ({ name, levels }));
  if (factors.length === 0) {
    throw new ConfigurationError("At least one factor is required");
  }

  for (const factor of factors) {
    if (factor.levels.length < 2) {
      throw new ConfigurationError(
        `Factor "${factor.name}" needs at least 2 levels, got ${factor.levels.length}`,
      );
    }
    const joined = factor.levels.find((level) => level.includes(CONDITION_SEPARATOR));
    if (joined !== undefined) {
      throw new ConfigurationError(
        `Factor "${factor.name}" level "${joined}" must not contain "${CONDITION_SEPARATOR}"`,
      );
    }
    const duplicate = findDuplicate(factor.levels);
    if (duplicate !== undefined) {
      throw new ConfigurationError(`Factor "${factor.name}" lists level "${duplicate}" more than once`);
    }
  }

  return factors;
};

const resolveTargets = (
  names: string[],
  design: z.output<typeof conditionDesignSchema>,
): ConditionTarget[] => {
  const given = [design.target, design.targetPerCondition, design.perConditionTarget].filter(
    (value) => value !== undefined,
  );
  if (given.length !== 1) {
    throw new ConfigurationError(
      "Specify exactly one of target, targetPerCondition or perConditionTarget",
    );
  }

  if (design.target !== undefined) {
    if (design.target % names.length !== 0) {
      throw new ConfigurationError(
        `Total target ${design.target} cannot be divided evenly between ${names.length} conditions`,
      );
    }
    const each = design.target / names.length;
    return names.map((name) => ({ name, target: each }));
  }

  if (design.targetPerCondition !== undefined) {
    const each = design.targetPerCondition;
    return names.map((name) => ({ name, target: each }));
  }

  const perCondition = design.perConditionTarget ?? {};
  const entries = Object.keys(perCondition);
  if (entries.length !== names.length) {
    throw new ConfigurationError(
      `perConditionTarget names ${entries.length} conditions, but the design has ${names.length}`,
    );
  }

  return names.map((name) => {
    const target = perCondition[name];
    if (target === undefined) {
      throw new ConfigurationError(`perConditionTarget has no entry for condition "${name}"`);
    }
    return { name, target };
  });
};

/**
 * Build the condition set of a randomizer from explicit names or from factors,
 * and attach a slot target to every condition.
 *
 * @throws ConfigurationError when the design is invalid
 */
export function defineConditions(input: ConditionDesignInput): ConditionDesign {
  const result = conditionDesignSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid condition design: ${formatIssues(result.error)}`);
  }
  const design = result.data;

  if ((design.conditions === undefined) === (design.factors === undefined)) {
    throw new ConfigurationError("Specify either conditions or factors, not both or neither");
  }

  let factors: Factor[] | undefined;
  let names: string[];
  if (design.factors !== undefined) {
    factors = parseFactors(design.factors);
    names = crossFactors(factors);
  } else {
    names = design.conditions ?? [];
  }

  if (names.length === 0) {
    throw new ConfigurationError("At least one condition is required");
  }
  const duplicate = findDuplicate(names);
  if (duplicate !== undefined) {
    throw new ConfigurationError(`Condition "${duplicate}" is defined more than once`);
  }

  const conditions = resolveTargets(names, design);
  return factors ? { conditions, factors } : { conditions };
}

