import {
  CONDITION_SEPARATOR,
  defineConditions,
  type ConditionDesign,
  type ConditionDesignInput,
} from "../../domain/condition";
import { ConfigurationError } from "../../domain/errors";
import { SlotQuota, type SlotQuotaDeps, type SlotQuotaOptions } from "./slotQuota";

/**
 * List randomization: every condition owns a fixed number of slots and
 * sessions are spread over the conditions until all slots are taken.
 *
 * Unlike naive randomization this ends with exactly the planned number of
 * participants per condition, provided sessions either finish or time out.
 */
export class ListRandomizer extends SlotQuota {
  readonly design: ConditionDesign;

  constructor(design: ConditionDesignInput, options: SlotQuotaOptions, deps: SlotQuotaDeps) {
    const resolved = defineConditions(design);
    super("list", resolved.conditions, options, deps);
    this.design = resolved;
  }

  /** Same number of slots (`n`) for each named condition. */
  static balanced(
    conditions: string[],
    n: number,
    options: SlotQuotaOptions,
    deps: SlotQuotaDeps,
  ): ListRandomizer {
    return new ListRandomizer({ conditions, targetPerCondition: n }, options, deps);
  }

  /**
   * Conditions from the cross product of factor levels, `n` slots each.
   * `{ A: ["a1", "a2"], B: ["b1", "b2"] }` yields `a1.b1`, `a1.b2`, `a2.b1`, `a2.b2`.
   */
  static factors(
    factors: Record<string, string[]>,
    n: number,
    options: SlotQuotaOptions,
    deps: SlotQuotaDeps,
  ): ListRandomizer {
    return new ListRandomizer({ factors, targetPerCondition: n }, options, deps);
  }

  /**
   * Factor levels that make up a condition, keyed by factor name.
   * Undefined for randomizers built from plain condition names.
   */
  levelsOf(condition: string): Record<string, string> | undefined {
    const factors = this.design.factors;
    if (!factors || !this.conditions.includes(condition)) return undefined;

    const levels = condition.split(CONDITION_SEPARATOR);
    if (levels.length !== factors.length) return undefined;

    const result: Record<string, string> = {};
    factors.forEach((factor, index) => {
      const level = levels[index];
      if (level !== undefined) result[factor.name] = level;
    });
    return result;
  }
}

/**
 * Pick one condition with equal probability and no bookkeeping.
 * Suited to prototypes; group sizes will drift apart.
 */
export function randomCondition(conditions: readonly string[], random: () => number = Math.random): string {
  const index = Math.floor(random() * conditions.length);
  const condition = conditions[index];
  if (condition === undefined) {
    throw new ConfigurationError("randomCondition needs at least one condition");
  }
  return condition;
}
