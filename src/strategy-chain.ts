/**
 * Strategy Chain Module
 * Tries named extractors in order until one yields a usable value
 */

export interface Strategy<T> {
  name: string;
  run: () => T | null | undefined;
}

export interface StrategyFailure {
  strategy: string;
  error: string;
}

export interface StrategyOutcome<T> {
  value: T | null;
  /** Name of the strategy that produced the value */
  strategy: string | null;
  failures: StrategyFailure[];
}

function isUsable<T>(value: T | null | undefined): value is T {
  if (value === null || value === undefined) return false;
  if (typeof value === "string") return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

/**
 * Runs the strategies in sequence. A strategy that throws counts as a miss and
 * its message is recorded in `failures`.
 */
export function runStrategies<T>(
  strategies: Strategy<T>[],
  accept: (value: T) => boolean = () => true
): StrategyOutcome<T> {
  const failures: StrategyFailure[] = [];

  for (const strategy of strategies) {
    try {
      const value = strategy.run();
      if (isUsable(value) && accept(value)) {
        return { value, strategy: strategy.name, failures };
      }
    } catch (error) {
      failures.push({
        strategy: strategy.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { value: null, strategy: null, failures };
}
