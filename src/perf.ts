type PerfSummary = {
  phasesMs: Record<string, number>;
  counters: Record<string, number>;
};

const PERF_ENV = "MODSCOPE_PERF";

export const isPerfEnabledByEnv = (): boolean => {
  const raw = process.env[PERF_ENV];
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

const roundMs = (value: number): number =>
  Math.round(value * 1000) / 1000;

const toSortedRecord = (
  entries: ReadonlyMap<string, number>,
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries()).sort(([left], [right]) =>
      left.localeCompare(right),
    ),
  );

/** Phase timings and counters for one analysis; a no-op unless enabled. */
export class PerfRecorder {
  readonly enabled: boolean;
  #phases = new Map<string, number>();
  #counters = new Map<string, number>();

  constructor(enabled = isPerfEnabledByEnv()) {
    this.enabled = enabled;
  }

  measure<T>(phase: string, run: () => T): T {
    if (!this.enabled) {
      return run();
    }
    const start = performance.now();
    try {
      return run();
    } finally {
      const elapsed = performance.now() - start;
      this.#phases.set(phase, (this.#phases.get(phase) ?? 0) + elapsed);
    }
  }

  increment(name: string, amount = 1): void {
    if (!this.enabled || amount === 0) {
      return;
    }
    this.#counters.set(name, (this.#counters.get(name) ?? 0) + amount);
  }

  summary(): PerfSummary {
    const phases = new Map(
      Array.from(this.#phases.entries()).map(([phase, value]) => [phase, roundMs(value)]),
    );
    return {
      phasesMs: toSortedRecord(phases),
      counters: toSortedRecord(this.#counters),
    };
  }
}

export const formatPerfSummary = ({
  unit,
  diagnostics,
  perf,
}: {
  unit: string;
  diagnostics: number;
  perf: PerfRecorder;
}): string =>
  `[modscope:perf] ${JSON.stringify({ unit, diagnostics, ...perf.summary() })}`;
