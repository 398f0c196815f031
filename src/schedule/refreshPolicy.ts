export type RefreshPolicyConfig = {
  defaultIntervalSec: number;
  hotName: string;
  hotIntervalSec: number;
  coldNames: string[];
  coldIntervalSec: number;
};

export type ReportIdentity = {
  rawName: string;
  reportName: string;
};

function fold(s: string): string {
  return s.trim().toLowerCase();
}

/**
 * Minimum seconds between writes for a report, or null when the report is
 * not refreshed at all. Without hot/cold settings every report gets the
 * default interval.
 */
export function createRefreshPolicy(cfg: RefreshPolicyConfig) {
  const hot = fold(cfg.hotName);
  const cold = new Set(cfg.coldNames.map(fold).filter(Boolean));
  const tiered = hot !== "" || cold.size > 0;

  return {
    intervalFor(id: ReportIdentity): number | null {
      if (!tiered) return cfg.defaultIntervalSec;
      const names = [fold(id.rawName), fold(id.reportName)];
      if (hot !== "" && names.includes(hot)) return cfg.hotIntervalSec;
      if (names.some((n) => cold.has(n))) return cfg.coldIntervalSec;
      return null;
    }
  };
}

export type RefreshPolicy = ReturnType<typeof createRefreshPolicy>;
