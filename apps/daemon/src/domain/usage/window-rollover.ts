export type WindowReset = {
  resetsAtMs: number;
  rolledOver: boolean;
};

export type RollingWindowReading = {
  utilizationPercent: number | null;
  resetsAtMs: number | null;
  windowDurationMins: number;
};

/**
 * Moves a stale reset instant forward by whole windows until it lies strictly after `nowMs`.
 * A reset at or before `nowMs` means the window already rolled over.
 */
export const resolveNextReset = (
  resetsAtMs: number,
  windowDurationMins: number,
  nowMs: number,
): WindowReset => {
  if (resetsAtMs > nowMs) {
    return { resetsAtMs, rolledOver: false };
  }
  const windowMs = windowDurationMins * 60_000;
  if (windowMs <= 0) {
    return { resetsAtMs, rolledOver: true };
  }
  const windowsElapsed = Math.floor((nowMs - resetsAtMs) / windowMs) + 1;
  return { resetsAtMs: resetsAtMs + windowsElapsed * windowMs, rolledOver: true };
};

/** A rolled-over window reports 0% and the next boundary instead of the stale reading. */
export const applyWindowRollover = (
  reading: RollingWindowReading,
  nowMs: number,
): RollingWindowReading => {
  if (reading.resetsAtMs == null) {
    return reading;
  }
  const next = resolveNextReset(reading.resetsAtMs, reading.windowDurationMins, nowMs);
  return {
    utilizationPercent: next.rolledOver ? 0 : reading.utilizationPercent,
    resetsAtMs: next.resetsAtMs,
    windowDurationMins: reading.windowDurationMins,
  };
};
