import { type DurationMs, createDurationMs } from "../types/brands";

// Supplied by the host; the engine never probes the display itself
export type DisplayCapability = Readonly<{
  maxRefreshRate: number;
}>;

export type ReturnToTrayTiming = Readonly<{
  fastMs: DurationMs;
  slowMs: DurationMs;
  highRefreshThresholdHz: number;
}>;

export const DEFAULT_RETURN_TO_TRAY: ReturnToTrayTiming = {
  fastMs: createDurationMs(250),
  highRefreshThresholdHz: 120,
  slowMs: createDurationMs(300),
};

export const STANDARD_DISPLAY: DisplayCapability = { maxRefreshRate: 60 };

export function isHighRefresh(
  capability: DisplayCapability,
  timing: ReturnToTrayTiming = DEFAULT_RETURN_TO_TRAY,
): boolean {
  return capability.maxRefreshRate >= timing.highRefreshThresholdHz;
}

// Return-to-tray animation length, which is also the cancel reset delay
export function returnToTrayDuration(
  capability: DisplayCapability,
  timing: ReturnToTrayTiming = DEFAULT_RETURN_TO_TRAY,
): DurationMs {
  return isHighRefresh(capability, timing) ? timing.fastMs : timing.slowMs;
}
