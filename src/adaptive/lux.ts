/** Converts a raw light-level sensor reading (10000·log10(lux) + 1) to lux. */
export function toLux(reading: number): number {
  if (reading <= 0) return 0;
  return 10 ** ((reading - 1) / 10000);
}

export interface AdjustmentInput {
  readonly targetLux: number;
  readonly currentLux: number;
  readonly currentBrightness: number;
  readonly minBrightness: number;
  readonly maxBrightness: number;
  readonly step: number;
  readonly toleranceLux: number;
}

export type Adjustment =
  | { readonly kind: "target_reached" }
  | { readonly kind: "adjust"; readonly brightness: number; readonly changed: boolean };

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * One proportional step: half the lux error, capped at `step` brightness
 * units either way, kept inside the session's brightness bounds.
 */
export function computeAdjustment(input: AdjustmentInput): Adjustment {
  const diff = input.targetLux - input.currentLux;
  if (Math.abs(diff) < input.toleranceLux) return { kind: "target_reached" };

  const adjustment = clamp(diff / 2, -input.step, input.step);
  const brightness = Math.round(
    clamp(input.currentBrightness + adjustment, input.minBrightness, input.maxBrightness),
  );
  return { kind: "adjust", brightness, changed: brightness !== input.currentBrightness };
}
