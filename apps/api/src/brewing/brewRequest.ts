import { brewTypes, isBrewType, type BrewType } from "@first-crack/shared";
import { fieldValidationError, type FieldReason } from "../errors.js";

export type BrewParameters = Readonly<{
  brewType: BrewType;
  doseGrams: number;
  targetTempC: number;
  targetPressureBar: number;
}>;

export type BrewContext = Readonly<{
  brewId: string;
  deviceAddress: string;
  parameters: BrewParameters;
  // Epoch milliseconds; every stage offset is relative to it.
  startTime: number;
}>;

export type BrewStartInput = {
  brewType: unknown;
  doseGrams: unknown;
  targetTempC: unknown;
  targetPressureBar: unknown;
  deviceAddress: unknown;
};

export type BrewStartRequest = BrewParameters & { deviceAddress: string };

type NumericField = "doseGrams" | "targetTempC" | "targetPressureBar";

export const BREW_PARAMETER_RANGES: Record<
  NumericField,
  { min: number; max: number; unit: string }
> = {
  doseGrams: { min: 10, max: 30, unit: "g" },
  targetTempC: { min: 85, max: 100, unit: "°C" },
  targetPressureBar: { min: 5, max: 15, unit: " bar" }
};

function readRanged(
  input: BrewStartInput,
  field: NumericField,
  reasons: FieldReason[]
): number {
  const value = input[field];
  const { min, max, unit } = BREW_PARAMETER_RANGES[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    reasons.push({ field, reason: "must be a number" });
    return Number.NaN;
  }
  if (value < min || value > max) {
    reasons.push({ field, reason: `must be between ${min}${unit} and ${max}${unit}` });
  }
  return value;
}

/**
 * Checks brew-start parameters and collects every field-level problem before failing,
 * so a caller sees all of them at once. `isValidAddress` is the transport's own check
 * of its device addressing format.
 */
export function validateBrewStart(
  input: BrewStartInput,
  isValidAddress: (address: string) => boolean
): BrewStartRequest {
  const reasons: FieldReason[] = [];

  const brewType = input.brewType;
  if (typeof brewType !== "string" || !isBrewType(brewType)) {
    reasons.push({ field: "brewType", reason: `must be one of ${brewTypes.join(", ")}` });
  }

  const doseGrams = readRanged(input, "doseGrams", reasons);
  const targetTempC = readRanged(input, "targetTempC", reasons);
  const targetPressureBar = readRanged(input, "targetPressureBar", reasons);

  const rawAddress = input.deviceAddress;
  const deviceAddress = typeof rawAddress === "string" ? rawAddress.trim() : "";
  if (!deviceAddress) {
    reasons.push({ field: "deviceAddress", reason: "is required" });
  } else if (!isValidAddress(deviceAddress)) {
    reasons.push({ field: "deviceAddress", reason: "is not a valid device address" });
  }

  if (reasons.length || typeof brewType !== "string" || !isBrewType(brewType)) {
    throw fieldValidationError("Invalid brew parameters", reasons);
  }

  return { brewType, doseGrams, targetTempC, targetPressureBar, deviceAddress };
}

export type BrewIdSource = {
  now: () => number;
  random: () => number;
};

export const systemBrewIdSource: BrewIdSource = {
  now: () => Date.now(),
  random: () => Math.random()
};

export function generateBrewId(source: BrewIdSource = systemBrewIdSource): string {
  const suffix = Math.floor(source.random() * 10_000);
  return `brew_${source.now()}_${suffix}`;
}

export function createBrewContext(
  request: BrewStartRequest,
  source: BrewIdSource = systemBrewIdSource
): BrewContext {
  const startTime = source.now();
  return Object.freeze({
    brewId: generateBrewId({ now: () => startTime, random: source.random }),
    deviceAddress: request.deviceAddress,
    parameters: Object.freeze({
      brewType: request.brewType,
      doseGrams: request.doseGrams,
      targetTempC: request.targetTempC,
      targetPressureBar: request.targetPressureBar
    }),
    startTime
  });
}
