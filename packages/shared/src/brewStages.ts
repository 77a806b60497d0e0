export const brewStages = [
  "heating",
  "grinding",
  "pre_infusion",
  "brewing",
  "complete"
] as const;
export type BrewStageId = (typeof brewStages)[number];

export const brewTypes = ["espresso", "lungo", "ristretto", "americano"] as const;
export type BrewType = (typeof brewTypes)[number];

export function isBrewStageId(value: string): value is BrewStageId {
  return (brewStages as readonly string[]).includes(value);
}

export function isBrewType(value: string): value is BrewType {
  return (brewTypes as readonly string[]).includes(value);
}

// Lifecycle position; stages are totally ordered by it.
export function stagePosition(stage: BrewStageId): number {
  return brewStages.indexOf(stage);
}

export function compareStages(a: BrewStageId, b: BrewStageId): number {
  return stagePosition(a) - stagePosition(b);
}

export function isFinalStage(stage: BrewStageId): boolean {
  return stagePosition(stage) === brewStages.length - 1;
}
