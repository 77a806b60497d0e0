import {
  compareStages,
  isButtonActionId,
  type BrewStageId,
  type ButtonActionId
} from "@first-crack/shared";
import { InvalidStageDataError } from "../errors.js";
import { MAX_STAGE_ACTIONS } from "./platforms.js";

export type MediaRef = Readonly<{
  image?: string;
  video?: string;
}>;

export type StageEntry = Readonly<{
  stageId: BrewStageId;
  offsetSeconds: number;
  title: string;
  body: string;
  media?: MediaRef;
  actions: readonly ButtonActionId[];
  progress: number;
  highPriority: boolean;
  requireInteraction: boolean;
}>;

export type BrewTimeline = readonly StageEntry[];

const stageDefinitions: StageEntry[] = [
  {
    stageId: "heating",
    offsetSeconds: 0,
    title: "Heating Water",
    body: "Your espresso machine is heating to the perfect temperature...",
    media: { image: "/images/heating.png" },
    actions: [],
    progress: 0,
    highPriority: false,
    requireInteraction: false
  },
  {
    stageId: "grinding",
    offsetSeconds: 15,
    title: "Grinding Beans",
    body: "Grinding fresh coffee beans to the perfect particle size...",
    media: { image: "/images/grinding.png" },
    actions: ["pauseGrinding", "adjustGrind"],
    progress: 20,
    highPriority: false,
    requireInteraction: false
  },
  {
    stageId: "pre_infusion",
    offsetSeconds: 30,
    title: "Pre-infusion",
    body: "Gently saturating the coffee puck at 2 bar...",
    media: { image: "/images/pre_infusion.png" },
    actions: ["skipPreinfusion", "extendPreinfusion"],
    progress: 40,
    highPriority: true,
    requireInteraction: false
  },
  {
    stageId: "brewing",
    offsetSeconds: 45,
    title: "Brewing",
    body: "Extracting at full pressure. Beautiful crema forming...",
    media: { image: "/images/brewing.png", video: "/videos/extraction-live.mp4" },
    actions: ["stopShot", "viewLive"],
    progress: 60,
    highPriority: true,
    requireInteraction: false
  },
  {
    stageId: "complete",
    offsetSeconds: 75,
    title: "Your Coffee is Ready! ☕",
    body: "Extraction finished. Enjoy!",
    media: { image: "/images/brew_complete.png" },
    actions: ["brewAgain", "adjustProfile", "share"],
    progress: 100,
    highPriority: true,
    requireInteraction: true
  }
];

function invalid(message: string, stageId: string): never {
  throw new InvalidStageDataError(message, { stage: stageId });
}

export function assertValidStage(entry: StageEntry) {
  const { stageId } = entry;
  if (!Number.isInteger(entry.offsetSeconds) || entry.offsetSeconds < 0) {
    invalid("Stage offset must be a non-negative integer", stageId);
  }
  if (!entry.title.trim() || !entry.body.trim()) {
    invalid("Stage title and body are required", stageId);
  }
  if (!Number.isInteger(entry.progress) || entry.progress < 0 || entry.progress > 100) {
    invalid("Stage progress must be an integer between 0 and 100", stageId);
  }
  if (entry.actions.length > MAX_STAGE_ACTIONS) {
    invalid(`Stage lists more than ${MAX_STAGE_ACTIONS} actions`, stageId);
  }
  if (new Set(entry.actions).size !== entry.actions.length) {
    invalid("Stage lists an action twice", stageId);
  }
  for (const action of entry.actions) {
    if (!isButtonActionId(action)) invalid(`Unknown action ${String(action)}`, stageId);
  }
}

export function assertValidTimeline(timeline: readonly StageEntry[]) {
  const seen = new Set<BrewStageId>();
  timeline.forEach((entry, index) => {
    assertValidStage(entry);
    if (seen.has(entry.stageId)) invalid("Stage listed twice", entry.stageId);
    seen.add(entry.stageId);
    const previous = timeline[index - 1];
    if (!previous) return;
    if (compareStages(previous.stageId, entry.stageId) >= 0) {
      invalid("Stages must follow lifecycle order", entry.stageId);
    }
    if (entry.offsetSeconds <= previous.offsetSeconds) {
      invalid("Stage offsets must be strictly increasing", entry.stageId);
    }
  });
}

function freezeStage(entry: StageEntry): StageEntry {
  return Object.freeze({
    ...entry,
    actions: Object.freeze([...entry.actions]),
    ...(entry.media ? { media: Object.freeze({ ...entry.media }) } : {})
  });
}

export function defineTimeline(entries: StageEntry[]): BrewTimeline {
  assertValidTimeline(entries);
  return Object.freeze(entries.map(freezeStage));
}

export const BREW_TIMELINE: BrewTimeline = defineTimeline(stageDefinitions);

export function totalDurationSeconds(timeline: BrewTimeline = BREW_TIMELINE): number {
  const last = timeline[timeline.length - 1];
  return last ? last.offsetSeconds : 0;
}

export function getStageEntry(
  stageId: BrewStageId,
  timeline: BrewTimeline = BREW_TIMELINE
): StageEntry | undefined {
  return timeline.find((entry) => entry.stageId === stageId);
}
