import type { BrewStageId } from "@first-crack/shared";
import { InvalidStageDataError } from "../errors.js";
import { errorMessage, log } from "../logger.js";
import type { PushTransport } from "../push/transport.js";
import type { BrewContext } from "./brewRequest.js";
import { BREW_TIMELINE, type BrewTimeline, type StageEntry } from "./brewTimeline.js";
import { buildStagePayloads, type PayloadOptions } from "./payloadBuilder.js";

export type StageOutcomeStatus = "sent" | "failed" | "skipped";

export type StageOutcome = {
  brewId: string;
  stageId: BrewStageId;
  status: StageOutcomeStatus;
  scheduledAt: number;
  firedAt?: number;
  messageId?: string;
  errorCode?: string;
  error?: string;
};

export type TimelineSummary = {
  brewId: string;
  cancelled: boolean;
  outcomes: StageOutcome[];
};

export type StageFireTime = {
  stageId: BrewStageId;
  fireAt: number;
};

export type ScheduledBrew = {
  brewId: string;
  fireTimes: StageFireTime[];
  done: Promise<TimelineSummary>;
  cancel: () => number;
};

export type StageSchedulerDeps = {
  transport: PushTransport;
  payloadOptions: PayloadOptions;
  timeline?: BrewTimeline;
  now?: () => number;
  onStageOutcome?: (outcome: StageOutcome) => void;
};

type TimelineRun = {
  context: BrewContext;
  controller: AbortController;
  timers: Map<BrewStageId, ReturnType<typeof setTimeout>>;
  fireTimes: StageFireTime[];
  outcomes: StageOutcome[];
  finish: (summary: TimelineSummary) => void;
};

export function fireTimesFor(context: BrewContext, timeline: BrewTimeline): StageFireTime[] {
  return [...timeline]
    .sort((a, b) => a.offsetSeconds - b.offsetSeconds)
    .map((stage) => ({
      stageId: stage.stageId,
      fireAt: context.startTime + stage.offsetSeconds * 1000
    }));
}

/**
 * Fires one push per timeline stage at `startTime + offset`, independently of how
 * earlier sends went. Nothing is retried. Timelines are keyed by brew id so a brew
 * can be cancelled; scheduling the same brew id twice runs two timelines.
 */
export class StageScheduler {
  private readonly runs = new Map<string, Set<TimelineRun>>();
  readonly timeline: BrewTimeline;
  private readonly now: () => number;

  constructor(private readonly deps: StageSchedulerDeps) {
    this.timeline = deps.timeline ?? BREW_TIMELINE;
    this.now = deps.now ?? (() => Date.now());
  }

  get stageCount(): number {
    return this.timeline.length;
  }

  schedule(context: BrewContext): ScheduledBrew {
    let finish: (summary: TimelineSummary) => void = () => {};
    const done = new Promise<TimelineSummary>((resolve) => {
      finish = resolve;
    });
    const run: TimelineRun = {
      context,
      controller: new AbortController(),
      timers: new Map(),
      fireTimes: fireTimesFor(context, this.timeline),
      outcomes: [],
      finish
    };

    const active = this.runs.get(context.brewId) ?? new Set<TimelineRun>();
    active.add(run);
    this.runs.set(context.brewId, active);

    const stagesById = new Map(this.timeline.map((stage) => [stage.stageId, stage]));
    for (const { stageId, fireAt } of run.fireTimes) {
      const stage = stagesById.get(stageId);
      if (!stage) continue;
      const delay = Math.max(0, fireAt - this.now());
      const timer = setTimeout(() => {
        void this.fire(run, stage, fireAt);
      }, delay);
      run.timers.set(stageId, timer);
    }

    if (!run.fireTimes.length) this.complete(run);

    return {
      brewId: context.brewId,
      fireTimes: run.fireTimes,
      done,
      cancel: () => this.cancelRun(run)
    };
  }

  cancel(brewId: string): number | null {
    const live = this.liveRuns(brewId);
    if (!live.length) return null;
    let pending = 0;
    for (const run of live) pending += this.cancelRun(run);
    return pending;
  }

  isActive(brewId: string): boolean {
    return this.liveRuns(brewId).length > 0;
  }

  activeBrewIds(): string[] {
    return [...this.runs.keys()].filter((brewId) => this.isActive(brewId));
  }

  // Cancelled runs stay in `runs` until their in-flight send settles.
  private liveRuns(brewId: string): TimelineRun[] {
    const runs = this.runs.get(brewId);
    if (!runs) return [];
    return [...runs].filter((run) => !run.controller.signal.aborted);
  }

  stopAll() {
    for (const brewId of this.activeBrewIds()) this.cancel(brewId);
  }

  private cancelRun(run: TimelineRun): number {
    if (run.controller.signal.aborted) return 0;
    run.controller.abort();
    const pending = [...run.timers.entries()];
    run.timers.clear();
    for (const [stageId, timer] of pending) {
      clearTimeout(timer);
      const scheduledAt = run.fireTimes.find((f) => f.stageId === stageId)?.fireAt ?? 0;
      log({
        level: "info",
        msg: "brew_stage_skipped",
        brew_id: run.context.brewId,
        stage: stageId
      });
      this.record(run, {
        brewId: run.context.brewId,
        stageId,
        status: "skipped",
        scheduledAt
      });
    }
    log({
      level: "info",
      msg: "brew_cancelled",
      brew_id: run.context.brewId,
      pending_stages: pending.length
    });
    return pending.length;
  }

  private async fire(run: TimelineRun, stage: StageEntry, scheduledAt: number) {
    run.timers.delete(stage.stageId);
    if (run.controller.signal.aborted) return;

    const { context } = run;
    const firedAt = this.now();
    const base = { brewId: context.brewId, stageId: stage.stageId, scheduledAt, firedAt };
    let outcome: StageOutcome;
    try {
      const payloads = buildStagePayloads(context, stage, this.deps.payloadOptions);
      const receipt = await this.deps.transport.send(
        { deviceAddress: context.deviceAddress, brewId: context.brewId, payloads },
        { signal: run.controller.signal }
      );
      outcome = { ...base, status: "sent", messageId: receipt.messageId };
      log({
        level: "info",
        msg: "brew_stage_sent",
        brew_id: context.brewId,
        stage: stage.stageId,
        message_id: receipt.messageId,
        lag_ms: firedAt - scheduledAt
      });
    } catch (err) {
      const errorCode =
        err instanceof InvalidStageDataError ? err.code : "TRANSPORT_SEND_FAILURE";
      outcome = { ...base, status: "failed", errorCode, error: errorMessage(err) };
      log({
        level: "error",
        msg: "brew_stage_failed",
        brew_id: context.brewId,
        stage: stage.stageId,
        code: errorCode,
        error: errorMessage(err)
      });
    }
    this.record(run, outcome);
  }

  private record(run: TimelineRun, outcome: StageOutcome) {
    run.outcomes.push(outcome);
    if (this.deps.onStageOutcome) {
      try {
        this.deps.onStageOutcome(outcome);
      } catch (err) {
        log({
          level: "error",
          msg: "brew_stage_listener_failed",
          brew_id: outcome.brewId,
          stage: outcome.stageId,
          error: errorMessage(err)
        });
      }
    }
    if (run.outcomes.length === run.fireTimes.length) this.complete(run);
  }

  private complete(run: TimelineRun) {
    const { brewId } = run.context;
    const active = this.runs.get(brewId);
    active?.delete(run);
    if (active && !active.size) this.runs.delete(brewId);

    const outcomes = [...run.outcomes].sort((a, b) => a.scheduledAt - b.scheduledAt);
    const cancelled = run.controller.signal.aborted;
    log({
      level: "info",
      msg: "brew_timeline_finished",
      brew_id: brewId,
      cancelled,
      sent: outcomes.filter((o) => o.status === "sent").length,
      failed: outcomes.filter((o) => o.status === "failed").length,
      skipped: outcomes.filter((o) => o.status === "skipped").length
    });
    run.finish({ brewId, cancelled, outcomes });
  }
}
