import type { ClockTime } from "../config.js";
import { logger } from "../logger.js";
import { QuoteFetcher, formatFetchResult } from "../tools/market/service.js";
import { Broadcaster, DeliveryReport } from "./broadcast.js";

export type DailySchedule = {
  weekdays: ReadonlySet<number>;
  time: ClockTime;
  timeZone: string;
};

export type ScheduledJob = {
  run: () => Promise<DeliveryReport>;
};

export type DailyScheduler = {
  stop: () => void;
};

const WEEKDAYS = new Map<string, number>([
  ["Mon", 1],
  ["Tue", 2],
  ["Wed", 3],
  ["Thu", 4],
  ["Fri", 5],
  ["Sat", 6],
  ["Sun", 7],
]);

export function createDailyPriceJob(fetcher: QuoteFetcher, broadcaster: Broadcaster): ScheduledJob {
  return {
    run: async () => {
      const result = await fetcher.fetchQuote();
      const text = formatFetchResult(result);
      const report = await broadcaster.broadcast(text);
      logger.info(
        { status: result.status, attempted: report.attempted, failed: report.failed },
        "Daily price update sent",
      );
      return report;
    },
  };
}

export type ZonedClock = {
  date: string;
  weekday: number;
  hour: number;
  minute: number;
};

export function zonedClock(at: Date, timeZone: string): ZonedClock {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    weekday: "short",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(at);
  const get = (type: string) => parts.find((part) => part.type === type)?.value ?? "";
  return {
    date: `${get("year")}-${get("month")}-${get("day")}`,
    weekday: WEEKDAYS.get(get("weekday")) ?? 0,
    hour: Number(get("hour")) % 24,
    minute: Number(get("minute")),
  };
}

/** True from the configured minute until the end of that local day. */
export function isDue(schedule: DailySchedule, clock: ZonedClock): boolean {
  if (!schedule.weekdays.has(clock.weekday)) return false;
  const minutes = clock.hour * 60 + clock.minute;
  return minutes >= schedule.time.hour * 60 + schedule.time.minute;
}

/**
 * Checks the zoned wall clock every `tickMs` and runs the job at most once per
 * local date. A tick that lands while a run is still in flight is skipped.
 */
export function startDailyScheduler(
  schedule: DailySchedule,
  job: ScheduledJob,
  opts?: { tickMs?: number; now?: () => Date },
): DailyScheduler {
  const tickMs = opts?.tickMs ?? 30_000;
  const now = opts?.now ?? (() => new Date());
  let running = false;
  // Starting after today's slot does not replay it.
  const startClock = zonedClock(now(), schedule.timeZone);
  let lastRunDate = isDue(schedule, startClock) ? startClock.date : "";

  const tick = () => {
    const clock = zonedClock(now(), schedule.timeZone);
    if (running || clock.date === lastRunDate || !isDue(schedule, clock)) return;

    running = true;
    lastRunDate = clock.date;
    logger.info({ date: clock.date, timeZone: schedule.timeZone }, "Daily price job started");
    void job
      .run()
      .catch((err) => {
        logger.error({ err }, "Daily price job failed");
      })
      .finally(() => {
        running = false;
      });
  };

  const timer = setInterval(tick, tickMs);
  logger.info(
    {
      weekdays: Array.from(schedule.weekdays),
      time: `${String(schedule.time.hour).padStart(2, "0")}:${String(schedule.time.minute).padStart(2, "0")}`,
      timeZone: schedule.timeZone,
    },
    "Daily scheduler started",
  );

  return {
    stop: () => {
      clearInterval(timer);
    },
  };
}
