import type { Logger } from "./logger";
import type { Track } from "./types";

const RFC3339_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:[Zz]|[+-](\d{2}):(\d{2}))$/;

export interface SkippedTrack {
  trackId: string;
  name: string;
  addedAt: string;
}

export interface YearClassification {
  buckets: Map<number, string[]>;
  years: number[];
  skipped: SkippedTrack[];
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }

  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

// Year as written, in the timestamp's own offset; null unless every field is in range.
export function parseAddedYear(addedAt: string): number | null {
  const match = RFC3339_PATTERN.exec(addedAt);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const offsetHour = match[7] === undefined ? 0 : Number(match[7]);
  const offsetMinute = match[8] === undefined ? 0 : Number(match[8]);

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }

  if (hour > 23 || minute > 59 || second > 59 || offsetHour > 23 || offsetMinute > 59) {
    return null;
  }

  return year;
}

export function classifyByYear(tracks: readonly Track[], logger: Logger): YearClassification {
  const buckets = new Map<number, string[]>();
  const skipped: SkippedTrack[] = [];

  for (const track of tracks) {
    const year = parseAddedYear(track.addedAt);
    if (year === null) {
      logger.warn(`Skipping '${track.name}' (${track.id}): unparseable added timestamp "${track.addedAt}".`);
      skipped.push({ trackId: track.id, name: track.name, addedAt: track.addedAt });
      continue;
    }

    const bucket = buckets.get(year);
    if (bucket) {
      bucket.push(track.id);
    } else {
      buckets.set(year, [track.id]);
    }
  }

  const years = [...buckets.keys()].sort((a, b) => a - b);

  return { buckets, years, skipped };
}
