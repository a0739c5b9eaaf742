// Compact itinerary durations as returned by the flight-offer API, e.g. "PT9H20M".
import { MalformedDurationError } from '@/utils/errors';

const DURATION_PATTERN = /^PT(?:(\d+)H)?(?:(\d+)M)?$/;

interface DurationParts {
  hours?: number;
  minutes?: number;
}

function parseParts(token: string): DurationParts {
  const match = DURATION_PATTERN.exec(token.trim());
  if (!match || (match[1] === undefined && match[2] === undefined)) {
    throw new MalformedDurationError(token);
  }
  return {
    hours: match[1] !== undefined ? Number(match[1]) : undefined,
    minutes: match[2] !== undefined ? Number(match[2]) : undefined,
  };
}

/** Total minutes for a token; a missing component counts as zero. */
export function parseDurationMinutes(token: string): number {
  const { hours = 0, minutes = 0 } = parseParts(token);
  return hours * 60 + minutes;
}

/** "PT9H20M" → "9h 20m", "PT2H" → "2h", "PT45M" → "45m". */
export function formatDuration(token: string): string {
  const { hours, minutes } = parseParts(token);
  if (hours !== undefined && minutes !== undefined) return `${hours}h ${minutes}m`;
  if (hours !== undefined) return `${hours}h`;
  return `${minutes ?? 0}m`;
}
