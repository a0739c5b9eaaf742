const WEEKS_PER_MONTH = 4;
const DAYS_BETWEEN_CANDIDATES = 7;

function toIsoDate(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const dd = String(d.getDate()).padStart(2, '0');
  return `${d.getFullYear()}-${mm}-${dd}`;
}

/**
 * Weekly departure dates covering `months` months, starting with today's local
 * calendar date: `4 * months` dates, seven days apart.
 */
export function generateCandidateDates(months: number, today: Date = new Date()): string[] {
  const dates: string[] = [];
  for (let i = 0; i < months * WEEKS_PER_MONTH; i++) {
    const day = new Date(today.getFullYear(), today.getMonth(), today.getDate() + i * DAYS_BETWEEN_CANDIDATES);
    dates.push(toIsoDate(day));
  }
  return dates;
}
