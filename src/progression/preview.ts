/**
 * Day index that would be active `daysDifference` days from now, assuming one
 * advance per day. Pure: no stored progress is read or written.
 *
 * Returns null when the plan has no days.
 */
export function previewDayIndex(
  currentDayIndex: number,
  totalDays: number,
  daysDifference: number,
  base: 0 | 1 = 1,
): number | null {
  if (totalDays <= 0) return null;
  const offset = currentDayIndex - base + daysDifference;
  return (((offset % totalDays) + totalDays) % totalDays) + base;
}
