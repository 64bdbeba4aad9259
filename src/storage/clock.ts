export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** UTC calendar day as YYYY-MM-DD. */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}
