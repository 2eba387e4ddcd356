export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function hoursBefore(now: Date, hours: number): Date {
  return new Date(now.getTime() - hours * 3600 * 1000);
}
