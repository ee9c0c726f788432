export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function fixedClock(start: Date) {
  let current = start.getTime();
  const clock: Clock = () => new Date(current);
  return {
    clock,
    advanceSeconds(seconds: number) { current += seconds * 1000; }
  };
}
