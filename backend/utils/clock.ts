/**
 * Time source for stateful services
 * Tests swap in a manual clock instead of waiting on real time
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};
