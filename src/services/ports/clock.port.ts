export interface ClockPort {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: ClockPort = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};
