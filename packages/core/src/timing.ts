export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

export const systemClock: Clock = () => Date.now();
