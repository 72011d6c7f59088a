export interface Clock {
  now(): number; // epoch ms
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

// Time only moves when told to.
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
