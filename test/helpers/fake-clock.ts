import type { Clock } from '../../src/utils/sleep.js';

/** Clock whose sleeps return at once and advance time by the requested amount. */
export class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];

  now = (): number => this.time;

  sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.time += ms;
  };

  advance(ms: number): void {
    this.time += ms;
  }
}
