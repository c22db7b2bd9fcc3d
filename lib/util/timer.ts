/**
 * Wall-clock timer for a single run
 */
export class Timer {
  public timeS?: number;
  private readonly startTime: number;

  constructor(public readonly label: string) {
    this.startTime = Date.now();
  }

  public stop() {
    if (this.timeS !== undefined) { return this.timeS; }
    this.timeS = (Date.now() - this.startTime) / 1000;
    return this.timeS;
  }

  public humanTime() {
    if (this.timeS === undefined) { return '???'; }
    return humanTime(this.timeS);
  }
}

export function humanTime(time: number) {
  const parts = [];

  if (time > 60) {
    const mins = Math.floor(time / 60);
    parts.push(mins + 'm');
    time -= mins * 60;
  }
  parts.push(time.toFixed(1) + 's');

  return parts.join('');
}
