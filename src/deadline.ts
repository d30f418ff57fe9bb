/** Cooperative run deadline; a limit of 0 never expires. */
export class RunDeadline {
  private readonly expiresAt: number | null;
  private readonly now: () => number;

  constructor(limitMs: number, now: () => number = Date.now) {
    this.now = now;
    this.expiresAt = limitMs > 0 ? now() + limitMs : null;
  }

  static none(): RunDeadline {
    return new RunDeadline(0);
  }

  expired(): boolean {
    return this.expiresAt !== null && this.now() >= this.expiresAt;
  }

  remainingMs(): number {
    return this.expiresAt === null ? Infinity : Math.max(0, this.expiresAt - this.now());
  }
}
