/** A status message that expires after a number of key presses. */
export class StatusLine {
  private text: string | null = null;
  private remaining = 0;

  constructor(private readonly ttl: number) {}

  get message(): string | null {
    return this.text;
  }

  get keypressesLeft(): number {
    return this.remaining;
  }

  set(message: string): void {
    this.text = message;
    this.remaining = this.ttl;
  }

  tick(): void {
    if (this.text === null) return;
    this.remaining = Math.max(0, this.remaining - 1);
    if (this.remaining === 0) {
      this.text = null;
    }
  }
}
