/** Hands out ping ids for one ingestion run, continuing after the highest stored id */
export class PingIdAllocator {
  private current: number;

  constructor(lastUsed = 0) {
    this.current = Math.max(0, Math.floor(lastUsed));
  }

  next(): number {
    return ++this.current;
  }

  get last(): number {
    return this.current;
  }
}
