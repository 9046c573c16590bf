export type QueryAction = 'refused' | 'redirected' | 'empty' | 'maintenance' | 'forwarded' | 'servfail';

export type QueryLogEntry = {
  ts: string;
  client: string;
  name: string;
  type: string;
  action: QueryAction;
  pattern?: string;
  target?: string;
};

export class QueryLog {
  private readonly entries: QueryLogEntry[] = [];

  constructor(private readonly limit: number) {}

  append(entry: QueryLogEntry): void {
    if (this.limit <= 0) return;
    this.entries.push(entry);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
  }

  /** Newest first. */
  list(): QueryLogEntry[] {
    return this.entries.slice().reverse();
  }

  clear(): void {
    this.entries.length = 0;
  }
}
