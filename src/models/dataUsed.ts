import type { DataUsedRecord } from "../schemas/responses.js";

function share(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

/** Today's API usage against the developer account's limits. */
export class DataUsed {
  readonly activeSessionsUsed: number;
  readonly activeSessionsLimit: number;
  readonly sessionsUsed: number;
  readonly sessionsLimit: number;
  readonly requestsUsed: number;
  readonly requestsLimit: number;
  /** Minutes a session stays valid. */
  readonly sessionTimeLimit: number;

  constructor(record: DataUsedRecord) {
    this.activeSessionsUsed = record.Active_Sessions;
    this.activeSessionsLimit = record.Concurrent_Sessions;
    this.sessionsUsed = record.Total_Sessions_Today;
    this.sessionsLimit = record.Session_Cap;
    this.requestsUsed = record.Total_Requests_Today;
    this.requestsLimit = record.Request_Limit_Daily;
    this.sessionTimeLimit = record.Session_Time_Limit;
  }

  get activeSessionsRemaining(): number {
    return this.activeSessionsLimit - this.activeSessionsUsed;
  }

  get sessionsRemaining(): number {
    return this.sessionsLimit - this.sessionsUsed;
  }

  get requestsRemaining(): number {
    return this.requestsLimit - this.requestsUsed;
  }

  get activeSessionsUsage(): number {
    return share(this.activeSessionsUsed, this.activeSessionsLimit);
  }

  get sessionsUsage(): number {
    return share(this.sessionsUsed, this.sessionsLimit);
  }

  get requestsUsage(): number {
    return share(this.requestsUsed, this.requestsLimit);
  }
}
