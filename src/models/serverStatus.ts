import { Platforms } from "../data/enums.js";
import type { ServerStatusRecord } from "../schemas/responses.js";

export type StatusName =
  | "Operational"
  | "Degraded"
  | "Limited Access"
  | "Maintenance"
  | "Partial Outage"
  | "Major Outage"
  | "Outage";

/** Component states reported by the status page, already mapped to status names. */
export type PageStatus = "Operational" | "Degraded" | "Maintenance" | "Partial Outage" | "Major Outage";

export const STATUS_COLORS: Readonly<Record<StatusName, number>> = {
  Operational: 2528092,
  Degraded: 16568108,
  "Limited Access": 16568108,
  Maintenance: 3447003,
  "Partial Outage": 15234063,
  "Major Outage": 15158332,
  Outage: 15158332
};

const STATUS_SEVERITY: readonly StatusName[] = [
  "Operational",
  "Degraded",
  "Limited Access",
  "Maintenance",
  "Partial Outage",
  "Outage",
  "Major Outage"
];

const PAGE_OVERRIDES: ReadonlySet<StatusName> = new Set<StatusName>(["Maintenance", "Partial Outage", "Major Outage"]);

export interface ConvertedStatus {
  up: boolean;
  limitedAccess: boolean;
  status: StatusName;
}

/**
 * Merges the API's view of a platform (`up` is `null` when the API did not report it)
 * with the status page's view (`null` when the page did not list it).
 */
export function convertStatus(up: boolean | null, limitedAccess: boolean, page: PageStatus | null): ConvertedStatus {
  if (up === null) {
    const status = page ?? "Outage";
    const pageUp = status === "Operational" || status === "Degraded";
    return { up: pageUp, limitedAccess: false, status };
  }
  if (!up) {
    return { up, limitedAccess, status: page && PAGE_OVERRIDES.has(page) ? page : "Outage" };
  }
  if (limitedAccess) {
    return { up, limitedAccess, status: page && PAGE_OVERRIDES.has(page) ? page : "Limited Access" };
  }
  return { up, limitedAccess, status: page === "Degraded" ? "Degraded" : "Operational" };
}

/** Lowercased key shared by API platform names and status page component names. */
export function platformKey(name: string): string {
  const trimmed = name.trim();
  if (trimmed.toLowerCase() === "pts") return "pts";
  const platform = Platforms.resolve(trimmed);
  const resolved = platform === undefined ? undefined : Platforms.nameOf(platform);
  return (resolved ?? trimmed).toLowerCase();
}

export interface PlatformStatus extends ConvertedStatus {
  platform: string;
  color: number;
  version: string;
  /** Entry time reported by the API, if it reported this platform. */
  entryDatetime: string;
}

export interface PageComponent {
  name: string;
  status: PageStatus;
}

export class ServerStatus {
  readonly timestamp: Date;
  readonly statuses: ReadonlyMap<string, PlatformStatus>;

  constructor(
    apiRecords: readonly ServerStatusRecord[],
    pageComponents: readonly PageComponent[] | null,
    timestamp = new Date()
  ) {
    this.timestamp = timestamp;

    const pageByKey = new Map<string, PageStatus>();
    for (const component of pageComponents ?? []) {
      pageByKey.set(platformKey(component.name), component.status);
    }

    const statuses = new Map<string, PlatformStatus>();
    for (const record of apiRecords) {
      // the test server is reported as an environment; treat it as a platform of its own
      const key = platformKey(record.environment === "pts" ? "pts" : record.platform);
      const converted = convertStatus(
        record.status.toUpperCase() === "UP",
        record.limited_access,
        pageByKey.get(key) ?? null
      );
      statuses.set(key, {
        platform: key,
        ...converted,
        color: STATUS_COLORS[converted.status],
        version: record.version,
        entryDatetime: record.entry_datetime
      });
    }
    for (const [key, page] of pageByKey) {
      if (statuses.has(key)) continue;
      const converted = convertStatus(null, false, page);
      statuses.set(key, {
        platform: key,
        ...converted,
        color: STATUS_COLORS[converted.status],
        version: "",
        entryDatetime: ""
      });
    }
    this.statuses = statuses;
  }

  private get liveStatuses(): PlatformStatus[] {
    return [...this.statuses.values()].filter((status) => status.platform !== "pts");
  }

  /** Every platform except the test server is up. */
  get allUp(): boolean {
    return this.liveStatuses.every((status) => status.up);
  }

  /** Some platform other than the test server has limited access. */
  get limitedAccess(): boolean {
    return this.liveStatuses.some((status) => status.limitedAccess);
  }

  /** The most severe status across all platforms except the test server. */
  get status(): StatusName {
    let worst = 0;
    for (const { status } of this.liveStatuses) {
      worst = Math.max(worst, STATUS_SEVERITY.indexOf(status));
    }
    return STATUS_SEVERITY[worst] ?? "Operational";
  }

  get color(): number {
    return STATUS_COLORS[this.status];
  }

  get(platform: string): PlatformStatus | undefined {
    return this.statuses.get(platformKey(platform));
  }

  equals(other: ServerStatus): boolean {
    if (this.statuses.size !== other.statuses.size) return false;
    for (const [key, status] of this.statuses) {
      if (other.statuses.get(key)?.status !== status.status) return false;
    }
    return true;
  }
}
