import { z } from "zod";
import type { PageComponent, PageStatus } from "../models/serverStatus.js";
import { HTTPException } from "../utils/errors.js";

const STATUS_PAGE_TIMEOUT_MS = 10_000;

const PAGE_STATUSES: Readonly<Record<string, PageStatus>> = {
  operational: "Operational",
  degraded_performance: "Degraded",
  partial_outage: "Partial Outage",
  major_outage: "Major Outage",
  under_maintenance: "Maintenance"
};

const componentSchema = z.looseObject({
  id: z.string(),
  name: z.string(),
  status: z.string().catch("operational"),
  group_id: z.string().nullable().catch(null),
  group: z.boolean().catch(false)
});
type ComponentRecord = z.infer<typeof componentSchema>;

const summarySchema = z.looseObject({
  status: z
    .looseObject({
      indicator: z.string().catch("none"),
      description: z.string().catch("")
    })
    .catch({ indicator: "none", description: "" }),
  components: z.array(componentSchema).catch([])
});

export function pageStatusOf(raw: string): PageStatus {
  return PAGE_STATUSES[raw] ?? "Operational";
}

/** One fetch of a statuspage.io summary. */
export class StatusSummary {
  readonly indicator: string;
  readonly description: string;
  private readonly components: readonly ComponentRecord[];

  constructor(raw: unknown) {
    const parsed = summarySchema.safeParse(raw);
    if (!parsed.success) {
      throw new HTTPException("Status page returned an unexpected summary.", { cause: parsed.error });
    }
    this.indicator = parsed.data.status.indicator;
    this.description = parsed.data.status.description;
    this.components = parsed.data.components;
  }

  /** Components of the group named `name`, or `null` when the page has no such group. */
  group(name: string): PageComponent[] | null {
    const wanted = name.trim().toLowerCase();
    const group = this.components.find((component) => component.group && component.name.trim().toLowerCase() === wanted);
    if (!group) return null;
    return this.components
      .filter((component) => component.group_id === group.id)
      .map((component) => ({ name: component.name, status: pageStatusOf(component.status) }));
  }
}

export interface StatusPageConfig {
  url: string;
  fetchImpl?: typeof fetch;
}

export class StatusPage {
  private readonly url: string;

  constructor(private readonly config: StatusPageConfig) {
    this.url = config.url.replace(/\/+$/, "");
  }

  async getStatus(): Promise<StatusSummary> {
    const fetchImpl = this.config.fetchImpl ?? fetch;
    let response: Response;
    try {
      response = await fetchImpl(`${this.url}/api/v2/summary.json`, {
        method: "GET",
        signal: AbortSignal.timeout(STATUS_PAGE_TIMEOUT_MS)
      });
    } catch (error) {
      throw new HTTPException("Status page request failed.", { cause: error });
    }
    if (!response.ok) {
      throw new HTTPException(`Status page ${response.status} ${response.statusText}`, { status: response.status });
    }
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new HTTPException("Status page returned invalid JSON.", { cause: error });
    }
    return new StatusSummary(body);
  }
}
