import { NotFoundError } from "./errors.js";
import {
  dataflowsPath,
  datasetsPath,
  executeQueriesPath,
  LIST_GROUPS_PATH,
  pagesPath,
  refreshHistoryPath,
  reportsPath,
  schedulePath,
  sortByStartTime,
  toDataflow,
  toDataset,
  toGroup,
  toPage,
  toRefreshRecord,
  toReport,
  toSchedule,
  type Dataflow,
  type Dataset,
  type Group,
  type Page,
  type RefreshRecord,
  type Refreshable,
  type Report,
  type Row,
  type RowValue,
  type Schedule,
} from "./resources.js";
import type { PayloadDefinition, PayloadValidator } from "./schema-validator.js";
import type { HttpSession } from "./session.js";
import type { JsonObject } from "./types.js";
import { isPlainObject } from "./utils.js";

export type ScheduleUpdate = {
  days?: string[];
  times?: string[];
  enabled?: boolean;
  localTimeZoneId?: string;
  notifyOption?: "MailOnFailure" | "NoNotification";
};

/**
 * Read-side operations over groups and their content. Batch listings fan out
 * one request per target and return results in target order.
 */
export class Catalog {
  constructor(
    private readonly http: HttpSession,
    private readonly validator: PayloadValidator,
  ) {}

  async listGroups(signal?: AbortSignal): Promise<Group[]> {
    const values = await this.http.listValues(LIST_GROUPS_PATH, signal);
    return this.validator.parseAll("Group", values, LIST_GROUPS_PATH).map(toGroup);
  }

  listDatasets(...groups: Group[]): Promise<Dataset[]> {
    return this.fanOut(groups, datasetsPath, "Dataset", toDataset);
  }

  listDataflows(...groups: Group[]): Promise<Dataflow[]> {
    return this.fanOut(groups, dataflowsPath, "Dataflow", toDataflow);
  }

  listReports(...groups: Group[]): Promise<Report[]> {
    return this.fanOut(groups, reportsPath, "Report", toReport);
  }

  listPages(...reports: Report[]): Promise<Page[]> {
    return this.fanOut(reports, pagesPath, "Page", toPage);
  }

  /** One resource's refresh history, oldest first. */
  async refreshHistory(resource: Refreshable, signal?: AbortSignal): Promise<RefreshRecord[]> {
    const path = refreshHistoryPath(resource, this.http.config.refreshHistoryTop);
    const values = await this.http.listValues(path, signal);
    const definition = resource.kind === "dataset" ? "Refresh" : "Transaction";
    const records = this.validator.parseAll(definition, values, path).map((p) => toRefreshRecord(p, resource));
    return sortByStartTime(records);
  }

  async listRefreshes(...resources: Refreshable[]): Promise<RefreshRecord[]> {
    const perResource = await Promise.all(resources.map((r) => this.refreshHistory(r)));
    return perResource.flat();
  }

  async getSchedule(dataset: Dataset, signal?: AbortSignal): Promise<Schedule> {
    const path = schedulePath(dataset);
    const data = await this.http.getJson(path, signal);
    return toSchedule(this.validator.parse("Schedule", data, path), dataset);
  }

  async updateSchedule(dataset: Dataset, update: ScheduleUpdate, signal?: AbortSignal): Promise<Schedule> {
    const body = this.validator.checkInput("ScheduleUpdate", update);
    await this.http.patch(schedulePath(dataset), { body: { value: body }, signal });
    return this.getSchedule(dataset, signal);
  }

  async findGroup(name: string, signal?: AbortSignal): Promise<Group> {
    const groups = await this.listGroups(signal);
    const match = groups.find((g) => g.name === name);
    if (!match) throw new NotFoundError(`No group named '${name}'.`);
    return match;
  }

  async findDataset(group: Group, name: string): Promise<Dataset> {
    const match = (await this.listDatasets(group)).find((d) => d.name === name);
    if (!match) throw new NotFoundError(`No dataset named '${name}' in group '${group.name}'.`);
    return match;
  }

  async findDataflow(group: Group, name: string): Promise<Dataflow> {
    const match = (await this.listDataflows(group)).find((d) => d.name === name);
    if (!match) throw new NotFoundError(`No dataflow named '${name}' in group '${group.name}'.`);
    return match;
  }

  /**
   * Runs DAX queries against a dataset, one request per query, and returns the
   * rows of each query's first table in query order. `Table[Column]` keys are
   * shortened to `Column`.
   */
  async executeQueries(dataset: Dataset, ...queries: string[]): Promise<Row[]> {
    const path = executeQueriesPath(dataset);
    const responses = await Promise.all(
      queries.map(async (query) => {
        const resp = await this.http.post(path, { body: { queries: [{ query }] } });
        return this.validator.parse("QueryResult", resp.data, path);
      }),
    );
    return responses.flatMap(firstTableRows);
  }

  private async fanOut<P extends { id: string }, T>(
    parents: P[],
    pathOf: (parent: P) => string,
    definition: PayloadDefinition,
    build: (payload: JsonObject, parent: P) => T,
  ): Promise<T[]> {
    const perParent = await Promise.all(
      parents.map(async (parent) => {
        const path = pathOf(parent);
        const values = await this.http.listValues(path);
        return this.validator.parseAll(definition, values, path).map((p) => build(p, parent));
      }),
    );
    return perParent.flat();
  }
}

export function normalizeColumnName(column: string): string {
  const m = /\[([^\]]*)\]\s*$/.exec(column);
  return m ? m[1] : column;
}

function toRowValue(v: unknown): RowValue {
  if (v === null || v === undefined) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
  return JSON.stringify(v);
}

function firstTableRows(result: JsonObject): Row[] {
  const results = Array.isArray(result.results) ? result.results : [];
  const first: unknown = results[0];
  if (!isPlainObject(first) || !Array.isArray(first.tables)) return [];
  const table: unknown = first.tables[0];
  if (!isPlainObject(table) || !Array.isArray(table.rows)) return [];

  const rows: Row[] = [];
  for (const raw of table.rows) {
    if (!isPlainObject(raw)) continue;
    const row: Row = {};
    for (const [k, v] of Object.entries(raw)) row[normalizeColumnName(k)] = toRowValue(v);
    rows.push(row);
  }
  return rows;
}
