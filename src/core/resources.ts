import { httpError } from "./errors.js";
import type { JsonObject, RefreshStatus } from "./types.js";

// ---- Resource shapes ------------------------------------------------------------

export type Group = {
  readonly kind: "group";
  readonly id: string;
  readonly name: string;
  readonly groupId: string;
  readonly isReadOnly: boolean;
  readonly type: string;
  readonly isOnDedicatedCapacity: boolean;
  readonly capacityId: string;
  readonly defaultDatasetStorageFormat: string;
};

export type Dataset = {
  readonly kind: "dataset";
  readonly id: string;
  readonly name: string;
  readonly group: Group;
  readonly groupId: string;
  readonly webUrl: string;
  readonly isRefreshable: boolean;
  readonly createdDate: string;
  readonly description: string;
  readonly configuredBy: string;
  readonly addRowsAPIEnabled: boolean;
  readonly isEffectiveIdentityRequired: boolean;
  readonly isEffectiveIdentityRolesRequired: boolean;
  readonly isOnPremGatewayRequired: boolean;
  readonly targetStorageMode: string;
  readonly createReportEmbedUrl: string;
  readonly qnaEmbedUrl: string;
  readonly upstreamDatasets: readonly unknown[];
  readonly users: readonly unknown[];
  readonly queryScaleOutSettings: JsonObject;
};

export type Dataflow = {
  readonly kind: "dataflow";
  readonly id: string;
  readonly name: string;
  readonly group: Group;
  readonly groupId: string;
  readonly configuredBy: string;
  readonly users: readonly unknown[];
  readonly description: string;
  readonly generation: number | null;
};

export type Report = {
  readonly kind: "report";
  readonly id: string;
  readonly name: string;
  readonly group: Group;
  readonly groupId: string;
  readonly reportType: string;
  readonly webUrl: string;
  readonly embedUrl: string;
  readonly isFromPbix: boolean;
  readonly isOwnedByMe: boolean;
  readonly datasetId: string;
  readonly datasetWorkspaceId: string;
  readonly users: readonly unknown[];
  readonly subscriptions: readonly unknown[];
  readonly reportFlags: readonly unknown[];
  readonly description: string;
};

export type Page = {
  readonly kind: "page";
  /** The page's position in its report, as a string. */
  readonly id: string;
  readonly name: string;
  readonly displayName: string;
  readonly order: number;
  readonly report: Report;
  readonly group: Group;
  readonly groupId: string;
};

export type Schedule = {
  readonly kind: "schedule";
  readonly id: string;
  readonly name: string;
  readonly dataset: Dataset;
  readonly group: Group;
  readonly groupId: string;
  readonly days: readonly string[];
  readonly times: readonly string[];
  readonly enabled: boolean;
  readonly localTimeZoneId: string;
  readonly notifyOption: string;
};

type RefreshRecordBase = {
  readonly id: string;
  readonly startTime: Date;
  readonly endTime: Date | null;
  readonly status: RefreshStatus;
  readonly refreshType: string;
  readonly durationMs: number | null;
  readonly groupId: string;
};

export type Refresh = RefreshRecordBase & {
  readonly kind: "refresh";
  readonly requestId: string;
  readonly dataset: Dataset;
  readonly refreshAttempts: readonly unknown[];
  readonly serviceExceptionJson: unknown;
  readonly extendedStatus: string;
};

export type Transaction = RefreshRecordBase & {
  readonly kind: "transaction";
  readonly dataflow: Dataflow;
  readonly errorInfo: unknown;
};

export type Refreshable = Dataset | Dataflow;

export type RefreshRecord = Refresh | Transaction;

export type Resource = Group | Dataset | Dataflow | Report | Page | Schedule | RefreshRecord;

export type RowValue = string | number | boolean | null;

export type Row = Record<string, RowValue>;

// ---- Status normalization ----------------------------------------------------------

const REFRESH_STATUSES: readonly RefreshStatus[] = ["Pending", "InProgress", "Completed", "Failed", "Cancelled"];

const STATUS_ALIASES: Record<string, RefreshStatus> = {
  success: "Completed",
  unknown: "InProgress",
  cancelling: "Cancelled",
};

export function normalizeRefreshStatus(raw: unknown): RefreshStatus {
  const value = typeof raw === "string" ? raw.trim().toLowerCase() : "";
  const alias = STATUS_ALIASES[value];
  if (alias) return alias;
  return REFRESH_STATUSES.find((s) => s.toLowerCase() === value) ?? "Failed";
}

export function isInProgress(record: RefreshRecord): boolean {
  return record.status === "InProgress";
}

/** Ascending by start time; ties keep their server order. */
export function sortByStartTime<T extends RefreshRecord>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
}

export function latestRecord<T extends RefreshRecord>(records: readonly T[]): T | null {
  const sorted = sortByStartTime(records);
  return sorted.length > 0 ? sorted[sorted.length - 1] : null;
}

// ---- Payload readers ----------------------------------------------------------------

function str(p: JsonObject, key: string, fallback = ""): string {
  const v = p[key];
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return fallback;
}

function bool(p: JsonObject, key: string, fallback = false): boolean {
  const v = p[key];
  return typeof v === "boolean" ? v : fallback;
}

function list(p: JsonObject, key: string): unknown[] {
  const v = p[key];
  return Array.isArray(v) ? v : [];
}

function stringList(p: JsonObject, key: string): string[] {
  return list(p, key).filter((x): x is string => typeof x === "string");
}

function obj(p: JsonObject, key: string): JsonObject {
  const v = p[key];
  return v !== null && typeof v === "object" && !Array.isArray(v) ? { ...v } : {};
}

/** Timestamps without an offset are UTC. */
const ZONED_TIME = /(?:Z|[+-]\d{2}:?\d{2})$/i;

function parseTime(p: JsonObject, key: string): Date | null {
  const raw = p[key];
  if (raw === undefined || raw === null || raw === "") return null;
  const text = String(raw).trim();
  const d = new Date(ZONED_TIME.test(text) || !text.includes("T") ? text : `${text}Z`);
  if (Number.isNaN(d.getTime())) throw httpError(502, `Invalid ${key} '${String(raw)}' in refresh payload.`);
  return d;
}

function requireTime(p: JsonObject, key: string): Date {
  const d = parseTime(p, key);
  if (!d) throw httpError(502, `Refresh payload is missing ${key}.`);
  return d;
}

// ---- Builders ---------------------------------------------------------------------

export function toGroup(p: JsonObject): Group {
  const id = str(p, "id");
  return {
    kind: "group",
    id,
    name: str(p, "name"),
    groupId: id,
    isReadOnly: bool(p, "isReadOnly"),
    type: str(p, "type", "Workspace"),
    isOnDedicatedCapacity: bool(p, "isOnDedicatedCapacity"),
    capacityId: str(p, "capacityId"),
    defaultDatasetStorageFormat: str(p, "defaultDatasetStorageFormat"),
  };
}

export function toDataset(p: JsonObject, group: Group): Dataset {
  return {
    kind: "dataset",
    id: str(p, "id"),
    name: str(p, "name"),
    group,
    groupId: group.id,
    webUrl: str(p, "webUrl"),
    isRefreshable: bool(p, "isRefreshable"),
    createdDate: str(p, "createdDate"),
    description: str(p, "description"),
    configuredBy: str(p, "configuredBy"),
    addRowsAPIEnabled: bool(p, "addRowsAPIEnabled"),
    isEffectiveIdentityRequired: bool(p, "isEffectiveIdentityRequired"),
    isEffectiveIdentityRolesRequired: bool(p, "isEffectiveIdentityRolesRequired"),
    isOnPremGatewayRequired: bool(p, "isOnPremGatewayRequired"),
    targetStorageMode: str(p, "targetStorageMode"),
    createReportEmbedUrl: str(p, "createReportEmbedUrl"),
    qnaEmbedUrl: str(p, "qnaEmbedUrl"),
    upstreamDatasets: list(p, "upstreamDatasets"),
    users: list(p, "users"),
    queryScaleOutSettings: obj(p, "queryScaleOutSettings"),
  };
}

export function toDataflow(p: JsonObject, group: Group): Dataflow {
  const generation = p.generation;
  return {
    kind: "dataflow",
    id: str(p, "objectId"),
    name: str(p, "name"),
    group,
    groupId: group.id,
    configuredBy: str(p, "configuredBy"),
    users: list(p, "users"),
    description: str(p, "description"),
    generation: typeof generation === "number" ? generation : null,
  };
}

export function toReport(p: JsonObject, group: Group): Report {
  return {
    kind: "report",
    id: str(p, "id"),
    name: str(p, "name"),
    group,
    groupId: group.id,
    reportType: str(p, "reportType"),
    webUrl: str(p, "webUrl"),
    embedUrl: str(p, "embedUrl"),
    isFromPbix: bool(p, "isFromPbix"),
    isOwnedByMe: bool(p, "isOwnedByMe"),
    datasetId: str(p, "datasetId"),
    datasetWorkspaceId: str(p, "datasetWorkspaceId"),
    users: list(p, "users"),
    subscriptions: list(p, "subscriptions"),
    reportFlags: list(p, "reportFlags"),
    description: str(p, "description"),
  };
}

export function toPage(p: JsonObject, report: Report): Page {
  const order = typeof p.order === "number" ? p.order : Number(p.order ?? 0);
  const displayName = str(p, "displayName");
  return {
    kind: "page",
    id: String(order),
    name: displayName,
    displayName,
    order,
    report,
    group: report.group,
    groupId: report.groupId,
  };
}

export function toSchedule(p: JsonObject, dataset: Dataset): Schedule {
  return {
    kind: "schedule",
    id: dataset.id,
    name: dataset.name,
    dataset,
    group: dataset.group,
    groupId: dataset.groupId,
    days: stringList(p, "days"),
    times: stringList(p, "times"),
    enabled: bool(p, "enabled", true),
    localTimeZoneId: str(p, "localTimeZoneId"),
    notifyOption: str(p, "notifyOption"),
  };
}

function recordTimes(p: JsonObject): Pick<RefreshRecordBase, "startTime" | "endTime" | "durationMs"> {
  const startTime = requireTime(p, "startTime");
  const endTime = parseTime(p, "endTime");
  return {
    startTime,
    endTime,
    durationMs: endTime ? endTime.getTime() - startTime.getTime() : null,
  };
}

export function toRefresh(p: JsonObject, dataset: Dataset): Refresh {
  const requestId = str(p, "requestId", str(p, "id"));
  return {
    kind: "refresh",
    id: requestId,
    requestId,
    ...recordTimes(p),
    status: normalizeRefreshStatus(p.status),
    refreshType: str(p, "refreshType"),
    groupId: dataset.groupId,
    dataset,
    refreshAttempts: list(p, "refreshAttempts"),
    serviceExceptionJson: p.serviceExceptionJson ?? null,
    extendedStatus: str(p, "extendedStatus"),
  };
}

export function toTransaction(p: JsonObject, dataflow: Dataflow): Transaction {
  return {
    kind: "transaction",
    id: str(p, "id"),
    ...recordTimes(p),
    status: normalizeRefreshStatus(p.status),
    refreshType: str(p, "refreshType"),
    groupId: dataflow.groupId,
    dataflow,
    errorInfo: p.errorInfo ?? null,
  };
}

export function toRefreshRecord(p: JsonObject, owner: Refreshable): RefreshRecord {
  return owner.kind === "dataset" ? toRefresh(p, owner) : toTransaction(p, owner);
}

// ---- URL builders (relative to the API base URL) ----------------------------------------

const seg = encodeURIComponent;

export const LIST_GROUPS_PATH = "groups";

export function datasetsPath(group: Group): string {
  return `groups/${seg(group.id)}/datasets`;
}

export function dataflowsPath(group: Group): string {
  return `groups/${seg(group.id)}/dataflows`;
}

export function reportsPath(group: Group): string {
  return `groups/${seg(group.id)}/reports`;
}

export function pagesPath(report: Report): string {
  return `groups/${seg(report.groupId)}/reports/${seg(report.id)}/pages`;
}

export function schedulePath(dataset: Dataset): string {
  return `groups/${seg(dataset.groupId)}/datasets/${seg(dataset.id)}/refreshSchedule`;
}

export function executeQueriesPath(dataset: Dataset): string {
  return `groups/${seg(dataset.groupId)}/datasets/${seg(dataset.id)}/executeQueries`;
}

export function refreshHistoryPath(resource: Refreshable, top: number): string {
  if (resource.kind === "dataset") {
    return `groups/${seg(resource.groupId)}/datasets/${seg(resource.id)}/refreshes?$top=${top}`;
  }
  return `groups/${seg(resource.groupId)}/dataflows/${seg(resource.id)}/transactions`;
}

export function startRefreshPath(resource: Refreshable): string {
  if (resource.kind === "dataset") {
    return `groups/${seg(resource.groupId)}/datasets/${seg(resource.id)}/refreshes`;
  }
  return `groups/${seg(resource.groupId)}/dataflows/${seg(resource.id)}/refreshes?processType=default`;
}

export function cancelRefreshPath(record: RefreshRecord): string {
  if (record.kind === "refresh") {
    return `groups/${seg(record.dataset.groupId)}/datasets/${seg(record.dataset.id)}/refreshes/${seg(record.id)}`;
  }
  return `groups/${seg(record.dataflow.groupId)}/dataflows/transactions/${seg(record.id)}/cancel`;
}

// ---- Row serialization ----------------------------------------------------------------

function json(v: unknown): string | null {
  if (v === null || v === undefined) return null;
  return JSON.stringify(v);
}

function iso(d: Date | null): string | null {
  return d ? d.toISOString() : null;
}

export function toRow(resource: Resource): Row {
  switch (resource.kind) {
    case "group":
      return {
        id: resource.id,
        name: resource.name,
        isReadOnly: resource.isReadOnly,
        type: resource.type,
        isOnDedicatedCapacity: resource.isOnDedicatedCapacity,
        capacityId: resource.capacityId,
        defaultDatasetStorageFormat: resource.defaultDatasetStorageFormat,
      };
    case "dataset":
      return {
        id: resource.id,
        name: resource.name,
        webUrl: resource.webUrl,
        isRefreshable: resource.isRefreshable,
        createdDate: resource.createdDate,
        description: resource.description,
        configuredBy: resource.configuredBy,
        addRowsAPIEnabled: resource.addRowsAPIEnabled,
        isEffectiveIdentityRequired: resource.isEffectiveIdentityRequired,
        isEffectiveIdentityRolesRequired: resource.isEffectiveIdentityRolesRequired,
        isOnPremGatewayRequired: resource.isOnPremGatewayRequired,
        targetStorageMode: resource.targetStorageMode,
        createReportEmbedUrl: resource.createReportEmbedUrl,
        qnaEmbedUrl: resource.qnaEmbedUrl,
        upstreamDatasets: json(resource.upstreamDatasets),
        users: json(resource.users),
        queryScaleOutSettings: json(resource.queryScaleOutSettings),
        groupName: resource.group.name,
        groupId: resource.groupId,
      };
    case "dataflow":
      return {
        id: resource.id,
        name: resource.name,
        configuredBy: resource.configuredBy,
        users: json(resource.users),
        description: resource.description,
        generation: resource.generation,
        groupName: resource.group.name,
        groupId: resource.groupId,
      };
    case "report":
      return {
        id: resource.id,
        name: resource.name,
        reportType: resource.reportType,
        webUrl: resource.webUrl,
        embedUrl: resource.embedUrl,
        isFromPbix: resource.isFromPbix,
        isOwnedByMe: resource.isOwnedByMe,
        datasetId: resource.datasetId,
        datasetWorkspaceId: resource.datasetWorkspaceId,
        users: json(resource.users),
        subscriptions: json(resource.subscriptions),
        reportFlags: json(resource.reportFlags),
        description: resource.description,
        groupName: resource.group.name,
        groupId: resource.groupId,
      };
    case "page":
      return {
        id: resource.id,
        name: resource.name,
        order: resource.order,
        reportName: resource.report.name,
        reportId: resource.report.id,
        groupId: resource.groupId,
      };
    case "schedule":
      return {
        days: json(resource.days),
        times: json(resource.times),
        enabled: resource.enabled,
        localTimeZoneId: resource.localTimeZoneId,
        notifyOption: resource.notifyOption,
        datasetId: resource.dataset.id,
        datasetName: resource.dataset.name,
        groupName: resource.group.name,
        groupId: resource.groupId,
      };
    case "refresh":
      return {
        id: resource.id,
        status: resource.status,
        startTime: iso(resource.startTime),
        endTime: iso(resource.endTime),
        durationMs: resource.durationMs,
        requestId: resource.requestId,
        refreshType: resource.refreshType,
        refreshAttempts: json(resource.refreshAttempts),
        serviceExceptionJson: json(resource.serviceExceptionJson),
        extendedStatus: resource.extendedStatus,
        datasetId: resource.dataset.id,
        datasetName: resource.dataset.name,
        groupId: resource.groupId,
      };
    case "transaction":
      return {
        id: resource.id,
        status: resource.status,
        startTime: iso(resource.startTime),
        endTime: iso(resource.endTime),
        durationMs: resource.durationMs,
        refreshType: resource.refreshType,
        errorInfo: json(resource.errorInfo),
        dataflowId: resource.dataflow.id,
        dataflowName: resource.dataflow.name,
        groupId: resource.groupId,
      };
  }
}

export function toRows(resources: Iterable<Resource>): Row[] {
  const rows: Row[] = [];
  for (const resource of resources) rows.push(toRow(resource));
  return rows;
}
