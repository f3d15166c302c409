export type UserRole = "citizen" | "authority" | "admin";

export interface SessionUser {
  id: number;
  email: string;
  name: string;
  role: UserRole;
  unit_id: string | null;
}

export const CATEGORIES = ["roads", "lighting", "water", "health", "education", "other"] as const;
export type Category = (typeof CATEGORIES)[number];

export const ISSUE_STATUSES = ["reported", "acknowledged", "in_progress", "resolved", "rejected"] as const;
export type IssueStatus = (typeof ISSUE_STATUSES)[number];
export type ActiveStatus = Exclude<IssueStatus, "resolved" | "rejected">;

export const PRIORITIES = ["low", "medium", "high", "urgent"] as const;
export type Priority = (typeof PRIORITIES)[number];

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface ReportInput {
  submitterId: string;
  category: Category;
  description: string;
  location: GeoPoint;
  mediaRef?: string | null;
}

export interface Report {
  id: string;
  submitterId: string;
  category: Category;
  description: string;
  location: GeoPoint;
  submittedAt: string;
  mediaRef: string | null;
  issueId: string | null;
}

export interface StatusEvent {
  id: number;
  issueId: string;
  from: IssueStatus | null;
  to: IssueStatus;
  actorId: string;
  note: string | null;
  at: string;
}

/** Issue row without its members and history; what scans and the index work from. */
export interface IssueRecord {
  id: string;
  category: Category;
  centroid: GeoPoint;
  memberCount: number;
  status: IssueStatus;
  priority: Priority;
  unitId: string;
  createdAt: string;
  lastTransitionAt: string;
  version: number;
}

export interface IssueDetail extends IssueRecord {
  reports: Report[];
  events: StatusEvent[];
}

export interface IssueFilter {
  status?: IssueStatus;
  category?: Category;
  unitId?: string;
}

export interface Page<T> {
  items: T[];
  page: number;
  pageSize: number;
  total: number;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
