import { z } from "zod";
import type { Notification } from "../collaborators/notifications.js";
import type { Category, GeoPoint, IssueDetail, IssueRecord, IssueStatus, Page, Priority, Report, SessionUser, StatusEvent } from "../types.js";

const jsonHeaders = { "Content-Type": "application/json" };

export interface SubmittedReport {
  reportId: string;
  issueId: string;
  status: IssueStatus;
}

export interface IssueQuery {
  status?: IssueStatus;
  category?: Category;
  unit?: string;
  page?: number;
  pageSize?: number;
}

export class ApiError extends Error {
  constructor(readonly status: number, readonly code: string, message: string, readonly details?: unknown) {
    super(message);
    this.name = "ApiError";
  }
}

const errorPayloadSchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
  details: z.unknown().optional()
});

/** Thin fetch wrapper over the HTTP API. Every non-2xx response becomes an ApiError. */
export class CivicApiClient {
  private readonly base: string;

  constructor(baseUrl = "", public token: string | null = null) {
    this.base = baseUrl.replace(/\/+$/, "");
  }

  apiUrl(path: string): string {
    if (!this.base) return path;
    return `${this.base}${path.startsWith("/") ? path : `/${path}`}`;
  }

  async login(email: string, password: string): Promise<{ token: string; user: SessionUser }> {
    const session = await this.request<{ token: string; user: SessionUser }>("POST", "/api/auth/login", { email, password });
    this.token = session.token;
    return session;
  }

  async register(name: string, email: string, password: string): Promise<{ token: string; user: SessionUser }> {
    const session = await this.request<{ token: string; user: SessionUser }>("POST", "/api/auth/register", {
      name,
      email,
      password
    });
    this.token = session.token;
    return session;
  }

  async logout() {
    await this.request<{ success: boolean }>("POST", "/api/auth/logout");
    this.token = null;
  }

  listCategories(): Promise<Category[]> {
    return this.request("GET", "/api/categories");
  }

  async uploadPhoto(photo: Blob, fileName: string): Promise<string> {
    const body = new FormData();
    body.append("photo", photo, fileName);
    const { mediaRef } = await this.send<{ mediaRef: string }>("POST", "/api/media", body, this.authHeaders());
    return mediaRef;
  }

  submitReport(payload: {
    category: Category;
    description: string;
    location: GeoPoint;
    mediaRef?: string | null;
  }): Promise<SubmittedReport> {
    return this.request("POST", "/api/reports", payload);
  }

  myReports(): Promise<Array<Report & { issueStatus: IssueStatus | null }>> {
    return this.request("GET", "/api/reports/mine");
  }

  getReport(id: string): Promise<Report> {
    return this.request("GET", `/api/reports/${encodeURIComponent(id)}`);
  }

  listIssues(query: IssueQuery = {}): Promise<Page<IssueRecord>> {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) params.set(key, String(value));
    }
    const search = params.toString();
    return this.request("GET", `/api/issues${search ? `?${search}` : ""}`);
  }

  getIssue(id: string): Promise<IssueDetail> {
    return this.request("GET", `/api/issues/${encodeURIComponent(id)}`);
  }

  transitionIssue(id: string, targetStatus: IssueStatus, note?: string): Promise<StatusEvent> {
    return this.request("POST", `/api/issues/${encodeURIComponent(id)}/transition`, { targetStatus, note });
  }

  setPriority(id: string, priority: Priority): Promise<IssueRecord> {
    return this.request("PATCH", `/api/issues/${encodeURIComponent(id)}/priority`, { priority });
  }

  notifications(): Promise<Notification[]> {
    return this.request("GET", "/api/notifications");
  }

  markNotificationRead(id: string): Promise<Notification> {
    return this.request("POST", `/api/notifications/${encodeURIComponent(id)}/read`);
  }

  private authHeaders(): Record<string, string> {
    return this.token ? { Authorization: `Bearer ${this.token}` } : {};
  }

  private request<T>(method: string, path: string, payload?: unknown): Promise<T> {
    const body = payload === undefined ? undefined : JSON.stringify(payload);
    return this.send<T>(method, path, body, { ...jsonHeaders, ...this.authHeaders() });
  }

  private async send<T>(method: string, path: string, body: string | FormData | undefined, headers: Record<string, string>): Promise<T> {
    const response = await fetch(this.apiUrl(path), { method, headers, body });
    const json: unknown = await response.json();
    if (!response.ok) {
      const payload = errorPayloadSchema.catch({}).parse(json);
      throw new ApiError(response.status, payload.error ?? "Error", payload.message ?? `Request failed with ${response.status}`, payload.details);
    }
    return json as T;
  }
}
