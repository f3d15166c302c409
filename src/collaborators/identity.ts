import bcrypt from "bcryptjs";
import { v4 as uuid } from "uuid";
import type { Db } from "../db.js";
import type { IssueStatus, SessionUser, UserRole } from "../types.js";

export type AuthorizationAction = `transition:${IssueStatus}` | "set_priority";

export interface IdentityAuthorizer {
  authorize(actorId: string, unitId: string, action: AuthorizationAction): Promise<boolean>;
}

/**
 * Users-table backed identity. Admins may act for every unit; officials only for the unit they
 * are attached to; citizens for none.
 */
export class DbIdentityAuthorizer implements IdentityAuthorizer {
  constructor(private readonly db: Db) {}

  async authorize(actorId: string, unitId: string, _action: AuthorizationAction): Promise<boolean> {
    const id = Number(actorId);
    if (!Number.isInteger(id)) return false;
    const user = this.db.prepare("SELECT role, unit_id FROM users WHERE id = ?").get(id) as
      | { role: UserRole; unit_id: string | null }
      | undefined;
    if (!user) return false;
    if (user.role === "admin") return true;
    return user.role === "authority" && user.unit_id === unitId;
  }
}

export interface NewUser {
  email: string;
  password: string;
  name: string;
  role: UserRole;
  unitId?: string | null;
}

export class UserDirectory {
  private readonly sessions = new Map<string, SessionUser>();

  constructor(private readonly db: Db, private readonly hashRounds = 10) {}

  create(user: NewUser): SessionUser {
    const hash = bcrypt.hashSync(user.password, this.hashRounds);
    const result = this.db
      .prepare("INSERT INTO users (email, password, name, role, unit_id) VALUES (?, ?, ?, ?, ?)")
      .run(user.email, hash, user.name, user.role, user.unitId ?? null);
    return { id: Number(result.lastInsertRowid), email: user.email, name: user.name, role: user.role, unit_id: user.unitId ?? null };
  }

  exists(email: string) {
    return this.db.prepare("SELECT 1 AS found FROM users WHERE email = ?").get(email) !== undefined;
  }

  verify(email: string, password: string): SessionUser | undefined {
    const user = this.db.prepare("SELECT * FROM users WHERE email = ?").get(email) as
      | (SessionUser & { password: string })
      | undefined;
    if (!user || !bcrypt.compareSync(password, user.password)) return undefined;
    return { id: user.id, email: user.email, name: user.name, role: user.role, unit_id: user.unit_id };
  }

  openSession(user: SessionUser): string {
    const token = uuid();
    this.sessions.set(token, user);
    this.db.prepare("INSERT OR REPLACE INTO user_sessions (token, user_id) VALUES (?, ?)").run(token, user.id);
    return token;
  }

  closeSession(token: string) {
    this.sessions.delete(token);
    this.db.prepare("DELETE FROM user_sessions WHERE token = ?").run(token);
  }

  fromToken(token: string): SessionUser | undefined {
    const cached = this.sessions.get(token);
    if (cached) return cached;
    const row = this.db
      .prepare(`
        SELECT u.id, u.email, u.name, u.role, u.unit_id
        FROM user_sessions s
        JOIN users u ON u.id = s.user_id
        WHERE s.token = ?
      `)
      .get(token) as SessionUser | undefined;
    if (row) this.sessions.set(token, row);
    return row;
  }

  idsWhere(filter: { role: UserRole; unitId?: string }): string[] {
    const rows = (
      filter.unitId === undefined
        ? this.db.prepare("SELECT id FROM users WHERE role = ? ORDER BY id").all(filter.role)
        : this.db.prepare("SELECT id FROM users WHERE role = ? AND unit_id = ? ORDER BY id").all(filter.role, filter.unitId)
    ) as Array<{ id: number }>;
    return rows.map((row) => String(row.id));
  }
}
